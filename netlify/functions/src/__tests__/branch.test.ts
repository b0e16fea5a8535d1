import { describe, it, expect } from '@jest/globals'
import { DEFAULT_PRIORITY_BRANCHES, extractBranch, parseBranchList } from '../branch.js'

describe('extractBranch', () => {
  it('returns the first two-letter uppercase run', () => {
    expect(extractBranch('21CS001')).toBe('CS')
    expect(extractBranch('2101EC45')).toBe('EC')
    expect(extractBranch('x-MTAI-9')).toBe('MT')
  })

  it('returns NA for missing values', () => {
    expect(extractBranch(undefined)).toBe('NA')
    expect(extractBranch(null)).toBe('NA')
  })

  it('returns NA when no two-letter run exists', () => {
    expect(extractBranch('')).toBe('NA')
    expect(extractBranch('21cs001')).toBe('NA')
    expect(extractBranch('21C0S1')).toBe('NA')
    expect(extractBranch(12345)).toBe('NA')
  })

  it('is idempotent on extracted codes', () => {
    for (const code of [...DEFAULT_PRIORITY_BRANCHES, 'NA', 'ZZ']) {
      expect(extractBranch(extractBranch(code))).toBe(code)
    }
  })
})

describe('parseBranchList', () => {
  it('uppercases, splits and drops duplicates', () => {
    expect(parseBranchList('cs, ec;AI  cs')).toEqual(['CS', 'EC', 'AI'])
  })

  it('returns an empty list for blank input', () => {
    expect(parseBranchList('  ')).toEqual([])
  })
})
