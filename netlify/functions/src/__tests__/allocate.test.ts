import { describe, it, expect } from '@jest/globals'
import {
  branchwiseAllocation,
  chunkSizeFor,
  countAllocated,
  drawCycle,
  drawRoundRobin,
  groupTargets,
  uniformAllocation,
} from '../allocate.js'
import type { StudentRecord } from '../types.js'
import { rolls, student, students } from './fixtures.js'

function mixedRoster(): StudentRecord[] {
  const out: StudentRecord[] = []
  const branches = ['CS', 'EC', 'ME', 'AI', 'CE']
  for (let i = 0; i < 23; i++) {
    const code = branches[(i * 7) % branches.length]
    out.push(student(`21${code}${String(i).padStart(3, '0')}`))
  }
  return out
}

describe('drawCycle', () => {
  it('puts listed branches first in priority order, then the rest as first seen', () => {
    const records = students('22ZZ001', '22CS001', '22XY001', '22AI001', '22CS002')
    expect(drawCycle(records)).toEqual(['AI', 'CS', 'ZZ', 'XY'])
  })

  it('uses a custom priority list', () => {
    const records = students('21CS001', '21EC001', '21ME001')
    expect(drawCycle(records, ['ME', 'EC'])).toEqual(['ME', 'EC', 'CS'])
  })

  it('lists a branch once when the priority list repeats it', () => {
    const records = students('21CS001', '21EC001')
    expect(drawCycle(records, ['CS', 'CS', 'EC'])).toEqual(['CS', 'EC'])
  })
})

describe('groupTargets', () => {
  it('gives the first total mod n groups one extra record', () => {
    expect(groupTargets(9, 4)).toEqual([3, 2, 2, 2])
    expect(groupTargets(3, 5)).toEqual([1, 1, 1, 0, 0])
    expect(groupTargets(0, 3)).toEqual([0, 0, 0])
  })
})

describe('branchwiseAllocation', () => {
  it('draws one record per branch per round', () => {
    const records = students('21CS001', '21CS002', '21CS003', '21EC001')
    const groups = branchwiseAllocation(records, 2)
    expect(rolls(groups)).toEqual([
      ['21CS001', '21EC001'],
      ['21CS002', '21CS003'],
    ])
  })

  it('keeps sweeping the cycle while a group is under target', () => {
    const records = students(
      '21CS001', '21CS002', '21EC001', '21CS003', '21AI001',
      '21EC002', '21CS004', '21EC003', '21CS005',
    )
    const groups = branchwiseAllocation(records, 4)
    expect(rolls(groups)).toEqual([
      ['21AI001', '21CS001', '21EC001'],
      ['21CS002', '21EC002'],
      ['21CS003', '21EC003'],
      ['21CS004', '21CS005'],
    ])
  })

  it('follows the priority option', () => {
    const records = students('21CS001', '21CS002', '21CS003', '21EC001')
    const groups = branchwiseAllocation(records, 2, { priority: ['EC', 'CS'] })
    expect(rolls(groups)).toEqual([
      ['21EC001', '21CS001'],
      ['21CS002', '21CS003'],
    ])
  })

  it('draws once per branch per round when the priority list repeats a code', () => {
    const records = students('21CS001', '21CS002', '21EC001', '21EC002')
    const groups = branchwiseAllocation(records, 2, { priority: ['CS', 'CS', 'EC'] })
    expect(rolls(groups)).toEqual([
      ['21CS001', '21EC001'],
      ['21CS002', '21EC002'],
    ])
  })

  it('returns empty trailing groups when there are fewer records than groups', () => {
    const groups = branchwiseAllocation(students('21CS001', '21EC001', '21ME001'), 5)
    expect(groups.map((g) => g.length)).toEqual([1, 1, 1, 0, 0])
  })

  it('keeps group sizes within one of each other', () => {
    const records = mixedRoster()
    for (const n of [1, 2, 3, 5, 7, 23, 30]) {
      const groups = branchwiseAllocation(records, n)
      const sizes = groups.map((g) => g.length)
      expect(groups).toHaveLength(n)
      expect(countAllocated(groups)).toBe(records.length)
      expect(Math.max(...sizes) - Math.min(...sizes)).toBeLessThanOrEqual(1)
    }
  })

  it('does not modify its input', () => {
    const records = students('21CS001', '21EC001', '21CS002')
    const copy = [...records]
    branchwiseAllocation(records, 2)
    expect(records).toEqual(copy)
  })
})

describe('drawRoundRobin', () => {
  it('stops a group on a round with no stock and leaves later groups short without throwing', () => {
    const [cs1, cs2, ec1] = students('21CS001', '21CS002', '21EC001')
    const stock = new Map([
      ['CS', [cs1, cs2]],
      ['EC', [ec1]],
    ])
    const groups = drawRoundRobin(['CS', 'EC'], stock, [2, 3, 2])
    expect(rolls(groups)).toEqual([['21CS001', '21EC001'], ['21CS002'], []])
    expect(countAllocated(groups)).toBe(3)
  })

  it('never takes from branches outside the cycle', () => {
    const [cs1, me1] = students('21CS001', '21ME001')
    const stock = new Map([
      ['CS', [cs1]],
      ['ME', [me1]],
    ])
    expect(rolls(drawRoundRobin(['CS'], stock, [2]))).toEqual([['21CS001']])
  })
})

describe('uniformAllocation', () => {
  it('cuts full chunks per branch and merges the tails', () => {
    const records = students(
      '21CS001', '21EC001', '21CS002', '21ME001', '21CS003', '21EC002', '21CS004',
    )
    const groups = uniformAllocation(records, 3)
    expect(chunkSizeFor(7, 3)).toBe(3)
    expect(rolls(groups)).toEqual([
      ['21CS001', '21CS002', '21CS003'],
      ['21EC001', '21EC002', '21CS004'],
      ['21ME001'],
    ])
    expect(countAllocated(groups)).toBe(7)
  })

  it('splits a tail that does not fit and puts the rest back at the front', () => {
    const records = students('21CS001', '21CS002', '21EC001', '21EC002', '21ME001', '21ME002')
    const groups = uniformAllocation(records, 2)
    expect(rolls(groups)).toEqual([
      ['21CS001', '21CS002', '21EC001'],
      ['21EC002', '21ME001', '21ME002'],
    ])
  })

  it('breaks population ties by first appearance', () => {
    const records = students('21EC001', '21CS001', '21CS002', '21EC002')
    const groups = uniformAllocation(records, 4)
    expect(rolls(groups)).toEqual([['21EC001'], ['21EC002'], ['21CS001'], ['21CS002']])
  })

  it('pads with empty groups', () => {
    const groups = uniformAllocation(students('21CS001', '21CS002', '21CS003', '21CS004'), 3)
    expect(rolls(groups)).toEqual([['21CS001', '21CS002'], ['21CS003', '21CS004'], []])
  })

  it('places every record once and respects the chunk size', () => {
    const records = mixedRoster()
    for (const n of [1, 2, 3, 4, 6, 9, 23, 40]) {
      const groups = uniformAllocation(records, n)
      const size = chunkSizeFor(records.length, n)
      expect(groups).toHaveLength(n)
      expect(countAllocated(groups)).toBe(records.length)
      for (const group of groups) expect(group.length).toBeLessThanOrEqual(size)
      const placed = groups.flat().map((r) => r.Roll).sort()
      expect(placed).toEqual(records.map((r) => r.Roll).sort())
    }
  })
})

describe('empty input', () => {
  it('yields n empty groups from both allocators', () => {
    expect(branchwiseAllocation([], 5)).toEqual([[], [], [], [], []])
    expect(uniformAllocation([], 5)).toEqual([[], [], [], [], []])
  })
})
