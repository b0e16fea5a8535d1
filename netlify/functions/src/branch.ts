export const DEFAULT_PRIORITY_BRANCHES: readonly string[] = [
  'AI',
  'CB',
  'CE',
  'CH',
  'CS',
  'CT',
  'EC',
  'MC',
  'MM',
  'MT',
]

export const UNKNOWN_BRANCH = 'NA'

const BRANCH_PATTERN = /[A-Z]{2}/

/**
 * Branch code of a roll identifier: the first run of two uppercase letters,
 * or `NA` when the value is missing or has none.
 */
export function extractBranch(roll: unknown): string {
  if (roll === undefined || roll === null) return UNKNOWN_BRANCH
  const match = BRANCH_PATTERN.exec(String(roll))
  return match ? match[0] : UNKNOWN_BRANCH
}

export function parseBranchList(raw: string): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const part of raw.split(/[\s,;]+/)) {
    const code = part.trim().toUpperCase()
    if (!code || seen.has(code)) continue
    seen.add(code)
    out.push(code)
  }
  return out
}
