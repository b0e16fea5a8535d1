import type { Group, SummaryMatrix, SummaryRow } from './types.js'

export function groupLabel(index: number): string {
  return `Group ${index + 1}`
}

export function compileSummary(groups: readonly Group[]): SummaryMatrix {
  const codes = new Set<string>()
  for (const group of groups) {
    for (const record of group) codes.add(record.Branch)
  }
  const branches = Array.from(codes).sort()

  const rows: SummaryRow[] = groups.map((group, index) => {
    const counts: Record<string, number> = {}
    for (const code of branches) counts[code] = 0
    for (const record of group) counts[record.Branch] += 1
    return { group: groupLabel(index), counts, total: group.length }
  })
  return { branches, rows }
}

/** Flattens a summary into `{ Group, <branch>..., Total }` rows for tables and sheets. */
export function summaryToRows(summary: SummaryMatrix): Record<string, string | number>[] {
  return summary.rows.map((row) => {
    const out: Record<string, string | number> = { Group: row.group }
    for (const code of summary.branches) out[code] = row.counts[code] ?? 0
    out.Total = row.total
    return out
  })
}

export function summaryColumns(summary: SummaryMatrix): string[] {
  return ['Group', ...summary.branches, 'Total']
}
