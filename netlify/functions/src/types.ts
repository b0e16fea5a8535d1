export interface StudentRecord {
  readonly Roll: string
  readonly Name: string
  readonly Email: string
  readonly Branch: string
  // remaining roster columns, verbatim and in header order
  readonly extra: Readonly<Record<string, string>>
}

export type Group = readonly StudentRecord[]

export type RawRow = Record<string, unknown>

export interface SummaryRow {
  group: string
  counts: Record<string, number>
  total: number
}

export interface SummaryMatrix {
  branches: string[]
  rows: SummaryRow[]
}

export interface Allocation {
  groups: Group[]
  summary: SummaryMatrix
}

export interface GroupingResult {
  groups: number
  records: number
  priority: readonly string[]
  chunkSize: number
  branchwise: Allocation
  uniform: Allocation
}

export interface BranchCount {
  branch: string
  count: number
}

export const RECORD_COLUMNS = ['Roll', 'Name', 'Email', 'Branch'] as const
