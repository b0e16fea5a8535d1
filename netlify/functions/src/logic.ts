import { DateTime } from 'luxon'
import { branchwiseAllocation, chunkSizeFor, countAllocated, uniformAllocation } from './allocate.js'
import { ARCHIVE_FILE_DEFAULT, buildBranchArchive } from './archive.js'
import type { GroupingParams } from './config.js'
import { createLogger } from './logger.js'
import { loadRoster } from './roster.js'
import { compileSummary, groupLabel, summaryToRows } from './summary.js'
import type { BranchCount, GroupingResult, StudentRecord } from './types.js'
import { WORKBOOK_FILE_DEFAULT, buildWorkbook, recordToRow } from './workbook.js'

const logger = createLogger('logic')

export interface GroupingOptions {
  priority: readonly string[]
}

export interface ProcessMeta {
  output_xlsx: string
  groups: number
  records: number
  branches: string[]
  chunk_size: number
  branchwise_allocated: number
  uniform_allocated: number
  priority: string[]
  generated_at: string
}

export interface ProcessPayload {
  buffer: Buffer
  meta: ProcessMeta
}

export interface ArchivePayload {
  buffer: Buffer
  filename: string
  branches: BranchCount[]
}

export interface GroupView {
  group: string
  records: Record<string, string>[]
}

export interface GroupsPayload {
  meta: ProcessMeta
  branchwise: { summary: Record<string, string | number>[]; groups: GroupView[] }
  uniform: { summary: Record<string, string | number>[]; groups: GroupView[] }
}

export function extractBranchCounts(records: readonly StudentRecord[]): BranchCount[] {
  const counts = new Map<string, number>()
  for (const record of records) {
    counts.set(record.Branch, (counts.get(record.Branch) ?? 0) + 1)
  }
  return Array.from(counts, ([branch, count]) => ({ branch, count }))
}

/** Runs both allocators over the same records and summarises each result. */
export function runGrouping(records: readonly StudentRecord[], groups: number, options: GroupingOptions): GroupingResult {
  const branchwiseGroups = branchwiseAllocation(records, groups, { priority: options.priority })
  const uniformGroups = uniformAllocation(records, groups)
  return {
    groups,
    records: records.length,
    priority: options.priority,
    chunkSize: chunkSizeFor(records.length, groups),
    branchwise: { groups: branchwiseGroups, summary: compileSummary(branchwiseGroups) },
    uniform: { groups: uniformGroups, summary: compileSummary(uniformGroups) },
  }
}

export function describeResult(result: GroupingResult, generatedAt: string): ProcessMeta {
  const branches = new Set<string>([...result.branchwise.summary.branches, ...result.uniform.summary.branches])
  return {
    output_xlsx: WORKBOOK_FILE_DEFAULT,
    groups: result.groups,
    records: result.records,
    branches: Array.from(branches).sort(),
    chunk_size: result.chunkSize,
    branchwise_allocated: countAllocated(result.branchwise.groups),
    uniform_allocated: countAllocated(result.uniform.groups),
    priority: [...result.priority],
    generated_at: generatedAt,
  }
}

function generatedAtNow(): string {
  return DateTime.now().toUTC().toISO() ?? new Date().toISOString()
}

async function groupRoster(
  rosterPath: string,
  filename: string,
  params: GroupingParams,
  options: GroupingOptions,
): Promise<GroupingResult> {
  const roster = await loadRoster(rosterPath, filename)
  logger.debug('Roster loaded', {
    filename,
    records: roster.records.length,
    rollColumn: roster.columns.rollCol,
  })
  return runGrouping(roster.records, params.groups, options)
}

export async function processRequest(
  rosterPath: string,
  filename: string,
  params: GroupingParams,
  options: GroupingOptions,
): Promise<ProcessPayload> {
  const result = await groupRoster(rosterPath, filename, params, options)
  const meta = describeResult(result, generatedAtNow())
  const buffer = await buildWorkbook(result, meta.generated_at)
  return { buffer, meta }
}

export async function groupsRequest(
  rosterPath: string,
  filename: string,
  params: GroupingParams,
  options: GroupingOptions,
): Promise<GroupsPayload> {
  const result = await groupRoster(rosterPath, filename, params, options)
  const view = (groups: GroupingResult['branchwise']['groups']): GroupView[] =>
    groups.map((group, index) => ({ group: groupLabel(index), records: group.map(recordToRow) }))
  return {
    meta: describeResult(result, generatedAtNow()),
    branchwise: { summary: summaryToRows(result.branchwise.summary), groups: view(result.branchwise.groups) },
    uniform: { summary: summaryToRows(result.uniform.summary), groups: view(result.uniform.groups) },
  }
}

export async function archiveRequest(rosterPath: string, filename: string): Promise<ArchivePayload> {
  const roster = await loadRoster(rosterPath, filename)
  const buffer = await buildBranchArchive(roster.records)
  return { buffer, filename: ARCHIVE_FILE_DEFAULT, branches: extractBranchCounts(roster.records) }
}

export async function extractBranchesFromRoster(rosterPath: string, filename: string): Promise<BranchCount[]> {
  const roster = await loadRoster(rosterPath, filename)
  return extractBranchCounts(roster.records)
}
