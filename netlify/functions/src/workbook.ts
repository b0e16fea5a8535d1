import { Workbook, Worksheet } from 'exceljs'
import { summaryColumns, summaryToRows } from './summary.js'
import { RECORD_COLUMNS } from './types.js'
import type { Group, GroupingResult, StudentRecord } from './types.js'

export const WORKBOOK_FILE_DEFAULT = 'student_groups.xlsx'

type Cell = string | number

function createWorksheetFromRows(workbook: Workbook, name: string, rows: Record<string, Cell>[], columns: string[]): Worksheet {
  const worksheet = workbook.addWorksheet(name.slice(0, 31))
  if (columns.length) {
    worksheet.columns = columns.map((key) => ({ header: key, key, width: Math.max(key.length + 2, 10) }))
    for (const row of rows) {
      worksheet.addRow(columns.map((col) => row[col] ?? ''))
    }
    worksheet.views = [{ state: 'frozen', ySplit: 1 }]
  }
  return worksheet
}

export function recordToRow(record: StudentRecord): Record<string, string> {
  return {
    Roll: record.Roll,
    Name: record.Name,
    Email: record.Email,
    Branch: record.Branch,
    ...record.extra,
  }
}

/** `Roll, Name, Email, Branch`, then every extra column seen, in first-seen order. */
export function recordColumns(records: Iterable<StudentRecord>): string[] {
  const columns: string[] = [...RECORD_COLUMNS]
  const seen = new Set<string>(columns)
  for (const record of records) {
    for (const key of Object.keys(record.extra)) {
      if (seen.has(key)) continue
      seen.add(key)
      columns.push(key)
    }
  }
  return columns
}

function addGroupSheets(workbook: Workbook, prefix: string, groups: Group[], columns: string[]): void {
  groups.forEach((group, index) => {
    createWorksheetFromRows(workbook, `${prefix}_${index + 1}`, group.map(recordToRow), columns)
  })
}

export async function buildWorkbook(result: GroupingResult, generatedAt: string): Promise<Buffer> {
  const workbook = new Workbook()
  workbook.creator = 'Student Groups'

  const { branchwise, uniform } = result
  createWorksheetFromRows(workbook, 'Branchwise_Summary', summaryToRows(branchwise.summary), summaryColumns(branchwise.summary))
  createWorksheetFromRows(workbook, 'Uniform_Summary', summaryToRows(uniform.summary), summaryColumns(uniform.summary))

  const columns = recordColumns([...branchwise.groups.flat(), ...uniform.groups.flat()])
  addGroupSheets(workbook, 'Branchwise', branchwise.groups, columns)
  addGroupSheets(workbook, 'Uniform', uniform.groups, columns)

  const metaSheet = workbook.addWorksheet('Meta')
  metaSheet.columns = [
    { header: 'Metric', key: 'Metric', width: 36 },
    { header: 'Value', key: 'Value', width: 40 },
  ]
  const branchwiseTotal = branchwise.summary.rows.reduce((sum, row) => sum + row.total, 0)
  const uniformTotal = uniform.summary.rows.reduce((sum, row) => sum + row.total, 0)
  const metaRows: [string, Cell][] = [
    ['Generated at', generatedAt],
    ['Groups', result.groups],
    ['Records', result.records],
    ['Branch priority', result.priority.join(', ')],
    ['Uniform chunk size', result.chunkSize],
    ['Branch-wise records allocated', branchwiseTotal],
    ['Uniform records allocated', uniformTotal],
  ]
  for (const row of metaRows) metaSheet.addRow(row)

  const buffer = await workbook.xlsx.writeBuffer()
  return Buffer.from(buffer)
}
