import JSZip from 'jszip'
import * as XLSX from 'xlsx'
import { recordColumns, recordToRow } from './workbook.js'
import type { StudentRecord } from './types.js'

export const ARCHIVE_FILE_DEFAULT = 'branches_csv.zip'

export function branchFileName(branch: string): string {
  return `${branch}_students.csv`
}

export function recordsToCsv(records: readonly StudentRecord[]): string {
  const header = recordColumns(records)
  const sheet = XLSX.utils.json_to_sheet(records.map(recordToRow), { header })
  return XLSX.utils.sheet_to_csv(sheet)
}

/** One CSV per branch, named `<BRANCH>_students.csv`, rows kept in roster order. */
export async function buildBranchArchive(records: readonly StudentRecord[]): Promise<Buffer> {
  const byBranch = new Map<string, StudentRecord[]>()
  for (const record of records) {
    const list = byBranch.get(record.Branch) ?? []
    list.push(record)
    byBranch.set(record.Branch, list)
  }
  const zip = new JSZip()
  for (const branch of Array.from(byBranch.keys()).sort()) {
    zip.file(branchFileName(branch), recordsToCsv(byBranch.get(branch) ?? []))
  }
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' })
}
