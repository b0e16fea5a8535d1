import { parse } from 'csv-parse/sync'
import iconv from 'iconv-lite'
import { promises as fs } from 'fs'
import { extname } from 'path'
import * as XLSX from 'xlsx'
import { extractBranch } from './branch.js'
import { RosterError, errorMessage } from './errors.js'
import { RECORD_COLUMNS } from './types.js'
import type { RawRow, StudentRecord } from './types.js'

const SPREADSHEET_EXTENSIONS = new Set(['.xlsx', '.xlsm', '.xls'])

const ROLL_HEADERS = ['roll', 'roll no', 'roll no.', 'roll number', 'rollno', 'roll_no', 'roll id', 'id']
const NAME_HEADERS = ['name', 'student name', 'full name']
const EMAIL_HEADERS = ['email', 'e-mail', 'email id', 'email address', 'mail']
// Headers that name a record field; never carried as extra columns.
const RESERVED_HEADERS = new Set<string>(RECORD_COLUMNS.map((col) => col.toLowerCase()))

export interface RosterColumns {
  rollCol: string | null
  nameCol: string | null
  emailCol: string | null
  extraCols: string[]
}

export interface Roster {
  columns: RosterColumns
  records: StudentRecord[]
}

export function decodeBuffer(buffer: Buffer): { text: string; encoding: string } {
  if (buffer.length === 0) {
    return { text: '', encoding: 'utf8' }
  }
  const first = buffer[0]
  const second = buffer[1]
  if (first === 0xff && second === 0xfe) {
    return { text: iconv.decode(buffer, 'utf16-le'), encoding: 'utf16le' }
  }
  if (first === 0xfe && second === 0xff) {
    return { text: iconv.decode(buffer, 'utf16-be'), encoding: 'utf16be' }
  }
  if (buffer.subarray(0, 3).equals(Buffer.from([0xef, 0xbb, 0xbf]))) {
    return { text: iconv.decode(buffer, 'utf8'), encoding: 'utf8-sig' }
  }
  return { text: iconv.decode(buffer, 'utf8'), encoding: 'utf8' }
}

export function detectDelimiter(sample: string): string {
  const candidates = [',', ';', '\t']
  const lines = sample.split(/\r?\n/).slice(0, 5)
  let best = ','
  let bestScore = -1
  for (const cand of candidates) {
    const counts = lines.map((ln) => (ln.includes(cand) ? ln.split(cand).length : 0))
    const avg = counts.reduce((a, b) => a + b, 0) / (counts.length || 1)
    if (avg > bestScore) {
      best = cand
      bestScore = avg
    }
  }
  return best
}

function isRawRow(value: unknown): value is RawRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseCsvRows(buffer: Buffer): RawRow[] {
  const { text } = decodeBuffer(buffer)
  const parsed: unknown = parse(text, {
    columns: (header: string[]) => header.map((h) => h.trim()),
    skip_empty_lines: true,
    delimiter: detectDelimiter(text),
    relax_column_count: true,
  })
  if (!Array.isArray(parsed)) return []
  return parsed.filter(isRawRow)
}

function parseSpreadsheetRows(buffer: Buffer): RawRow[] {
  const workbook = XLSX.read(buffer, { type: 'buffer' })
  const sheetName = workbook.SheetNames[0]
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined
  if (!sheet) return []
  return XLSX.utils.sheet_to_json<RawRow>(sheet, { defval: '', raw: false })
}

export function cleanRaw(val: unknown): string {
  if (val === undefined || val === null) return ''
  if (typeof val === 'string') return val
  return String(val)
}

function isBlankRow(row: RawRow): boolean {
  return Object.values(row).every((value) => cleanRaw(value).trim() === '')
}

/** Reads the rows of the first sheet (spreadsheets) or of the whole file (CSV). */
export function readRosterRows(buffer: Buffer, filename: string): RawRow[] {
  const ext = extname(filename).toLowerCase()
  let rows: RawRow[]
  try {
    rows = SPREADSHEET_EXTENSIONS.has(ext) ? parseSpreadsheetRows(buffer) : parseCsvRows(buffer)
  } catch (err) {
    throw new RosterError(`Could not read roster ${filename}: ${errorMessage(err)}`)
  }
  return rows.filter((row) => !isBlankRow(row))
}

export function detectRosterColumns(rows: RawRow[]): RosterColumns {
  if (!rows.length) return { rollCol: null, nameCol: null, emailCol: null, extraCols: [] }
  const header = Object.keys(rows[0])
  const lookup = new Map(header.map((h) => [h.trim().toLowerCase(), h]))
  const pick = (cands: string[]): string | null => {
    for (const cand of cands) {
      const found = lookup.get(cand)
      if (found !== undefined) return found
    }
    return null
  }
  const rollCol = pick(ROLL_HEADERS)
  const nameCol = pick(NAME_HEADERS)
  const emailCol = pick(EMAIL_HEADERS)
  const used = new Set([rollCol, nameCol, emailCol])
  const extraCols = header.filter((h) => !used.has(h) && !RESERVED_HEADERS.has(h.trim().toLowerCase()))
  return { rollCol, nameCol, emailCol, extraCols }
}

/**
 * Builds the read-only records the allocators work on. Missing Roll, Name or
 * Email columns become empty strings; the branch always comes from Roll.
 */
export function annotateRecords(rows: RawRow[], columns: RosterColumns = detectRosterColumns(rows)): StudentRecord[] {
  const { rollCol, nameCol, emailCol, extraCols } = columns
  return rows.map((row) => {
    const extra: Record<string, string> = {}
    for (const col of extraCols) extra[col] = cleanRaw(row[col])
    const roll = rollCol ? cleanRaw(row[rollCol]) : ''
    return Object.freeze({
      Roll: roll,
      Name: nameCol ? cleanRaw(row[nameCol]) : '',
      Email: emailCol ? cleanRaw(row[emailCol]) : '',
      Branch: extractBranch(rollCol ? row[rollCol] : ''),
      extra: Object.freeze(extra),
    })
  })
}

export function parseRoster(buffer: Buffer, filename: string): Roster {
  const rows = readRosterRows(buffer, filename)
  const columns = detectRosterColumns(rows)
  return { columns, records: annotateRecords(rows, columns) }
}

export async function loadRoster(path: string, filename: string = path): Promise<Roster> {
  let buffer: Buffer
  try {
    buffer = await fs.readFile(path)
  } catch (err) {
    throw new RosterError(`Could not open roster ${filename}: ${errorMessage(err)}`)
  }
  return parseRoster(buffer, filename)
}
