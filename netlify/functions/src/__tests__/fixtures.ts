import { extractBranch } from '../branch.js'
import type { Group, StudentRecord } from '../types.js'

export function student(roll: string, extra: Record<string, string> = {}): StudentRecord {
  return {
    Roll: roll,
    Name: `Student ${roll}`,
    Email: `${roll.toLowerCase()}@example.edu`,
    Branch: extractBranch(roll),
    extra,
  }
}

export function students(...rolls: string[]): StudentRecord[] {
  return rolls.map((roll) => student(roll))
}

export function rolls(groups: readonly Group[]): string[][] {
  return groups.map((group) => group.map((record) => record.Roll))
}

export const BOUNDARY = 'test-boundary'

export interface Part {
  name: string
  value: string
  filename?: string
}

export function multipartBody(parts: Part[]): string {
  const chunks = parts.map((part) => {
    const disposition = part.filename
      ? `form-data; name="${part.name}"; filename="${part.filename}"`
      : `form-data; name="${part.name}"`
    const type = part.filename ? 'Content-Type: text/csv\r\n' : ''
    return `--${BOUNDARY}\r\nContent-Disposition: ${disposition}\r\n${type}\r\n${part.value}\r\n`
  })
  return `${chunks.join('')}--${BOUNDARY}--\r\n`
}
