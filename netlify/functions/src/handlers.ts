import type { HandlerResponse } from '@netlify/functions'
import { loadConfig, paramsSchema } from './config.js'
import type { AppConfig, GroupingParams } from './config.js'
import { RequestError } from './errors.js'
import { archiveRequest, extractBranchesFromRoster, groupsRequest, processRequest } from './logic.js'
import { createLogger } from './logger.js'
import {
  cleanupFiles,
  fileResponse,
  jsonResponse,
  parseJsonField,
  parseMultipart,
} from './shared.js'
import type { RequestEvent, UploadedFile } from './shared.js'

const logger = createLogger('handlers')

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'

interface Upload {
  roster: UploadedFile
  fields: Record<string, string>
}

/** Parses the upload, hands the roster to `work` and always removes the temp files. */
async function withRoster(event: RequestEvent, work: (upload: Upload) => Promise<HandlerResponse>): Promise<HandlerResponse> {
  const { fields, files } = await parseMultipart(event)
  try {
    const roster = files['roster']
    if (!roster) {
      throw new RequestError('roster file is required')
    }
    return await work({ roster, fields })
  } finally {
    await cleanupFiles(Object.values(files))
  }
}

export function parseGroupingParams(fields: Record<string, string>, config: AppConfig): GroupingParams {
  const parsed = paramsSchema(config).safeParse(parseJsonField(fields['params']))
  if (!parsed.success) {
    throw new RequestError(parsed.error.issues.map((issue) => issue.message).join('; '))
  }
  return parsed.data
}

export async function handleProcess(event: RequestEvent, config: AppConfig = loadConfig()): Promise<HandlerResponse> {
  return withRoster(event, async ({ roster, fields }) => {
    const params = parseGroupingParams(fields, config)
    const { buffer, meta } = await processRequest(roster.path, roster.filename, params, { priority: config.priority })
    logger.info('Groups workbook built', { filename: roster.filename, groups: meta.groups, records: meta.records })
    return fileResponse(buffer, meta.output_xlsx, XLSX_CONTENT_TYPE, {
      'X-Student-Groups-Meta': JSON.stringify(meta),
    })
  })
}

export async function handleGroups(event: RequestEvent, config: AppConfig = loadConfig()): Promise<HandlerResponse> {
  return withRoster(event, async ({ roster, fields }) => {
    const params = parseGroupingParams(fields, config)
    const payload = await groupsRequest(roster.path, roster.filename, params, { priority: config.priority })
    return jsonResponse(200, payload)
  })
}

export async function handleArchive(event: RequestEvent): Promise<HandlerResponse> {
  return withRoster(event, async ({ roster }) => {
    const { buffer, filename, branches } = await archiveRequest(roster.path, roster.filename)
    logger.info('Branch archive built', { filename: roster.filename, branches: branches.length })
    return fileResponse(buffer, filename, 'application/zip')
  })
}

export async function handleBranches(event: RequestEvent): Promise<HandlerResponse> {
  return withRoster(event, async ({ roster }) => {
    const items = await extractBranchesFromRoster(roster.path, roster.filename)
    return jsonResponse(200, items)
  })
}

export function handleHealth(): HandlerResponse {
  return jsonResponse(200, { ok: true })
}
