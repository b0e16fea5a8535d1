import Busboy from 'busboy'
import type { HandlerEvent, HandlerResponse } from '@netlify/functions'
import { randomUUID } from 'crypto'
import { createWriteStream } from 'fs'
import { promises as fs } from 'fs'
import { tmpdir } from 'os'
import { basename, join } from 'path'
import { RequestError, errorMessage } from './errors.js'
import { createLogger } from './logger.js'

const logger = createLogger('shared')

export type RequestEvent = Pick<HandlerEvent, 'httpMethod' | 'headers' | 'body' | 'isBase64Encoded' | 'path' | 'rawUrl'>

export interface UploadedFile {
  fieldName: string
  path: string
  filename: string
  contentType: string
}

export interface MultipartResult {
  fields: Record<string, string>
  files: Record<string, UploadedFile>
}

export async function parseMultipart(event: RequestEvent): Promise<MultipartResult> {
  const contentType = event.headers['content-type'] || event.headers['Content-Type']
  if (!contentType || !contentType.toLowerCase().startsWith('multipart/form-data')) {
    throw new RequestError('Expected multipart/form-data request')
  }
  const bodyBuffer = Buffer.from(event.body || '', event.isBase64Encoded ? 'base64' : 'utf8')
  return new Promise((resolve, reject) => {
    let busboy: Busboy.Busboy
    try {
      busboy = Busboy({ headers: { 'content-type': contentType } })
    } catch (err) {
      reject(new RequestError(`Malformed multipart request: ${errorMessage(err)}`))
      return
    }
    const fields: Record<string, string> = {}
    const files: Record<string, UploadedFile> = {}
    const writePromises: Promise<void>[] = []

    busboy.on('field', (name, value) => {
      fields[name] = value
    })

    busboy.on('file', (fieldName, stream, info) => {
      const filename = info.filename || `${fieldName}-${randomUUID()}`
      const tmpPath = join(tmpdir(), `upload-${Date.now()}-${randomUUID()}-${basename(filename)}`)
      const outStream = createWriteStream(tmpPath)
      const record: UploadedFile = {
        fieldName,
        path: tmpPath,
        filename,
        contentType: info.mimeType || 'application/octet-stream',
      }
      const writePromise = new Promise<void>((res, rej) => {
        stream.on('error', rej)
        outStream.on('error', rej)
        outStream.on('finish', res)
      }).then(() => {
        files[fieldName] = record
      })
      stream.pipe(outStream)
      writePromises.push(writePromise)
    })

    busboy.on('error', (err) => reject(new RequestError(`Malformed multipart request: ${errorMessage(err)}`)))
    busboy.on('finish', () => {
      Promise.all(writePromises)
        .then(() => resolve({ fields, files }))
        .catch(reject)
    })

    busboy.end(bodyBuffer)
  })
}

export async function cleanupFiles(files: Iterable<UploadedFile>): Promise<void> {
  for (const file of files) {
    try {
      await fs.unlink(file.path)
    } catch (err) {
      logger.warn('Could not remove uploaded file', { path: file.path, error: errorMessage(err) })
    }
  }
}

export function parseJsonField(raw: string | undefined): unknown {
  if (!raw) return {}
  try {
    return JSON.parse(raw)
  } catch {
    return {}
  }
}

export function normalisePath(event: RequestEvent): string {
  let rawPath: string
  if (event.rawUrl) {
    try {
      rawPath = new URL(event.rawUrl).pathname
    } catch {
      rawPath = event.path || '/'
    }
  } else {
    rawPath = event.path || '/'
  }
  const prefixes = ['/.netlify/functions/process', '/.netlify/functions', '/api']
  for (const prefix of prefixes) {
    if (rawPath === prefix) {
      rawPath = '/'
      break
    }
    if (rawPath.startsWith(`${prefix}/`)) {
      rawPath = rawPath.slice(prefix.length)
      break
    }
  }
  if (!rawPath.startsWith('/')) rawPath = `/${rawPath}`
  if (rawPath === '/' || rawPath === '') {
    return '/process'
  }
  return rawPath
}

export function withCors(response: HandlerResponse): HandlerResponse {
  const headers = {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Headers': 'content-type',
    'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
    'Access-Control-Expose-Headers': 'content-disposition,x-student-groups-meta',
    ...(response.headers || {}),
  }
  return { ...response, headers }
}

export function jsonResponse(statusCode: number, body: unknown): HandlerResponse {
  return withCors({
    statusCode,
    headers: {
      'Content-Type': 'application/json',
    },
    body: JSON.stringify(body),
  })
}

export function fileResponse(buffer: Buffer, filename: string, contentType: string, headers: Record<string, string> = {}): HandlerResponse {
  return withCors({
    statusCode: 200,
    isBase64Encoded: true,
    body: buffer.toString('base64'),
    headers: {
      'Content-Type': contentType,
      'Content-Disposition': `attachment; filename=${filename}`,
      ...headers,
    },
  })
}

export function optionsResponse(): HandlerResponse {
  return withCors({ statusCode: 204, body: '' })
}

export function methodNotAllowed(): HandlerResponse {
  return withCors({ statusCode: 405, body: 'Method Not Allowed' })
}

export function notFound(): HandlerResponse {
  return withCors({ statusCode: 404, body: 'Not Found' })
}

export function badRequest(message: string): HandlerResponse {
  return jsonResponse(400, { error: message })
}

export function errorResponse(err: unknown): HandlerResponse {
  if (err instanceof RequestError) {
    return jsonResponse(err.statusCode, { error: err.message })
  }
  logger.error('Request failed', { error: errorMessage(err) })
  return jsonResponse(500, { error: errorMessage(err) })
}
