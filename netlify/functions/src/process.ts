import type { Handler, HandlerResponse } from '@netlify/functions'
import {
  badRequest,
  errorResponse,
  methodNotAllowed,
  normalisePath,
  notFound,
  optionsResponse,
} from './shared.js'
import type { RequestEvent } from './shared.js'
import { handleArchive, handleBranches, handleGroups, handleHealth, handleProcess } from './handlers.js'

const POST_ROUTES = new Map<string, (event: RequestEvent) => Promise<HandlerResponse>>([
  ['/process', (event) => handleProcess(event)],
  ['/groups', (event) => handleGroups(event)],
  ['/archive', handleArchive],
  ['/branches', handleBranches],
])

export async function route(event: RequestEvent): Promise<HandlerResponse> {
  const method = (event.httpMethod || 'GET').toUpperCase()
  if (method === 'OPTIONS') {
    return optionsResponse()
  }
  const path = normalisePath(event)
  try {
    if (method === 'GET' && path === '/health') {
      return handleHealth()
    }
    const post = POST_ROUTES.get(path)
    if (post && method === 'POST') {
      return await post(event)
    }
    if (post && method === 'GET') {
      return badRequest(`POST required for ${path}`)
    }
    if (method !== 'GET' && method !== 'POST') {
      return methodNotAllowed()
    }
    return notFound()
  } catch (err) {
    return errorResponse(err)
  }
}

const handler: Handler = async (event) => route(event)

export { handler }
