import type { Handler, HandlerResponse } from '@netlify/functions'
import { badRequest, errorResponse, methodNotAllowed, optionsResponse } from './shared.js'
import type { RequestEvent } from './shared.js'
import { handleBranches } from './handlers.js'

export async function branchesRoute(event: RequestEvent): Promise<HandlerResponse> {
  const method = (event.httpMethod || 'GET').toUpperCase()
  if (method === 'OPTIONS') {
    return optionsResponse()
  }
  if (method !== 'POST') {
    if (method === 'GET') {
      return badRequest('POST required for /branches')
    }
    return methodNotAllowed()
  }
  try {
    return await handleBranches(event)
  } catch (err) {
    return errorResponse(err)
  }
}

const handler: Handler = async (event) => branchesRoute(event)

export { handler }
