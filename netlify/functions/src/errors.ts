export class RequestError extends Error {
  readonly statusCode: number

  constructor(message: string, statusCode = 400) {
    super(message)
    this.name = 'RequestError'
    this.statusCode = statusCode
  }
}

export class RosterError extends RequestError {
  constructor(message: string) {
    super(message, 400)
    this.name = 'RosterError'
  }
}

/** Raised when an allocator's output does not account for its input exactly. */
export class AllocationInvariantError extends Error {
  readonly details: Record<string, unknown>

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message)
    this.name = 'AllocationInvariantError'
    this.details = details
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
