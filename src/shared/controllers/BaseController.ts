import logger from '../logger'

/** The part of an Express `Response` the controllers write to. */
export interface JsonReply {
  status(code: number): JsonReply
  json(body: unknown): unknown
}

// Domain errors carry their kind as a message prefix, e.g. "NOT_FOUND: Document not found".
const PREFIX_STATUS: ReadonlyArray<[string, number]> = [
  ['VALIDATION_ERROR', 400],
  ['NOT_FOUND', 404],
  ['UNAVAILABLE', 503],
  ['CLASSIFICATION_FAILED', 500],
]

/** HTTP status for a prefixed domain error message, or null when it is unexpected. */
export function statusForError(message: string): number | null {
  const match = PREFIX_STATUS.find(([prefix]) => message.startsWith(prefix))
  return match ? match[1] : null
}

export abstract class BaseController {
  protected sendResponse<T>(res: JsonReply, status: number, data: T) {
    return res.status(status).json(data)
  }

  protected sendError(res: JsonReply, status: number, message: string, details?: unknown) {
    const body = details === undefined ? { error: message } : { error: message, details }
    return res.status(status).json(body)
  }

  protected ok<T>(res: JsonReply, data: T) {
    return this.sendResponse(res, 200, data)
  }

  protected created<T>(res: JsonReply, data: T) {
    return this.sendResponse(res, 201, data)
  }

  protected badRequest(res: JsonReply, message: string, details?: unknown) {
    return this.sendError(res, 400, message, details)
  }

  protected parseIdParam(value: string | undefined): number | null {
    if (value === undefined) return null
    const n = Number(value)
    if (Number.isInteger(n) && n > 0) return n
    return null
  }

  protected handleError(res: JsonReply, logLabel: string, err: unknown) {
    const msg = err instanceof Error ? err.message : String(err ?? 'UNKNOWN_ERROR')

    const status = statusForError(msg)
    if (status !== null) return this.sendError(res, status, msg)

    logger.error(`[HTTP] ${logLabel}`, {
      errorMessage: msg,
      errorStack: err instanceof Error ? err.stack : undefined,
    })
    return this.sendError(res, 500, 'INTERNAL_ERROR')
  }
}
