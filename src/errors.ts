export type ErrorKind =
  | 'validation'
  | 'not_found'
  | 'storage'
  | 'gateway_unavailable'
  | 'gateway_http'
  | 'gateway_decode'
  | 'gateway_network'

export class StillpointError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.kind = kind
  }
}

/** Rejected synchronously, never persisted. */
export class ValidationError extends StillpointError {
  readonly field: string

  constructor(field: string, message: string) {
    super('validation', message)
    this.field = field
  }
}

export class NotFoundError extends StillpointError {
  readonly entity: string
  readonly id: string

  constructor(entity: string, id: string) {
    super('not_found', `${entity} not found: ${id}`)
    this.entity = entity
    this.id = id
  }
}

export class StorageError extends StillpointError {
  readonly operation: string

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super('storage', `Storage failure during ${operation}: ${detail}`, { cause })
    this.operation = operation
  }
}

/** Missing or invalid remote configuration. No request was attempted. */
export class GatewayUnavailableError extends StillpointError {
  constructor(reason: string) {
    super('gateway_unavailable', reason)
  }
}

export class GatewayHttpError extends StillpointError {
  readonly status: number
  readonly body: string

  constructor(status: number, body: string, endpoint: string) {
    super('gateway_http', `Gateway ${endpoint} responded ${status}`)
    this.status = status
    this.body = body
  }
}

export class GatewayDecodeError extends StillpointError {
  constructor(endpoint: string, cause: unknown) {
    super('gateway_decode', `Gateway ${endpoint} returned an unexpected body`, { cause })
  }
}

export class GatewayNetworkError extends StillpointError {
  constructor(endpoint: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super('gateway_network', `Gateway ${endpoint} request failed: ${detail}`, { cause })
  }
}

export function isGatewayError(err: unknown): err is StillpointError {
  return err instanceof StillpointError && err.kind.startsWith('gateway_')
}
