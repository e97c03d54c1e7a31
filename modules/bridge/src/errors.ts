/**
 * Error taxonomy for the bridge. Every failure a caller can observe carries a
 * distinct `kind` so it can be told apart without string matching.
 */

export type BridgeErrorKind =
  | 'ConnectFailed'
  | 'Unavailable'
  | 'NotFound'
  | 'Timeout'
  | 'PermissionDenied'
  | 'ProtocolError'
  | 'DuplicateServer'
  | 'InvalidConfig'

const STATUS_CODES: Record<BridgeErrorKind, number> = {
  ConnectFailed: 502,
  Unavailable: 503,
  NotFound: 404,
  Timeout: 504,
  PermissionDenied: 403,
  ProtocolError: 502,
  DuplicateServer: 409,
  InvalidConfig: 400,
}

export class BridgeError extends Error {
  readonly kind: BridgeErrorKind

  constructor(kind: BridgeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'BridgeError'
    this.kind = kind
  }

  /** HTTP status used when the error crosses the API boundary. */
  get statusCode(): number {
    return STATUS_CODES[this.kind]
  }
}

export function isBridgeError(err: unknown, kind?: BridgeErrorKind): err is BridgeError {
  return err instanceof BridgeError && (kind === undefined || err.kind === kind)
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
