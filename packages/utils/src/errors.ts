export const ErrorCode = {
  INVALID_RLP: 'INVALID_RLP',
  INVALID_HEADER: 'INVALID_HEADER',
  INVALID_CONFIG: 'INVALID_CONFIG',
  INVALID_CHAIN: 'INVALID_CHAIN',
} as const

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode]

export class HashlinkError extends Error {
  readonly code: ErrorCode
  readonly details?: readonly string[]

  constructor(code: ErrorCode, message: string, details?: readonly string[]) {
    super(message)
    this.name = 'HashlinkError'
    this.code = code
    this.details = details
  }
}

export const isHashlinkError = (err: unknown): err is HashlinkError =>
  err instanceof HashlinkError
