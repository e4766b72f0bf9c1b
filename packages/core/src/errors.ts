export type PreflightReason =
  | 'missing_recipients'
  | 'missing_template'
  | 'missing_credentials'
  | 'authentication_failed'

export class PreflightError extends Error {
  readonly reason: PreflightReason

  constructor(reason: PreflightReason, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PreflightError'
    this.reason = reason
  }
}

export class AuthenticationError extends Error {
  constructor(message = 'Provider rejected the credentials', options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'AuthenticationError'
  }
}

export class SendError extends Error {
  readonly code?: string | number

  constructor(message: string, options?: { cause?: unknown; code?: string | number }) {
    super(message, options)
    this.name = 'SendError'
    this.code = options?.code
  }
}

export class RunCancelledError extends Error {
  constructor(message = 'Run cancelled before dispatching') {
    super(message)
    this.name = 'RunCancelledError'
  }
}

export function describeError(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error) return error.message || fallback
  if (typeof error === 'string' && error.trim()) return error
  return fallback
}
