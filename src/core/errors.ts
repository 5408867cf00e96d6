/** Base class for every error raised by this library. */
export class SdkError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SdkError'
  }
}

/** Indicates a configuration problem detected at construction time or during method validation. */
export class ConfigurationError extends SdkError {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export type TAuthFailureReason =
  | 'invalid-credentials'
  | 'invalid-api-key'
  | 'missing-token'
  | 'rejected'
  | 'not-authenticated'

/** Indicates the remote rejected an authentication attempt, or no session has been established. */
export class AuthError extends SdkError {
  readonly reason: TAuthFailureReason

  constructor(message: string, reason: TAuthFailureReason = 'rejected', options?: ErrorOptions) {
    super(message, options)
    this.name = 'AuthError'
    this.reason = reason
  }
}

/** The admin portal did not hand out a session cookie for the given username and password. */
export class InvalidCredentialsError extends AuthError {
  constructor(message = 'Invalid credentials') {
    super(message, 'invalid-credentials')
    this.name = 'InvalidCredentialsError'
  }
}

/** The admin portal accepted the credentials but not the obfuscated API key. */
export class InvalidApiKeyError extends AuthError {
  constructor(message = 'Invalid API key') {
    super(message, 'invalid-api-key')
    this.name = 'InvalidApiKeyError'
  }
}

export type TAPIErrorDetails = {
  status?: number
  method?: string
  path?: string
  cause?: unknown
}

/** Indicates a non-successful HTTP response, a network failure or an unexpected response body. */
export class APIError extends SdkError {
  readonly status?: number
  readonly method?: string
  readonly path?: string

  constructor(message: string, details: TAPIErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause })
    this.name = 'APIError'
    this.status = details.status
    this.method = details.method
    this.path = details.path
  }
}

/** Indicates a request did not complete within its timeout. */
export class TimeoutError extends SdkError {
  constructor(message = 'Operation timed out') {
    super(message)
    this.name = 'TimeoutError'
  }
}

/** Indicates an operation was aborted via AbortSignal. */
export class AbortOperationError extends SdkError {
  constructor(message = 'Operation aborted') {
    super(message)
    this.name = 'AbortOperationError'
  }
}
