import { ErrorKind } from './codes'
import type { ResponseLike } from './context'

export type APIErrorKind = ErrorKind.API | ErrorKind.NOT_FOUND | ErrorKind.IMAGE_NOT_FOUND

/**
 * Error raised for a failed HTTP exchange with the service.
 *
 * The status code is read from `response` on every access rather than
 * copied, so it always reflects the response handle the transport passed in.
 */
export class APIError extends Error {
  public readonly kind: APIErrorKind = ErrorKind.API
  public readonly response?: ResponseLike
  public readonly explanation?: string

  /**
   * @param message - Message from the service, or the transport failure
   * @param response - Response the failure was read from
   * @param explanation - Extra context appended to the rendered message
   * @param options - Underlying error, for transport failures without a response
   */
  constructor(
    message: string,
    response?: ResponseLike,
    explanation?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'APIError'
    this.response = response
    this.explanation = explanation

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  /**
   * HTTP status code of the response, if there is one
   */
  get statusCode(): number | undefined {
    return this.response?.statusCode
  }

  /**
   * True when the HTTP operation resulted in an error
   */
  isError(): boolean {
    return this.isClientError() || this.isServerError()
  }

  /**
   * True when the request was rejected as incorrect (4xx)
   */
  isClientError(): boolean {
    const status = this.statusCode ?? 0
    return status >= 400 && status < 500
  }

  /**
   * True when the service failed to handle the request (5xx)
   */
  isServerError(): boolean {
    const status = this.statusCode ?? 0
    return status >= 500 && status < 600
  }

  /**
   * Compose the diagnostic message.
   * Once a response is attached its reason replaces the constructor message.
   */
  render(): string {
    let msg = this.message

    if (this.response !== undefined) {
      msg = this.response.reason
    }

    if (this.isClientError()) {
      msg = `${this.statusCode} Client Error: ${msg}`
    } else if (this.isServerError()) {
      msg = `${this.statusCode} Server Error: ${msg}`
    }

    if (this.explanation) {
      msg = `${msg} (${this.explanation})`
    }

    return msg
  }

  toString(): string {
    return this.render()
  }

  toJSON() {
    return {
      name: this.name,
      kind: this.kind,
      message: this.render(),
      statusCode: this.statusCode,
      explanation: this.explanation,
    }
  }
}

/**
 * Resource not found on the service
 */
export class NotFound extends APIError {
  public override readonly kind: ErrorKind.NOT_FOUND = ErrorKind.NOT_FOUND

  constructor(
    message: string,
    response?: ResponseLike,
    explanation?: string,
    options?: { cause?: unknown }
  ) {
    super(message, response, explanation, options)
    this.name = 'NotFound'
  }
}

/**
 * Image not found on the service
 */
export class ImageNotFound extends APIError {
  public override readonly kind: ErrorKind.IMAGE_NOT_FOUND = ErrorKind.IMAGE_NOT_FOUND

  constructor(
    message: string,
    response?: ResponseLike,
    explanation?: string,
    options?: { cause?: unknown }
  ) {
    super(message, response, explanation, options)
    this.name = 'ImageNotFound'
  }
}

/**
 * Constructor shape shared by APIError and its not-found subtypes,
 * used by transports that let callers choose the 404 class
 */
export type APIErrorClass = new (
  message: string,
  response?: ResponseLike,
  explanation?: string,
  options?: { cause?: unknown }
) => APIError
