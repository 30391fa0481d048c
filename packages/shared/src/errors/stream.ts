import { ErrorKind } from './codes'

/**
 * Streamed payload data could not be decoded.
 * Raised by local parsing only; there is no HTTP context attached.
 */
export class StreamParseError extends Error {
  public readonly kind = ErrorKind.STREAM_PARSE
  public readonly reason: string

  constructor(reason: string) {
    super(reason)
    this.name = 'StreamParseError'
    this.reason = reason

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StreamParseError)
    }
  }

  render(): string {
    return this.reason
  }

  toString(): string {
    return this.render()
  }
}
