/**
 * Shapes the errors receive from their collaborators
 */

/**
 * HTTP response handle as seen by the error layer.
 * Read lazily; the error never writes to it.
 */
export interface ResponseLike {
  readonly statusCode: number
  readonly reason: string
}

/**
 * Connection attempt context
 */
export interface ConnectionErrorContext {
  environment?: Readonly<Record<string, string | undefined>>
  host?: string
  originalError?: Error
}

export type Command = string | readonly string[]

export type StderrOutput = string | readonly string[]
