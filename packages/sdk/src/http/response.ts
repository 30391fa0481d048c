import { z } from 'zod'
import { APIError, NotFound, type APIErrorClass, type ResponseLike } from '@podlink/shared/errors'
import type { FetchResponse, LibpodErrorBody } from './types'

const LibpodErrorBodySchema: z.ZodType<LibpodErrorBody> = z.object({
  cause: z.string(),
  message: z.string(),
  response: z.number().optional(),
})

/**
 * Response from the service.
 *
 * Status and reason are read from the underlying fetch response on every
 * access; errors raised from here hold this object, not a copy.
 */
export class APIResponse implements ResponseLike {
  private bodyText?: Promise<string>

  constructor(
    readonly raw: FetchResponse,
    readonly url: string
  ) {}

  get statusCode(): number {
    return this.raw.status
  }

  get reason(): string {
    return this.raw.statusText
  }

  get ok(): boolean {
    return this.statusCode >= 200 && this.statusCode < 300
  }

  /**
   * Body as text. The body is consumed once and cached.
   */
  text(): Promise<string> {
    if (this.bodyText === undefined) {
      this.bodyText = this.raw.text()
    }
    return this.bodyText
  }

  async json(): Promise<unknown> {
    return JSON.parse(await this.text())
  }

  async buffer(): Promise<Buffer> {
    return Buffer.from(await this.raw.arrayBuffer())
  }

  /**
   * Raise the matching APIError when the status is not 2xx.
   *
   * @param notFound - Class raised for a 404, e.g. ImageNotFound
   */
  async raiseForStatus(notFound: APIErrorClass = NotFound): Promise<void> {
    if (this.ok) {
      return
    }

    const text = await this.text()
    const { cause, explanation } = parseErrorBody(text, this.reason)

    if (this.statusCode === 404) {
      throw new notFound(cause, this, explanation)
    }
    throw new APIError(cause, this, explanation)
  }
}

/**
 * Extract cause and explanation from an error body.
 * Bodies that are not libpod errors contribute their raw text to both.
 */
function parseErrorBody(text: string, reason: string): { cause: string; explanation?: string } {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    parsed = undefined
  }

  const body = LibpodErrorBodySchema.safeParse(parsed)
  if (body.success) {
    return { cause: body.data.cause, explanation: body.data.message || undefined }
  }

  return { cause: text || reason, explanation: text || undefined }
}
