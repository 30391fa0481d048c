import { APIError, BuildError } from '@podlink/shared/errors'
import { API_ENDPOINTS } from '../core/constants'
import type { APIClient } from '../http/client'
import { parseJsonLines } from '../stream'

export interface BuildOptions {
  /** Name and optionally a tag for the built image */
  tag?: string
  /** Path of the Containerfile within the context */
  dockerfile?: string
}

export interface BuildResult {
  id: string
  log: string[]
}

const BUILT_IMAGE_PATTERN = /^(?:Successfully built |sha256:)?([0-9a-f]{12,64})$/

export class ImagesManager {
  constructor(private readonly client: APIClient) {}

  /**
   * Pull an image and return its id
   */
  async pull(reference: string): Promise<string> {
    const response = await this.client.post(API_ENDPOINTS.IMAGES.PULL, {
      params: { reference },
    })
    await response.raiseForStatus()

    let id: string | undefined
    for (const entry of parseJsonLines(await response.text())) {
      if (typeof entry.error === 'string') {
        throw new APIError(entry.error)
      }
      if (typeof entry.id === 'string') {
        id = entry.id
      }
    }

    if (id === undefined) {
      throw new APIError(`Pull of ${reference} did not report an image id`)
    }
    this.client.logger.info('image pulled', { reference, id })
    return id
  }

  /**
   * Build an image from a tar archive of the build context.
   * The complete log is collected before any BuildError is raised.
   */
  async build(context: Uint8Array, options: BuildOptions = {}): Promise<BuildResult> {
    const response = await this.client.post(API_ENDPOINTS.IMAGES.BUILD, {
      params: { t: options.tag, dockerfile: options.dockerfile },
      headers: { 'Content-Type': 'application/x-tar' },
      body: context,
    })
    await response.raiseForStatus()

    const log: string[] = []
    let id: string | undefined
    for (const entry of parseJsonLines(await response.text())) {
      if (typeof entry.stream === 'string') {
        const line = entry.stream.replace(/\r?\n$/, '')
        log.push(line)

        const match = BUILT_IMAGE_PATTERN.exec(line.trim())
        if (match) {
          id = match[1]
        }
      }
      if (typeof entry.error === 'string') {
        throw new BuildError(entry.error, log)
      }
    }

    if (id === undefined) {
      throw new BuildError('Unknown', log)
    }
    return { id, log }
  }
}
