import { APIError } from '@podlink/shared/errors'
import { API_ENDPOINTS, endpoint } from '../core/constants'
import type { APIClient } from '../http/client'
import { StreamType, demuxFrames, frameLines } from '../stream'

export type ContainerAttributes = Record<string, unknown>

export interface LogsOptions {
  stdout?: boolean
  stderr?: boolean
}

function exitCodeOf(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value
  }
  // docker-compatible wait responses wrap the code
  if (typeof value === 'object' && value !== null && 'StatusCode' in value) {
    return exitCodeOf(value.StatusCode)
  }
  return undefined
}

/**
 * Handle to a container on the service.
 * Holds no state beyond the last inspected attributes.
 */
export class Container {
  private attributes: ContainerAttributes

  constructor(
    private readonly client: APIClient,
    readonly id: string,
    attributes: ContainerAttributes = {}
  ) {
    this.attributes = attributes
  }

  get attrs(): Readonly<ContainerAttributes> {
    return this.attributes
  }

  get name(): string | undefined {
    const name = this.attributes.Name
    return typeof name === 'string' ? name : undefined
  }

  async start(): Promise<void> {
    const response = await this.client.post(endpoint(API_ENDPOINTS.CONTAINERS.START, { id: this.id }))
    await response.raiseForStatus()
  }

  /**
   * Block until the container stops and return its exit code
   */
  async wait(): Promise<number> {
    const response = await this.client.post(endpoint(API_ENDPOINTS.CONTAINERS.WAIT, { id: this.id }))
    await response.raiseForStatus()

    const text = await response.text()
    let body: unknown
    try {
      body = JSON.parse(text)
    } catch (error) {
      throw new APIError(`Unexpected wait response for container ${this.id}: ${text}`, undefined, undefined, {
        cause: error,
      })
    }

    const code = exitCodeOf(body)
    if (code === undefined) {
      throw new APIError(`Unexpected wait response for container ${this.id}: ${text}`)
    }
    return code
  }

  /**
   * Lines the container wrote to the selected streams
   */
  async logs(options: LogsOptions = {}): Promise<string[]> {
    const stdout = options.stdout ?? true
    const stderr = options.stderr ?? false
    const response = await this.client.get(endpoint(API_ENDPOINTS.CONTAINERS.LOGS, { id: this.id }), {
      params: { stdout, stderr },
    })
    await response.raiseForStatus()

    const streams: StreamType[] = []
    if (stdout) streams.push(StreamType.STDOUT)
    if (stderr) streams.push(StreamType.STDERR)

    return frameLines(demuxFrames(await response.buffer()), streams)
  }

  /**
   * Refresh attributes from the service. Raises NotFound when the container is gone.
   */
  async reload(): Promise<ContainerAttributes> {
    const response = await this.client.get(endpoint(API_ENDPOINTS.CONTAINERS.INSPECT, { id: this.id }))
    await response.raiseForStatus()

    const body = await response.json()
    if (typeof body === 'object' && body !== null && !Array.isArray(body)) {
      this.attributes = { ...body }
    }
    return this.attributes
  }

  async remove(options: { force?: boolean } = {}): Promise<void> {
    const response = await this.client.delete(endpoint(API_ENDPOINTS.CONTAINERS.REMOVE, { id: this.id }), {
      params: { force: options.force },
    })
    await response.raiseForStatus()
  }
}
