import { APIError, ContainerError, ImageNotFound, type Command } from '@podlink/shared/errors'
import { API_ENDPOINTS } from '../core/constants'
import type { APIClient } from '../http/client'
import { Container } from './container'
import type { ImagesManager } from './images'

export interface CreateOptions {
  name?: string
  env?: Record<string, string>
}

export interface RunOptions extends CreateOptions {
  /** Remove the container once it has stopped */
  remove?: boolean
}

function commandArgs(command: Command): string[] {
  return typeof command === 'string' ? command.split(/\s+/).filter(arg => arg.length > 0) : [...command]
}

export class ContainersManager {
  constructor(
    private readonly client: APIClient,
    private readonly images: ImagesManager
  ) {}

  /**
   * Create a container. Raises ImageNotFound when the image is not present locally.
   */
  async create(image: string, command: Command, options: CreateOptions = {}): Promise<Container> {
    const response = await this.client.post(API_ENDPOINTS.CONTAINERS.CREATE, {
      body: {
        image,
        command: commandArgs(command),
        name: options.name,
        env: options.env,
      },
    })
    await response.raiseForStatus(ImageNotFound)

    const body = await response.json()
    if (typeof body !== 'object' || body === null || !('Id' in body) || typeof body.Id !== 'string') {
      throw new APIError('Create response did not include a container id')
    }
    return new Container(this.client, body.Id)
  }

  async get(id: string): Promise<Container> {
    const container = new Container(this.client, id)
    await container.reload()
    return container
  }

  /**
   * Run a command in a new container and return its stdout lines.
   *
   * The image is pulled once when missing. A non-zero exit raises
   * ContainerError carrying the container's stderr. With `remove` the
   * container is deleted whether or not the run succeeded.
   */
  async run(image: string, command: Command, options: RunOptions = {}): Promise<string[]> {
    let container: Container
    try {
      container = await this.create(image, command, options)
    } catch (error) {
      if (!(error instanceof ImageNotFound)) {
        throw error
      }
      this.client.logger.info('image not found locally, pulling', { image })
      await this.images.pull(image)
      container = await this.create(image, command, options)
    }

    let exitStatus: number
    let output: string[]
    try {
      await container.start()
      exitStatus = await container.wait()
      output =
        exitStatus === 0
          ? await container.logs({ stdout: true, stderr: false })
          : await container.logs({ stdout: false, stderr: true })
    } finally {
      if (options.remove) {
        await container.remove()
      }
    }

    if (exitStatus !== 0) {
      throw new ContainerError(container, exitStatus, command, image, output.length > 0 ? output : undefined)
    }
    return output
  }
}
