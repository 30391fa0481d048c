import { createLogger, type Logger } from '@podlink/shared/logger'
import { type ConnectionConfig, type Environment, resolveConnectionConfig } from '../config/connection'
import { resolveTlsOptions } from '../config/tls'
import { ContainersManager } from '../domain/containers'
import { ImagesManager } from '../domain/images'
import { APIClient } from '../http/client'
import type { FetchFn } from '../http/types'

export interface PodlinkClientOptions {
  /** Overrides CONTAINER_HOST / DOCKER_HOST */
  host?: string
  /** Request timeout in milliseconds */
  timeout?: number
  /** Environment to resolve the connection from; defaults to process.env */
  env?: Environment
  logger?: Logger
  fetch?: FetchFn
}

export class PodlinkClient {
  readonly config: ConnectionConfig
  readonly images: ImagesManager
  readonly containers: ContainersManager
  private apiClient: APIClient

  constructor(options: PodlinkClientOptions = {}) {
    const env = options.env ?? process.env
    this.config = resolveConnectionConfig(env, { host: options.host, timeout: options.timeout })

    const logger = options.logger ?? createLogger({ level: this.config.logLevel })
    this.apiClient = new APIClient({
      host: this.config.host,
      baseUrl: this.config.baseUrl,
      socketPath: this.config.socketPath,
      tls: resolveTlsOptions(this.config, env),
      timeout: this.config.timeout,
      environment: { ...env },
      logger: logger.child({ host: this.config.host }),
      fetch: options.fetch,
    })
    this.images = new ImagesManager(this.apiClient)
    this.containers = new ContainersManager(this.apiClient, this.images)
  }

  /**
   * Client configured from environment variables only
   */
  static fromEnv(env: Environment = process.env): PodlinkClient {
    return new PodlinkClient({ env })
  }

  async ping(): Promise<string> {
    return this.apiClient.ping()
  }

  async close(): Promise<void> {
    await this.apiClient.close()
  }

  getAPIClient(): APIClient {
    return this.apiClient
  }
}
