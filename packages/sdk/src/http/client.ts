import { Agent, fetch as undiciFetch } from 'undici'
import { APIError, ConnectionError } from '@podlink/shared/errors'
import { createLogger, type Logger } from '@podlink/shared/logger'
import type { Environment } from '../config/connection'
import type { TlsOptions } from '../config/tls'
import { API_ENDPOINTS, API_VERSION, DEFAULT_CONFIG } from '../core/constants'
import { APIResponse } from './response'
import type { FetchFn, FetchInit, RequestOptions } from './types'

export interface APIClientOptions {
  /** Host string as configured, reported in connection diagnostics */
  host: string
  baseUrl: string
  socketPath?: string
  /** Connector settings for https hosts */
  tls?: TlsOptions
  timeout?: number
  logger?: Logger
  /** Environment snapshot the connection was resolved from */
  environment?: Environment
  fetch?: FetchFn
}

function describe(error: unknown): string {
  return String(error)
}

/**
 * Transport to the libpod API.
 *
 * Non-2xx responses are returned as-is; callers decide which error to raise
 * through APIResponse.raiseForStatus. Failures below HTTP become APIError
 * without a response.
 */
export class APIClient {
  readonly logger: Logger
  private readonly host: string
  private readonly baseUrl: string
  private readonly timeout: number
  private readonly environment?: Environment
  private readonly fetchImpl: FetchFn
  private readonly dispatcher?: Agent

  constructor(options: APIClientOptions) {
    this.host = options.host
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.timeout = options.timeout ?? DEFAULT_CONFIG.HTTP_CLIENT.TIMEOUT
    this.environment = options.environment
    this.logger = options.logger ?? createLogger()
    this.fetchImpl = options.fetch ?? undiciFetch
    if (options.socketPath) {
      this.dispatcher = new Agent({ connect: { socketPath: options.socketPath } })
    } else if (options.tls && this.baseUrl.startsWith('https:')) {
      this.dispatcher = new Agent({ connect: { ...options.tls } })
    }
  }

  async get(path: string, options?: RequestOptions): Promise<APIResponse> {
    return this.request('GET', path, options)
  }

  async post(path: string, options?: RequestOptions): Promise<APIResponse> {
    return this.request('POST', path, options)
  }

  async delete(path: string, options?: RequestOptions): Promise<APIResponse> {
    return this.request('DELETE', path, options)
  }

  /**
   * Check the service is reachable.
   * A transport failure here is a connection failure, not an API error.
   */
  async ping(): Promise<string> {
    let response: APIResponse
    try {
      response = await this.get(API_ENDPOINTS.PING)
    } catch (error) {
      throw new ConnectionError('Failed to connect to the service', {
        environment: this.environment,
        host: this.host,
        originalError: error instanceof Error ? error : undefined,
      })
    }

    await response.raiseForStatus()
    return response.text()
  }

  /**
   * Release the dispatcher, if one was created
   */
  async close(): Promise<void> {
    await this.dispatcher?.close()
  }

  /**
   * Full URL for a libpod path
   */
  url(path: string, params?: RequestOptions['params']): string {
    const url = new URL(`${this.baseUrl}/v${API_VERSION}/libpod${path}`)

    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          url.searchParams.append(key, String(value))
        }
      }
    }

    return url.toString()
  }

  private async request(method: string, path: string, options?: RequestOptions): Promise<APIResponse> {
    const url = this.url(path, options?.params)
    const init: FetchInit = {
      method,
      headers: { ...options?.headers },
      dispatcher: this.dispatcher,
    }

    if (options?.body !== undefined) {
      if (typeof options.body === 'string' || options.body instanceof Uint8Array) {
        init.body = options.body
      } else {
        init.headers['Content-Type'] = 'application/json'
        init.body = JSON.stringify(options.body)
      }
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), options?.timeout ?? this.timeout)
    init.signal = options?.signal ? AbortSignal.any([options.signal, controller.signal]) : controller.signal

    this.logger.debug('request', { method, url })

    try {
      const raw = await this.fetchImpl(url, init)
      return new APIResponse(raw, url)
    } catch (error) {
      this.logger.debug('request failed', { method, url, reason: describe(error) })
      throw new APIError(describe(error), undefined, undefined, { cause: error })
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
