/**
 * HTTP client type definitions
 */

import type { Dispatcher } from 'undici'

/**
 * Request init accepted by the transport's fetch
 */
export interface FetchInit {
  method: string
  headers: Record<string, string>
  body?: string | Uint8Array
  signal?: AbortSignal
  dispatcher?: Dispatcher
}

/**
 * The parts of a fetch Response the client reads
 */
export interface FetchResponse {
  readonly status: number
  readonly statusText: string
  readonly headers: { get(name: string): string | null }
  text(): Promise<string>
  arrayBuffer(): Promise<ArrayBuffer>
}

export type FetchFn = (url: string, init: FetchInit) => Promise<FetchResponse>

/**
 * HTTP request options
 */
export interface RequestOptions {
  headers?: Record<string, string>
  body?: unknown
  params?: Record<string, string | number | boolean | undefined>
  timeout?: number
  signal?: AbortSignal
}

/**
 * Error body returned by libpod for non-2xx responses
 */
export interface LibpodErrorBody {
  cause: string
  message: string
  response?: number
}
