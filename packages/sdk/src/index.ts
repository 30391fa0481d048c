/**
 * podlink SDK - Main Entry Point
 * TypeScript client for the Podman libpod API
 */

export const VERSION = '0.1.0'

// Export core classes
export { PodlinkClient, type PodlinkClientOptions } from './core/podlink-client'
export { Container, type ContainerAttributes, type LogsOptions } from './domain/container'
export { ContainersManager, type CreateOptions, type RunOptions } from './domain/containers'
export { ImagesManager, type BuildOptions, type BuildResult } from './domain/images'

// Export transport
export { APIClient, type APIClientOptions } from './http/client'
export { APIResponse } from './http/response'
export type { FetchFn, FetchInit, FetchResponse, RequestOptions, LibpodErrorBody } from './http/types'

// Export configuration
export {
  resolveConnectionConfig,
  type ConnectionConfig,
  type ConnectionOverrides,
  type Environment,
} from './config/connection'
export { resolveTlsOptions, TLS_FILES, type TlsOptions } from './config/tls'
export { API_VERSION, DEFAULT_CONFIG, API_ENDPOINTS } from './core/constants'

// Export stream decoders
export { StreamType, demuxFrames, frameLines, parseJsonLines, type Frame, type JsonRecord } from './stream'

// Export error handling
export {
  ErrorKind,
  APIError,
  NotFound,
  ImageNotFound,
  DockerException,
  PodmanError,
  InvalidArgument,
  BuildError,
  ContainerError,
  ConnectionError,
  StreamParseError,
  isAPIError,
  isNotFound,
  isPodmanError,
  isPodlinkError,
  type PodlinkError,
} from '@podlink/shared/errors'

// Default export for convenience
import { PodlinkClient } from './core/podlink-client'
export default PodlinkClient
