/**
 * Error kinds for the podlink error taxonomy
 * One member per concrete error class, so callers can switch on `error.kind`
 */
export enum ErrorKind {
  // ============================================
  // HTTP exchanges (carry a response)
  // ============================================
  API = 'API',
  NOT_FOUND = 'NOT_FOUND',
  IMAGE_NOT_FOUND = 'IMAGE_NOT_FOUND',

  // ============================================
  // Library-native conditions
  // ============================================
  BUILD = 'BUILD',
  CONTAINER = 'CONTAINER',
  CONNECTION = 'CONNECTION',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',

  // ============================================
  // Local decoding
  // ============================================
  STREAM_PARSE = 'STREAM_PARSE',
}

/**
 * Environment variables a connection diagnostic may surface.
 * Anything else in the process environment is never rendered.
 */
export const CONNECTION_ENV_VARS: ReadonlySet<string> = new Set([
  'DOCKER_HOST',
  'DOCKER_TLS_VERIFY',
  'DOCKER_CERT_PATH',
  'CONTAINER_HOST',
  'CONTAINER_TLS_VERIFY',
  'CONTAINER_CERT_PATH',
])
