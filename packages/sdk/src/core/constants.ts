/**
 * Global constants for podlink
 */

/** libpod API version the client speaks */
export const API_VERSION = '5.0.0'

export const DEFAULT_CONFIG = {
  /** Rootful service socket */
  HOST: 'unix:///run/podman/podman.sock',

  /** Placeholder origin used when the transport is a unix socket */
  UNIX_BASE_URL: 'http://d',

  /** Default HTTP client settings */
  HTTP_CLIENT: {
    TIMEOUT: 30000, // 30 seconds
  },
} as const

export const API_ENDPOINTS = {
  PING: '/_ping',
  CONTAINERS: {
    CREATE: '/containers/create',
    INSPECT: '/containers/{id}/json',
    START: '/containers/{id}/start',
    WAIT: '/containers/{id}/wait',
    LOGS: '/containers/{id}/logs',
    REMOVE: '/containers/{id}',
  },
  IMAGES: {
    PULL: '/images/pull',
    BUILD: '/build',
  },
} as const

/**
 * Substitute `{name}` placeholders in an endpoint template
 */
export function endpoint(template: string, params: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    const value = params[key]
    return value === undefined ? match : encodeURIComponent(value)
  })
}
