import { z } from 'zod'
import { ConnectionError } from '@podlink/shared/errors'
import { type LogLevel, parseLogLevel } from '@podlink/shared/logger'
import { DEFAULT_CONFIG } from '../core/constants'

export type Environment = Readonly<Record<string, string | undefined>>

/**
 * Resolved settings for reaching the service
 */
export interface ConnectionConfig {
  /** Host string as configured, e.g. unix:///run/podman/podman.sock */
  host: string
  /** Origin requests are issued against */
  baseUrl: string
  /** Unix socket the transport dials, when the host names one */
  socketPath?: string
  tlsVerify: boolean
  certPath?: string
  timeout: number
  logLevel: LogLevel
}

export interface ConnectionOverrides {
  host?: string
  timeout?: number
}

const EnvironmentSchema = z.object({
  CONTAINER_HOST: z.string().optional(),
  DOCKER_HOST: z.string().optional(),
  CONTAINER_TLS_VERIFY: z.string().optional(),
  DOCKER_TLS_VERIFY: z.string().optional(),
  CONTAINER_CERT_PATH: z.string().optional(),
  DOCKER_CERT_PATH: z.string().optional(),
  PODLINK_TIMEOUT: z.coerce.number().int('Timeout must be an integer').positive('Timeout must be positive').optional(),
  LOG_LEVEL: z.string().optional(),
})

const OverridesSchema = z.object({
  host: z.string().min(1, 'Host cannot be empty').optional(),
  timeout: z.number().int().positive().optional(),
})

function isTruthyFlag(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true'
}

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined
}

function resolveEndpoint(
  url: URL,
  useTls: boolean
): Pick<ConnectionConfig, 'baseUrl' | 'socketPath'> | undefined {
  switch (url.protocol) {
    case 'unix:':
      return { baseUrl: DEFAULT_CONFIG.UNIX_BASE_URL, socketPath: url.pathname }
    case 'http+unix:':
      return {
        baseUrl: DEFAULT_CONFIG.UNIX_BASE_URL,
        socketPath: url.hostname ? decodeURIComponent(url.hostname) : url.pathname,
      }
    case 'tcp:':
      return { baseUrl: `${useTls ? 'https' : 'http'}://${url.host}` }
    case 'http:':
    case 'https:':
      return { baseUrl: url.origin }
    default:
      return undefined
  }
}

/**
 * Resolve connection settings from the environment.
 *
 * CONTAINER_* variables take precedence over their DOCKER_* synonyms.
 * Any invalid setting raises a ConnectionError carrying the environment snapshot.
 */
export function resolveConnectionConfig(
  env: Environment = process.env,
  overrides: ConnectionOverrides = {}
): ConnectionConfig {
  const parsedEnv = EnvironmentSchema.safeParse(env)
  if (!parsedEnv.success) {
    throw new ConnectionError('Invalid connection environment', {
      environment: env,
      originalError: parsedEnv.error,
    })
  }

  const parsedOverrides = OverridesSchema.safeParse(overrides)
  if (!parsedOverrides.success) {
    throw new ConnectionError('Invalid connection overrides', {
      environment: env,
      host: overrides.host,
      originalError: parsedOverrides.error,
    })
  }

  const vars = parsedEnv.data
  const host =
    parsedOverrides.data.host ??
    nonEmpty(vars.CONTAINER_HOST) ??
    nonEmpty(vars.DOCKER_HOST) ??
    DEFAULT_CONFIG.HOST
  const tlsVerify = isTruthyFlag(nonEmpty(vars.CONTAINER_TLS_VERIFY) ?? vars.DOCKER_TLS_VERIFY)
  const certPath = nonEmpty(vars.CONTAINER_CERT_PATH) ?? nonEmpty(vars.DOCKER_CERT_PATH)

  let url: URL
  try {
    url = new URL(host)
  } catch (error) {
    throw new ConnectionError('Malformed service host', {
      environment: env,
      host,
      originalError: error instanceof Error ? error : undefined,
    })
  }

  const target = resolveEndpoint(url, tlsVerify || certPath !== undefined)
  if (!target) {
    throw new ConnectionError(`Unsupported connection scheme '${url.protocol}'`, {
      environment: env,
      host,
    })
  }

  return {
    host,
    ...target,
    tlsVerify,
    certPath,
    timeout: parsedOverrides.data.timeout ?? vars.PODLINK_TIMEOUT ?? DEFAULT_CONFIG.HTTP_CLIENT.TIMEOUT,
    logLevel: parseLogLevel(vars.LOG_LEVEL),
  }
}
