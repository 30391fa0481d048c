import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { ConnectionError } from '@podlink/shared/errors'
import type { ConnectionConfig, Environment } from './connection'

/**
 * TLS settings handed to the transport's connector
 */
export interface TlsOptions {
  ca?: Buffer
  cert?: Buffer
  key?: Buffer
  rejectUnauthorized: boolean
}

/** File names looked up under the cert path */
export const TLS_FILES = {
  CA: 'ca.pem',
  CERT: 'cert.pem',
  KEY: 'key.pem',
} as const

function readOptional(dir: string, name: string): Buffer | undefined {
  const file = join(dir, name)
  return existsSync(file) ? readFileSync(file) : undefined
}

/**
 * TLS options for an https connection, or undefined when the defaults apply.
 *
 * A cert path without TLS verification enables TLS with client certificates
 * but skips server verification. An https host with neither setting keeps
 * the runtime's default verification.
 */
export function resolveTlsOptions(
  config: Pick<ConnectionConfig, 'host' | 'baseUrl' | 'tlsVerify' | 'certPath'>,
  env: Environment = {}
): TlsOptions | undefined {
  if (!config.baseUrl.startsWith('https:')) {
    return undefined
  }
  if (config.certPath === undefined) {
    return config.tlsVerify ? { rejectUnauthorized: true } : undefined
  }

  const certPath = config.certPath
  let options: TlsOptions
  try {
    options = {
      ca: readOptional(certPath, TLS_FILES.CA),
      cert: readOptional(certPath, TLS_FILES.CERT),
      key: readOptional(certPath, TLS_FILES.KEY),
      rejectUnauthorized: config.tlsVerify,
    }
  } catch (error) {
    throw new ConnectionError(`Failed to read TLS files from ${certPath}`, {
      environment: env,
      host: config.host,
      originalError: error instanceof Error ? error : undefined,
    })
  }

  if ((options.cert === undefined) !== (options.key === undefined)) {
    throw new ConnectionError(`Client certificate and key must both be present in ${certPath}`, {
      environment: env,
      host: config.host,
    })
  }

  return options
}
