/**
 * Connection configuration tests
 */

import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import { ConnectionError } from '@podlink/shared/errors'
import { LogLevel } from '@podlink/shared/logger'
import { resolveConnectionConfig } from '../src/config/connection'

function captureSync(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('Expected function to throw')
}

describe('resolveConnectionConfig', () => {
  it('should default to the rootful podman socket', () => {
    expect(resolveConnectionConfig({})).toEqual({
      host: 'unix:///run/podman/podman.sock',
      baseUrl: 'http://d',
      socketPath: '/run/podman/podman.sock',
      tlsVerify: false,
      certPath: undefined,
      timeout: 30000,
      logLevel: LogLevel.SILENT,
    })
  })

  it('should prefer CONTAINER_HOST over DOCKER_HOST', () => {
    const config = resolveConnectionConfig({
      CONTAINER_HOST: 'unix:///run/user/1000/podman/podman.sock',
      DOCKER_HOST: 'tcp://10.0.0.5:2375',
    })

    expect(config.host).toBe('unix:///run/user/1000/podman/podman.sock')
    expect(config.socketPath).toBe('/run/user/1000/podman/podman.sock')
  })

  it('should ignore empty variables', () => {
    const config = resolveConnectionConfig({ CONTAINER_HOST: '', DOCKER_HOST: 'tcp://10.0.0.5:2375' })

    expect(config.host).toBe('tcp://10.0.0.5:2375')
  })

  it('should map tcp hosts to http', () => {
    const config = resolveConnectionConfig({ DOCKER_HOST: 'tcp://10.0.0.5:2375' })

    expect(config.baseUrl).toBe('http://10.0.0.5:2375')
    expect(config.socketPath).toBeUndefined()
  })

  it('should map tcp hosts to https when TLS verification is on', () => {
    const config = resolveConnectionConfig({
      DOCKER_HOST: 'tcp://10.0.0.5:2376',
      CONTAINER_TLS_VERIFY: '',
      DOCKER_TLS_VERIFY: '1',
      DOCKER_CERT_PATH: '/etc/certs',
    })

    expect(config.tlsVerify).toBe(true)
    expect(config.baseUrl).toBe('https://10.0.0.5:2376')
    expect(config.certPath).toBe('/etc/certs')
  })

  it('should map tcp hosts to https when only a cert path is set', () => {
    const config = resolveConnectionConfig({
      DOCKER_HOST: 'tcp://10.0.0.5:2376',
      CONTAINER_CERT_PATH: '/etc/podman/certs',
      DOCKER_CERT_PATH: '/etc/docker/certs',
    })

    expect(config.tlsVerify).toBe(false)
    expect(config.baseUrl).toBe('https://10.0.0.5:2376')
    expect(config.certPath).toBe('/etc/podman/certs')
  })

  it('should keep the origin of http(s) hosts', () => {
    const config = resolveConnectionConfig({ CONTAINER_HOST: 'https://podman.example.test:8443/' })

    expect(config.baseUrl).toBe('https://podman.example.test:8443')
  })

  it('should apply overrides before the environment', () => {
    const config = resolveConnectionConfig(
      { CONTAINER_HOST: 'tcp://10.0.0.5:2375', PODLINK_TIMEOUT: '5000' },
      { host: 'http://127.0.0.1:8888', timeout: 100 }
    )

    expect(config.host).toBe('http://127.0.0.1:8888')
    expect(config.timeout).toBe(100)
  })

  it('should read timeout and log level from the environment', () => {
    const config = resolveConnectionConfig({ PODLINK_TIMEOUT: '5000', LOG_LEVEL: 'debug' })

    expect(config.timeout).toBe(5000)
    expect(config.logLevel).toBe(LogLevel.DEBUG)
  })

  it('should reject unsupported schemes with the relevant environment', () => {
    const error = captureSync(() =>
      resolveConnectionConfig({ CONTAINER_HOST: 'ssh://core@host', SECRET_TOKEN: 'test-secret' })
    )

    expect(error).toBeInstanceOf(ConnectionError)
    expect(String(error)).toBe(
      "Unsupported connection scheme 'ssh:' | Host: ssh://core@host | Environment:\n  CONTAINER_HOST=ssh://core@host"
    )
  })

  it('should reject malformed hosts with the parse failure as cause', () => {
    const error = captureSync(() => resolveConnectionConfig({ DOCKER_HOST: 'not a url' }))

    expect(error).toBeInstanceOf(ConnectionError)
    if (!(error instanceof ConnectionError)) return
    expect(error.host).toBe('not a url')
    expect(error.originalError).toBeInstanceOf(TypeError)
    expect(error.render().startsWith('Malformed service host | Host: not a url | Environment:\n  DOCKER_HOST=not a url | Caused by: ')).toBe(true)
  })

  it('should reject an invalid timeout', () => {
    const error = captureSync(() => resolveConnectionConfig({ PODLINK_TIMEOUT: 'soon' }))

    expect(error).toBeInstanceOf(ConnectionError)
    if (!(error instanceof ConnectionError)) return
    expect(error.message).toBe('Invalid connection environment')
    expect(error.originalError).toBeInstanceOf(ZodError)
  })

  it('should reject an empty host override', () => {
    const error = captureSync(() => resolveConnectionConfig({}, { host: '' }))

    expect(error).toBeInstanceOf(ConnectionError)
    if (!(error instanceof ConnectionError)) return
    expect(error.message).toBe('Invalid connection overrides')
  })
})
