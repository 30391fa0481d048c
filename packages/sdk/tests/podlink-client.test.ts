/**
 * PodlinkClient Unit Tests
 */

import { describe, it, expect } from 'vitest'
import { ConnectionError } from '@podlink/shared/errors'
import { LogLevel, createLogger } from '@podlink/shared/logger'
import { PodlinkClient } from '../src/core/podlink-client'
import { FakeResponse, captureError, createFakeFetch } from './setup'

const logger = createLogger({ level: LogLevel.SILENT })

describe('PodlinkClient', () => {
  it('should resolve its connection from the given environment', () => {
    const client = new PodlinkClient({ env: { CONTAINER_HOST: 'tcp://localhost:8080' }, logger })

    expect(client.config.baseUrl).toBe('http://localhost:8080')
    expect(client.containers).toBeDefined()
    expect(client.images).toBeDefined()
  })

  it('should ping through the configured host', async () => {
    const { fetch, requests } = createFakeFetch({
      'GET /_ping': () => new FakeResponse(200, 'OK'),
    })
    const client = new PodlinkClient({ host: 'http://127.0.0.1:8888', env: {}, logger, fetch })

    await expect(client.ping()).resolves.toBe('OK')
    expect(fetch).toHaveBeenCalledWith('http://127.0.0.1:8888/v5.0.0/libpod/_ping', expect.anything())
    expect(requests).toHaveLength(1)
  })

  it('should report unreachable services with connection context', async () => {
    const client = new PodlinkClient({
      env: { DOCKER_HOST: 'tcp://10.0.0.5:2375', AWS_SECRET_ACCESS_KEY: 'test-secret' },
      logger,
      fetch: async () => {
        throw new TypeError('fetch failed')
      },
    })

    const error = await captureError(client.ping())

    expect(error).toBeInstanceOf(ConnectionError)
    expect(String(error)).toBe(
      'Failed to connect to the service | Host: tcp://10.0.0.5:2375 | Environment:\n  DOCKER_HOST=tcp://10.0.0.5:2375 | Caused by: TypeError: fetch failed'
    )
  })

  it('should dial TLS hosts through a dispatcher built from the cert settings', async () => {
    const { fetch, requests } = createFakeFetch({
      'GET /_ping': () => new FakeResponse(200, 'OK'),
    })
    const client = new PodlinkClient({
      env: { DOCKER_HOST: 'tcp://10.0.0.5:2376', DOCKER_CERT_PATH: '/nonexistent/podlink-certs' },
      logger,
      fetch,
    })

    await client.ping()

    expect(client.config.baseUrl).toBe('https://10.0.0.5:2376')
    expect(requests[0]?.init.dispatcher).toBeDefined()
    await client.close()
  })

  it('should fail fast on an unsupported host', () => {
    expect(() => PodlinkClient.fromEnv({ CONTAINER_HOST: 'ssh://core@host' })).toThrow(ConnectionError)
  })

  it('should close a socket client', async () => {
    const client = PodlinkClient.fromEnv({ CONTAINER_HOST: 'unix:///run/user/1000/podman/podman.sock' })

    expect(client.config.socketPath).toBe('/run/user/1000/podman/podman.sock')
    await expect(client.close()).resolves.toBeUndefined()
  })
})
