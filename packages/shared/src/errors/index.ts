/**
 * Shared error system for podlink
 *
 * This module provides the error taxonomy raised by the client:
 * - HTTP errors classified by status range (APIError, NotFound, ImageNotFound)
 * - Library-native errors under PodmanError (build, container, connection)
 * - Stream decoding errors
 * - A kind enum for switching without string inspection
 */

import { APIError, ImageNotFound, NotFound } from './api'
import {
  BuildError,
  ConnectionError,
  ContainerError,
  InvalidArgument,
  PodmanError,
} from './podman'
import { StreamParseError } from './stream'

export { ErrorKind, CONNECTION_ENV_VARS } from './codes'
export type { ResponseLike, ConnectionErrorContext, Command, StderrOutput } from './context'
export { APIError, NotFound, ImageNotFound, type APIErrorClass, type APIErrorKind } from './api'
export {
  DockerException,
  PodmanError,
  InvalidArgument,
  BuildError,
  ContainerError,
  ConnectionError,
} from './podman'
export { StreamParseError } from './stream'

/**
 * Every concrete error the library raises
 */
export type PodlinkError =
  | APIError
  | NotFound
  | ImageNotFound
  | BuildError
  | ContainerError
  | ConnectionError
  | InvalidArgument
  | StreamParseError

/**
 * Check if an error came from an HTTP exchange
 */
export function isAPIError(error: unknown): error is APIError {
  return error instanceof APIError
}

/**
 * Check if an error reports a missing resource of any kind
 */
export function isNotFound(error: unknown): error is NotFound | ImageNotFound {
  return error instanceof NotFound || error instanceof ImageNotFound
}

/**
 * Check if an error is one of the library's own reported conditions
 */
export function isPodmanError(error: unknown): error is PodmanError {
  return error instanceof PodmanError
}

/**
 * Check if an error belongs to the taxonomy at all
 */
export function isPodlinkError(error: unknown): error is PodlinkError {
  return (
    error instanceof APIError ||
    error instanceof BuildError ||
    error instanceof ContainerError ||
    error instanceof ConnectionError ||
    error instanceof InvalidArgument ||
    error instanceof StreamParseError
  )
}
