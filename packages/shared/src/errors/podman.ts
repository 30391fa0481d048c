import { CONNECTION_ENV_VARS, ErrorKind } from './codes'
import type { Command, ConnectionErrorContext, StderrOutput } from './context'

/**
 * Base class for the exception hierarchy.
 * Provided for compatibility with code written against docker-style taxonomies.
 */
export class DockerException extends Error {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DockerException'

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  /**
   * Human-readable diagnostic
   */
  render(): string {
    return this.message
  }

  toString(): string {
    return this.render()
  }

  toJSON() {
    return {
      name: this.name,
      message: this.render(),
    }
  }
}

/**
 * Base class for conditions reported by this library itself
 */
export class PodmanError extends DockerException {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PodmanError'
  }
}

/**
 * Parameter to a method or function was not valid
 */
export class InvalidArgument extends PodmanError {
  public readonly kind = ErrorKind.INVALID_ARGUMENT

  constructor(message: string) {
    super(message)
    this.name = 'InvalidArgument'
  }
}

/**
 * Error occurred during an image build
 */
export class BuildError extends PodmanError {
  public readonly kind = ErrorKind.BUILD
  public readonly reason: string
  public readonly buildLog: readonly string[]

  /**
   * @param reason - Describes the error
   * @param buildLog - Build output collected before the failure
   */
  constructor(reason: string, buildLog: Iterable<string>) {
    super(reason)
    this.name = 'BuildError'
    this.reason = reason
    this.buildLog = Object.freeze(Array.from(buildLog))
  }
}

function formatCommand(command: Command): string {
  return typeof command === 'string' ? command : command.join(' ')
}

function formatStderr(stderr: StderrOutput): string {
  return typeof stderr === 'string' ? stderr : stderr.join('\n')
}

/**
 * A container exited with a non-zero exit status.
 *
 * The message is composed once at construction; the container handle may
 * change afterwards but the diagnostic does not.
 */
export class ContainerError<TContainer = unknown> extends PodmanError {
  public readonly kind = ErrorKind.CONTAINER
  public readonly container: TContainer
  public readonly exitStatus: number
  public readonly command: Command
  public readonly image: string
  public readonly stderr?: StderrOutput

  /**
   * @param container - Container that reported the error
   * @param exitStatus - Non-zero exit status of the container
   * @param command - Command passed to the container when created
   * @param image - Image used to create the container
   * @param stderr - Errors written by the container
   */
  constructor(
    container: TContainer,
    exitStatus: number,
    command: Command,
    image: string,
    stderr?: StderrOutput
  ) {
    if (!Number.isInteger(exitStatus) || exitStatus === 0) {
      throw new InvalidArgument(
        `ContainerError requires a non-zero integer exit status, got ${exitStatus}`
      )
    }

    const err = stderr !== undefined ? `: ${formatStderr(stderr)}` : ''
    super(
      `Command '${formatCommand(command)}' in image '${image}' returned non-zero exit status ${exitStatus}${err}`
    )
    this.name = 'ContainerError'
    this.container = container
    this.exitStatus = exitStatus
    this.command = command
    this.image = image
    this.stderr = stderr
  }
}

/**
 * Taxonomy errors render through toString; anything else contributes its message
 */
function describeCause(error: Error): string {
  return error.toString === Error.prototype.toString ? error.message : error.toString()
}

/**
 * Connecting to the service failed before any HTTP exchange took place
 */
export class ConnectionError extends PodmanError {
  public readonly kind = ErrorKind.CONNECTION
  public readonly environment?: Readonly<Record<string, string | undefined>>
  public readonly host?: string
  public readonly originalError?: Error

  constructor(message: string, context: ConnectionErrorContext = {}) {
    super(message, context.originalError ? { cause: context.originalError } : undefined)
    this.name = 'ConnectionError'
    this.environment = context.environment
    this.host = context.host
    this.originalError = context.originalError
  }

  /**
   * Connection-relevant variables from the captured environment, in their original order
   */
  relevantEnvironment(): Array<[string, string]> {
    if (!this.environment) {
      return []
    }

    const relevant: Array<[string, string]> = []
    for (const [key, value] of Object.entries(this.environment)) {
      if (value !== undefined && CONNECTION_ENV_VARS.has(key)) {
        relevant.push([key, value])
      }
    }
    return relevant
  }

  /**
   * Segments are always ordered: message, host, environment, cause
   */
  override render(): string {
    const segments = [this.message]

    if (this.host) {
      segments.push(`Host: ${this.host}`)
    }

    const relevant = this.relevantEnvironment()
    if (relevant.length > 0) {
      segments.push(['Environment:', ...relevant.map(([key, value]) => `  ${key}=${value}`)].join('\n'))
    }

    if (this.originalError) {
      segments.push(`Caused by: ${describeCause(this.originalError)}`)
    }

    return segments.join(' | ')
  }
}
