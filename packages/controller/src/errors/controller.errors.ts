/**
 * Error taxonomy for the limits controller.
 *
 * Configuration errors stop the process before any I/O. Every other error
 * aborts the running cycle.
 */

export type ControllerErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'CONNECTIVITY_ERROR'
  | 'NOT_FOUND'
  | 'KEY_MISSING'
  | 'DECODE_ERROR'
  | 'CONFLICT'
  | 'ALREADY_EXISTS'

export type ErrorContext = Record<string, unknown>

/**
 * Base class carrying a stable code and the names needed to diagnose the failure
 */
export class ControllerError extends Error {
  constructor(
    message: string,
    public readonly code: ControllerErrorCode,
    public readonly context: ErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ControllerError'
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    }
  }
}

/**
 * Invalid or missing command line options
 */
export class ConfigurationError extends ControllerError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    context: ErrorContext = {}
  ) {
    super(message, 'CONFIGURATION_ERROR', { ...context, issues })
    this.name = 'ConfigurationError'
  }
}

/**
 * The API server could not be reached or refused the request
 */
export class ConnectivityError extends ControllerError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    context: ErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, 'CONNECTIVITY_ERROR', { ...context, statusCode }, options)
    this.name = 'ConnectivityError'
  }
}

export class NotFoundError extends ControllerError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, 'NOT_FOUND', context, options)
    this.name = 'NotFoundError'
  }
}

/**
 * The ConfigMap exists but has no entry under the expected key
 */
export class KeyMissingError extends ControllerError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'KEY_MISSING', context)
    this.name = 'KeyMissingError'
  }
}

export class DecodeError extends ControllerError {
  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }>,
    context: ErrorContext = {}
  ) {
    super(message, 'DECODE_ERROR', { ...context, issues })
    this.name = 'DecodeError'
  }
}

/**
 * The resourceVersion sent with an update no longer matches the stored object
 */
export class ConflictError extends ControllerError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, 'CONFLICT', context, options)
    this.name = 'ConflictError'
  }
}

/**
 * A create was rejected because the name is taken. Only the publisher sees this.
 */
export class AlreadyExistsError extends ControllerError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, 'ALREADY_EXISTS', context, options)
    this.name = 'AlreadyExistsError'
  }
}
