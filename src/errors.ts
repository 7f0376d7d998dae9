/**
 * Error types for credential resolution.
 *
 * A credential source that finds nothing is not an error; it yields `undefined`.
 * Everything below aborts the lookup that raised it.
 */

/**
 * Base class for all errors raised by this package
 */
export class Xoauth2Error extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Malformed or unreadable credential configuration
 */
export class ConfigurationError extends Xoauth2Error {
  readonly path?: string
  readonly field?: string

  constructor(
    message: string,
    details: { path?: string; field?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause })
    this.path = details.path
    this.field = details.field
  }
}

/**
 * Token endpoint request failed, or its response carried no access token
 */
export class TransportError extends Xoauth2Error {
  readonly endpoint?: string

  constructor(message: string, details: { endpoint?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause })
    this.endpoint = details.endpoint
  }
}

/**
 * The mail server rejected the XOAUTH2 exchange
 */
export class ProtocolAuthError extends Xoauth2Error {
  readonly reply?: string

  constructor(message: string, details: { reply?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause })
    this.reply = details.reply
  }
}

/**
 * Extracts a message from an unknown thrown value.
 * @param error The thrown value
 * @returns Error message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
