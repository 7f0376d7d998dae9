/**
 * IMAP client using imapflow, authenticated with a resolved XOAUTH2 record
 */

import { ImapFlow } from 'imapflow'
import { ConfigurationError, ProtocolAuthError } from '../errors.js'
import { createLog, type Log } from '../logger.js'
import type { AuthenticationRecord } from '../types.js'

/** Default timeout for IMAP operations in milliseconds */
const DEFAULT_TIMEOUT_MS = 30000

/** Port using implicit TLS */
const IMAPS_PORT = 993

/**
 * Options for the IMAP client
 */
export interface Xoauth2ImapClientOptions {
  /** Implicit TLS (default: true on port 993) */
  secure?: boolean
  tls?: { rejectUnauthorized?: boolean }
  /** Timeout for IMAP operations in milliseconds (default: 30000) */
  timeoutMs?: number
  log?: Log
}

/**
 * Error fields imapflow adds to its errors
 */
interface ImapFlowErrorFields {
  response?: string
  responseText?: string
  serverResponseCode?: string
  authenticationFailed?: boolean
  code?: string
}

/**
 * Reads the extra imapflow fields off an error.
 * @param error The thrown value
 * @returns The fields present on it
 */
function imapErrorFields(error: unknown): ImapFlowErrorFields {
  if (!(error instanceof Error)) {
    return {}
  }
  const fields: ImapFlowErrorFields = {}
  if ('response' in error && typeof error.response === 'string') {
    fields.response = error.response
  }
  if ('responseText' in error && typeof error.responseText === 'string') {
    fields.responseText = error.responseText
  }
  if ('serverResponseCode' in error && typeof error.serverResponseCode === 'string') {
    fields.serverResponseCode = error.serverResponseCode
  }
  if ('authenticationFailed' in error && typeof error.authenticationFailed === 'boolean') {
    fields.authenticationFailed = error.authenticationFailed
  }
  if ('code' in error && typeof error.code === 'string') {
    fields.code = error.code
  }
  return fields
}

/**
 * Extracts a detailed error message from ImapFlow errors.
 * @param error The error object
 * @returns A descriptive error message
 */
export function formatImapError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error)
  }

  const imapError = imapErrorFields(error)
  const parts: string[] = []

  if (imapError.authenticationFailed) {
    parts.push('Authentication failed')
  }

  if (imapError.responseText && imapError.responseText !== 'Command failed') {
    parts.push(imapError.responseText)
  } else if (imapError.serverResponseCode) {
    parts.push(imapError.serverResponseCode)
  }

  if (imapError.code && imapError.code !== imapError.serverResponseCode) {
    parts.push(`(${imapError.code})`)
  }

  return parts.length > 0 ? parts.join(': ') : error.message
}

/**
 * Parses a record port.
 * @param port Port string
 * @returns Port number
 */
function parsePort(port: string): number {
  const value = Number(port)
  if (!Number.isInteger(value) || value <= 0 || value > 65535) {
    throw new ConfigurationError(`Invalid IMAP port: ${port}`, { field: 'port' })
  }
  return value
}

/**
 * IMAP connection authenticated with XOAUTH2.
 * imapflow sends `AUTHENTICATE XOAUTH2` itself when given an access token.
 */
export class Xoauth2ImapClient {
  private client: ImapFlow | null = null
  private readonly record: AuthenticationRecord
  private readonly options: Xoauth2ImapClientOptions
  private readonly log: Log

  /**
   * Creates a new IMAP client instance.
   * @param record Resolved authentication record
   * @param options Connection options
   */
  constructor(record: AuthenticationRecord, options: Xoauth2ImapClientOptions = {}) {
    this.record = record
    this.options = options
    this.log = options.log ?? createLog('imap')
  }

  /**
   * Connects and authenticates.
   * A server rejecting the token raises ProtocolAuthError; other failures propagate.
   */
  async connect(): Promise<void> {
    const port = parsePort(this.record.port)
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS

    const client = new ImapFlow({
      host: this.record.host,
      port,
      secure: this.options.secure ?? port === IMAPS_PORT,
      ...(this.options.tls ? { tls: this.options.tls } : {}),
      auth: {
        user: this.record.user,
        accessToken: this.record.secret,
      },
      logger: false,
      connectionTimeout: timeoutMs,
      greetingTimeout: timeoutMs,
      socketTimeout: timeoutMs,
    })

    this.log.debug('Connecting to IMAP server', {
      host: this.record.host,
      port,
      user: this.record.user,
    })

    try {
      await client.connect()
    } catch (error) {
      const fields = imapErrorFields(error)
      if (fields.authenticationFailed) {
        throw new ProtocolAuthError(
          `IMAP XOAUTH2 authentication failed for ${this.record.user}@${this.record.host}: ${formatImapError(error)}`,
          { reply: fields.response, cause: error }
        )
      }
      throw error
    }

    this.client = client
  }

  /**
   * Disconnects from the IMAP server.
   */
  async disconnect(): Promise<void> {
    if (this.client) {
      const client = this.client
      this.client = null
      await client.logout()
    }
  }

  /**
   * Connects, opens INBOX and disconnects.
   */
  async testConnection(): Promise<void> {
    await this.connect()
    try {
      const client = this.getConnectedClient()
      const lock = await client.getMailboxLock('INBOX')
      lock.release()
    } finally {
      await this.disconnect()
    }
  }

  /**
   * Gets the imapflow instance.
   * @returns The imapflow client, or null when not connected
   */
  getClient(): ImapFlow | null {
    return this.client
  }

  private getConnectedClient(): ImapFlow {
    if (!this.client) {
      throw new Error('Not connected to IMAP server')
    }
    return this.client
  }
}
