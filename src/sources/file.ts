/**
 * File Credential Source
 *
 * Reads an encrypted JSON credentials file holding either a single record or a
 * mapping keyed by the exact [host, user, port]:
 *
 *   { "token_url": "...", "client_id": "...", "client_secret": "...", "refresh_token": "..." }
 *
 *   [{ "key": ["imap.example.com", "alice@example.com", "993"], "credentials": { ... } }]
 */

import type { ZodError } from 'zod'
import { ConfigurationError, errorMessage } from '../errors.js'
import { createLog, type Log } from '../logger.js'
import { GPG_EXTENSION, decryptWithGpg } from '../stores/gpg.js'
import type { FileDecryptor } from '../stores/types.js'
import type { OAuth2ClientParams } from '../types.js'
import { BaseCredentialSource } from './base.js'
import {
  CredentialMappingSchema,
  CredentialRecordSchema,
  describeIssue,
  type CredentialEntry,
} from './schema.js'
import type { CredentialLookup } from './types.js'

/**
 * Options for the file credential source
 */
export interface FileSourceOptions {
  path: string
  /** Extension marking the file as encrypted (default: ".gpg") */
  encryptedExtension?: string
  decrypt?: FileDecryptor
  log?: Log
}

/**
 * Parsed contents of a credentials file
 */
type CredentialsFile =
  | { type: 'single'; credentials: OAuth2ClientParams }
  | { type: 'mapping'; entries: CredentialEntry[] }

/**
 * Looks up credentials in an encrypted file
 */
export class FileCredentialSource extends BaseCredentialSource {
  readonly kind = 'file'

  private readonly path: string
  private readonly encryptedExtension: string
  private readonly decrypt: FileDecryptor
  private readonly log: Log

  constructor(options: FileSourceOptions) {
    super()
    this.path = options.path
    this.encryptedExtension = options.encryptedExtension ?? GPG_EXTENSION
    this.decrypt = options.decrypt ?? decryptWithGpg
    this.log = options.log ?? createLog('sources')
  }

  async open(): Promise<CredentialLookup> {
    const file = await this.load()

    if (file.type === 'single') {
      return async () => file.credentials
    }

    return async (host, user, port) => {
      const entry = file.entries.find(
        ({ key }) => key[0] === host && key[1] === (user || null) && key[2] === port
      )
      return entry?.credentials
    }
  }

  /**
   * Decrypts, parses and validates the whole file.
   */
  private async load(): Promise<CredentialsFile> {
    if (!this.path.endsWith(this.encryptedExtension)) {
      throw new ConfigurationError(
        `Credentials file ${this.path} must be encrypted (expected ${this.encryptedExtension} extension)`,
        { path: this.path }
      )
    }

    let plaintext: string
    try {
      plaintext = await this.decrypt(this.path)
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error
      }
      throw new ConfigurationError(`Failed to decrypt ${this.path}: ${errorMessage(error)}`, {
        path: this.path,
        cause: error,
      })
    }

    let data: unknown
    try {
      data = JSON.parse(plaintext)
    } catch (error) {
      throw new ConfigurationError(`Credentials file ${this.path} is not valid JSON`, {
        path: this.path,
        cause: error,
      })
    }

    if (Array.isArray(data)) {
      const parsed = CredentialMappingSchema.safeParse(data)
      if (!parsed.success) {
        throw this.invalid(parsed.error)
      }
      this.log.debug('Loaded credentials mapping', { path: this.path, entries: parsed.data.length })
      return { type: 'mapping', entries: parsed.data }
    }

    const parsed = CredentialRecordSchema.safeParse(data)
    if (!parsed.success) {
      throw this.invalid(parsed.error)
    }
    this.log.debug('Loaded single credentials record', { path: this.path })
    return { type: 'single', credentials: parsed.data }
  }

  private invalid(error: ZodError): ConfigurationError {
    const issue = describeIssue(error)
    return new ConfigurationError(`Invalid credentials file ${this.path}: ${issue.message}`, {
      path: this.path,
      field: issue.field || undefined,
      cause: error,
    })
  }
}

/**
 * Creates a file credential source.
 * @param options File source options
 * @returns File credential source
 */
export function createFileSource(options: FileSourceOptions): FileCredentialSource {
  return new FileCredentialSource(options)
}
