/**
 * Password Store Credential Source
 *
 * Reads the OAuth2 parameters from named fields of a secret-store entry.
 */

import { createLog, type Log } from '../logger.js'
import type { SecretEntry, SecretStore } from '../stores/types.js'
import type { OAuth2ClientParams } from '../types.js'
import { BaseCredentialSource } from './base.js'
import type { CredentialLookup } from './types.js'

/**
 * Entry field names holding the OAuth2 parameters
 */
export const PASSWORD_STORE_FIELDS = {
  tokenUrl: 'xoauth2_token_url',
  clientId: 'xoauth2_client_id',
  clientSecret: 'xoauth2_client_secret',
  refreshToken: 'xoauth2_refresh_token',
} as const

/** Optional entry field overriding the user */
export const PASSWORD_STORE_USER_FIELD = 'user'

/**
 * Looks up credentials in a secret store
 */
export class PasswordStoreCredentialSource extends BaseCredentialSource {
  readonly kind = 'password-store'

  private readonly store: SecretStore
  private readonly log: Log

  constructor(store: SecretStore, log: Log = createLog('sources')) {
    super()
    this.store = store
    this.log = log
  }

  /**
   * Opens a store session; each matched entry is read and checked once per open.
   */
  async open(): Promise<CredentialLookup> {
    const store = this.store.open ? await this.store.open() : this.store
    const results = new Map<string, OAuth2ClientParams | undefined>()

    return async (host, user, port) => {
      const entry = await store.find({ host, user, port })
      if (!entry) {
        return undefined
      }
      if (results.has(entry.name)) {
        return results.get(entry.name)
      }

      const params = this.readParams(store, entry)
      results.set(entry.name, params)
      return params
    }
  }

  private readParams(store: SecretStore, entry: SecretEntry): OAuth2ClientParams | undefined {
    const missing: string[] = []
    const read = (field: string): string => {
      const value = store.get(field, entry)
      if (!value) {
        this.log.warn(`Password store entry is missing field ${field}`, {
          entry: entry.name,
          field,
        })
        missing.push(field)
        return ''
      }
      return value
    }

    const params: OAuth2ClientParams = {
      tokenUrl: read(PASSWORD_STORE_FIELDS.tokenUrl),
      clientId: read(PASSWORD_STORE_FIELDS.clientId),
      clientSecret: read(PASSWORD_STORE_FIELDS.clientSecret),
      refreshToken: read(PASSWORD_STORE_FIELDS.refreshToken),
    }

    if (missing.length > 0) {
      return undefined
    }

    const userOverride = store.get(PASSWORD_STORE_USER_FIELD, entry)
    if (userOverride) {
      params.user = userOverride
    }
    return params
  }
}

/**
 * Creates a password store credential source.
 * @param store Secret store
 * @param log Logger
 * @returns Password store credential source
 */
export function createPasswordStoreSource(
  store: SecretStore,
  log?: Log
): PasswordStoreCredentialSource {
  return new PasswordStoreCredentialSource(store, log)
}
