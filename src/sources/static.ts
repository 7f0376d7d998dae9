/**
 * Static Credential Source
 *
 * One identity for every query.
 */

import { ConfigurationError } from '../errors.js'
import type { OAuth2ClientParams } from '../types.js'
import { BaseCredentialSource } from './base.js'
import { missingParams } from './schema.js'
import type { CredentialLookup } from './types.js'

/**
 * Returns the configured literal regardless of host, user and port
 */
export class StaticCredentialSource extends BaseCredentialSource {
  readonly kind = 'static'

  private readonly credentials: Readonly<OAuth2ClientParams>

  /**
   * @param credentials The literal; all required fields must be non-empty
   */
  constructor(credentials: OAuth2ClientParams) {
    super()

    const missing = missingParams(credentials)
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Static XOAUTH2 credentials are missing required field: ${missing.join(', ')}`,
        { field: missing[0] }
      )
    }

    this.credentials = Object.freeze({ ...credentials })
  }

  async open(): Promise<CredentialLookup> {
    return async () => this.credentials
  }
}

/**
 * Creates a static credential source.
 * @param credentials OAuth2 client parameters
 * @returns Static credential source
 */
export function createStaticSource(credentials: OAuth2ClientParams): StaticCredentialSource {
  return new StaticCredentialSource(credentials)
}
