/**
 * Shared behaviour for credential sources
 */

import type { OAuth2ClientParams } from '../types.js'
import type { CredentialLookup, CredentialSource, CredentialSourceKind } from './types.js'

/**
 * Base class implementing `fetch` on top of `open`
 */
export abstract class BaseCredentialSource implements CredentialSource {
  abstract readonly kind: CredentialSourceKind

  abstract open(): Promise<CredentialLookup>

  async fetch(
    host: string,
    user: string | undefined,
    port: string
  ): Promise<OAuth2ClientParams | undefined> {
    const lookup = await this.open()
    return lookup(host, user, port)
  }
}
