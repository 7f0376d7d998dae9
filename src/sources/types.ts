/**
 * Credential Source Types
 */

import type { Log } from '../logger.js'
import type { OAuth2ClientParams } from '../types.js'
import type { FileDecryptor, SecretStore } from '../stores/types.js'

/**
 * Credential source variants
 */
export type CredentialSourceKind = 'static' | 'function' | 'file' | 'password-store'

/**
 * Looks up OAuth2 parameters for one (host, user, port).
 * `undefined` means no match.
 */
export type CredentialLookup = (
  host: string,
  user: string | undefined,
  port: string
) => Promise<OAuth2ClientParams | undefined>

/**
 * User-supplied resolver for the function variant
 */
export type CredentialFunction = (
  host: string,
  user: string | undefined,
  port: string
) => OAuth2ClientParams | null | undefined | Promise<OAuth2ClientParams | null | undefined>

/**
 * Credential source interface
 */
export interface CredentialSource {
  readonly kind: CredentialSourceKind

  /**
   * Prepares a lookup for one resolution.
   * Reads backing storage at most once; the lookup can then be called per (host, port).
   */
  open(): Promise<CredentialLookup>

  /**
   * Single lookup, equivalent to `open()` followed by one call.
   * @param host Host name
   * @param user User, if the query has one
   * @param port Port
   */
  fetch(host: string, user: string | undefined, port: string): Promise<OAuth2ClientParams | undefined>
}

/**
 * Process-wide credential source configuration, chosen once
 */
export type CredentialSourceConfig =
  | { type: 'static'; credentials: OAuth2ClientParams }
  | { type: 'function'; resolve: CredentialFunction }
  | { type: 'file'; path: string; encryptedExtension?: string }
  | { type: 'password-store'; store: SecretStore }

/**
 * Collaborators for building a credential source
 */
export interface CredentialSourceDeps {
  decrypt?: FileDecryptor
  log?: Log
}
