/**
 * Backend for a credential-search dispatcher.
 *
 * The dispatcher asks every backend in turn and merges the results; an empty
 * list tells it to try the next one.
 */

import type { CredentialResolver } from './resolver.js'
import type { AuthenticationRecord, IdentityQuery } from './types.js'

/**
 * Backend as seen by the dispatcher
 */
export interface CredentialBackend {
  readonly name: string
  search(query: IdentityQuery): Promise<AuthenticationRecord[]>
}

/**
 * Normalizes a single value or list into ordered unique candidates.
 * @param value One candidate or a list
 * @returns Candidates in first-seen order
 */
export function toCandidates(value: string | readonly string[]): string[] {
  const values = typeof value === 'string' ? [value] : value
  return [...new Set(values)]
}

/**
 * Creates the XOAUTH2 backend.
 * @param resolver Credential resolver
 * @returns Dispatcher backend
 */
export function createXoauth2Backend(resolver: CredentialResolver): CredentialBackend {
  return {
    name: 'xoauth2',
    async search(query) {
      const record = await resolver.resolve(
        toCandidates(query.host),
        query.user,
        toCandidates(query.port)
      )
      return record ? [record] : []
    },
  }
}
