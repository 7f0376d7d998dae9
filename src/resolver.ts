/**
 * Credential resolution: credential source, then token refresh.
 */

import { createLog, type Log } from './logger.js'
import { refreshAccessToken } from './oauth/token-endpoint.js'
import { selectTransport, type HttpTransport } from './oauth/transports.js'
import { createCredentialSource } from './sources/index.js'
import type { CredentialSource, CredentialSourceConfig } from './sources/types.js'
import type { FileDecryptor } from './stores/types.js'
import type { AuthenticationRecord } from './types.js'

/**
 * Resolver configuration, fixed for the resolver's lifetime
 */
export interface ResolverConfig {
  source: CredentialSourceConfig
  /** Use the curl executable instead of built-in fetch */
  useCurl?: boolean
  curlCommand?: string
}

/**
 * Collaborators, overridable for embedding and tests
 */
export interface ResolverDeps {
  log?: Log
  transport?: HttpTransport
  decrypt?: FileDecryptor
}

/**
 * Resolves (host, user, port) candidates to a live access token
 */
export class CredentialResolver {
  private readonly source: CredentialSource
  private readonly transport: HttpTransport
  private readonly log: Log

  /**
   * Creates a resolver. The credential source is built once here.
   * @param config Resolver configuration
   * @param deps Optional collaborators
   */
  constructor(config: ResolverConfig, deps: ResolverDeps = {}) {
    this.log = deps.log ?? createLog('resolver')
    this.source = createCredentialSource(config.source, { decrypt: deps.decrypt, log: this.log })
    this.transport = deps.transport ?? selectTransport(config.useCurl ?? false, config.curlCommand)
  }

  /**
   * Gets the credential source variant in use.
   */
  get sourceKind(): CredentialSource['kind'] {
    return this.source.kind
  }

  /**
   * Probes hosts × ports in order and refreshes a token for the first match.
   * A match whose refresh fails raises instead of trying the next candidate.
   * @param hosts Candidate hosts
   * @param user Query user, if any
   * @param ports Candidate ports
   * @returns Authentication record, or undefined when no candidate matched
   */
  async resolve(
    hosts: readonly string[],
    user: string | undefined,
    ports: readonly string[]
  ): Promise<AuthenticationRecord | undefined> {
    const lookup = await this.source.open()

    for (const host of hosts) {
      for (const port of ports) {
        const params = await lookup(host, user, port)
        if (!params) continue

        const effectiveUser = user || params.user
        if (!effectiveUser) {
          this.log.debug('Credentials matched without a user, skipping', { host, port })
          continue
        }

        this.log.info('Refreshing XOAUTH2 access token', {
          host,
          port,
          user: effectiveUser,
          source: this.source.kind,
        })
        const secret = await refreshAccessToken(this.transport, params, this.log)

        return { host, port, user: effectiveUser, secret }
      }
    }

    this.log.debug('No XOAUTH2 credentials matched', { hosts, ports, user })
    return undefined
  }
}

/**
 * Creates a credential resolver.
 * @param config Resolver configuration
 * @param deps Optional collaborators
 * @returns Credential resolver
 */
export function createCredentialResolver(
  config: ResolverConfig,
  deps?: ResolverDeps
): CredentialResolver {
  return new CredentialResolver(config, deps)
}
