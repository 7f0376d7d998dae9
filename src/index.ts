/**
 * XOAUTH2 credential source for IMAP and SMTP
 *
 * Resolves a short-lived OAuth2 access token for a (host, user, port) identity
 * and hands it to mail protocol sessions through SASL XOAUTH2.
 */

export type { OAuth2ClientParams, IdentityQuery, AuthenticationRecord } from './types.js'
export {
  Xoauth2Error,
  ConfigurationError,
  TransportError,
  ProtocolAuthError,
} from './errors.js'
export { createLog, LOG_CATEGORY, type Log, type LogData } from './logger.js'
export {
  CredentialResolver,
  createCredentialResolver,
  type ResolverConfig,
  type ResolverDeps,
} from './resolver.js'
export { createXoauth2Backend, toCandidates, type CredentialBackend } from './backend.js'
export { loadResolverConfig, EnvConfigSchema, type EnvConfig, type EnvConfigDeps } from './config.js'
export { runCommand, type CommandRunner, type CommandResult } from './process.js'
export * from './oauth/index.js'
export * from './sources/index.js'
export * from './stores/index.js'
export * from './imap/index.js'
export * from './smtp/index.js'
