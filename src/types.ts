/**
 * XOAUTH2 Credential Types
 */

/**
 * Static OAuth2 client parameters for one identity
 */
export interface OAuth2ClientParams {
  tokenUrl: string
  clientId: string
  clientSecret: string
  refreshToken: string
  // Used when the query carries no user
  user?: string
}

/**
 * Query from a credential-search dispatcher.
 * Hosts and ports are candidate lists, probed hosts × ports in the given order.
 */
export interface IdentityQuery {
  host: string | readonly string[]
  user?: string
  port: string | readonly string[]
}

/**
 * Result of a successful lookup.
 * `secret` is the live access token, never the refresh token.
 */
export interface AuthenticationRecord {
  host: string
  port: string
  user: string
  secret: string
}

