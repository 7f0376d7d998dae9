/**
 * SASL XOAUTH2 initial response
 */

/** SASL field separator (CTRL-A) */
const SEPARATOR = '\x01'

/**
 * Builds the XOAUTH2 string for IMAP AUTHENTICATE / SMTP AUTH.
 * Framing is `user=<user>^Aauth=Bearer <token>^A^A`, base64 encoded on one line.
 * @param user User identity
 * @param accessToken OAuth2 access token
 * @returns Base64-encoded XOAUTH2 string
 */
export function buildXOAuth2String(user: string, accessToken: string): string {
  const authString = `user=${user}${SEPARATOR}auth=Bearer ${accessToken}${SEPARATOR}${SEPARATOR}`
  return Buffer.from(authString, 'utf8').toString('base64')
}
