/**
 * SMTP XOAUTH2 login
 */

import { buildXOAuth2String } from '../oauth/xoauth2.js'
import type { AuthenticationRecord } from '../types.js'

/** Reply code for a successful AUTH */
export const SMTP_AUTH_SUCCESS = 235

/**
 * SMTP session contract consumed by the authenticator.
 * `sendCommandOrFail` rejects when the reply code differs from `expectedCode`.
 */
export interface SmtpSession {
  sendCommandOrFail(command: string, expectedCode: number): Promise<unknown>
}

/**
 * Sends `AUTH XOAUTH2` with the resolved access token.
 * A rejected reply propagates from the session unchanged.
 * @param session SMTP session
 * @param record Resolved authentication record
 */
export async function authenticateSmtp(
  session: SmtpSession,
  record: AuthenticationRecord
): Promise<void> {
  await session.sendCommandOrFail(
    `AUTH XOAUTH2 ${buildXOAuth2String(record.user, record.secret)}`,
    SMTP_AUTH_SUCCESS
  )
}
