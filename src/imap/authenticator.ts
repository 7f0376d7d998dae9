/**
 * IMAP XOAUTH2 login
 *
 * Overrides the session login when XOAUTH2 is negotiated and the server takes
 * the initial response inline; otherwise the session's own login runs.
 */

import { ProtocolAuthError } from '../errors.js'
import { buildXOAuth2String } from '../oauth/xoauth2.js'
import type { AuthenticationRecord } from '../types.js'

/**
 * Tagged IMAP command completion
 */
export interface ImapReply {
  status: 'OK' | 'NO' | 'BAD'
  text: string
}

/**
 * IMAP session contract consumed by the authenticator
 */
export interface ImapSession {
  hasCapability(name: string): boolean
  sendCommand(command: string): Promise<ImapReply>
}

/**
 * The session's normal login, used when XOAUTH2 does not apply
 */
export type ImapFallbackLogin = (user: string, secret: string) => Promise<void>

/** Authenticator name selecting XOAUTH2 */
export const XOAUTH2_AUTHENTICATOR = 'xoauth2'

/**
 * Checks whether the XOAUTH2 path applies.
 * @param session IMAP session
 * @param authenticator Negotiated authenticator name
 * @returns True when the server advertises AUTH=XOAUTH2 and SASL-IR
 */
export function canUseXoauth2(session: ImapSession, authenticator: string): boolean {
  return (
    authenticator.toLowerCase() === XOAUTH2_AUTHENTICATOR &&
    session.hasCapability('AUTH=XOAUTH2') &&
    session.hasCapability('SASL-IR')
  )
}

/**
 * XOAUTH2 login strategy for IMAP sessions
 */
export class ImapXoauth2Authenticator {
  private readonly fallback: ImapFallbackLogin

  /**
   * @param fallback Login used when XOAUTH2 does not apply
   */
  constructor(fallback: ImapFallbackLogin) {
    this.fallback = fallback
  }

  /**
   * Logs in with the resolved record.
   * @param session IMAP session
   * @param record Resolved authentication record
   * @param authenticator Negotiated authenticator name
   */
  async login(
    session: ImapSession,
    record: AuthenticationRecord,
    authenticator: string
  ): Promise<void> {
    if (!canUseXoauth2(session, authenticator)) {
      await this.fallback(record.user, record.secret)
      return
    }

    const reply = await session.sendCommand(
      `AUTHENTICATE XOAUTH2 ${buildXOAuth2String(record.user, record.secret)}`
    )

    if (reply.status !== 'OK') {
      throw new ProtocolAuthError(
        `IMAP XOAUTH2 authentication failed for ${record.user}@${record.host}: ${reply.status} ${reply.text}`,
        { reply: `${reply.status} ${reply.text}` }
      )
    }
  }
}
