/**
 * IMAP module exports
 */

export { Xoauth2ImapClient, formatImapError, type Xoauth2ImapClientOptions } from './client.js'
export {
  ImapXoauth2Authenticator,
  canUseXoauth2,
  XOAUTH2_AUTHENTICATOR,
  type ImapSession,
  type ImapReply,
  type ImapFallbackLogin,
} from './authenticator.js'
