/**
 * SMTP module exports
 */

export { authenticateSmtp, SMTP_AUTH_SUCCESS, type SmtpSession } from './authenticator.js'
