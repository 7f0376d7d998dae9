/**
 * Validation for credential records
 */

import { z, type ZodError } from 'zod'
import type { OAuth2ClientParams } from '../types.js'

const requiredString = z.string().min(1, 'must not be empty')

/**
 * A credential record as written in a credentials file
 */
export const CredentialRecordSchema = z
  .object({
    token_url: requiredString,
    client_id: requiredString,
    client_secret: requiredString,
    refresh_token: requiredString,
    user: z.string().optional(),
  })
  .transform(
    (record): OAuth2ClientParams => ({
      tokenUrl: record.token_url,
      clientId: record.client_id,
      clientSecret: record.client_secret,
      refreshToken: record.refresh_token,
      ...(record.user ? { user: record.user } : {}),
    })
  )

/**
 * One entry of a credentials mapping, keyed by the exact [host, user, port]
 */
export const CredentialEntrySchema = z.object({
  key: z.tuple([z.string(), z.string().nullable(), z.string()]),
  credentials: CredentialRecordSchema,
})

export const CredentialMappingSchema = z.array(CredentialEntrySchema)

export type CredentialEntry = z.infer<typeof CredentialEntrySchema>

/** Required fields of OAuth2ClientParams */
export const REQUIRED_PARAMS = ['tokenUrl', 'clientId', 'clientSecret', 'refreshToken'] as const

/**
 * Lists required fields that are missing or empty.
 * @param params Candidate parameters
 * @returns Names of missing fields
 */
export function missingParams(params: Partial<OAuth2ClientParams>): string[] {
  return REQUIRED_PARAMS.filter((field) => !params[field])
}

/**
 * Describes the first validation issue.
 * @param error Zod error
 * @returns Field path and message
 */
export function describeIssue(error: ZodError): { field: string; message: string } {
  const issue = error.issues[0]
  if (!issue) {
    return { field: '', message: error.message }
  }
  const field = issue.path.join('.')
  return { field, message: field ? `${field}: ${issue.message}` : issue.message }
}
