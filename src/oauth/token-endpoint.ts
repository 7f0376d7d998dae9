/**
 * OAuth2 refresh_token grant
 */

import { z } from 'zod'
import { TransportError } from '../errors.js'
import type { Log } from '../logger.js'
import type { OAuth2ClientParams } from '../types.js'
import type { HttpTransport } from './transports.js'

/**
 * Token endpoint response (the fields we read)
 */
const TokenEndpointResponseSchema = z
  .object({
    access_token: z.string().optional(),
    error: z.string().optional(),
    error_description: z.string().optional(),
  })
  .passthrough()

export type TokenEndpointResponse = z.infer<typeof TokenEndpointResponseSchema>

const FORM_HEADERS = {
  'Content-Type': 'application/x-www-form-urlencoded',
} as const

/**
 * Builds the form body for the refresh_token grant.
 * @param params OAuth2 client parameters
 * @returns Form-encoded body
 */
export function buildRefreshRequestBody(params: OAuth2ClientParams): string {
  return new URLSearchParams({
    client_id: params.clientId,
    client_secret: params.clientSecret,
    refresh_token: params.refreshToken,
    grant_type: 'refresh_token',
  }).toString()
}

/**
 * Extracts the access token from a token endpoint response body.
 * @param body Raw response body
 * @param tokenUrl Endpoint URL, for error context
 * @returns Access token
 */
export function parseAccessToken(body: string, tokenUrl: string): string {
  let data: unknown
  try {
    data = JSON.parse(body)
  } catch (error) {
    throw new TransportError(`Token endpoint ${tokenUrl} returned invalid JSON`, {
      endpoint: tokenUrl,
      cause: error,
    })
  }

  const parsed = TokenEndpointResponseSchema.safeParse(data)
  if (!parsed.success) {
    throw new TransportError(`Token endpoint ${tokenUrl} returned an unexpected response`, {
      endpoint: tokenUrl,
      cause: parsed.error,
    })
  }

  const response: TokenEndpointResponse = parsed.data
  if (response.access_token) {
    return response.access_token
  }

  // Endpoints report grant failures as { error, error_description }
  if (response.error) {
    const description = response.error_description ? ` - ${response.error_description}` : ''
    throw new TransportError(`Token error from ${tokenUrl}: ${response.error}${description}`, {
      endpoint: tokenUrl,
    })
  }

  throw new TransportError(`Token endpoint ${tokenUrl} response has no access_token`, {
    endpoint: tokenUrl,
  })
}

/**
 * Exchanges a refresh token for a new access token.
 * One request, no retry.
 * @param transport HTTP transport
 * @param params OAuth2 client parameters
 * @param log Logger
 * @returns Access token
 */
export async function refreshAccessToken(
  transport: HttpTransport,
  params: OAuth2ClientParams,
  log: Log
): Promise<string> {
  log.debug('Requesting access token', {
    tokenUrl: params.tokenUrl,
    clientId: params.clientId,
    transport: transport.name,
  })

  const body = await transport.post(params.tokenUrl, buildRefreshRequestBody(params), FORM_HEADERS)
  const accessToken = parseAccessToken(body, params.tokenUrl)

  // Access tokens are short-lived; the refresh token and client secret are never logged
  log.debug('Access token refreshed', { tokenUrl: params.tokenUrl, accessToken })

  return accessToken
}
