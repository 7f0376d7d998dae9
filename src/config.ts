/**
 * Resolver configuration from environment variables
 */

import { z } from 'zod'
import { ConfigurationError } from './errors.js'
import type { Log } from './logger.js'
import type { ResolverConfig } from './resolver.js'
import { missingParams } from './sources/schema.js'
import type { CredentialSourceConfig } from './sources/types.js'
import { createPassStore, defaultStoreDir } from './stores/pass.js'
import type { FileDecryptor } from './stores/types.js'

const flag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', ''])
  .optional()
  .transform((value) => value === '1' || value === 'true' || value === 'yes')

const optionalString = z
  .string()
  .optional()
  .transform((value) => value || undefined)

/**
 * Environment variables read by the resolver
 */
export const EnvConfigSchema = z.object({
  XOAUTH2_CREDENTIALS_FILE: optionalString,
  XOAUTH2_PASSWORD_STORE: flag,
  XOAUTH2_TOKEN_URL: optionalString,
  XOAUTH2_CLIENT_ID: optionalString,
  XOAUTH2_CLIENT_SECRET: optionalString,
  XOAUTH2_REFRESH_TOKEN: optionalString,
  XOAUTH2_USER: optionalString,
  XOAUTH2_USE_CURL: flag,
  XOAUTH2_CURL_COMMAND: optionalString,
})

export type EnvConfig = z.infer<typeof EnvConfigSchema>

/**
 * Collaborators used by sources that the environment selects
 */
export interface EnvConfigDeps {
  decrypt?: FileDecryptor
  log?: Log
}

/**
 * Builds a resolver configuration from the environment.
 * Precedence: credentials file, then password store, then static variables.
 * @param env Environment variables
 * @param deps Collaborators for the password store
 * @returns Resolver configuration
 */
export function loadResolverConfig(
  env: NodeJS.ProcessEnv = process.env,
  deps: EnvConfigDeps = {}
): ResolverConfig {
  const parsed = EnvConfigSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue ? String(issue.path[0]) : undefined
    throw new ConfigurationError(
      `Invalid XOAUTH2 environment configuration${field ? `: ${field}` : ''}`,
      { field, cause: parsed.error }
    )
  }

  const config = parsed.data
  return {
    source: selectSource(config, env, deps),
    useCurl: config.XOAUTH2_USE_CURL,
    curlCommand: config.XOAUTH2_CURL_COMMAND,
  }
}

/**
 * Picks the credential source variant.
 */
function selectSource(
  config: EnvConfig,
  env: NodeJS.ProcessEnv,
  deps: EnvConfigDeps
): CredentialSourceConfig {
  if (config.XOAUTH2_CREDENTIALS_FILE) {
    return { type: 'file', path: config.XOAUTH2_CREDENTIALS_FILE }
  }

  if (config.XOAUTH2_PASSWORD_STORE) {
    return {
      type: 'password-store',
      store: createPassStore({
        storeDir: defaultStoreDir(env),
        decrypt: deps.decrypt,
        log: deps.log,
      }),
    }
  }

  const credentials = {
    tokenUrl: config.XOAUTH2_TOKEN_URL ?? '',
    clientId: config.XOAUTH2_CLIENT_ID ?? '',
    clientSecret: config.XOAUTH2_CLIENT_SECRET ?? '',
    refreshToken: config.XOAUTH2_REFRESH_TOKEN ?? '',
    ...(config.XOAUTH2_USER ? { user: config.XOAUTH2_USER } : {}),
  }

  const missing = missingParams(credentials)
  if (missing.length === 4) {
    throw new ConfigurationError(
      'No XOAUTH2 credential source configured (set XOAUTH2_CREDENTIALS_FILE, XOAUTH2_PASSWORD_STORE or XOAUTH2_TOKEN_URL)'
    )
  }
  if (missing.length > 0) {
    const field = `XOAUTH2_${toEnvName(missing[0] ?? '')}`
    throw new ConfigurationError(`Static XOAUTH2 credentials are missing ${field}`, { field })
  }

  return { type: 'static', credentials }
}

/**
 * Converts a camelCase parameter name to its environment suffix.
 * @param name Parameter name, e.g. "tokenUrl"
 * @returns Suffix, e.g. "TOKEN_URL"
 */
function toEnvName(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `_${letter}`).toUpperCase()
}
