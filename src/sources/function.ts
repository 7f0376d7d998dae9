/**
 * Function Credential Source
 *
 * Delegates matching to a user-supplied function.
 */

import { createLog, type Log } from '../logger.js'
import { BaseCredentialSource } from './base.js'
import { missingParams } from './schema.js'
import type { CredentialFunction, CredentialLookup } from './types.js'

/**
 * Forwards each query to the configured function
 */
export class FunctionCredentialSource extends BaseCredentialSource {
  readonly kind = 'function'

  private readonly resolveCredentials: CredentialFunction
  private readonly log: Log

  constructor(resolveCredentials: CredentialFunction, log: Log = createLog('sources')) {
    super()
    this.resolveCredentials = resolveCredentials
    this.log = log
  }

  async open(): Promise<CredentialLookup> {
    return async (host, user, port) => {
      const result = await this.resolveCredentials(host, user, port)
      if (!result) {
        return undefined
      }

      // An incomplete record cannot be refreshed; treat it as no match
      const missing = missingParams(result)
      if (missing.length > 0) {
        this.log.debug('Credential function returned an incomplete record', {
          host,
          port,
          missing,
        })
        return undefined
      }

      return result
    }
  }
}

/**
 * Creates a function credential source.
 * @param resolve User-supplied resolver
 * @param log Logger
 * @returns Function credential source
 */
export function createFunctionSource(
  resolve: CredentialFunction,
  log?: Log
): FunctionCredentialSource {
  return new FunctionCredentialSource(resolve, log)
}
