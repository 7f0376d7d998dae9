/**
 * Credential Source Registry
 */

import type { CredentialSource, CredentialSourceConfig, CredentialSourceDeps } from './types.js'
import { createStaticSource } from './static.js'
import { createFunctionSource } from './function.js'
import { createFileSource } from './file.js'
import { createPasswordStoreSource } from './password-store.js'

export type {
  CredentialSource,
  CredentialSourceConfig,
  CredentialSourceDeps,
  CredentialSourceKind,
  CredentialLookup,
  CredentialFunction,
} from './types.js'
export { BaseCredentialSource } from './base.js'
export { createStaticSource, StaticCredentialSource } from './static.js'
export { createFunctionSource, FunctionCredentialSource } from './function.js'
export { createFileSource, FileCredentialSource, type FileSourceOptions } from './file.js'
export {
  createPasswordStoreSource,
  PasswordStoreCredentialSource,
  PASSWORD_STORE_FIELDS,
  PASSWORD_STORE_USER_FIELD,
} from './password-store.js'
export { CredentialRecordSchema, CredentialMappingSchema, missingParams } from './schema.js'

/**
 * Builds the credential source for a configuration.
 * @param config Credential source configuration
 * @param deps Decryptor and logger
 * @returns Credential source
 */
export function createCredentialSource(
  config: CredentialSourceConfig,
  deps: CredentialSourceDeps = {}
): CredentialSource {
  switch (config.type) {
    case 'static':
      return createStaticSource(config.credentials)
    case 'function':
      return createFunctionSource(config.resolve, deps.log)
    case 'file':
      return createFileSource({
        path: config.path,
        encryptedExtension: config.encryptedExtension,
        decrypt: deps.decrypt,
        log: deps.log,
      })
    case 'password-store':
      return createPasswordStoreSource(config.store, deps.log)
  }
}
