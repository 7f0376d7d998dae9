/**
 * Secret storage exports
 */

export type {
  FileDecryptor,
  SecretEntry,
  SecretQuery,
  SecretStore,
} from './types.js'
export { createGpgDecryptor, decryptWithGpg, GPG_EXTENSION, type GpgDecryptorOptions } from './gpg.js'
export {
  PassStore,
  PassStoreSession,
  createPassStore,
  candidateEntryNames,
  defaultStoreDir,
  parseEntry,
  type PassStoreOptions,
} from './pass.js'
