/**
 * Secret storage collaborator types
 */

/**
 * Decrypts a file and returns its plaintext
 */
export type FileDecryptor = (path: string) => Promise<string>

/**
 * Query passed to a secret store
 */
export interface SecretQuery {
  host: string
  user?: string
  port: string
}

/**
 * An entry read from a secret store
 */
export interface SecretEntry {
  name: string
  secret: string
  fields: Readonly<Record<string, string>>
}

/**
 * Secret store lookup contract.
 * Stores that do not index by port may ignore `query.port`.
 */
export interface SecretStore {
  find(query: SecretQuery): Promise<SecretEntry | undefined>
  get(field: string, entry: SecretEntry): string | undefined
  /**
   * Starts a session for one resolution. Within a session the store is read
   * once and each entry is decrypted at most once.
   */
  open?(): Promise<SecretStore>
}
