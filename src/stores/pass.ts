/**
 * Secret store backed by a `pass` password-store directory.
 *
 * Each entry is a `.gpg` file. The first decrypted line is the secret; later
 * lines of the form `key: value` are fields.
 */

import { readdir } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join, sep } from 'node:path'
import { errorMessage, ConfigurationError } from '../errors.js'
import { createLog, type Log } from '../logger.js'
import { GPG_EXTENSION, decryptWithGpg } from './gpg.js'
import type { FileDecryptor, SecretEntry, SecretQuery, SecretStore } from './types.js'

/**
 * Options for the pass store
 */
export interface PassStoreOptions {
  /** Store directory (default: $PASSWORD_STORE_DIR or ~/.password-store) */
  storeDir?: string
  decrypt?: FileDecryptor
  log?: Log
}

/**
 * Gets the default password-store directory.
 * @param env Environment variables
 * @returns Store directory
 */
export function defaultStoreDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.PASSWORD_STORE_DIR || join(homedir(), '.password-store')
}

/**
 * Entry names that may hold credentials for a query, most specific first.
 * @param query Secret query
 * @returns Candidate entry names
 */
export function candidateEntryNames(query: SecretQuery): string[] {
  const { host, user, port } = query
  const candidates: string[] = []

  if (user) {
    candidates.push(`${user}@${host}:${port}`, `${user}@${host}`)
    candidates.push(`${host}:${port}/${user}`, `${host}/${user}`)
  }
  candidates.push(`${host}:${port}`, host)

  return candidates
}

/**
 * Parses decrypted entry contents.
 * @param name Entry name
 * @param contents Decrypted contents
 * @returns Secret entry
 */
export function parseEntry(name: string, contents: string): SecretEntry {
  const [secret = '', ...lines] = contents.split(/\r?\n/)
  const fields: Record<string, string> = {}

  for (const line of lines) {
    const separator = line.indexOf(':')
    if (separator <= 0) continue

    const key = line.slice(0, separator).trim()
    const value = line.slice(separator + 1).trim()
    if (key && !(key in fields)) {
      fields[key] = value
    }
  }

  return { name, secret, fields }
}

/**
 * `pass` password-store reader
 */
export class PassStore implements SecretStore {
  private readonly storeDir: string
  private readonly decrypt: FileDecryptor
  private readonly log: Log

  constructor(options: PassStoreOptions = {}) {
    this.storeDir = options.storeDir ?? defaultStoreDir()
    this.decrypt = options.decrypt ?? decryptWithGpg
    this.log = options.log ?? createLog('pass')
  }

  /**
   * Lists the store once and returns a session caching decrypted entries.
   * @returns Store session
   */
  async open(): Promise<PassStoreSession> {
    const names = await this.listEntries()
    return new PassStoreSession(this.storeDir, names, this.decrypt, this.log)
  }

  /**
   * Finds and decrypts the best entry for a query.
   * @param query Host, user and port
   * @returns Entry or undefined when nothing matches
   */
  async find(query: SecretQuery): Promise<SecretEntry | undefined> {
    const session = await this.open()
    return session.find(query)
  }

  /**
   * Reads a field from an entry.
   * @param field Field name
   * @param entry Secret entry
   * @returns Field value or undefined
   */
  get(field: string, entry: SecretEntry): string | undefined {
    return entry.fields[field]
  }

  /**
   * Lists entry names (paths relative to the store, without extension), sorted.
   */
  private async listEntries(): Promise<string[]> {
    let files: string[]
    try {
      files = await readdir(this.storeDir, { recursive: true })
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read password store ${this.storeDir}: ${errorMessage(error)}`,
        { path: this.storeDir, cause: error }
      )
    }

    return files
      .filter((file) => file.endsWith(GPG_EXTENSION))
      .map((file) => file.slice(0, -GPG_EXTENSION.length).split(sep).join('/'))
      .sort()
  }
}

/**
 * A listing of a `pass` store with the entries decrypted so far
 */
export class PassStoreSession implements SecretStore {
  private readonly storeDir: string
  private readonly names: readonly string[]
  private readonly decrypt: FileDecryptor
  private readonly log: Log
  private readonly entries = new Map<string, SecretEntry>()

  constructor(storeDir: string, names: readonly string[], decrypt: FileDecryptor, log: Log) {
    this.storeDir = storeDir
    this.names = names
    this.decrypt = decrypt
    this.log = log
  }

  /**
   * Finds the best entry for a query, decrypting it on first use.
   * @param query Host, user and port
   * @returns Entry or undefined when nothing matches
   */
  async find(query: SecretQuery): Promise<SecretEntry | undefined> {
    for (const candidate of candidateEntryNames(query)) {
      const name = this.names.find((entry) => entry === candidate || entry.endsWith(`/${candidate}`))
      if (name) {
        this.log.debug('Matched password store entry', { entry: name, host: query.host })
        return this.load(name)
      }
    }

    return undefined
  }

  get(field: string, entry: SecretEntry): string | undefined {
    return entry.fields[field]
  }

  async open(): Promise<PassStoreSession> {
    return this
  }

  private async load(name: string): Promise<SecretEntry> {
    const cached = this.entries.get(name)
    if (cached) {
      return cached
    }

    const contents = await this.decrypt(join(this.storeDir, `${name}${GPG_EXTENSION}`))
    const entry = parseEntry(name, contents)
    this.entries.set(name, entry)
    return entry
  }
}

/**
 * Creates a pass store.
 * @param options Pass store options
 * @returns Secret store
 */
export function createPassStore(options?: PassStoreOptions): PassStore {
  return new PassStore(options)
}
