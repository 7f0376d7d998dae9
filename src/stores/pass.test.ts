import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ConfigurationError } from '../errors.js'
import type { Log } from '../logger.js'
import { PassStore, candidateEntryNames, defaultStoreDir, parseEntry } from './pass.js'
import type { FileDecryptor } from './types.js'

const log: Log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn() }

describe('candidateEntryNames', () => {
  it('lists user-qualified names before host-only names', () => {
    expect(candidateEntryNames({ host: 'imap.example.com', user: 'alice', port: '993' })).toEqual([
      'alice@imap.example.com:993',
      'alice@imap.example.com',
      'imap.example.com:993/alice',
      'imap.example.com/alice',
      'imap.example.com:993',
      'imap.example.com',
    ])
  })

  it('omits user names when the query has no user', () => {
    expect(candidateEntryNames({ host: 'imap.example.com', port: '993' })).toEqual([
      'imap.example.com:993',
      'imap.example.com',
    ])
  })
})

describe('parseEntry', () => {
  it('splits the secret from key: value fields', () => {
    const entry = parseEntry(
      'mail/imap.example.com',
      'app-password\nxoauth2_client_id: client-1\nxoauth2_token_url: https://auth.example.com/token\n'
    )

    expect(entry).toEqual({
      name: 'mail/imap.example.com',
      secret: 'app-password',
      fields: {
        xoauth2_client_id: 'client-1',
        xoauth2_token_url: 'https://auth.example.com/token',
      },
    })
  })

  it('keeps the first value of a repeated key and skips free text', () => {
    const entry = parseEntry('x', 'secret\nuser: alice\nnotes without colon\nuser: bob\r\n')

    expect(entry.fields).toEqual({ user: 'alice' })
  })
})

describe('defaultStoreDir', () => {
  it('prefers PASSWORD_STORE_DIR', () => {
    expect(defaultStoreDir({ PASSWORD_STORE_DIR: '/srv/pass' })).toBe('/srv/pass')
  })
})

describe('PassStore', () => {
  let storeDir: string

  beforeEach(async () => {
    storeDir = await mkdtemp(join(tmpdir(), 'pass-store-test-'))
    await mkdir(join(storeDir, 'mail', 'imap.example.com'), { recursive: true })
    await writeFile(join(storeDir, 'mail', 'imap.example.com:993.gpg'), '')
    await writeFile(join(storeDir, 'mail', 'imap.example.com', 'alice.gpg'), '')
    await writeFile(join(storeDir, 'smtp.example.com.gpg'), '')
    await writeFile(join(storeDir, '.gpg-id'), 'KEYID\n')
  })

  afterEach(async () => {
    await rm(storeDir, { recursive: true, force: true })
  })

  function createStore(decrypt: FileDecryptor) {
    return new PassStore({ storeDir, decrypt, log })
  }

  it('prefers the entry naming the user', async () => {
    const decrypt = vi.fn<FileDecryptor>().mockResolvedValue('pw\nxoauth2_client_id: client-alice')
    const store = createStore(decrypt)

    const entry = await store.find({ host: 'imap.example.com', user: 'alice', port: '993' })

    expect(entry?.name).toBe('mail/imap.example.com/alice')
    expect(decrypt).toHaveBeenCalledWith(join(storeDir, 'mail/imap.example.com/alice.gpg'))
    expect(entry && store.get('xoauth2_client_id', entry)).toBe('client-alice')
  })

  it('falls back to the host:port entry for another user', async () => {
    const decrypt = vi.fn<FileDecryptor>().mockResolvedValue('pw')
    const store = createStore(decrypt)

    const entry = await store.find({ host: 'imap.example.com', user: 'bob', port: '993' })

    expect(entry?.name).toBe('mail/imap.example.com:993')
  })

  it('matches a bare host entry on any port', async () => {
    const decrypt = vi.fn<FileDecryptor>().mockResolvedValue('pw')
    const store = createStore(decrypt)

    const entry = await store.find({ host: 'smtp.example.com', port: '587' })

    expect(entry?.name).toBe('smtp.example.com')
  })

  it('returns undefined without decrypting when nothing matches', async () => {
    const decrypt = vi.fn<FileDecryptor>()
    const store = createStore(decrypt)

    expect(await store.find({ host: 'imap.other.org', port: '993' })).toBeUndefined()
    expect(decrypt).not.toHaveBeenCalled()
  })

  it('does not match a host that only shares a suffix', async () => {
    const decrypt = vi.fn<FileDecryptor>().mockResolvedValue('pw')
    const store = createStore(decrypt)

    expect(await store.find({ host: 'example.com', port: '993' })).toBeUndefined()
  })

  it('raises ConfigurationError for a missing store directory', async () => {
    const store = new PassStore({ storeDir: join(storeDir, 'missing'), decrypt: vi.fn(), log })

    await expect(store.find({ host: 'imap.example.com', port: '993' })).rejects.toBeInstanceOf(
      ConfigurationError
    )
  })

  it('decrypts each entry once per session', async () => {
    const decrypt = vi.fn<FileDecryptor>().mockResolvedValue('pw')
    const session = await createStore(decrypt).open()

    const first = await session.find({ host: 'imap.example.com', user: 'bob', port: '993' })
    const second = await session.find({ host: 'imap.example.com', user: 'carol', port: '993' })

    expect(first?.name).toBe('mail/imap.example.com:993')
    expect(second).toBe(first)
    expect(decrypt).toHaveBeenCalledTimes(1)
  })

  it('decrypts again in a new session', async () => {
    const decrypt = vi.fn<FileDecryptor>().mockResolvedValue('pw')
    const store = createStore(decrypt)

    await store.find({ host: 'smtp.example.com', port: '587' })
    await store.find({ host: 'smtp.example.com', port: '587' })

    expect(decrypt).toHaveBeenCalledTimes(2)
  })
})

