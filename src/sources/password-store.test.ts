import { describe, expect, it, vi } from 'vitest'
import type { Log } from '../logger.js'
import type { SecretEntry, SecretQuery, SecretStore } from '../stores/types.js'
import { PasswordStoreCredentialSource } from './password-store.js'

const completeFields = {
  xoauth2_token_url: 'https://auth.example.com/token',
  xoauth2_client_id: 'client-1',
  xoauth2_client_secret: 'test-secret',
  xoauth2_refresh_token: 'refresh-1',
}

function createStore(entries: Record<string, SecretEntry>) {
  const find = vi.fn(async (query: SecretQuery) => entries[query.host])
  const store: SecretStore = {
    find,
    get: (field, entry) => entry.fields[field],
  }
  return { store, find }
}

function createLogStub() {
  const log: Log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn() }
  return log
}

describe('PasswordStoreCredentialSource', () => {
  it('reads the four xoauth2 fields from the entry', async () => {
    const { store, find } = createStore({
      'imap.example.com': { name: 'imap.example.com', secret: 'app-password', fields: completeFields },
    })
    const source = new PasswordStoreCredentialSource(store, createLogStub())

    const result = await source.fetch('imap.example.com', 'alice', '993')

    expect(result).toEqual({
      tokenUrl: 'https://auth.example.com/token',
      clientId: 'client-1',
      clientSecret: 'test-secret',
      refreshToken: 'refresh-1',
    })
    expect(find).toHaveBeenCalledWith({ host: 'imap.example.com', user: 'alice', port: '993' })
  })

  it('takes the user override from the user field', async () => {
    const { store } = createStore({
      'imap.example.com': {
        name: 'imap.example.com',
        secret: '',
        fields: { ...completeFields, user: 'alice@example.com' },
      },
    })
    const source = new PasswordStoreCredentialSource(store, createLogStub())

    const result = await source.fetch('imap.example.com', undefined, '993')

    expect(result?.user).toBe('alice@example.com')
  })

  it('reports no match when the store has no entry', async () => {
    const { store } = createStore({})
    const source = new PasswordStoreCredentialSource(store, createLogStub())

    expect(await source.fetch('imap.example.com', undefined, '993')).toBeUndefined()
  })

  it('warns once per missing field and reports no match', async () => {
    const { xoauth2_client_id: _id, xoauth2_refresh_token: _token, ...partial } = completeFields
    const { store } = createStore({
      'imap.example.com': { name: 'mail/imap.example.com', secret: '', fields: partial },
    })
    const log = createLogStub()
    const source = new PasswordStoreCredentialSource(store, log)

    const result = await source.fetch('imap.example.com', undefined, '993')

    expect(result).toBeUndefined()
    expect(log.warn).toHaveBeenCalledTimes(2)
    expect(log.warn).toHaveBeenCalledWith('Password store entry is missing field xoauth2_client_id', {
      entry: 'mail/imap.example.com',
      field: 'xoauth2_client_id',
    })
    expect(log.warn).toHaveBeenCalledWith(
      'Password store entry is missing field xoauth2_refresh_token',
      { entry: 'mail/imap.example.com', field: 'xoauth2_refresh_token' }
    )
  })

  it('checks an entry once per open across ports', async () => {
    const { xoauth2_token_url: _url, ...partial } = completeFields
    const { store, find } = createStore({
      'imap.example.com': { name: 'imap.example.com', secret: '', fields: partial },
    })
    const log = createLogStub()
    const lookup = await new PasswordStoreCredentialSource(store, log).open()

    expect(await lookup('imap.example.com', 'alice', '143')).toBeUndefined()
    expect(await lookup('imap.example.com', 'alice', '993')).toBeUndefined()

    expect(find).toHaveBeenCalledTimes(2)
    expect(log.warn).toHaveBeenCalledTimes(1)
  })

  it('uses the session the store opens', async () => {
    const entry: SecretEntry = { name: 'imap.example.com', secret: '', fields: completeFields }
    const sessionFind = vi.fn(async () => entry)
    const session: SecretStore = { find: sessionFind, get: (field, e) => e.fields[field] }
    const rootFind = vi.fn(async () => undefined)
    const store: SecretStore = {
      find: rootFind,
      get: (field, e) => e.fields[field],
      open: vi.fn(async () => session),
    }

    const result = await new PasswordStoreCredentialSource(store, createLogStub()).fetch(
      'imap.example.com',
      'alice',
      '993'
    )

    expect(result?.clientId).toBe('client-1')
    expect(sessionFind).toHaveBeenCalledTimes(1)
    expect(rootFind).not.toHaveBeenCalled()
  })
})

