import { describe, expect, it, vi } from 'vitest'
import type { SecretStore } from '../stores/types.js'
import { createCredentialSource } from './index.js'

const credentials = {
  tokenUrl: 'https://auth.example.com/token',
  clientId: 'client-1',
  clientSecret: 'test-secret',
  refreshToken: 'refresh-1',
}

describe('createCredentialSource', () => {
  it('builds the variant named by the configuration', () => {
    const store: SecretStore = { find: async () => undefined, get: () => undefined }

    expect(createCredentialSource({ type: 'static', credentials }).kind).toBe('static')
    expect(createCredentialSource({ type: 'function', resolve: () => undefined }).kind).toBe(
      'function'
    )
    expect(createCredentialSource({ type: 'file', path: '/tmp/creds.json.gpg' }).kind).toBe('file')
    expect(createCredentialSource({ type: 'password-store', store }).kind).toBe('password-store')
  })

  it('hands the decryptor to the file source', async () => {
    const decrypt = vi.fn(async () => JSON.stringify({
      token_url: credentials.tokenUrl,
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      refresh_token: credentials.refreshToken,
    }))
    const source = createCredentialSource(
      { type: 'file', path: '/tmp/creds.json.gpg' },
      { decrypt }
    )

    expect(await source.fetch('imap.example.com', undefined, '993')).toEqual(credentials)
    expect(decrypt).toHaveBeenCalledWith('/tmp/creds.json.gpg')
  })
})
