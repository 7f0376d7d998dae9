import { describe, expect, it, vi } from 'vitest'
import { createXoauth2Backend, toCandidates } from './backend.js'
import type { Log } from './logger.js'
import type { HttpTransport } from './oauth/transports.js'
import { CredentialResolver } from './resolver.js'
import type { CredentialFunction } from './sources/types.js'

const credentials = {
  tokenUrl: 'https://auth.example.com/token',
  clientId: 'client-1',
  clientSecret: 'test-secret',
  refreshToken: 'refresh-1',
}

const log: Log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn() }

function createResolver(resolve: CredentialFunction) {
  const transport: HttpTransport = {
    name: 'stub',
    post: vi.fn<HttpTransport['post']>().mockResolvedValue('{"access_token":"access-1"}'),
  }
  return new CredentialResolver({ source: { type: 'function', resolve } }, { transport, log })
}

describe('toCandidates', () => {
  it('wraps a single value', () => {
    expect(toCandidates('imap.example.com')).toEqual(['imap.example.com'])
  })

  it('keeps first-seen order and drops duplicates', () => {
    expect(toCandidates(['993', '143', '993'])).toEqual(['993', '143'])
  })
})

describe('createXoauth2Backend', () => {
  it('returns a single record for a match', async () => {
    const backend = createXoauth2Backend(createResolver(() => credentials))

    const results = await backend.search({ host: 'imap.example.com', user: 'alice', port: '993' })

    expect(results).toEqual([
      { host: 'imap.example.com', port: '993', user: 'alice', secret: 'access-1' },
    ])
  })

  it('returns an empty list when nothing matches', async () => {
    const backend = createXoauth2Backend(createResolver(() => undefined))

    expect(await backend.search({ host: ['a.com', 'b.com'], port: ['143', '993'] })).toEqual([])
  })

  it('probes candidate lists in order', async () => {
    const probed: string[] = []
    const backend = createXoauth2Backend(
      createResolver((host, _user, port) => {
        probed.push(`${host}:${port}`)
        return undefined
      })
    )

    await backend.search({ host: ['a.com', 'b.com', 'a.com'], user: 'alice', port: ['143', '993'] })

    expect(probed).toEqual(['a.com:143', 'a.com:993', 'b.com:143', 'b.com:993'])
  })
})
