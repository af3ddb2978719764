import { afterEach, describe, expect, it, vi } from 'vitest'
import { httpFetch, UncachedHttpRequestError } from './http'

describe('HTTP Utilities', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    vi.unstubAllGlobals()
  })

  describe('httpFetch', () => {
    it('blocks requests in offline mode', async () => {
      vi.stubEnv('CI', 'false')
      vi.stubEnv('CARD_BINDER_OFFLINE', 'true')
      const fetchSpy = vi.fn()
      vi.stubGlobal('fetch', fetchSpy)

      await expect(httpFetch('https://example.test/cards')).rejects.toThrow(
        'Uncached HTTP request to https://example.test/cards blocked: offline mode is on (CARD_BINDER_OFFLINE=true).'
      )
      expect(fetchSpy).not.toHaveBeenCalled()
    })

    it('blocks requests while tests run in CI', async () => {
      vi.stubEnv('CI', 'true')
      vi.stubEnv('VITEST', 'true')
      vi.stubEnv('CARD_BINDER_OFFLINE', 'false')
      vi.stubGlobal('fetch', vi.fn())

      const error = await httpFetch('https://example.test/sets').catch((e: unknown) => e)
      expect(error).toBeInstanceOf(UncachedHttpRequestError)
      expect(error).toHaveProperty('message', 'Uncached HTTP request to https://example.test/sets blocked: running tests in CI.')
    })

    it('passes requests through to fetch otherwise', async () => {
      vi.stubEnv('CI', 'false')
      vi.stubEnv('CARD_BINDER_OFFLINE', 'false')
      const response = { ok: true, status: 200 }
      const fetchSpy = vi.fn().mockResolvedValue(response)
      vi.stubGlobal('fetch', fetchSpy)

      const init = { headers: { Accept: 'application/json' } }
      await expect(httpFetch('https://example.test/cards', init)).resolves.toBe(response)
      expect(fetchSpy).toHaveBeenCalledWith('https://example.test/cards', init)
    })
  })
})
