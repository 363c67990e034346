import type { ArrInstance } from '@root/types/arr.types.js'
import { LibraryLookupError } from '@root/types/errors.js'
import { ArrLibraryService } from '@services/arr-library.service.js'
import { HttpResponse, http } from 'msw'
import { beforeEach, describe, expect, it } from 'vitest'
import {
  TEST_RADARR_URL,
  TEST_SONARR_URL,
} from '../../mocks/external-api-handlers.js'
import { createMockLogger } from '../../mocks/logger.js'
import { server } from '../../setup/msw-setup.js'

const RADARR: ArrInstance = {
  name: 'Radarr Main',
  type: 'radarr',
  baseUrl: TEST_RADARR_URL,
  apiKey: 'test-secret',
  category: 'movies',
}

const SONARR: ArrInstance = {
  name: 'Sonarr Main',
  type: 'sonarr',
  baseUrl: `${TEST_SONARR_URL}/`,
  apiKey: 'test-secret',
  category: 'tv',
}

const MOVIES = [
  {
    id: 1,
    title: 'Example Movie',
    year: 2021,
    images: [
      { coverType: 'fanart', remoteUrl: 'https://images.test/fanart.jpg' },
      { coverType: 'poster', remoteUrl: 'https://images.test/poster-1.jpg' },
    ],
  },
  {
    id: 2,
    title: 'Example Movie',
    year: 1987,
    images: [{ coverType: 'poster', url: '/MediaCover/2/poster.jpg' }],
  },
  { id: 3, title: 'Unrelated Film', year: 2021 },
]

describe('ArrLibraryService', () => {
  let now: number
  let requests: number

  beforeEach(() => {
    now = Date.parse('2026-01-02T12:00:00.000Z')
    requests = 0
    server.use(
      http.get(`${TEST_RADARR_URL}/api/v3/movie`, ({ request }) => {
        requests++
        if (request.headers.get('X-Api-Key') !== 'test-secret') {
          return new HttpResponse(null, { status: 401 })
        }
        return HttpResponse.json(MOVIES)
      }),
    )
  })

  function createService(instance: ArrInstance = RADARR) {
    return new ArrLibraryService(
      createMockLogger(),
      instance,
      { cacheTtlSeconds: 300, requestTimeoutMs: 1000 },
      { now: () => new Date(now) },
    )
  }

  describe('searchByTitle', () => {
    it('should return candidates that share a word, closest year first', async () => {
      const service = createService()

      const candidates = await service.searchByTitle('Example Movie', 1990)

      expect(candidates).toEqual([
        {
          title: 'Example Movie',
          year: 1987,
          type: 'movie',
          posterUrl: `${TEST_RADARR_URL}/MediaCover/2/poster.jpg`,
        },
        {
          title: 'Example Movie',
          year: 2021,
          type: 'movie',
          posterUrl: 'https://images.test/poster-1.jpg',
        },
      ])
    })

    it('should keep library order without a year', async () => {
      const service = createService()

      const candidates = await service.searchByTitle('example.movie')

      expect(candidates.map((c) => c.year)).toEqual([2021, 1987])
    })

    it('should return nothing for a title made of stop words', async () => {
      const service = createService()

      expect(await service.searchByTitle('The Of And')).toEqual([])
      expect(requests).toBe(0)
    })

    it('should map Sonarr series to tv candidates', async () => {
      server.use(
        http.get(`${TEST_SONARR_URL}/api/v3/series`, () =>
          HttpResponse.json([{ id: 9, title: 'Show Name', year: 2015 }]),
        ),
      )
      const service = createService(SONARR)

      expect(await service.searchByTitle('Show Name')).toEqual([
        { title: 'Show Name', year: 2015, type: 'tv', posterUrl: null },
      ])
    })
  })

  describe('caching', () => {
    it('should reuse the library within the TTL', async () => {
      const service = createService()

      await service.searchByTitle('Example Movie')
      now += 299_000
      await service.searchByTitle('Example Movie')

      expect(requests).toBe(1)
    })

    it('should refetch once the TTL has passed', async () => {
      const service = createService()

      await service.searchByTitle('Example Movie')
      now += 300_000
      await service.searchByTitle('Example Movie')

      expect(requests).toBe(2)
    })

    it('should share one request between concurrent searches', async () => {
      const service = createService()

      await Promise.all([
        service.searchByTitle('Example Movie'),
        service.searchByTitle('Unrelated Film'),
      ])

      expect(requests).toBe(1)
    })

    it('should refetch after invalidation', async () => {
      const service = createService()

      await service.searchByTitle('Example Movie')
      service.invalidateCache()
      await service.searchByTitle('Example Movie')

      expect(requests).toBe(2)
    })
  })

  describe('errors', () => {
    it('should report a rejected API key', async () => {
      const service = createService({ ...RADARR, apiKey: 'wrong-key' })

      const error = await service.searchByTitle('Example Movie').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(LibraryLookupError)
      expect(error).toHaveProperty('message', 'Authentication failed. Check API key.')
      expect(error).toHaveProperty('instanceName', 'Radarr Main')
    })

    it('should report a server error', async () => {
      server.use(
        http.get(`${TEST_RADARR_URL}/api/v3/movie`, () =>
          new HttpResponse(null, { status: 503, statusText: 'Service Unavailable' }),
        ),
      )
      const service = createService()

      await expect(service.searchByTitle('Example Movie')).rejects.toThrow(
        'Radarr API error: 503 Service Unavailable',
      )
    })

    it('should report a body that is not JSON', async () => {
      server.use(
        http.get(
          `${TEST_RADARR_URL}/api/v3/movie`,
          () =>
            new HttpResponse('<html>Login</html>', {
              status: 200,
              headers: { 'Content-Type': 'text/html' },
            }),
        ),
      )
      const service = createService()

      const error = await service.searchByTitle('Example Movie').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(LibraryLookupError)
      expect(error).toHaveProperty('message', 'Radarr Main returned invalid JSON')
      expect(error).toHaveProperty('statusCode', 200)
      expect(error).toHaveProperty('cause', expect.any(SyntaxError))
    })

    it('should not cache a failed request', async () => {
      server.use(
        http.get(
          `${TEST_RADARR_URL}/api/v3/movie`,
          () => new HttpResponse(null, { status: 500 }),
          { once: true },
        ),
      )
      const service = createService()

      await expect(service.searchByTitle('Example Movie')).rejects.toBeInstanceOf(
        LibraryLookupError,
      )
      expect(await service.searchByTitle('Example Movie')).toHaveLength(2)
    })

    it('should stop when the caller aborts', async () => {
      const service = createService()
      const controller = new AbortController()
      controller.abort()

      await expect(
        service.searchByTitle('Example Movie', null, controller.signal),
      ).rejects.toBeInstanceOf(LibraryLookupError)
    })
  })
})
