import { describe, it, expect } from 'vitest'
import { http, HttpResponse } from 'msw'
import { BetterstackClient } from '../../src/client.js'
import { SourcesApi, resolveSourceAlias } from '../../src/sources.js'
import { TELEMETRY_URL, generateMockSource, mockApiSources } from '../__mocks__/betterstack-responses.js'
import { createTestCredentials } from '../helpers/test-config.js'

const createSourcesApi = () => new SourcesApi(new BetterstackClient(createTestCredentials()))

describe('Sources Integration Tests', () => {
  it('should list every source on a single page', async () => {
    expect(await createSourcesApi().listAll()).toEqual(mockApiSources)
  })

  it('should follow pagination until next is null', async () => {
    const extra = generateMockSource({ name: 'worker-jobs' })
    const requestedPages: string[] = []
    globalThis.__MSW_SERVER__.use(
      http.get(`${TELEMETRY_URL}/sources`, ({ request }) => {
        const url = new URL(request.url)
        const page = url.searchParams.get('page') || '1'
        requestedPages.push(`${page}/${url.searchParams.get('per_page')}`)
        return HttpResponse.json({
          data: page === '1' ? mockApiSources : [extra],
          pagination: { next: page === '1' ? `${TELEMETRY_URL}/sources?page=2` : null }
        })
      })
    )

    const sources = await createSourcesApi().listAll()

    expect(requestedPages).toEqual(['1/50', '2/50'])
    expect(sources.map((source) => source.attributes.name)).toEqual(['test-source', 'api-production', 'worker-jobs'])
  })

  it('should find a source by exact name', async () => {
    const api = createSourcesApi()

    expect((await api.findByName('api-production'))?.id).toBe('1021716')
    expect(await api.findByName('API-production')).toBeUndefined()
  })

  it('should fetch a single source by id', async () => {
    expect(await createSourcesApi().get('1021715')).toEqual(mockApiSources[0])
  })

  it('should report a missing source id as an API failure', async () => {
    await expect(createSourcesApi().get('999')).rejects.toThrow('API request failed: 404 - {"errors":["Resource not found"]}')
  })

  it('should fill defaults for missing attributes and numeric ids', async () => {
    globalThis.__MSW_SERVER__.use(
      http.get(`${TELEMETRY_URL}/sources`, () =>
        HttpResponse.json({ data: [{ id: 42, attributes: { name: 'bare', team_id: 'oops' } }] })
      )
    )

    expect(await createSourcesApi().listAll()).toEqual([
      {
        id: '42',
        type: '',
        attributes: {
          name: 'bare',
          platform: '',
          token: '',
          team_id: 0,
          table_name: '',
          created_at: '',
          updated_at: '',
          ingesting_paused: false,
          messages_count: 0,
          bytes_count: 0
        }
      }
    ])
  })
})

describe('resolveSourceAlias', () => {
  const aliases = { Prod: 'api-production' }

  it('should map aliases case-insensitively', () => {
    expect(resolveSourceAlias('prod', aliases)).toBe('api-production')
    expect(resolveSourceAlias('PROD', aliases)).toBe('api-production')
  })

  it('should pass other names through', () => {
    expect(resolveSourceAlias('test-source', aliases)).toBe('test-source')
    expect(resolveSourceAlias(undefined, aliases)).toBeUndefined()
  })
})
