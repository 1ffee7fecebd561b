import { faker } from '@faker-js/faker'
import type { LogRow, SourceDescriptor } from '../../src/types.js'

export const TELEMETRY_URL = 'https://telemetry.betterstack.com/api/v1'
export const QUERY_URL = 'https://eu-nbg-2-connect.betterstackdata.com/'

// Source directory as returned by the telemetry API
export const mockApiSources: SourceDescriptor[] = [
  {
    id: '1021715',
    type: 'source',
    attributes: {
      name: 'test-source',
      platform: 'ubuntu',
      token: 'test-token-abcdef',
      team_id: 123456,
      table_name: 'test_source',
      created_at: '2024-01-01T10:00:00Z',
      updated_at: '2024-01-15T10:00:00Z',
      ingesting_paused: false,
      messages_count: 1234567,
      bytes_count: 1048576
    }
  },
  {
    id: '1021716',
    type: 'source',
    attributes: {
      name: 'api-production',
      platform: 'kubernetes',
      token: '',
      team_id: 123456,
      table_name: 'api_production',
      created_at: '2024-02-01T10:00:00Z',
      updated_at: '2024-02-15T10:00:00Z',
      ingesting_paused: true,
      messages_count: 0,
      bytes_count: 0
    }
  }
]

export const generateMockSource = (overrides: Partial<SourceDescriptor['attributes']> = {}): SourceDescriptor => {
  const name = faker.helpers.slugify(faker.company.name()).toLowerCase()
  return {
    id: faker.string.numeric(7),
    type: 'source',
    attributes: {
      name,
      platform: faker.helpers.arrayElement(['ubuntu', 'docker', 'kubernetes', 'vercel']),
      token: faker.string.alphanumeric(24),
      team_id: faker.number.int({ min: 100000, max: 999999 }),
      table_name: name.replace(/-/g, '_'),
      created_at: faker.date.past().toISOString(),
      updated_at: faker.date.recent().toISOString(),
      ingesting_paused: false,
      messages_count: faker.number.int({ min: 0, max: 1000000 }),
      bytes_count: faker.number.int({ min: 0, max: 1000000000 }),
      ...overrides
    }
  }
}

// Rows as the query endpoint returns them (newest first)
export const mockLogRows: LogRow[] = [
  {
    dt: '2025-09-24 12:00:03.000000',
    raw: JSON.stringify({ level: 'error', message: 'payment declined', subsystem: 'billing', requestId: 'req-1' })
  },
  {
    dt: '2025-09-24 12:00:02.000000',
    raw: JSON.stringify({ level: 'info', message: 'request served', subsystem: 'api', requestId: 'req-1' })
  },
  {
    dt: '2025-09-24 12:00:01.000000',
    raw: JSON.stringify({ level: 'debug', message: 'cache warm', subsystem: 'cache' })
  }
]

export const toNdjson = (rows: LogRow[]): string => rows.map((row) => JSON.stringify(row)).join('\n') + '\n'
