import { describe, it, expect } from 'vitest'
import {
  saveQuery,
  setConfig,
  setSourceAlias,
  showConfig,
  showHistory
} from '../../../src/commands/config-commands.js'
import { InvalidOption, InvalidQueryFormat } from '../../../src/errors.js'
import { createTestContext } from '../../helpers/test-config.js'

describe('setConfig', () => {
  it('should store each key and confirm it', () => {
    const { ctx, sink, config } = createTestContext()

    setConfig(ctx, 'source', 'test-source')
    setConfig(ctx, 'limit', '25')
    setConfig(ctx, 'format', 'csv')
    setConfig(ctx, 'logLevel', 'WARN')
    setConfig(ctx, 'queryBaseUrl', 'https://query.example.test')

    expect(sink.lines).toEqual([
      'Default source set to: test-source',
      'Default limit set to: 25',
      'Default output format set to: csv',
      'Default log level set to: warning',
      'Query base URL set to: https://query.example.test'
    ])
    expect(config.load()).toMatchObject({
      defaultSource: 'test-source',
      defaultLimit: 25,
      outputFormat: 'csv',
      defaultLogLevel: 'warning',
      queryBaseUrl: 'https://query.example.test'
    })
  })

  it('should reject invalid values without writing', () => {
    const { ctx, sink, config } = createTestContext()

    expect(() => setConfig(ctx, 'limit', '-1')).toThrow(InvalidOption)
    expect(sink.lines).toEqual([])
    expect(config.load().defaultLimit).toBe(100)
  })
})

describe('showConfig', () => {
  it('should print the effective config as JSON', () => {
    const { ctx, sink } = createTestContext()

    showConfig(ctx, 'json')

    expect(JSON.parse(sink.lines[0])).toEqual({
      defaultSource: null,
      defaultLimit: 100,
      defaultLogLevel: 'all',
      outputFormat: 'json',
      queryBaseUrl: 'https://eu-nbg-2-connect.betterstackdata.com',
      savedQueries: {},
      sourceAliases: {},
      queryHistory: []
    })
  })

  it('should list aliases and saved queries in pretty format', () => {
    const { ctx, sink } = createTestContext({
      config: {
        defaultSource: 'test-source',
        sourceAliases: { prod: 'api-production' },
        savedQueries: { errs: "{ logs(level: 'error') { dt } }" }
      }
    })

    showConfig(ctx)

    expect(sink.lines).toEqual([
      [
        '',
        'Current Configuration:',
        '',
        'Default Source: test-source',
        'Default Limit: 100',
        'Default Log Level: all',
        'Output Format: json',
        'Query Base URL: https://eu-nbg-2-connect.betterstackdata.com',
        '',
        'Source Aliases:',
        '  prod → api-production',
        '',
        'Saved Queries:',
        "  errs: { logs(level: 'error') { dt } }",
        ''
      ].join('\n')
    ])
  })

  it('should mark an unset default source', () => {
    const { ctx, sink } = createTestContext()

    showConfig(ctx)

    expect(sink.lines[0].split('\n')).toContain('Default Source: (not set)')
  })
})

describe('setSourceAlias', () => {
  it('should add the alias next to existing ones', () => {
    const { ctx, sink, config } = createTestContext({ config: { sourceAliases: { stage: 'api-staging' } } })

    setSourceAlias(ctx, ' prod ', 'api-production')

    expect(sink.lines).toEqual(['Alias prod now points to: api-production'])
    expect(config.load().sourceAliases).toEqual({ stage: 'api-staging', prod: 'api-production' })
  })

  it('should require both names', () => {
    const { ctx } = createTestContext()
    expect(() => setSourceAlias(ctx, ' ', 'api-production')).toThrow('Usage: bsq config alias <alias> <source>')
  })
})

describe('saveQuery', () => {
  it('should store queries that parse', () => {
    const { ctx, sink, config } = createTestContext()

    saveQuery(ctx, 'errs', "{ logs(level: 'error') { dt } }")

    expect(sink.lines).toEqual(['Saved query: errs'])
    expect(config.load().savedQueries).toEqual({ errs: "{ logs(level: 'error') { dt } }" })
  })

  it('should refuse queries that do not parse', () => {
    const { ctx, config } = createTestContext()

    expect(() => saveQuery(ctx, 'bad', 'select 1')).toThrow(InvalidQueryFormat)
    expect(config.load().savedQueries).toEqual({})
  })
})

describe('showHistory', () => {
  it('should report an empty history', () => {
    const { ctx, sink } = createTestContext()

    showHistory(ctx)

    expect(sink.lines).toEqual(['No queries in history'])
  })

  it('should number entries newest first and honor the limit', () => {
    const { ctx, sink, config } = createTestContext()
    config.addToHistory('first')
    config.addToHistory('second')

    showHistory(ctx)
    showHistory(ctx, 1)

    expect(sink.lines).toEqual(['1. second\n2. first', '1. second'])
  })
})
