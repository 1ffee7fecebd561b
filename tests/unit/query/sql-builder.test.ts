import { describe, it, expect } from 'vitest'
import { SourceNotSpecified } from '../../../src/errors.js'
import {
  buildLevelCondition,
  buildSqlStatement,
  buildWhereCondition,
  effectiveLevel,
  resolveSourceName,
  sanitizeSqlString,
  type BuildSettings
} from '../../../src/query/sql-builder.js'
import { mockApiSources } from '../../__mocks__/betterstack-responses.js'
import { FIXED_NOW } from '../../helpers/test-config.js'
import { arrayValue, boolValue, intValue, nullValue, objectValue, stringValue } from '../../../src/utils/values.js'

const source = mockApiSources[0]
const settings: BuildSettings = { now: FIXED_NOW, defaultLimit: 100, defaultLogLevel: 'all' }

const LEVEL = "lowerUTF8(COALESCE(JSONExtractString(raw, 'level'), JSON_VALUE(raw, '$.level'), JSON_VALUE(raw, '$.levelName'), JSON_VALUE(raw, '$.vercel.level')))"
const MESSAGE = "COALESCE(JSONExtractString(raw, 'message'), JSON_VALUE(raw, '$.message'))"
const STATUS = "toInt32OrZero(JSON_VALUE(raw, '$.vercel.proxy.status_code'))"

const hotBranch = (sql: string): string => sql.split(' UNION ALL ')[0]

describe('sanitizeSqlString', () => {
  it('should escape single quotes', () => {
    expect(sanitizeSqlString("test'value")).toBe("test''value")
    expect(sanitizeSqlString("user's 'special' data")).toBe("user''s ''special'' data")
  })

  it('should double backslashes before quotes', () => {
    expect(sanitizeSqlString('C:\\logs')).toBe('C:\\\\logs')
    expect(sanitizeSqlString("\\'")).toBe("\\\\''")
  })

  it('should neutralize SQL injection attempts', () => {
    expect(sanitizeSqlString("'; DROP TABLE logs; --")).toBe("''; DROP TABLE logs; --")
  })
})

describe('resolveSourceName', () => {
  it('should prefer the explicit source', () => {
    expect(resolveSourceName({ source: 'api-production' }, { defaultSource: 'test-source' })).toBe('api-production')
  })

  it('should fall back to the default source', () => {
    expect(resolveSourceName({}, { defaultSource: 'test-source' })).toBe('test-source')
  })

  it('should resolve aliases case-insensitively', () => {
    expect(resolveSourceName({ source: 'PROD' }, { sourceAliases: { prod: 'api-production' } })).toBe('api-production')
  })

  it('should throw when no source is available', () => {
    expect(() => resolveSourceName({}, {})).toThrow(SourceNotSpecified)
  })
})

describe('effectiveLevel', () => {
  it('should use the explicit level first', () => {
    expect(effectiveLevel({ level: 'info' }, 'error')).toBe('info')
  })

  it('should ignore a default of all in any case', () => {
    expect(effectiveLevel({}, 'ALL')).toBeUndefined()
    expect(effectiveLevel({}, 'error')).toBe('error')
  })
})

describe('buildLevelCondition', () => {
  it('should expand error into level, status, message and error-key checks', () => {
    expect(buildLevelCondition('error')).toBe(
      `(${LEVEL} = 'error' OR ${STATUS} >= 500 OR positionCaseInsensitive(${MESSAGE}, 'error') > 0 OR JSONHas(raw, 'error'))`
    )
  })

  it('should expand warn into both spellings and 4xx statuses', () => {
    expect(buildLevelCondition('WARN')).toBe(
      `(${LEVEL} IN ('warn', 'warning', 'warn') OR (${STATUS} >= 400 AND ${STATUS} < 500))`
    )
  })

  it('should compare other levels in lowercase', () => {
    expect(buildLevelCondition('Info')).toBe(`${LEVEL} = 'info'`)
  })

  it('should escape quotes and backslashes in the level', () => {
    expect(buildLevelCondition("o'k")).toBe(`${LEVEL} = 'o''k'`)
    expect(buildLevelCondition('x\\')).toBe(`${LEVEL} = 'x\\\\'`)
  })
})

describe('buildWhereCondition', () => {
  it('should render each value kind as a string comparison', () => {
    expect(buildWhereCondition('user.id', intValue(42))).toBe("JSON_VALUE(raw, '$.user.id') = '42'")
    expect(buildWhereCondition('enabled', boolValue(true))).toBe("JSON_VALUE(raw, '$.enabled') = 'true'")
    expect(buildWhereCondition('name', stringValue("O'Brien"))).toBe("JSON_VALUE(raw, '$.name') = 'O''Brien'")
  })

  it('should use IS NULL for null', () => {
    expect(buildWhereCondition('deleted_at', nullValue())).toBe("JSON_VALUE(raw, '$.deleted_at') IS NULL")
  })

  it('should compare containers as compact JSON', () => {
    expect(buildWhereCondition('tags', arrayValue([stringValue('a'), stringValue('b')]))).toBe(
      `JSON_VALUE(raw, '$.tags') = '["a","b"]'`
    )
    expect(buildWhereCondition('flags', objectValue([['beta', boolValue(true)]]))).toBe(
      `JSON_VALUE(raw, '$.flags') = '{"beta":true}'`
    )
  })
})

describe('buildSqlStatement', () => {
  it('should build the basic statement against the hot table', () => {
    expect(buildSqlStatement({ limit: 50 }, source, settings)).toBe(
      'SELECT dt, raw FROM remote(t123456_test_source_logs) ORDER BY dt DESC LIMIT 50 FORMAT JSONEachRow'
    )
  })

  it('should fall back to the configured limit, then 100', () => {
    expect(buildSqlStatement({}, source, { now: FIXED_NOW, defaultLimit: 25 })).toContain(' LIMIT 25 ')
    expect(buildSqlStatement({}, source, { now: FIXED_NOW })).toContain(' LIMIT 100 ')
  })

  it('should select requested fields with quoted aliases', () => {
    expect(buildSqlStatement({ fields: ['level', 'message'], limit: 10 }, source, settings)).toBe(
      `SELECT dt, JSON_VALUE(raw, '$.level') AS "level", JSON_VALUE(raw, '$.message') AS "message" ` +
        'FROM remote(t123456_test_source_logs) ORDER BY dt DESC LIMIT 10 FORMAT JSONEachRow'
    )
  })

  it('should keep dt once, include raw when asked and double quotes in aliases', () => {
    const sql = buildSqlStatement({ fields: ['dt', 'raw', '["root key"].value'] }, source, settings)
    expect(sql).toContain(`SELECT dt, raw, JSON_VALUE(raw, '$["root key"].value') AS "[""root key""].value" FROM`)
  })

  it('should treat a leading * as no field selection', () => {
    expect(buildSqlStatement({ fields: ['*', 'level'] }, source, settings)).toContain('SELECT dt, raw FROM')
  })

  it('should convert relative and absolute time bounds to UTC literals', () => {
    const sql = buildSqlStatement({ since: '1h', until: '2025-09-24T11:30:00Z' }, source, settings)
    expect(sql).toContain(
      "WHERE dt >= toDateTime64('2025-09-24 11:00:00', 3) AND dt <= toDateTime64('2025-09-24 11:30:00', 3) ORDER BY"
    )
  })

  it('should apply the configured default level when none is given', () => {
    const sql = buildSqlStatement({}, source, { ...settings, defaultLogLevel: 'error' })
    expect(sql).toContain(`WHERE ${buildLevelCondition('error')} ORDER BY`)
  })

  it('should join level, subsystem and search conditions with AND in order', () => {
    const sql = buildSqlStatement({ level: 'info', subsystem: 'api', search: 'timeout' }, source, settings)
    expect(hotBranch(sql)).toBe(
      `SELECT dt, raw FROM remote(t123456_test_source_logs) WHERE ${LEVEL} = 'info' AND ` +
        "JSON_VALUE(raw, '$.subsystem') = 'api' AND raw LIKE '%timeout%'"
    )
  })

  it('should add a cold storage branch for searches', () => {
    expect(buildSqlStatement({ search: "user's data" }, source, settings)).toBe(
      "SELECT dt, raw FROM remote(t123456_test_source_logs) WHERE raw LIKE '%user''s data%' " +
        'UNION ALL SELECT dt, raw FROM s3Cluster(primary, t123456_test_source_s3) ' +
        "WHERE _row_type = 1 AND dt > now() - INTERVAL 24 HOUR AND raw LIKE '%user''s data%' " +
        'ORDER BY dt DESC LIMIT 100 FORMAT JSONEachRow'
    )
  })

  it('should bound the cold branch by since and until and repeat where filters', () => {
    const where = new Map([['requestId', stringValue('req-1')]])
    const sql = buildSqlStatement(
      { search: 'boom', since: '2h', until: '1h', level: 'info', where },
      source,
      settings
    )
    const cold = sql.split(' UNION ALL ')[1]
    expect(cold).toBe(
      'SELECT dt, raw FROM s3Cluster(primary, t123456_test_source_s3) WHERE _row_type = 1 AND ' +
        "dt >= toDateTime64('2025-09-24 10:00:00', 3) AND dt <= toDateTime64('2025-09-24 11:00:00', 3) AND " +
        "raw LIKE '%boom%' AND JSON_VALUE(raw, '$.requestId') = 'req-1' ORDER BY dt DESC LIMIT 100 FORMAT JSONEachRow"
    )
  })

  it('should append where filters after the other conditions in insertion order', () => {
    const where = new Map([
      ['user.id', intValue(42)],
      ['deleted_at', nullValue()]
    ])
    const sql = buildSqlStatement({ subsystem: 'auth', where }, source, settings)
    expect(sql).toContain(
      "WHERE JSON_VALUE(raw, '$.subsystem') = 'auth' AND JSON_VALUE(raw, '$.user.id') = '42' AND " +
        "JSON_VALUE(raw, '$.deleted_at') IS NULL ORDER BY"
    )
  })
})
