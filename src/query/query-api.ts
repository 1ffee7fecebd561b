import { queryBaseUrlOf, type CliConfig } from '../config-store.js';
import { SourceNotFound } from '../errors.js';
import type { LogEntry, LogRow, QueryOptions, SourceDescriptor } from '../types.js';
import { toLogEntry } from '../utils/log-entry.js';
import { createLogger } from '../utils/logging.js';
import { buildSqlStatement, resolveSourceName } from './sql-builder.js';

const logToFile = createLogger('QUERY');

export interface SqlExecutor {
  query(sql: string, queryBaseUrl?: string): Promise<LogRow[]>;
}

export interface SourceDirectory {
  findByName(name: string): Promise<SourceDescriptor | undefined>;
}

export interface ConfigReader {
  load(): CliConfig;
}

/** Compiles query options against the live source directory and runs them. */
export class QueryApi {
  private executor: SqlExecutor;
  private sources: SourceDirectory;
  private config: ConfigReader;
  private now: () => Date;

  constructor(executor: SqlExecutor, sources: SourceDirectory, config: ConfigReader, now: () => Date = () => new Date()) {
    this.executor = executor;
    this.sources = sources;
    this.config = config;
    this.now = now;
  }

  private async compile(options: QueryOptions, config: CliConfig): Promise<string> {
    const sourceName = resolveSourceName(options, config);
    const source = await this.sources.findByName(sourceName);
    if (!source) {
      throw new SourceNotFound(sourceName);
    }

    return buildSqlStatement(options, source, {
      defaultLogLevel: config.defaultLogLevel,
      defaultLimit: config.defaultLimit,
      now: this.now()
    });
  }

  async buildQuery(options: QueryOptions): Promise<string> {
    return this.compile(options, this.config.load());
  }

  async execute(options: QueryOptions): Promise<LogEntry[]> {
    const config = this.config.load();
    const sql = await this.compile(options, config);

    if (options.verbose) {
      console.error(`Executing query: ${sql}`);
    }
    logToFile('DEBUG', 'Compiled query', { source: options.source, sql });

    const rows = await this.executor.query(sql, queryBaseUrlOf(config));
    return rows.map(toLogEntry);
  }

  /** Runs caller-written SQL; JSONEachRow framing is appended unless a FORMAT is present. */
  async executeSql(sql: string): Promise<LogRow[]> {
    const statement = sql.toLowerCase().includes('format') ? sql : `${sql} FORMAT JSONEachRow`;
    return this.executor.query(statement, queryBaseUrlOf(this.config.load()));
  }
}
