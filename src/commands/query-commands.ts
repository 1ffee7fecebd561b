import { InvalidOption } from '../errors.js';
import { parseShorthandQuery } from '../query/shorthand-parser.js';
import type { LogRow, OutputFormat } from '../types.js';
import { dim, yellow } from '../utils/colors.js';
import { toDisplayRow } from '../utils/log-entry.js';
import { printResults } from '../utils/output.js';
import type { CommandContext } from './context.js';

export interface QueryCommandOptions {
  source?: string;
  format?: OutputFormat;
  verbose?: boolean;
  saved?: string;
}

export interface SqlCommandOptions {
  format?: OutputFormat;
  verbose?: boolean;
}

async function report(ctx: CommandContext, rows: LogRow[], format: OutputFormat): Promise<void> {
  await printResults(rows, format, undefined, ctx.output, ctx.jqRunner);

  if (rows.length === 0) {
    ctx.output.error(yellow('\nNo results found'));
  } else {
    ctx.output.error(dim(`\n${rows.length} results returned`));
  }
}

/** `bsq query '<shorthand>'`, or `bsq query --saved <name>`. */
export async function runQuery(
  ctx: CommandContext,
  queryText: string | undefined,
  options: QueryCommandOptions = {}
): Promise<void> {
  const config = ctx.config.load();

  let text = queryText;
  if (options.saved) {
    text = config.savedQueries[options.saved];
    if (text === undefined) {
      throw new InvalidOption(`Saved query not found: ${options.saved}`);
    }
  }
  if (!text) {
    throw new InvalidOption('A query is required, e.g. bsq query "{ logs(limit: 10) { dt, message } }"');
  }

  const queryOptions = parseShorthandQuery(text);
  if (options.source) queryOptions.source = options.source;
  if (options.verbose) queryOptions.verbose = true;

  ctx.config.addToHistory(text);

  const results = await ctx.queryApi.execute(queryOptions);
  await report(ctx, results.map(toDisplayRow), options.format ?? config.outputFormat);
}

/** `bsq sql '<statement>'` */
export async function runSql(ctx: CommandContext, sql: string, options: SqlCommandOptions = {}): Promise<void> {
  const config = ctx.config.load();
  ctx.config.addToHistory(`SQL: ${sql}`);

  if (options.verbose) {
    ctx.output.error(`Executing: ${sql}`);
  }

  const rows = await ctx.queryApi.executeSql(sql);
  await report(ctx, rows, options.format ?? config.outputFormat);
}
