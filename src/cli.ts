import { parseArgs } from 'util';
import { InvalidOption, describeError } from './errors.js';
import type { CommandContext } from './commands/context.js';
import { runQuery, runSql } from './commands/query-commands.js';
import {
  searchLogs,
  showErrors,
  showWarnings,
  tailLogs,
  traceRequest,
  type TailRequest
} from './commands/tail-commands.js';
import { getSource, listSources } from './commands/source-commands.js';
import { saveQuery, setConfig, setSourceAlias, showConfig, showHistory } from './commands/config-commands.js';
import { DEFAULT_INTERVAL_MS } from './tail/tail-engine.js';
import { OUTPUT_FORMATS, isOutputFormat, type OutputFormat } from './types.js';
import { red } from './utils/colors.js';
import { createLogger } from './utils/logging.js';
import {
  normalizeFieldsOption,
  normalizeSourcesOption,
  parseLimitOption,
  parseWhereOption,
  positiveIntOr
} from './utils/options.js';

const logToFile = createLogger('CLI');

export const VERSION = '1.0.0';

export const USAGE = `bsq ${VERSION}: query Better Stack logs

Usage:
  bsq query <shorthand> [-s source] [-f format] [-v] [--saved name]
  bsq sql <statement> [-f format] [-v]
  bsq tail [source] [log options]
  bsq errors [source] [log options]
  bsq warnings [source] [log options]
  bsq search <pattern> [source] [log options]
  bsq trace <request-id> [source] [log options]
  bsq sources list [-f format]
  bsq sources get <name> [-f format]
  bsq config set <source|limit|format|logLevel|queryBaseUrl> <value>
  bsq config show [-f json|pretty]
  bsq config source <name>
  bsq config alias <alias> <source>
  bsq config save <name> <shorthand>
  bsq config history [-n count]

Log options:
  -n, --limit <n>        rows to fetch (default 100)
  -l, --level <level>    error, warning, info, debug, ...
      --subsystem <name>
      --since <time>     30m, 1h, 2d, 1w or an ISO date
      --until <time>
      --format <format>  json, table, csv, pretty
      --fields <list>    comma-separated field paths
      --sources <list>   comma-separated sources to merge
      --where <f=v>      JSON field filter (repeatable)
      --jq <filter>      pipe JSON output through jq
  -f, --follow           keep polling for new rows
      --interval <ms>    polling interval (default 2000)
  -v, --verbose          print the generated SQL`;

const LOG_OPTIONS = {
  limit: { type: 'string', short: 'n' },
  level: { type: 'string', short: 'l' },
  subsystem: { type: 'string' },
  since: { type: 'string' },
  until: { type: 'string' },
  format: { type: 'string' },
  fields: { type: 'string', multiple: true },
  sources: { type: 'string', multiple: true },
  where: { type: 'string', multiple: true },
  jq: { type: 'string' },
  follow: { type: 'boolean', short: 'f' },
  interval: { type: 'string' },
  verbose: { type: 'boolean', short: 'v' }
} as const;

const QUERY_OPTIONS = {
  source: { type: 'string', short: 's' },
  format: { type: 'string', short: 'f' },
  verbose: { type: 'boolean', short: 'v' },
  saved: { type: 'string' }
} as const;

const SQL_OPTIONS = {
  format: { type: 'string', short: 'f' },
  verbose: { type: 'boolean', short: 'v' }
} as const;

const FORMAT_OPTIONS = {
  format: { type: 'string', short: 'f' }
} as const;

const HISTORY_OPTIONS = {
  limit: { type: 'string', short: 'n' }
} as const;

/** Runs a parse step, reporting malformed arguments as an invalid option. */
function parsed<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new InvalidOption(describeError(error));
  }
}

export function parseFormat(value: string | undefined): OutputFormat | undefined {
  if (value === undefined) return undefined;
  if (!isOutputFormat(value)) {
    throw new InvalidOption(`Invalid format: ${value}\nValid formats: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return value;
}

function requireArgument(value: string | undefined, name: string): string {
  if (value === undefined || value === '') {
    throw new InvalidOption(`Missing argument: <${name}>\n\n${USAGE}`);
  }
  return value;
}

/** Log-viewing flags shared by tail, errors, warnings, search and trace. */
export function parseLogArgs(args: string[]): { request: TailRequest; positionals: string[] } {
  const { values, positionals } = parsed(() => parseArgs({ args, options: LOG_OPTIONS, allowPositionals: true }));

  let limit: number | undefined;
  if (values.limit !== undefined) {
    limit = parseLimitOption(values.limit);
    if (limit === undefined) {
      throw new InvalidOption(`Invalid limit: ${values.limit}`);
    }
  }

  const jq = values.jq?.trim();

  const request: TailRequest = {
    limit,
    level: values.level,
    subsystem: values.subsystem,
    since: values.since,
    until: values.until,
    format: parseFormat(values.format),
    fields: normalizeFieldsOption(values.fields),
    sources: normalizeSourcesOption(values.sources),
    where: parseWhereOption(values.where),
    jq: jq ? jq : undefined,
    follow: values.follow ?? false,
    intervalMs: positiveIntOr(values.interval, DEFAULT_INTERVAL_MS),
    verbose: values.verbose ?? false
  };

  return { request, positionals };
}

async function runLogCommand(ctx: CommandContext, command: string, args: string[]): Promise<void> {
  const { request, positionals } = parseLogArgs(args);

  switch (command) {
    case 'tail':
      return tailLogs(ctx, { ...request, source: positionals[0] });
    case 'errors':
      return showErrors(ctx, { ...request, source: positionals[0] });
    case 'warnings':
      return showWarnings(ctx, { ...request, source: positionals[0] });
    case 'search':
      return searchLogs(ctx, requireArgument(positionals[0], 'pattern'), { ...request, source: positionals[1] });
    case 'trace':
      return traceRequest(ctx, requireArgument(positionals[0], 'request-id'), { ...request, source: positionals[1] });
  }
}

async function runSourcesCommand(ctx: CommandContext, args: string[]): Promise<void> {
  const [subcommand, ...rest] = args;
  const { values, positionals } = parsed(() =>
    parseArgs({ args: rest, options: FORMAT_OPTIONS, allowPositionals: true })
  );
  const format = parseFormat(values.format) ?? 'pretty';

  switch (subcommand) {
    case 'list':
      return listSources(ctx, format);
    case 'get':
      return getSource(ctx, requireArgument(positionals[0], 'name'), format);
    default:
      throw new InvalidOption(`Unknown sources command: ${subcommand ?? ''}\n\n${USAGE}`);
  }
}

function runConfigCommand(ctx: CommandContext, args: string[]): void {
  const [subcommand, ...rest] = args;

  switch (subcommand) {
    case 'set': {
      const { positionals } = parsed(() => parseArgs({ args: rest, allowPositionals: true }));
      setConfig(ctx, requireArgument(positionals[0], 'key'), requireArgument(positionals[1], 'value'));
      return;
    }
    case 'show': {
      const { values } = parsed(() => parseArgs({ args: rest, options: FORMAT_OPTIONS, allowPositionals: false }));
      const format = values.format === 'json' ? 'json' : (values.format ?? 'pretty') === 'pretty' ? 'pretty' : undefined;
      if (!format) {
        throw new InvalidOption(`Invalid format: ${values.format}\nValid formats: json, pretty`);
      }
      showConfig(ctx, format);
      return;
    }
    case 'source': {
      const { positionals } = parsed(() => parseArgs({ args: rest, allowPositionals: true }));
      setConfig(ctx, 'source', requireArgument(positionals[0], 'name'));
      return;
    }
    case 'alias': {
      const { positionals } = parsed(() => parseArgs({ args: rest, allowPositionals: true }));
      setSourceAlias(ctx, requireArgument(positionals[0], 'alias'), requireArgument(positionals[1], 'source'));
      return;
    }
    case 'save': {
      const { positionals } = parsed(() => parseArgs({ args: rest, allowPositionals: true }));
      saveQuery(ctx, requireArgument(positionals[0], 'name'), requireArgument(positionals[1], 'query'));
      return;
    }
    case 'history': {
      const { values } = parsed(() => parseArgs({ args: rest, options: HISTORY_OPTIONS, allowPositionals: false }));
      showHistory(ctx, parseLimitOption(values.limit));
      return;
    }
    default:
      throw new InvalidOption(`Unknown config command: ${subcommand ?? ''}\n\n${USAGE}`);
  }
}

const ERROR_LABELS = new Map<string, string>([
  ['query', 'Query'],
  ['sql', 'SQL'],
  ['tail', 'Tail'],
  ['errors', 'Tail'],
  ['warnings', 'Tail'],
  ['search', 'Tail'],
  ['trace', 'Tail'],
  ['sources', 'Sources'],
  ['config', 'Config']
]);

async function dispatch(ctx: CommandContext, command: string, args: string[]): Promise<void> {
  switch (command) {
    case 'query': {
      const { values, positionals } = parsed(() =>
        parseArgs({ args, options: QUERY_OPTIONS, allowPositionals: true })
      );
      return runQuery(ctx, positionals[0], {
        source: values.source,
        format: parseFormat(values.format),
        verbose: values.verbose,
        saved: values.saved
      });
    }
    case 'sql': {
      const { values, positionals } = parsed(() => parseArgs({ args, options: SQL_OPTIONS, allowPositionals: true }));
      return runSql(ctx, requireArgument(positionals[0], 'statement'), {
        format: parseFormat(values.format),
        verbose: values.verbose
      });
    }
    case 'tail':
    case 'errors':
    case 'warnings':
    case 'search':
    case 'trace':
      return runLogCommand(ctx, command, args);
    case 'sources':
      return runSourcesCommand(ctx, args);
    case 'config':
      return runConfigCommand(ctx, args);
  }
}

/** Runs one command line and returns the process exit code. */
export async function run(argv: string[], ctx: CommandContext): Promise<number> {
  const [command, ...args] = argv;

  if (command === undefined || command === '-h' || command === '--help' || command === 'help') {
    ctx.output.write(USAGE);
    return 0;
  }
  if (command === '-V' || command === '--version') {
    ctx.output.write(`bsq ${VERSION}`);
    return 0;
  }

  const label = ERROR_LABELS.get(command);
  if (!label) {
    ctx.output.error(red(`Unknown command: ${command}`));
    ctx.output.error(USAGE);
    return 1;
  }

  try {
    await dispatch(ctx, command, args);
    return 0;
  } catch (error) {
    logToFile('ERROR', `${command} failed`, {
      error: describeError(error),
      stack: error instanceof Error ? error.stack : undefined
    });
    ctx.output.error(red(`${label} error: ${describeError(error)}`));
    return 1;
  }
}
