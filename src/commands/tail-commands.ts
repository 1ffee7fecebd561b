import { describeError } from '../errors.js';
import { resolveSourceAlias } from '../sources.js';
import {
  DEFAULT_TAIL_LIMIT,
  runMultiSource,
  runSingleSource,
  type TailRuntime
} from '../tail/tail-engine.js';
import type { OutputFormat, QueryOptions, WhereFilters } from '../types.js';
import { dim, red } from '../utils/colors.js';
import { toDisplayRow } from '../utils/log-entry.js';
import { printResults } from '../utils/output.js';
import { stringValue } from '../utils/values.js';
import type { CommandContext } from './context.js';

export interface TailRequest {
  source?: string;
  sources?: string[];
  limit?: number;
  level?: string;
  subsystem?: string;
  since?: string;
  until?: string;
  search?: string;
  where?: WhereFilters;
  fields?: string[];
  format?: OutputFormat;
  jq?: string;
  follow?: boolean;
  intervalMs: number;
  verbose?: boolean;
}

/** Explicit source first, then `--sources`, else the configured default; aliases resolved, duplicates dropped. */
export function resolveTailSources(
  request: Pick<TailRequest, 'source' | 'sources'>,
  defaultSource: string | undefined,
  aliases: Record<string, string>
): string[] {
  const names: string[] = [];
  const add = (name: string | undefined) => {
    const resolved = resolveSourceAlias(name, aliases);
    if (resolved && !names.includes(resolved)) names.push(resolved);
  };

  add(request.source);
  for (const name of request.sources ?? []) add(name);
  if (names.length === 0) add(defaultSource);
  return names;
}

export async function tailLogs(ctx: CommandContext, request: TailRequest): Promise<void> {
  const config = ctx.config.load();
  const format = request.format ?? config.outputFormat;

  const options: QueryOptions = {
    level: request.level,
    subsystem: request.subsystem,
    since: request.since,
    until: request.until,
    search: request.search,
    where: request.where,
    fields: request.fields,
    verbose: request.verbose,
    limit: request.limit && request.limit > 0 ? request.limit : DEFAULT_TAIL_LIMIT
  };

  const runtime: TailRuntime = {
    execute: (queryOptions) => ctx.queryApi.execute(queryOptions),
    emit: (entries) => printResults(entries.map(toDisplayRow), format, request.jq, ctx.output, ctx.jqRunner),
    sleep: ctx.sleep,
    signal: ctx.signal,
    onError: (error) => ctx.output.error(red(`Polling error: ${describeError(error)}`)),
    onFollowStart: () => ctx.output.error(dim('\nFollowing logs... (Press Ctrl+C to stop)'))
  };
  const settings = { follow: Boolean(request.follow), intervalMs: request.intervalMs };

  const sources = resolveTailSources(request, config.defaultSource, config.sourceAliases);
  if (sources.length <= 1) {
    await runSingleSource({ ...options, source: sources[0] }, settings, runtime);
    return;
  }

  await runMultiSource(options, sources, settings, runtime);
}

export const showErrors = (ctx: CommandContext, request: TailRequest) => tailLogs(ctx, { ...request, level: 'error' });

export const showWarnings = (ctx: CommandContext, request: TailRequest) =>
  tailLogs(ctx, { ...request, level: 'warning' });

export const searchLogs = (ctx: CommandContext, pattern: string, request: TailRequest) =>
  tailLogs(ctx, { ...request, search: pattern });

/** Every row carrying `requestId`, across the requested sources. */
export function traceRequest(ctx: CommandContext, requestId: string, request: TailRequest): Promise<void> {
  const where: WhereFilters = new Map(request.where ?? []);
  where.set('requestId', stringValue(requestId));
  return tailLogs(ctx, { ...request, where });
}
