import { setTimeout as delay } from 'timers/promises';
import type { LogEntry, QueryOptions } from '../types.js';
import { withExtraField } from '../utils/log-entry.js';
import { createLogger } from '../utils/logging.js';

const logToFile = createLogger('TAIL');

export const DEFAULT_INTERVAL_MS = 2000;
export const DEFAULT_TAIL_LIMIT = 100;
export const MAX_POLL_LIMIT = 50;
const POLL_FALLBACK_SINCE = '1m';

export interface TailRuntime {
  execute(options: QueryOptions): Promise<LogEntry[]>;
  emit(entries: LogEntry[]): Promise<void>;
  sleep(ms: number, signal: AbortSignal): Promise<void>;
  signal: AbortSignal;
  onError(error: unknown): void;
  /** Called once, after the initial batch, when follow mode starts. */
  onFollowStart?(): void;
}

export interface FollowSettings {
  follow: boolean;
  intervalMs: number;
}

export interface SourceBatch {
  source: string;
  entries: LogEntry[];
}

export const defaultSleep = (ms: number, signal: AbortSignal): Promise<void> =>
  delay(ms, undefined, { signal });

/** Sleeps one interval; false once the run has been cancelled. */
async function pause(runtime: TailRuntime, ms: number): Promise<boolean> {
  if (runtime.signal.aborted) return false;
  try {
    await runtime.sleep(ms, runtime.signal);
  } catch (error) {
    if (runtime.signal.aborted) return false;
    throw error;
  }
  return !runtime.signal.aborted;
}

export const pollLimitFor = (limit: number | undefined): number =>
  Math.max(1, Math.min(MAX_POLL_LIMIT, limit || MAX_POLL_LIMIT));

/** The filters every fetch carries; time bounds and limit are set per fetch. */
function filterOptions(options: QueryOptions): QueryOptions {
  return {
    source: options.source,
    level: options.level,
    subsystem: options.subsystem,
    search: options.search,
    where: options.where,
    fields: options.fields,
    verbose: options.verbose
  };
}

/**
 * Emits the newest rows of one source, then (when following) polls for rows
 * strictly newer than the last emitted timestamp.
 */
export async function runSingleSource(
  options: QueryOptions,
  settings: FollowSettings,
  runtime: TailRuntime
): Promise<void> {
  let lastTimestamp: string | undefined;

  const initial = await runtime.execute(options);
  if (initial.length > 0) {
    await runtime.emit(initial);
    lastTimestamp = initial[0].dt;
  }

  if (!settings.follow) return;
  runtime.onFollowStart?.();

  const pollLimit = pollLimitFor(options.limit);
  const sinceFallback = options.since || POLL_FALLBACK_SINCE;

  while (await pause(runtime, settings.intervalMs)) {
    try {
      const results = await runtime.execute({
        ...filterOptions(options),
        limit: pollLimit,
        since: lastTimestamp || sinceFallback
      });
      const watermark = lastTimestamp;
      const fresh = watermark ? results.filter((entry) => entry.dt > watermark) : results;
      if (fresh.length === 0) continue;

      await runtime.emit(fresh);
      lastTimestamp = fresh[0].dt;
    } catch (error) {
      logToFile('WARN', 'Single-source poll failed', { source: options.source });
      runtime.onError(error);
    }
  }
}

const byTimestampDesc = (a: LogEntry, b: LogEntry): number => (a.dt < b.dt ? 1 : a.dt > b.dt ? -1 : 0);

/**
 * Tags every row with its `source`, orders by `dt` descending and keeps the
 * first `limit`. Rows with equal timestamps keep their batch order.
 */
export function mergeSourceBatches(batches: SourceBatch[], limit: number): LogEntry[] {
  const combined: LogEntry[] = [];
  for (const batch of batches) {
    for (const entry of batch.entries) {
      combined.push(withExtraField(entry, 'source', batch.source));
    }
  }
  return combined.sort(byTimestampDesc).slice(0, limit);
}

const sourceOf = (entry: LogEntry): string => {
  const source = entry.extra.get('source');
  return typeof source === 'string' ? source : '';
};

/**
 * Fetches every source in turn and merges the rows. In follow mode each
 * source keeps its own watermark; a row is new when it is later than its
 * source's watermark, or when that source has none yet.
 */
export async function runMultiSource(
  options: QueryOptions,
  sources: string[],
  settings: FollowSettings,
  runtime: TailRuntime
): Promise<void> {
  const limit = options.limit || DEFAULT_TAIL_LIMIT;
  const watermarks = new Map<string, string>();

  const collect = async (perSourceLimit: number, fallbackSince?: string, until?: string) => {
    const batches: SourceBatch[] = [];
    const latest = new Map<string, string>();

    for (const source of sources) {
      const entries = await runtime.execute({
        ...filterOptions(options),
        source,
        limit: perSourceLimit,
        since: watermarks.get(source) || options.since || fallbackSince,
        until
      });
      if (entries.length > 0) {
        latest.set(source, entries[0].dt);
      }
      batches.push({ source, entries });
    }

    return { combined: mergeSourceBatches(batches, perSourceLimit), latest };
  };

  const initial = await collect(Math.max(1, limit), undefined, options.until);
  for (const [source, dt] of initial.latest) {
    watermarks.set(source, dt);
  }
  if (initial.combined.length > 0) {
    await runtime.emit(initial.combined);
  }

  if (!settings.follow) return;
  runtime.onFollowStart?.();

  const pollLimit = pollLimitFor(limit);
  const fallbackSince = options.since ? undefined : POLL_FALLBACK_SINCE;

  while (await pause(runtime, settings.intervalMs)) {
    try {
      const { combined, latest } = await collect(pollLimit, fallbackSince);

      const fresh = combined.filter((entry) => {
        const watermark = watermarks.get(sourceOf(entry));
        return !watermark || entry.dt > watermark;
      });
      if (fresh.length > 0) {
        await runtime.emit(fresh);
      }

      for (const [source, dt] of latest) {
        const previous = watermarks.get(source);
        if (!previous || dt > previous) {
          watermarks.set(source, dt);
        }
      }
    } catch (error) {
      logToFile('WARN', 'Multi-source poll failed', { sources });
      runtime.onError(error);
    }
  }
}
