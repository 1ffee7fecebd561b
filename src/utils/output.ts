import type { LogRow, OutputFormat } from '../types.js';
import { formatOutput } from './formatter.js';
import { filterThroughJq, spawnJq, type JqRunner } from './jq.js';

/** Line-oriented destination for command output. */
export interface OutputSink {
  write(line: string): void;
  error(line: string): void;
}

export const consoleSink: OutputSink = {
  write: (line) => console.log(line),
  error: (line) => console.error(line)
};

/** A jq filter always sees JSON, whatever format was asked for. */
export function resolveFormat(format: OutputFormat, jqFilter?: string): OutputFormat {
  return jqFilter ? 'json' : format;
}

export async function printResults(
  rows: LogRow[],
  format: OutputFormat,
  jqFilter: string | undefined,
  sink: OutputSink,
  runner: JqRunner = spawnJq
): Promise<void> {
  const payload = formatOutput(rows, resolveFormat(format, jqFilter));

  if (!jqFilter) {
    sink.write(payload);
    return;
  }

  const outcome = await filterThroughJq(jqFilter, payload, runner);
  if (outcome.warning) sink.error(outcome.warning);
  sink.write(outcome.output);
}
