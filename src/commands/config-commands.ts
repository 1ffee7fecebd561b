import { configUpdateFor, isConfigKey, queryBaseUrlOf, type ConfigKey } from '../config-store.js';
import { InvalidOption } from '../errors.js';
import { parseShorthandQuery } from '../query/shorthand-parser.js';
import { bold, cyan, dim, green } from '../utils/colors.js';
import type { CommandContext } from './context.js';

const CONFIRMATIONS: Record<ConfigKey, string> = {
  source: 'Default source set to',
  limit: 'Default limit set to',
  format: 'Default output format set to',
  logLevel: 'Default log level set to',
  queryBaseUrl: 'Query base URL set to'
};

export function setConfig(ctx: CommandContext, key: string, value: string): void {
  const update = configUpdateFor(key, value);
  const next = ctx.config.update(update);

  const shown =
    key === 'limit' ? String(next.defaultLimit) : key === 'logLevel' ? next.defaultLogLevel : value;
  const label = isConfigKey(key) ? CONFIRMATIONS[key] : key;
  ctx.output.write(green(`${label}: ${shown}`));
}

export function showConfig(ctx: CommandContext, format: 'json' | 'pretty' = 'pretty'): void {
  const config = ctx.config.load();

  if (format === 'json') {
    ctx.output.write(
      JSON.stringify(
        {
          defaultSource: config.defaultSource ?? null,
          defaultLimit: config.defaultLimit,
          defaultLogLevel: config.defaultLogLevel,
          outputFormat: config.outputFormat,
          queryBaseUrl: queryBaseUrlOf(config),
          savedQueries: config.savedQueries,
          sourceAliases: config.sourceAliases,
          queryHistory: config.queryHistory
        },
        null,
        2
      )
    );
    return;
  }

  const lines = [
    '',
    bold('Current Configuration:'),
    '',
    `Default Source: ${config.defaultSource ?? dim('(not set)')}`,
    `Default Limit: ${config.defaultLimit}`,
    `Default Log Level: ${config.defaultLogLevel}`,
    `Output Format: ${config.outputFormat}`,
    `Query Base URL: ${queryBaseUrlOf(config)}`
  ];

  const aliases = Object.entries(config.sourceAliases);
  if (aliases.length > 0) {
    lines.push('', bold('Source Aliases:'));
    for (const [alias, source] of aliases) lines.push(`  ${cyan(alias)} → ${source}`);
  }

  const saved = Object.entries(config.savedQueries);
  if (saved.length > 0) {
    lines.push('', bold('Saved Queries:'));
    for (const [name, query] of saved) lines.push(`  ${cyan(name)}: ${query}`);
  }

  lines.push('');
  ctx.output.write(lines.join('\n'));
}

export function setSourceAlias(ctx: CommandContext, alias: string, source: string): void {
  const trimmed = alias.trim();
  if (!trimmed || !source.trim()) {
    throw new InvalidOption('Usage: bsq config alias <alias> <source>');
  }

  const config = ctx.config.load();
  ctx.config.update({ sourceAliases: { ...config.sourceAliases, [trimmed]: source.trim() } });
  ctx.output.write(green(`Alias ${trimmed} now points to: ${source.trim()}`));
}

/** Stores a shorthand query under a name, after checking that it parses. */
export function saveQuery(ctx: CommandContext, name: string, query: string): void {
  if (!name.trim()) {
    throw new InvalidOption('Usage: bsq config save <name> <query>');
  }
  parseShorthandQuery(query);

  const config = ctx.config.load();
  ctx.config.update({ savedQueries: { ...config.savedQueries, [name.trim()]: query } });
  ctx.output.write(green(`Saved query: ${name.trim()}`));
}

export function showHistory(ctx: CommandContext, limit?: number): void {
  const history = ctx.config.load().queryHistory;
  const entries = limit && limit > 0 ? history.slice(0, limit) : history;

  if (entries.length === 0) {
    ctx.output.write(dim('No queries in history'));
    return;
  }

  ctx.output.write(entries.map((entry, idx) => `${dim(`${idx + 1}.`)} ${entry}`).join('\n'));
}
