import { SourceNotFound } from '../errors.js';
import type { OutputFormat, SourceDescriptor } from '../types.js';
import { bold, cyan, green, red } from '../utils/colors.js';
import { formatBytes, formatOutput } from '../utils/formatter.js';
import type { CommandContext } from './context.js';

const formatCount = (count: number): string => (count ? count.toLocaleString('en-US') : '0');
const statusText = (source: SourceDescriptor): string =>
  source.attributes.ingesting_paused ? red('Paused') : green('Active');

export async function listSources(ctx: CommandContext, format: OutputFormat = 'pretty'): Promise<void> {
  const sources = await ctx.sources.listAll();

  if (format === 'pretty' || format === 'table') {
    const lines = ['', bold('Available Sources:'), ''];
    for (const source of sources) {
      const attrs = source.attributes;
      lines.push(
        `  ${cyan(attrs.name)}`,
        `    Platform: ${attrs.platform}`,
        `    Messages: ${formatCount(attrs.messages_count)}`,
        `    Size: ${formatBytes(attrs.bytes_count)}`,
        `    Status: ${statusText(source)}`,
        `    ID: ${source.id}`,
        ''
      );
    }
    ctx.output.write(lines.join('\n'));
    return;
  }

  const rows = sources.map((source) => ({
    id: source.id,
    type: source.type,
    name: source.attributes.name,
    platform: source.attributes.platform,
    messages_count: source.attributes.messages_count,
    bytes_count: source.attributes.bytes_count,
    ingesting_paused: source.attributes.ingesting_paused
  }));
  ctx.output.write(formatOutput(rows, format));
}

export async function getSource(ctx: CommandContext, name: string, format: OutputFormat = 'pretty'): Promise<void> {
  const source = await ctx.sources.findByName(name);
  if (!source) {
    throw new SourceNotFound(name);
  }

  const attrs = source.attributes;
  if (format === 'pretty') {
    ctx.output.write(
      [
        '',
        bold(`Source: ${attrs.name}`),
        '',
        `ID: ${source.id}`,
        `Platform: ${attrs.platform}`,
        `Token: ${attrs.token ? `${attrs.token.slice(0, 10)}...` : 'N/A'}`,
        `Messages: ${formatCount(attrs.messages_count)}`,
        `Size: ${formatBytes(attrs.bytes_count)}`,
        `Status: ${statusText(source)}`,
        `Created: ${attrs.created_at || 'N/A'}`,
        `Updated: ${attrs.updated_at || 'N/A'}`
      ].join('\n')
    );
    return;
  }

  const row = {
    id: source.id,
    type: source.type,
    attributes: {
      name: attrs.name,
      platform: attrs.platform,
      token: attrs.token,
      team_id: attrs.team_id,
      table_name: attrs.table_name,
      messages_count: attrs.messages_count,
      bytes_count: attrs.bytes_count,
      ingesting_paused: attrs.ingesting_paused
    }
  };
  ctx.output.write(formatOutput([row], format));
}
