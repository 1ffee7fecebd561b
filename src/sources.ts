import { z } from 'zod';
import type { SourceDescriptor, SourcesPage } from './types.js';
import { createLogger } from './utils/logging.js';

const logToFile = createLogger('SOURCES');
const PAGE_SIZE = 50;

const attributesSchema = z.object({
  name: z.string().catch(''),
  platform: z.string().catch(''),
  token: z.string().catch(''),
  team_id: z.number().catch(0),
  table_name: z.string().catch(''),
  created_at: z.string().catch(''),
  updated_at: z.string().catch(''),
  ingesting_paused: z.boolean().catch(false),
  messages_count: z.number().catch(0),
  bytes_count: z.number().catch(0)
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

export const sourceSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).catch(''),
  type: z.string().catch(''),
  attributes: z.unknown().transform((value) => attributesSchema.parse(isRecord(value) ? value : {}))
});

const pageSchema = z.object({
  data: z.array(sourceSchema).catch([]),
  pagination: z
    .object({
      first: z.string().nullish(),
      last: z.string().nullish(),
      prev: z.string().nullish(),
      next: z.string().nullish()
    })
    .optional()
    .catch(undefined)
});

const singleSchema = z.object({ data: sourceSchema });

export interface TelemetryTransport {
  telemetry(path: string): Promise<unknown>;
}

/** Read access to the Better Stack source directory. Nothing is cached. */
export class SourcesApi {
  private transport: TelemetryTransport;

  constructor(transport: TelemetryTransport) {
    this.transport = transport;
  }

  async listPage(page = 1, perPage = PAGE_SIZE): Promise<SourcesPage> {
    const payload = await this.transport.telemetry(`/sources?page=${page}&per_page=${perPage}`);
    return pageSchema.parse(payload);
  }

  async listAll(): Promise<SourceDescriptor[]> {
    const sources: SourceDescriptor[] = [];
    let page = 1;
    let hasMore = true;

    while (hasMore) {
      const response = await this.listPage(page, PAGE_SIZE);
      sources.push(...response.data);
      hasMore = response.pagination?.next != null;
      page++;
    }

    logToFile('DEBUG', 'Fetched source directory', { pages: page - 1, sources: sources.length });
    return sources;
  }

  async get(id: string): Promise<SourceDescriptor> {
    const payload = await this.transport.telemetry(`/sources/${encodeURIComponent(id)}`);
    return singleSchema.parse(payload).data;
  }

  async findByName(name: string): Promise<SourceDescriptor | undefined> {
    const sources = await this.listAll();
    return sources.find((source) => source.attributes.name === name);
  }
}

/** Maps a configured alias (any case) to its source name; other names pass through. */
export function resolveSourceAlias(
  name: string | undefined,
  aliases: Record<string, string>
): string | undefined {
  if (name === undefined) return undefined;

  const wanted = name.toLowerCase();
  for (const [alias, target] of Object.entries(aliases)) {
    if (alias.toLowerCase() === wanted) return target;
  }
  return name;
}
