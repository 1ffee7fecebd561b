import { BetterstackClient } from '../client.js';
import { loadCredentials } from '../config.js';
import { ConfigStore } from '../config-store.js';
import { QueryApi } from '../query/query-api.js';
import { SourcesApi } from '../sources.js';
import { defaultSleep } from '../tail/tail-engine.js';
import { spawnJq, type JqRunner } from '../utils/jq.js';
import { consoleSink, type OutputSink } from '../utils/output.js';

/** Collaborators every command runs against. */
export interface CommandContext {
  config: ConfigStore;
  queryApi: QueryApi;
  sources: SourcesApi;
  output: OutputSink;
  jqRunner: JqRunner;
  sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  signal: AbortSignal;
}

export function createContext(signal: AbortSignal): CommandContext {
  const client = new BetterstackClient(loadCredentials());
  const config = new ConfigStore();
  const sources = new SourcesApi(client);

  return {
    config,
    queryApi: new QueryApi(client, sources, config),
    sources,
    output: consoleSink,
    jqRunner: spawnJq,
    sleep: defaultSleep,
    signal
  };
}
