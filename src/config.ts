import { config } from 'dotenv';

config();

export const DEFAULT_TELEMETRY_ENDPOINT = 'https://telemetry.betterstack.com';
export const DEFAULT_QUERY_BASE_URL = 'https://eu-nbg-2-connect.betterstackdata.com';
export const DEFAULT_TIMEOUT_MS = 30000;

export interface BetterstackCredentials {
  // Telemetry API token (source directory, and query fallback auth)
  apiToken?: string;
  telemetryEndpoint: string;

  // Query API credentials (basic auth for log queries)
  queryUsername?: string;
  queryPassword?: string;

  timeoutMs: number;
}

function parseTimeout(value?: string): number {
  const parsed = value ? parseInt(value, 10) : NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_TIMEOUT_MS;
}

/**
 * Reads credentials from the environment (a `.env` file in the working
 * directory is loaded first). Nothing is validated here: the client reports
 * a missing token when a request actually needs one.
 */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): BetterstackCredentials {
  return {
    apiToken: env.BETTERSTACK_API_TOKEN || undefined,
    telemetryEndpoint: env.BETTERSTACK_TELEMETRY_ENDPOINT || DEFAULT_TELEMETRY_ENDPOINT,
    queryUsername: env.BETTERSTACK_QUERY_USERNAME || undefined,
    queryPassword: env.BETTERSTACK_QUERY_PASSWORD || undefined,
    timeoutMs: parseTimeout(env.BSQ_TIMEOUT_MS)
  };
}
