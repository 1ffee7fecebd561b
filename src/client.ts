import axios, { isAxiosError, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import pLimit from 'p-limit';
import { DEFAULT_QUERY_BASE_URL, type BetterstackCredentials } from './config.js';
import {
  AuthenticationFailed,
  QueryExecutionFailed,
  RequestTimedOut,
  describeError
} from './errors.js';
import type { LogRow } from './types.js';
import { createLogger } from './utils/logging.js';

const logToFile = createLogger('CLIENT');
const RATE_LIMIT = 5; // Upper bound on in-flight requests across every client instance
const USER_AGENT = 'bsq-cli/1.0.0';

const MISSING_TOKEN_MESSAGE =
  'BETTERSTACK_API_TOKEN environment variable is not set.\n' +
  'Please add it to your shell configuration:\n' +
  'export BETTERSTACK_API_TOKEN="your_token_here"';

const CONNECT_REMOTELY_STEPS =
  '1. Go to Better Stack > Logs > Dashboards\n' +
  '2. Click "Connect remotely"\n' +
  '3. Create credentials and save them';

const EXPORT_LINES =
  'export BETTERSTACK_QUERY_USERNAME="your_username"\n' +
  'export BETTERSTACK_QUERY_PASSWORD="your_password"';

function envLine(name: string, present: boolean): string {
  return `  ${name}: ${present ? '✓ Set' : '✗ Not set'}`;
}

export function malformedTokenMessage(credentials: BetterstackCredentials): string {
  const indentedExports = EXPORT_LINES.split('\n')
    .map((line) => `   ${line}`)
    .join('\n');

  return [
    'Query API authentication failed: Malformed token',
    '',
    'This usually means your Query API credentials are not set.',
    '',
    'Current environment:',
    envLine('BETTERSTACK_API_TOKEN', Boolean(credentials.apiToken)),
    envLine('BETTERSTACK_QUERY_USERNAME', Boolean(credentials.queryUsername)),
    envLine('BETTERSTACK_QUERY_PASSWORD', Boolean(credentials.queryPassword)),
    '',
    'To fix this:',
    '1. Add these to your ~/.zshrc or ~/.bashrc:',
    indentedExports,
    '',
    '2. Reload your shell:',
    '   source ~/.zshrc',
    '',
    '3. Or set them for this session:',
    indentedExports,
    '',
    'To get Query API credentials:',
    CONNECT_REMOTELY_STEPS
  ].join('\n');
}

export function rejectedCredentialsMessage(hasQueryCredentials: boolean): string {
  if (hasQueryCredentials) {
    return 'Authentication failed. Please check your Query API credentials.';
  }

  return (
    'Query API authentication failed.\n\n' +
    'The Query API requires separate credentials from your API token.\n' +
    'To create credentials:\n' +
    `${CONNECT_REMOTELY_STEPS}\n\n` +
    'Then set them as environment variables:\n' +
    `${EXPORT_LINES}`
  );
}

function bodyText(data: unknown): string {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;
  return JSON.stringify(data);
}

/**
 * Decodes a JSONEachRow payload. Blank lines are skipped; lines that are not
 * JSON objects are reported on stderr and dropped.
 */
export function decodeRows(text: string): LogRow[] {
  const rows: LogRow[] = [];

  for (const line of text.trim().split('\n')) {
    if (!line.trim()) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      console.error(`Failed to parse line: ${line}`);
      continue;
    }

    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      rows.push(Object.fromEntries(Object.entries(parsed)));
    } else {
      console.error(`Unexpected row payload: ${line}`);
    }
  }

  return rows;
}

export class BetterstackClient {
  private telemetryClient: AxiosInstance;
  private queryClient: AxiosInstance;
  private credentials: BetterstackCredentials;
  private static rateLimiter = pLimit(RATE_LIMIT); // All instances share the same gate

  constructor(credentials: BetterstackCredentials) {
    this.credentials = credentials;

    // Telemetry API client for the source directory (Bearer token auth)
    this.telemetryClient = axios.create({
      baseURL: `${credentials.telemetryEndpoint.replace(/\/+$/, '')}/api/v1`,
      timeout: credentials.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': USER_AGENT
      }
    });

    // Query API client for log SQL (basic auth, Bearer fallback)
    this.queryClient = axios.create({
      timeout: credentials.timeoutMs,
      responseType: 'text',
      headers: {
        'Content-Type': 'text/plain',
        'User-Agent': USER_AGENT
      }
    });

    this.telemetryClient.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        throw this.mapTelemetryError(error);
      }
    );
    this.queryClient.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        throw this.mapQueryError(error);
      }
    );
  }

  get hasQueryCredentials(): boolean {
    return Boolean(this.credentials.queryUsername && this.credentials.queryPassword);
  }

  private requireToken(): string {
    if (!this.credentials.apiToken) {
      throw new AuthenticationFailed('missing-token', MISSING_TOKEN_MESSAGE);
    }
    return this.credentials.apiToken;
  }

  private isTimeout(error: unknown): boolean {
    return isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
  }

  private mapTelemetryError(error: unknown): unknown {
    if (this.isTimeout(error)) {
      return new RequestTimedOut(this.credentials.timeoutMs);
    }
    if (isAxiosError(error) && error.response) {
      const body = bodyText(error.response.data);
      logToFile('ERROR', 'Telemetry API request failed', { status: error.response.status, body });
      return new QueryExecutionFailed(
        `API request failed: ${error.response.status} - ${body}`,
        error.response.status,
        body
      );
    }
    logToFile('ERROR', 'Telemetry API network error', { error: describeError(error) });
    return error;
  }

  private mapQueryError(error: unknown): unknown {
    if (this.isTimeout(error)) {
      logToFile('WARN', 'Query timed out', { timeoutMs: this.credentials.timeoutMs });
      return new RequestTimedOut(this.credentials.timeoutMs);
    }
    if (!isAxiosError(error) || !error.response) {
      logToFile('ERROR', 'Query API network error', { error: describeError(error) });
      return error;
    }

    const status = error.response.status;
    const body = bodyText(error.response.data);
    logToFile('ERROR', 'Query API request failed', { status, body });

    if (status === 400 && body.includes('Malformed token')) {
      return new AuthenticationFailed('malformed-token', malformedTokenMessage(this.credentials));
    }
    if (status === 401 || status === 403 || body.includes('Authentication failed')) {
      return new AuthenticationFailed('rejected', rejectedCredentialsMessage(this.hasQueryCredentials));
    }
    return new QueryExecutionFailed(`Query failed: ${status} - ${body}`, status, body);
  }

  /** GET a telemetry API path such as `/sources?page=1&per_page=50`. */
  async telemetry(path: string): Promise<unknown> {
    const token = this.requireToken();
    logToFile('DEBUG', 'Telemetry request', { path });

    const response = await BetterstackClient.rateLimiter(() =>
      this.telemetryClient.get<unknown>(path, { headers: { Authorization: `Bearer ${token}` } })
    );
    return response.data;
  }

  /** POST SQL to the query endpoint and decode the JSONEachRow response. */
  async query(sql: string, queryBaseUrl?: string): Promise<LogRow[]> {
    const url = queryBaseUrl || DEFAULT_QUERY_BASE_URL;
    const { queryUsername, queryPassword } = this.credentials;
    const authorization =
      queryUsername && queryPassword
        ? `Basic ${Buffer.from(`${queryUsername}:${queryPassword}`).toString('base64')}`
        : `Bearer ${this.requireToken()}`;
    const request: AxiosRequestConfig = { headers: { Authorization: authorization } };

    logToFile('INFO', 'Executing query', { url, sql });
    const response = await BetterstackClient.rateLimiter(() =>
      this.queryClient.post<string>(url, sql, request)
    );

    const rows = decodeRows(bodyText(response.data));
    logToFile('DEBUG', 'Query response decoded', { status: response.status, rows: rows.length });
    return rows;
  }
}
