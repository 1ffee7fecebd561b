export type BsqErrorCode =
  | 'SOURCE_NOT_SPECIFIED'
  | 'SOURCE_NOT_FOUND'
  | 'INVALID_QUERY_FORMAT'
  | 'AUTHENTICATION_FAILED'
  | 'QUERY_EXECUTION_FAILED'
  | 'REQUEST_TIMED_OUT'
  | 'JQ_INTEGRATION_ERROR'
  | 'CONFIG_LOAD_FAILED'
  | 'INVALID_OPTION';

/**
 * Base class for every failure the CLI reports to the user.
 * `code` is stable and safe to match on; `message` is what gets printed.
 */
export class BsqError extends Error {
  readonly code: BsqErrorCode;

  constructor(code: BsqErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class SourceNotSpecified extends BsqError {
  constructor() {
    super(
      'SOURCE_NOT_SPECIFIED',
      'No source specified. Use --source or set a default source with: bsq config source <name>'
    );
  }
}

export class SourceNotFound extends BsqError {
  readonly sourceName: string;

  constructor(sourceName: string) {
    super('SOURCE_NOT_FOUND', `Source not found: ${sourceName}`);
    this.sourceName = sourceName;
  }
}

export class InvalidQueryFormat extends BsqError {
  constructor(message = 'Invalid query format. Expected: { logs(...) { ... } }') {
    super('INVALID_QUERY_FORMAT', message);
  }
}

export type AuthenticationFailureReason = 'missing-token' | 'malformed-token' | 'rejected';

export class AuthenticationFailed extends BsqError {
  readonly reason: AuthenticationFailureReason;

  constructor(reason: AuthenticationFailureReason, message: string) {
    super('AUTHENTICATION_FAILED', message);
    this.reason = reason;
  }
}

export class QueryExecutionFailed extends BsqError {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, status?: number, body?: string) {
    super('QUERY_EXECUTION_FAILED', message);
    this.status = status;
    this.body = body;
  }
}

export class RequestTimedOut extends BsqError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('REQUEST_TIMED_OUT', `Query timed out after ${Math.round(timeoutMs / 1000)} seconds`);
    this.timeoutMs = timeoutMs;
  }
}

export class JqIntegrationError extends BsqError {
  constructor(message: string) {
    super('JQ_INTEGRATION_ERROR', message);
  }
}

export class ConfigLoadFailed extends BsqError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(
      'CONFIG_LOAD_FAILED',
      `Failed to load config from ${filePath}, using defaults: ${describeError(cause)}`
    );
    this.filePath = filePath;
  }
}

/** A command-line argument or config value that fails validation. */
export class InvalidOption extends BsqError {
  constructor(message: string) {
    super('INVALID_OPTION', message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
