import { spawn } from 'child_process';
import { JqIntegrationError, describeError } from '../errors.js';
import { createLogger } from './logging.js';

const logToFile = createLogger('JQ');

export interface JqResult {
  status: number;
  stdout: string;
  stderr: string;
}

export type JqRunner = (filter: string, payload: string) => Promise<JqResult>;

/** Runs `jq <filter>` with the payload on stdin. */
export const spawnJq: JqRunner = (filter, payload) =>
  new Promise((resolve, reject) => {
    const child = spawn('jq', [filter], { stdio: ['pipe', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      reject(new JqIntegrationError(error.code === 'ENOENT' ? 'jq not found in PATH' : error.message));
    });
    child.on('close', (code) => {
      resolve({ status: code ?? 1, stdout, stderr });
    });

    // jq may exit before reading all of stdin (bad filter); the exit status reports that case
    child.stdin.on('error', (error) => {
      logToFile('DEBUG', 'jq stdin closed early', { error: error.message });
    });
    child.stdin.end(payload);
  });

export interface JqOutcome {
  output: string;
  warning?: string;
}

/**
 * Filters a JSON payload through jq. On a missing binary or a non-zero exit
 * the payload itself is returned, with a warning for stderr.
 */
export async function filterThroughJq(filter: string, payload: string, runner: JqRunner = spawnJq): Promise<JqOutcome> {
  let result: JqResult;
  try {
    result = await runner(filter, payload);
  } catch (error) {
    logToFile('WARN', 'jq failed to run', { filter, error: describeError(error) });
    const warning =
      error instanceof JqIntegrationError
        ? `jq execution failed: ${error.message}`
        : `jq integration error: ${describeError(error)}`;
    return { output: payload, warning };
  }

  if (result.status !== 0) {
    const stderr = result.stderr.trim();
    return {
      output: payload,
      warning: stderr ? `jq exited with status ${result.status}: ${stderr}` : `jq exited with status ${result.status}`
    };
  }

  return { output: result.stdout.endsWith('\n') ? result.stdout.slice(0, -1) : result.stdout };
}
