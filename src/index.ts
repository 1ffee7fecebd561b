#!/usr/bin/env node

import { run } from './cli.js';
import { createContext } from './commands/context.js';
import { createLogger } from './utils/logging.js';

const logToFile = createLogger('MAIN');

const controller = new AbortController();
process.once('SIGINT', () => {
  logToFile('INFO', 'Interrupted, stopping');
  controller.abort();
});

try {
  process.exitCode = await run(process.argv.slice(2), createContext(controller.signal));
} catch (error) {
  logToFile('ERROR', 'Unhandled failure', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined
  });
  console.error('Fatal error:', error);
  process.exitCode = 1;
}
