import os from 'os';
import path from 'path';

/**
 * Directory holding config.json and debug.log.
 * BSQ_CONFIG_DIR overrides the default of ~/.bsq.
 */
export function getConfigDir(): string {
  const override = process.env.BSQ_CONFIG_DIR;
  if (override && override.trim()) {
    return path.resolve(override.trim());
  }
  return path.join(os.homedir(), '.bsq');
}

export function getConfigFilePath(): string {
  return path.join(getConfigDir(), 'config.json');
}

export function getLogFilePath(): string {
  const override = process.env.BSQ_LOG_FILE;
  if (override && override.trim()) {
    return path.resolve(override.trim());
  }
  return path.join(getConfigDir(), 'debug.log');
}
