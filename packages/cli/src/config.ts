import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import {
  loadConfig,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
  type CmdbenchConfig,
} from '@cmdbench/core';

/**
 * Load `.cmdbench.yaml` from the given directory, falling back to the
 * defaults when there is none. A config file that exists but is invalid
 * is reported and then ignored.
 */
export async function loadConfigOrDefault(rootDir: string): Promise<CmdbenchConfig> {
  const configResult = await loadConfig(rootDir);
  if (configResult.isOk()) return configResult.value;

  if (existsSync(join(rootDir, CONFIG_FILE_NAME))) {
    // eslint-disable-next-line no-console
    console.error(chalk.yellow(`${configResult.error.message}. Using defaults.`));
  }
  return DEFAULT_CONFIG;
}
