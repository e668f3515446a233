import JSON5 from 'json5';
import { pathExists } from 'fs-extra/esm';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { configSchema } from '../common/types.js';
import type { Config } from '../common/types.js';
import { ConfigError } from './errors.js';
import i18n from './i18n.js';
import logger from './logger.js';


export const defaultConfigFileName = 'drp-timeline.config.json5';

export const defaultConfig: Config = configSchema.parse({});

/**
 * Loads the JSON5 config file. Without an explicit path, a missing default file means defaults.
 */
export async function loadConfig({ configPath, cwd = process.cwd() }: {
  configPath?: string | undefined,
  cwd?: string | undefined,
} = {}): Promise<Config> {
  const path = configPath ?? join(cwd, defaultConfigFileName);

  if (!(await pathExists(path))) {
    if (configPath != null) throw new ConfigError(`${i18n.t('Config file not found')}: ${configPath}`);
    return defaultConfig;
  }

  let json: unknown;
  try {
    json = JSON5.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new ConfigError(`${i18n.t('Unable to read config file')} ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = configSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`${i18n.t('Invalid config file')} ${path}: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')}`);
  }

  logger.debug('Loaded config from %s', path);
  return parsed.data;
}

// CLI flags win over the file, but only when they were actually given
export function mergeConfig(config: Config, overrides: Partial<Config>): Config {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value != null));
  return configSchema.parse({ ...config, ...defined });
}
