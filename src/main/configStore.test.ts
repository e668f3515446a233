import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { defaultConfig, defaultConfigFileName, loadConfig, mergeConfig } from './configStore.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'drp-timeline-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses defaults without a config file', async () => {
    expect(await loadConfig({ cwd: dir })).toEqual({ trackName: 'Main Mix', format: 'otio', logLevel: 'info' });
  });

  it('reads the default file as JSON5', async () => {
    await writeFile(join(dir, defaultConfigFileName), `{
  // edit bay wants frames
  format: 'csv-frames',
  trackName: 'Program',
}
`);
    expect(await loadConfig({ cwd: dir })).toEqual({ trackName: 'Program', format: 'csv-frames', logLevel: 'info' });
  });

  it('rejects unknown formats', async () => {
    const configPath = join(dir, 'custom.json5');
    await writeFile(configPath, '{ format: "aaf" }');
    await expect(loadConfig({ configPath })).rejects.toThrow(ConfigError);
  });

  it('rejects broken JSON5', async () => {
    const configPath = join(dir, 'custom.json5');
    await writeFile(configPath, '{ format: ');
    await expect(loadConfig({ configPath })).rejects.toThrow(ConfigError);
  });

  it('requires an explicitly given file to exist', async () => {
    await expect(loadConfig({ configPath: join(dir, 'missing.json5') })).rejects.toThrow('Config file not found');
  });
});

describe('mergeConfig', () => {
  it('only overrides given values', () => {
    expect(mergeConfig(defaultConfig, { format: 'csv-human', trackName: undefined, logFile: undefined })).toEqual({
      trackName: 'Main Mix',
      format: 'csv-human',
      logLevel: 'info',
    });
  });
});
