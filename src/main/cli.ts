#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import sumBy from 'lodash/sumBy.js';

import { logLevels, outputFormats } from '../common/types.js';
import { formatFrames } from '../util/duration.js';
import { loadConfig, mergeConfig } from './configStore.js';
import { convertDrpFile, getDefaultOutPath, writeTimeline } from './convert.js';
import { ConfigError, DrpFormatError } from './errors.js';
import i18n from './i18n.js';
import logger, { configureLogger } from './logger.js';


const args = yargs(hideBin(process.argv))
  .scriptName('drp-timeline')
  .usage('$0 <input.drp> [options]\n\nConvert a switcher .drp log into a single-track edit timeline')
  .option('out', {
    alias: 'o',
    type: 'string',
    describe: 'Output file, defaults to the input path with the extension of the format',
  })
  .option('format', {
    alias: 'f',
    choices: outputFormats,
    describe: 'Output format',
  })
  .option('track-name', {
    type: 'string',
    describe: 'Name of the video track',
  })
  .option('config', {
    type: 'string',
    describe: 'JSON5 config file',
  })
  .option('log-level', {
    choices: logLevels,
  })
  .option('log-file', {
    type: 'string',
  })
  .demandCommand(1)
  .strictOptions()
  .parseSync();

async function main() {
  const [input] = args._;
  if (input == null) throw new Error('Please provide a .drp file');
  const inputPath = String(input);

  const config = mergeConfig(await loadConfig({ configPath: args.config }), {
    format: args.format,
    trackName: args.trackName,
    logLevel: args.logLevel,
    logFile: args.logFile,
  });
  configureLogger({ level: config.logLevel, logFile: config.logFile });

  const { reconstruction, timeline } = await convertDrpFile(inputPath, { trackName: config.trackName });
  const { clips, rate } = reconstruction;

  clips.forEach((clip) => {
    logger.info('%s  %s  %s', formatFrames({ frames: clip.startFrame, rate }), formatFrames({ frames: clip.durationFrames, rate }), clip.sourceName);
  });

  const outPath = args.out ?? getDefaultOutPath(inputPath, config.format);
  await writeTimeline({ path: outPath, format: config.format, reconstruction, timeline });

  logger.info('%d clips, %s at %d fps', clips.length, formatFrames({ frames: sumBy(clips, (clip) => clip.durationFrames), rate }), rate);
}

try {
  await main();
} catch (err) {
  if (err instanceof DrpFormatError || err instanceof ConfigError) {
    logger.error('%s: %s', i18n.t('Conversion failed'), err.message);
  } else {
    logger.error('%s', err instanceof Error ? err.stack : String(err));
  }
  process.exitCode = 1;
}
