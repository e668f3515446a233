import { once } from 'node:events';
import { createReadStream } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import type { Readable } from 'node:stream';

import type { OutputFormat, Reconstruction } from '../common/types.js';
import { readDrp } from './drpParser.js';
import { formatCsvFrames, formatCsvHuman, formatOtio } from './edlFormats.js';
import logger from './logger.js';
import { buildOtioTimeline, timelineNameFromPath } from './otio.js';
import type { OtioTimeline } from './otio.js';
import { reconstruct } from './reconstruct.js';


export async function convert(input: Readable) {
  const { header, events } = await readDrp(input);
  return reconstruct(header, events);
}

export async function convertDrpFile(path: string, { trackName }: { trackName?: string | undefined } = {}) {
  logger.info('Converting %s', path);
  const input = createReadStream(path);
  // open errors (ENOENT etc.) surface here rather than inside the line iterator
  await once(input, 'open');
  const reconstruction = await convert(input);
  const timeline = buildOtioTimeline({ name: timelineNameFromPath(path), trackName, reconstruction });
  return { reconstruction, timeline };
}

const outputExtensions: Record<OutputFormat, string> = {
  otio: 'otio',
  'csv-frames': 'csv',
  'csv-human': 'csv',
};

export const getDefaultOutPath = (inputPath: string, format: OutputFormat) => join(dirname(inputPath), `${basename(inputPath, extname(inputPath))}.${outputExtensions[format]}`);

export function formatTimeline({ format, reconstruction, timeline }: {
  format: OutputFormat,
  reconstruction: Reconstruction,
  timeline: OtioTimeline,
}) {
  if (format === 'csv-frames') return formatCsvFrames(reconstruction.clips);
  if (format === 'csv-human') return formatCsvHuman(reconstruction.clips, reconstruction.rate);
  return formatOtio(timeline);
}

export async function writeTimeline({ path, ...rest }: {
  path: string,
  format: OutputFormat,
  reconstruction: Reconstruction,
  timeline: OtioTimeline,
}) {
  logger.info('Saving %s %s', rest.format, path);
  await writeFile(path, formatTimeline(rest));
}
