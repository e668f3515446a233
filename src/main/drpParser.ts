import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { ZodError } from 'zod';

import { drpEventSchema, drpHeaderSchema } from '../common/types.js';
import type { DrpEvent, DrpHeader, DrpLog } from '../common/types.js';
import { MalformedEventError, MalformedHeaderError } from './errors.js';
import i18n from './i18n.js';
import logger from './logger.js';


// .trim() also removes a UTF-8 BOM, which JSON.parse would reject
const trimBom = (text: string) => text.trim();

const formatZodError = (err: ZodError) => err.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'record'}: ${issue.message}`).join(', ');

function decodeJson(text: string): { ok: true, value: unknown } | { ok: false, reason: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

export function parseHeaderLine(line: string): DrpHeader {
  const text = trimBom(line);
  if (text === '') throw new MalformedHeaderError(i18n.t('Header line is empty'));

  const decoded = decodeJson(text);
  if (!decoded.ok) throw new MalformedHeaderError(decoded.reason);

  const parsed = drpHeaderSchema.safeParse(decoded.value);
  if (!parsed.success) throw new MalformedHeaderError(formatZodError(parsed.error));
  return parsed.data;
}

export function parseEventLine(line: string, lineNumber: number): DrpEvent {
  const decoded = decodeJson(line.trim());
  if (!decoded.ok) throw new MalformedEventError(lineNumber, decoded.reason);

  const parsed = drpEventSchema.safeParse(decoded.value);
  if (!parsed.success) throw new MalformedEventError(lineNumber, formatZodError(parsed.error));
  return parsed.data;
}

/**
 * Accumulates lines in file order: the first one is the header, every following
 * non-blank line is one switch event.
 */
function createDrpLineReader() {
  let header: DrpHeader | undefined;
  const events: DrpEvent[] = [];
  let lineNumber = 0;

  return {
    push(line: string) {
      lineNumber += 1;
      if (lineNumber === 1) {
        header = parseHeaderLine(line);
      } else if (line.trim() !== '') {
        events.push(parseEventLine(line, lineNumber));
      }
    },
    finish(): DrpLog {
      if (header == null) throw new MalformedHeaderError(i18n.t('File is empty'));
      logger.debug('Parsed switcher log header and %d switch events', events.length);
      return { header, events };
    },
  };
}

export function parseDrpLines(lines: Iterable<string>) {
  const reader = createDrpLineReader();
  for (const line of lines) reader.push(line);
  return reader.finish();
}

export const parseDrp = (text: string) => parseDrpLines(text.split(/\r?\n/));

/**
 * Reads a switcher log from a stream. The stream is destroyed when this returns or throws.
 */
export async function readDrp(input: Readable) {
  const rl = createInterface({ input, crlfDelay: Infinity });
  try {
    const reader = createDrpLineReader();
    for await (const line of rl) reader.push(line);
    return reader.finish();
  } finally {
    rl.close();
    input.destroy();
  }
}
