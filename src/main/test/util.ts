import fs from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const getFixturePath = (name: string) => join(__dirname, 'fixtures', name);

export const readFixture = async (name: string, encoding: BufferEncoding = 'utf8') => fs.readFile(getFixturePath(name), encoding);
