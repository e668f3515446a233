import { expect, it } from 'vitest';

import { DrpFormatError, formatCsvFrames, parseDrp, reconstruct } from './index.js';

it('exposes parsing, reconstruction and formatting', () => {
  const { header, events } = parseDrp([
    '{"masterTimecode":"00:00:00:00","videoMode":"1080p25","sources":[{"_index_":0,"name":"Wide"},{"_index_":1,"name":"Close"}]}',
    '{"masterTimecode":"00:00:02:00","mixEffectBlocks":[{"source":1}]}',
    '{"masterTimecode":"00:00:03:00","mixEffectBlocks":[{}]}',
  ].join('\n'));
  expect(formatCsvFrames(reconstruct(header, events).clips)).toBe('0,50,Wide\n50,75,Close\n');
});

it('fatal errors share a base class', () => {
  expect(() => reconstruct({ masterTimecode: '00:00:00:00', videoMode: '1080p25' }, [])).toThrow(DrpFormatError);
});
