import { it, expect } from 'vitest';

import { formatFrames } from './duration.js';

it('should format frames properly', () => {
  expect(formatFrames({ frames: 0, rate: 25 })).toBe('00:00:00.00');
  expect(formatFrames({ frames: 37, rate: 25 })).toBe('00:00:01.12');
  expect(formatFrames({ frames: -37, rate: 25 })).toBe('-00:00:01.12');
  expect(formatFrames({ frames: 90000, rate: 25 })).toBe('01:00:00.00');
  expect(formatFrames({ frames: 3059, rate: 50 })).toBe('00:01:01.09');
  expect(formatFrames({ frames: 120, rate: 120 })).toBe('00:00:01.00');
});
