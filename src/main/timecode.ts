import Timecode from 'smpte-timecode';
import type { FRAMERATE } from 'smpte-timecode';

import { InvalidTimecodeError, UnsupportedVideoModeError } from './errors.js';


/**
 * Video modes look like `1080p25`: the number after `p` is the frame rate.
 */
export function parseVideoMode(videoMode: string) {
  const match = videoMode.match(/^(\d+)p(\d+)$/);
  if (!match || match[2] == null) throw new UnsupportedVideoModeError(videoMode);
  const rate = parseInt(match[2], 10);
  if (rate === 0) throw new UnsupportedVideoModeError(videoMode);
  return rate;
}

export function timecodeToFrames(timecode: string, rate: number) {
  try {
    // the library counts any whole rate, its typings only list the common ones
    const t = Timecode(timecode, rate as FRAMERATE);
    return (((t.hours * 60) + t.minutes) * 60 + t.seconds) * rate + t.frames;
  } catch (err) {
    throw new InvalidTimecodeError(timecode, err instanceof Error ? err.message : String(err));
  }
}
