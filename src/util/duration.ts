import padStart from 'lodash/padStart.js';


const pad2 = (n: number) => padStart(String(n), 2, '0');

/**
 * Formats a frame count as `HH:MM:SS.ff`.
 */
export function formatFrames({ frames: framesIn, rate }: { frames: number, rate: number }) {
  const sign = framesIn < 0 ? '-' : '';
  const totalFrames = Math.round(Math.abs(framesIn));

  const totalSeconds = Math.floor(totalFrames / rate);
  const remainder = totalFrames % rate;
  const seconds = totalSeconds % 60;
  const minutes = Math.floor(totalSeconds / 60) % 60;
  const hours = Math.floor(totalSeconds / 60 / 60);

  return `${sign}${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}.${pad2(remainder)}`;
}
