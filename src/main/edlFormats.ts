import { stringify as csvStringify } from 'csv-stringify/sync';

import type { ClipDescriptor } from '../common/types.js';
import { formatFrames } from '../util/duration.js';
import type { OtioTimeline } from './otio.js';


// OTIO's own serializer indents with 4 spaces
export const formatOtio = (timeline: OtioTimeline) => `${JSON.stringify(timeline, null, 4)}\n`;

export const getClipEndFrame = ({ startFrame, durationFrames }: ClipDescriptor) => startFrame + durationFrames;

export function formatCsvFrames(clips: ClipDescriptor[]) {
  const rows = clips.map((clip) => [clip.startFrame, getClipEndFrame(clip), clip.sourceName]);
  return csvStringify(rows);
}

export function formatClipsTimes(clips: ClipDescriptor[], rate: number) {
  return clips.map((clip) => [
    formatFrames({ frames: clip.startFrame, rate }),
    formatFrames({ frames: getClipEndFrame(clip), rate }),
    clip.sourceName,
  ]);
}

export const formatCsvHuman = (clips: ClipDescriptor[], rate: number) => csvStringify(formatClipsTimes(clips, rate));
