import { basename, extname } from 'node:path';

import type { ClipDescriptor, MediaReference, Reconstruction } from '../common/types.js';


// https://opentimelineio.readthedocs.io/en/latest/tutorials/otio-file-format-specification.html

export interface OtioRationalTime {
  OTIO_SCHEMA: 'RationalTime.1',
  rate: number,
  value: number,
}

export interface OtioTimeRange {
  OTIO_SCHEMA: 'TimeRange.1',
  duration: OtioRationalTime,
  start_time: OtioRationalTime,
}

export interface OtioExternalReference {
  OTIO_SCHEMA: 'ExternalReference.1',
  metadata: Record<string, unknown>,
  name: string,
  available_range: OtioTimeRange,
  available_image_bounds: null,
  target_url: string,
}

export interface OtioMissingReference {
  OTIO_SCHEMA: 'MissingReference.1',
  metadata: Record<string, unknown>,
  name: string,
  available_range: null,
  available_image_bounds: null,
}

export type OtioMediaReference = OtioExternalReference | OtioMissingReference;

export interface OtioClip {
  OTIO_SCHEMA: 'Clip.2',
  metadata: Record<string, unknown>,
  name: string,
  source_range: OtioTimeRange,
  effects: [],
  markers: [],
  enabled: boolean,
  media_references: { DEFAULT_MEDIA: OtioMediaReference },
  active_media_reference_key: 'DEFAULT_MEDIA',
}

export interface OtioTrack {
  OTIO_SCHEMA: 'Track.1',
  metadata: Record<string, unknown>,
  name: string,
  source_range: null,
  effects: [],
  markers: [],
  enabled: boolean,
  children: OtioClip[],
  kind: 'Video',
}

export interface OtioStack {
  OTIO_SCHEMA: 'Stack.1',
  metadata: Record<string, unknown>,
  name: string,
  source_range: null,
  effects: [],
  markers: [],
  enabled: boolean,
  children: OtioTrack[],
}

export interface OtioTimeline {
  OTIO_SCHEMA: 'Timeline.1',
  metadata: Record<string, unknown>,
  name: string,
  global_start_time: null,
  tracks: OtioStack,
}

export const defaultTrackName = 'Main Mix';

const rationalTime = (value: number, rate: number): OtioRationalTime => ({ OTIO_SCHEMA: 'RationalTime.1', rate, value });

export const timeRange = ({ startFrame, durationFrames }: { startFrame: number, durationFrames: number }, rate: number): OtioTimeRange => ({
  OTIO_SCHEMA: 'TimeRange.1',
  duration: rationalTime(durationFrames, rate),
  start_time: rationalTime(startFrame, rate),
});

export function toOtioMediaReference(mediaReference: MediaReference | null, rate: number): OtioMediaReference {
  if (mediaReference == null) {
    return {
      OTIO_SCHEMA: 'MissingReference.1',
      metadata: {},
      name: '',
      available_range: null,
      available_image_bounds: null,
    };
  }
  return {
    OTIO_SCHEMA: 'ExternalReference.1',
    metadata: {},
    name: '',
    available_range: timeRange(mediaReference.availableRange, rate),
    available_image_bounds: null,
    target_url: mediaReference.targetUrl,
  };
}

export const toOtioClip = (clip: ClipDescriptor, rate: number): OtioClip => ({
  OTIO_SCHEMA: 'Clip.2',
  metadata: {},
  name: clip.sourceName,
  source_range: timeRange(clip, rate),
  effects: [],
  markers: [],
  enabled: true,
  media_references: { DEFAULT_MEDIA: toOtioMediaReference(clip.mediaReference, rate) },
  active_media_reference_key: 'DEFAULT_MEDIA',
});

// show.drp -> show
export const timelineNameFromPath = (path: string) => basename(path, extname(path).toLowerCase() === '.drp' ? extname(path) : '');

export function buildOtioTimeline({ name, trackName = defaultTrackName, reconstruction }: {
  name: string,
  trackName?: string | undefined,
  reconstruction: Reconstruction,
}): OtioTimeline {
  const { rate, clips } = reconstruction;

  return {
    OTIO_SCHEMA: 'Timeline.1',
    metadata: {},
    name,
    global_start_time: null,
    tracks: {
      OTIO_SCHEMA: 'Stack.1',
      metadata: {},
      name: 'tracks',
      source_range: null,
      effects: [],
      markers: [],
      enabled: true,
      children: [{
        OTIO_SCHEMA: 'Track.1',
        metadata: {},
        name: trackName,
        source_range: null,
        effects: [],
        markers: [],
        enabled: true,
        children: clips.map((clip) => toOtioClip(clip, rate)),
        kind: 'Video',
      }],
    },
  };
}
