import invariant from 'tiny-invariant';

import { initialMixEffectBlocksSchema } from '../common/types.js';
import type { ClipDescriptor, DrpEvent, DrpHeader, DrpSource, FrameRange, InitialSource, MediaReference, Reconstruction } from '../common/types.js';
import { DrpFormatError, MissingSourcesError, NoEventsError, UnknownSourceError } from './errors.js';
import logger from './logger.js';
import { parseVideoMode, timecodeToFrames } from './timecode.js';


export interface CatalogueEntry {
  index: number,
  name: string,
  mediaReference: MediaReference | null,
}

export interface ShowContext {
  rate: number,
  /** Frame count of the header timecode, the show's time zero */
  referenceFrame: number,
  totalFrames: number,
  catalogue: ReadonlyMap<number, CatalogueEntry>,
}

export interface ReconstructionState {
  /** Relative to referenceFrame */
  currentFrame: number,
  activeSourceIndex: number,
  ended: boolean,
}

export type ReconstructResult = { ok: true, value: Reconstruction } | { ok: false, error: DrpFormatError };

export function resolveInitialSource(header: DrpHeader): InitialSource {
  const parsed = initialMixEffectBlocksSchema.safeParse(header.mixEffectBlocks);
  if (parsed.success) return { index: parsed.data[0].source, defaulted: false };
  return { index: 0, defaulted: true };
}

// An event without a source ends the show
export const getSwitchSource = (event: DrpEvent) => event.mixEffectBlocks?.[0]?.source;

export function buildCatalogue(sources: DrpSource[], availableRange: FrameRange) {
  const catalogue = new Map<number, CatalogueEntry>();
  sources.forEach((source) => {
    catalogue.set(source._index_, {
      index: source._index_,
      name: source.name,
      // every file gets the same range, we have no way of knowing the real file length
      mediaReference: source.file != null ? { targetUrl: source.file, availableRange } : null,
    });
  });
  return catalogue;
}

export function createShowContext(header: DrpHeader, events: DrpEvent[]): ShowContext {
  const rate = parseVideoMode(header.videoMode);
  const { sources } = header;
  if (sources == null || sources.length === 0) throw new MissingSourcesError();

  const referenceFrame = timecodeToFrames(header.masterTimecode, rate);

  const lastEvent = events.at(-1);
  if (lastEvent == null) throw new NoEventsError();
  const totalFrames = timecodeToFrames(lastEvent.masterTimecode, rate) - referenceFrame;

  const catalogue = buildCatalogue(sources, { startFrame: 0, durationFrames: totalFrames });
  return { rate, referenceFrame, totalFrames, catalogue };
}

/**
 * Closes the clip that was on air until `event`, then applies the event's switch.
 */
export function stepReconstruction(context: ShowContext, state: ReconstructionState, event: DrpEvent) {
  invariant(!state.ended, 'Show has already ended');

  const eventFrame = timecodeToFrames(event.masterTimecode, context.rate) - context.referenceFrame;
  const durationFrames = eventFrame - state.currentFrame;

  const source = context.catalogue.get(state.activeSourceIndex);
  if (source == null) throw new UnknownSourceError(state.activeSourceIndex);

  const clip: ClipDescriptor = {
    sourceIndex: source.index,
    sourceName: source.name,
    mediaReference: source.mediaReference,
    startFrame: state.currentFrame,
    durationFrames,
  };

  const nextSourceIndex = getSwitchSource(event);
  const nextState: ReconstructionState = {
    currentFrame: state.currentFrame + durationFrames,
    activeSourceIndex: nextSourceIndex ?? state.activeSourceIndex,
    ended: nextSourceIndex == null,
  };

  return { state: nextState, clip };
}

export function reconstruct(header: DrpHeader, events: DrpEvent[]): Reconstruction {
  const context = createShowContext(header, events);

  const initialSource = resolveInitialSource(header);
  if (initialSource.defaulted) logger.debug('No valid initial source in header, starting on source %d', initialSource.index);

  const initialState: ReconstructionState = { currentFrame: 0, activeSourceIndex: initialSource.index, ended: false };

  const { clips } = events.reduce<{ state: ReconstructionState, clips: ClipDescriptor[] }>((acc, event) => {
    // events after the end of the show are never read
    if (acc.state.ended) return acc;
    const { state, clip } = stepReconstruction(context, acc.state, event);
    logger.debug('Clip %s from frame %d, %d frames', clip.sourceName, clip.startFrame, clip.durationFrames);
    acc.clips.push(clip);
    return { state, clips: acc.clips };
  }, { state: initialState, clips: [] });

  return {
    rate: context.rate,
    referenceFrame: context.referenceFrame,
    totalFrames: context.totalFrames,
    initialSource,
    clips,
  };
}

export function tryReconstruct(header: DrpHeader, events: DrpEvent[]): ReconstructResult {
  try {
    return { ok: true, value: reconstruct(header, events) };
  } catch (err) {
    if (err instanceof DrpFormatError) return { ok: false, error: err };
    throw err;
  }
}
