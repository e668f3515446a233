export * from '../common/types.js';

export { parseDrp, parseDrpLines, parseHeaderLine, parseEventLine, readDrp } from './drpParser.js';

export { reconstruct, tryReconstruct, stepReconstruction, createShowContext, resolveInitialSource, buildCatalogue, getSwitchSource } from './reconstruct.js';
export type { CatalogueEntry, ShowContext, ReconstructionState, ReconstructResult } from './reconstruct.js';

export { parseVideoMode, timecodeToFrames } from './timecode.js';

export { buildOtioTimeline, timelineNameFromPath, defaultTrackName } from './otio.js';
export type { OtioTimeline, OtioTrack, OtioClip, OtioMediaReference } from './otio.js';

export { formatOtio, formatCsvFrames, formatCsvHuman } from './edlFormats.js';

export { convert, convertDrpFile, formatTimeline, writeTimeline, getDefaultOutPath } from './convert.js';

export { loadConfig } from './configStore.js';

export * from './errors.js';

export { default as logger, configureLogger } from './logger.js';
