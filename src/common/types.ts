import { z } from 'zod';


export const drpSourceSchema = z.object({
  _index_: z.number().int().nonnegative(),
  name: z.string(),
  file: z.string().optional(),
}).passthrough();

export type DrpSource = z.infer<typeof drpSourceSchema>

export const mixEffectBlockSchema = z.object({
  source: z.number().int().nonnegative().optional(),
}).passthrough();

export type MixEffectBlock = z.infer<typeof mixEffectBlockSchema>

// mixEffectBlocks is left loose on the header: a bad initial source falls back to index 0
export const drpHeaderSchema = z.object({
  masterTimecode: z.string(),
  videoMode: z.string(),
  sources: drpSourceSchema.array().nullish(),
  mixEffectBlocks: z.unknown().optional(),
}).passthrough();

export type DrpHeader = z.infer<typeof drpHeaderSchema>

export const initialMixEffectBlocksSchema = z.object({
  source: z.number().int().nonnegative(),
}).passthrough().array().nonempty();

export const drpEventSchema = z.object({
  masterTimecode: z.string(),
  mixEffectBlocks: mixEffectBlockSchema.array().optional(),
}).passthrough();

export type DrpEvent = z.infer<typeof drpEventSchema>

export interface DrpLog {
  header: DrpHeader,
  events: DrpEvent[],
}

export interface FrameRange {
  startFrame: number,
  durationFrames: number,
}

export interface MediaReference {
  targetUrl: string,
  /** Spans the whole show, not the real length of the file. */
  availableRange: FrameRange,
}

export interface ClipDescriptor extends FrameRange {
  sourceIndex: number,
  sourceName: string,
  mediaReference: MediaReference | null,
}

export interface InitialSource {
  index: number,
  defaulted: boolean,
}

export interface Reconstruction {
  rate: number,
  referenceFrame: number,
  totalFrames: number,
  initialSource: InitialSource,
  clips: ClipDescriptor[],
}

export const outputFormats = ['otio', 'csv-frames', 'csv-human'] as const;
export type OutputFormat = typeof outputFormats[number];

export const logLevels = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = typeof logLevels[number];

export const configSchema = z.object({
  trackName: z.string().min(1).default('Main Mix'),
  format: z.enum(outputFormats).default('otio'),
  logLevel: z.enum(logLevels).default('info'),
  logFile: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>
