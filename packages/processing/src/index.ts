/**
 * @tracksmith/processing
 *
 * Audio synthesis and muxing layer.
 *
 * CRITICAL RULES:
 * - NEVER re-encode video or existing audio
 * - Always preserve metadata and chapters
 * - Never write the source path except through the final atomic replace
 * - Log every FFmpeg command executed
 */

// FFmpeg wrapper
export {
  FFmpeg,
  FFMPEG_GLOBAL_ARGS,
  type FFmpegOptions,
  type FFmpegRunOptions,
  type FFmpegRunResult,
} from './ffmpeg.js';

export { FFmpegProgressParser, type FFmpegProgress } from './progressParser.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  type StreamMapping,
  type StreamCodec,
} from './commandBuilder.js';

// Downmix presets
export {
  DOWNMIX_PRESETS,
  TARGET_ORDER,
  PAN_71_TO_51,
  PAN_71_TO_STEREO,
  PAN_51_TO_STEREO,
  getDownmixFilter,
  sortTargets,
  type DownmixPreset,
} from './presets.js';

// Synthesis and merge
export {
  DownmixSynthesizer,
  buildSynthesisCommand,
  type SynthesizeOptions,
  type SynthesizeResult,
} from './synthesizer.js';

export {
  TrackMerger,
  buildMergeCommand,
  type MergeOptions,
  type MergeResult,
  type MergeLayout,
} from './muxer.js';

// Safety transaction
export {
  SafetyTransaction,
  planTransformJob,
  BACKUP_SUFFIX,
  PARTIAL_SUFFIX,
  type TransactionDependencies,
  type TransactionResult,
} from './transaction.js';

// Per-file pipeline
export {
  FileProcessor,
  SKIP_REASONS,
  type FileProcessorDependencies,
  type ProcessContext,
} from './fileProcessor.js';

// Types
export type {
  SynthesizedTrack,
  TransformJob,
  TransformStage,
  PipelineEvent,
  PipelineObserver,
} from './types.js';
