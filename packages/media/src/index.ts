/**
 * @tracksmith/media
 *
 * Media analysis layer.
 *
 * Responsibilities:
 * - Probe files with ffprobe (JSON writer, key=value text writer as fallback)
 * - Describe audio and subtitle streams in both numbering spaces
 * - Classify a file's audio configuration and decide what to synthesize
 */

// Probing
export {
  FFProbe,
  ProbeOutputError,
  parseJsonStreams,
  parsePlainStreams,
  parseDuration,
  toAudioDescriptors,
  toStreamDescriptors,
  type StreamProber,
  type FFProbeOptions,
  type RawStreamEntry,
} from './probes/ffprobe.js';

// Classification
export {
  summarizeAudio,
  decideAction,
  classify,
  resolveStreamNumber,
  describeConfiguration,
} from './classifier.js';

// Types
export {
  CHANNELS_STEREO,
  CHANNELS_51,
  CHANNELS_71,
} from './types.js';

export type {
  StreamType,
  StreamDescriptor,
  AudioStreamDescriptor,
  ProbeFormat,
  AudioConfiguration,
  SourceStream,
  RequiredAction,
  RequiredActionKind,
  SynthesizeAction,
} from './types.js';
