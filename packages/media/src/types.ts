/**
 * Media Types
 *
 * Two numbering spaces are in play and must never be mixed up:
 * - streamIndex: position in the container's full stream list (ffprobe "index")
 * - streamNumber: 0-based position among streams of one type, which is what
 *   ffmpeg's `-map 0:a:<n>` / `-map 0:s:<n>` selectors address
 */

import type { SynthesisTarget } from '@tracksmith/core';

export type StreamType = 'audio' | 'subtitle';

export interface StreamDescriptor {
  type: StreamType;
  streamIndex: number;
  streamNumber: number;
  codecName: string;
}

export interface AudioStreamDescriptor extends StreamDescriptor {
  type: 'audio';
  channelCount: number;
}

/**
 * Output mode used to read ffprobe results.
 * `auto` prefers JSON and falls back to the key=value text writer.
 */
export type ProbeFormat = 'auto' | 'json' | 'plain';

export const CHANNELS_STEREO = 2;
export const CHANNELS_51 = 6;
export const CHANNELS_71 = 8;

export interface AudioConfiguration {
  hasStereo: boolean;
  has51: boolean;
  has71: boolean;
  /** Defined iff has71 */
  first71StreamNumber?: number;
  first71StreamIndex?: number;
  /** Defined iff has51 */
  first51StreamNumber?: number;
  first51StreamIndex?: number;
}

/**
 * The stream a new track is derived from
 */
export interface SourceStream {
  streamNumber: number;
  streamIndex: number;
  channelCount: number;
}

export type RequiredAction =
  | { kind: 'AlreadyComplete' }
  | { kind: 'NoSurroundSource'; hasStereo: boolean }
  | { kind: 'SynthesizeFrom71'; source: SourceStream; targets: SynthesisTarget[] }
  | { kind: 'SynthesizeStereo'; source: SourceStream; targets: ['stereo'] };

export type RequiredActionKind = RequiredAction['kind'];

export type SynthesizeAction = Extract<RequiredAction, { kind: 'SynthesizeFrom71' | 'SynthesizeStereo' }>;
