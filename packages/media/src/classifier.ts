/**
 * Audio Configuration Classifier
 *
 * Pure decision logic: probe descriptors → audio configuration → required action.
 * Layouts are identified by channel count alone (2, 6, 8); any other count is ignored.
 */

import { DEFAULT_SYNTHESIS_POLICY, type SynthesisPolicy, type SynthesisTarget } from '@tracksmith/core';
import {
  CHANNELS_51,
  CHANNELS_71,
  CHANNELS_STEREO,
  type AudioConfiguration,
  type AudioStreamDescriptor,
  type RequiredAction,
  type SourceStream,
} from './types.js';

/**
 * Summarize which layouts are present. The first occurrence in probe order
 * wins when a layout appears more than once.
 */
export function summarizeAudio(streams: readonly AudioStreamDescriptor[]): AudioConfiguration {
  const configuration: AudioConfiguration = {
    hasStereo: false,
    has51: false,
    has71: false,
  };

  for (const stream of streams) {
    switch (stream.channelCount) {
      case CHANNELS_STEREO:
        configuration.hasStereo = true;
        break;
      case CHANNELS_51:
        if (!configuration.has51) {
          configuration.has51 = true;
          configuration.first51StreamNumber = stream.streamNumber;
          configuration.first51StreamIndex = stream.streamIndex;
        }
        break;
      case CHANNELS_71:
        if (!configuration.has71) {
          configuration.has71 = true;
          configuration.first71StreamNumber = stream.streamNumber;
          configuration.first71StreamIndex = stream.streamIndex;
        }
        break;
    }
  }

  return configuration;
}

function sourceFrom(
  streamNumber: number | undefined,
  streamIndex: number | undefined,
  channelCount: number
): SourceStream | undefined {
  if (streamNumber === undefined || streamIndex === undefined) {
    return undefined;
  }
  return { streamNumber, streamIndex, channelCount };
}

/**
 * Decide the minimal action for a configuration under a policy
 */
export function decideAction(
  configuration: AudioConfiguration,
  policy: SynthesisPolicy = DEFAULT_SYNTHESIS_POLICY
): RequiredAction {
  const wantsStereo = policy === 'stereo-and-surround';

  if (configuration.has51) {
    const source = sourceFrom(configuration.first51StreamNumber, configuration.first51StreamIndex, CHANNELS_51);
    if (wantsStereo && !configuration.hasStereo && source) {
      return { kind: 'SynthesizeStereo', source, targets: ['stereo'] };
    }
    return { kind: 'AlreadyComplete' };
  }

  const source71 = sourceFrom(configuration.first71StreamNumber, configuration.first71StreamIndex, CHANNELS_71);
  if (configuration.has71 && source71) {
    const targets: SynthesisTarget[] = ['surround51'];
    if (wantsStereo && !configuration.hasStereo) {
      targets.push('stereo');
    }
    return { kind: 'SynthesizeFrom71', source: source71, targets };
  }

  return { kind: 'NoSurroundSource', hasStereo: configuration.hasStereo };
}

/**
 * Descriptors straight to an action
 */
export function classify(
  streams: readonly AudioStreamDescriptor[],
  policy: SynthesisPolicy = DEFAULT_SYNTHESIS_POLICY
): { configuration: AudioConfiguration; action: RequiredAction } {
  const configuration = summarizeAudio(streams);
  return { configuration, action: decideAction(configuration, policy) };
}

/**
 * Translate a container stream index into the audio stream number ffmpeg's
 * `0:a:<n>` selector expects. Returns undefined when no audio stream has that index.
 */
export function resolveStreamNumber(
  streams: readonly AudioStreamDescriptor[],
  streamIndex: number
): number | undefined {
  return streams.find((stream) => stream.streamIndex === streamIndex)?.streamNumber;
}

/**
 * Short label for a configuration, as shown on status lines
 */
export function describeConfiguration(configuration: AudioConfiguration): string {
  return `stereo=${configuration.hasStereo} 5.1=${configuration.has51} 7.1=${configuration.has71}`;
}
