/**
 * Downmix Presets
 *
 * Fixed output encodings and explicit pan graphs for every layout this tool
 * can add. Pan graphs name each output channel's inputs so it is always clear
 * which source channels are kept, mixed or dropped.
 */

import type { SynthesisTarget } from '@tracksmith/core';
import { CHANNELS_51, CHANNELS_71 } from '@tracksmith/media';

export interface DownmixPreset {
  target: SynthesisTarget;
  label: string;
  channels: number;
  codec: 'ac3';
  bitrate: string;
  extension: string;
}

export const DOWNMIX_PRESETS: Readonly<Record<SynthesisTarget, DownmixPreset>> = {
  surround51: {
    target: 'surround51',
    label: '5.1',
    channels: 6,
    codec: 'ac3',
    bitrate: '640k',
    extension: 'ac3',
  },
  stereo: {
    target: 'stereo',
    label: 'stereo',
    channels: 2,
    codec: 'ac3',
    bitrate: '192k',
    extension: 'ac3',
  },
};

/**
 * Order new tracks are appended in
 */
export const TARGET_ORDER: readonly SynthesisTarget[] = ['surround51', 'stereo'];

/**
 * 7.1 → 5.1: keep FL FR FC LFE BL BR, drop SL SR (not folded into the rears)
 */
export const PAN_71_TO_51 = 'pan=5.1|FL=FL|FR=FR|FC=FC|LFE=LFE|BL=BL|BR=BR';

/**
 * 7.1 → stereo: centre, rears and sides folded in at -3 dB, LFE dropped
 */
export const PAN_71_TO_STEREO =
  'pan=stereo|FL=FL+0.707*FC+0.707*BL+0.707*SL|FR=FR+0.707*FC+0.707*BR+0.707*SR';

/**
 * 5.1 → stereo by channel position, so both 5.1 (BL/BR) and 5.1(side) (SL/SR)
 * sources work: c0 FL, c1 FR, c2 FC, c3 LFE, c4 left surround, c5 right surround
 */
export const PAN_51_TO_STEREO =
  'pan=stereo|c0=c0+0.707*c2+0.707*c4|c1=c1+0.707*c2+0.707*c5';

/**
 * Pan graph for producing `target` from a source with `sourceChannels` channels
 */
export function getDownmixFilter(target: SynthesisTarget, sourceChannels: number): string {
  if (target === 'surround51' && sourceChannels === CHANNELS_71) {
    return PAN_71_TO_51;
  }
  if (target === 'stereo' && sourceChannels === CHANNELS_71) {
    return PAN_71_TO_STEREO;
  }
  if (target === 'stereo' && sourceChannels === CHANNELS_51) {
    return PAN_51_TO_STEREO;
  }
  throw new Error(`No downmix from ${sourceChannels} channels to ${DOWNMIX_PRESETS[target].label}`);
}

export function sortTargets(targets: readonly SynthesisTarget[]): SynthesisTarget[] {
  return TARGET_ORDER.filter((target) => targets.includes(target));
}
