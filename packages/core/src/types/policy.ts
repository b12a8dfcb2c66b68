/**
 * Which audio layouts a file must end up with.
 *
 * - surround-only: make sure a 5.1 track exists; synthesize it from 7.1 when missing
 * - stereo-and-surround: additionally make sure a stereo track exists,
 *   synthesized from the widest available layout when missing
 */
export const SYNTHESIS_POLICIES = ['surround-only', 'stereo-and-surround'] as const;

export type SynthesisPolicy = typeof SYNTHESIS_POLICIES[number];

export const DEFAULT_SYNTHESIS_POLICY: SynthesisPolicy = 'surround-only';

/**
 * Output layouts the synthesizer can produce
 */
export type SynthesisTarget = 'surround51' | 'stereo';
