import { writeFile } from 'node:fs/promises';
import { vi } from 'vitest';
import type { CommandRunner } from '@tracksmith/utils';
import type { AudioStreamDescriptor, StreamDescriptor, StreamProber } from '@tracksmith/media';

export function audioStream(streamIndex: number, streamNumber: number, channelCount: number): AudioStreamDescriptor {
    return { type: 'audio', streamIndex, streamNumber, codecName: 'dts', channelCount };
}

export function subtitleStream(streamIndex: number, streamNumber: number): StreamDescriptor {
    return { type: 'subtitle', streamIndex, streamNumber, codecName: 'subrip' };
}

/**
 * Prober that answers from fixed lists; `audio` can be swapped between calls
 */
export class FakeProber implements StreamProber {
    audio: AudioStreamDescriptor[];
    subtitles: StreamDescriptor[];
    durationMs: number | undefined;
    audioCalls = 0;

    constructor(audio: AudioStreamDescriptor[], subtitles: StreamDescriptor[] = []) {
        this.audio = audio;
        this.subtitles = subtitles;
        this.durationMs = undefined;
    }

    async probeAudioStreams(): Promise<AudioStreamDescriptor[]> {
        this.audioCalls++;
        return this.audio;
    }

    async probeSubtitleStreams(): Promise<StreamDescriptor[]> {
        return this.subtitles;
    }

    async probeDurationMs(): Promise<number | undefined> {
        return this.durationMs;
    }
}

export interface FakeFfmpegOptions {
    /** Exit code for a call; 0 when undefined */
    exitCode?: (args: string[]) => number | undefined;
    /** Write the output file even when exiting non-zero */
    writeOnFailure?: boolean;
    /** Bytes written to the output file */
    content?: (args: string[]) => string;
    /** Lines written to stdout; one block ending in progress=end by default */
    progressLines?: string[];
    /** Runs first on every call, e.g. to abort while the tool is running */
    onCall?: (args: string[]) => void;
}

export const isMergeCall = (args: string[]): boolean => args.includes('-map_chapters');

/**
 * Stand-in for ffmpeg: writes the output file named by the last argument and
 * reports one progress block
 */
export function createFakeFfmpeg(options: FakeFfmpegOptions = {}) {
    const calls: string[][] = [];

    const runner = vi.fn<CommandRunner>(async (_command, args, runOptions) => {
        calls.push(args);
        options.onCall?.(args);
        if (runOptions?.signal?.aborted) {
            return { exitCode: 130, stdout: '', stderr: '', duration: 0, timedOut: false, aborted: true };
        }

        const exitCode = options.exitCode?.(args) ?? 0;
        const output = args[args.length - 1];
        if (output && (exitCode === 0 || options.writeOnFailure)) {
            const content = options.content?.(args) ?? (isMergeCall(args) ? 'merged' : 'encoded');
            await writeFile(output, content);
        }

        for (const line of options.progressLines ?? ['out_time_us=1500000', 'total_size=4096', 'progress=end']) {
            runOptions?.onStdoutLine?.(line);
        }

        return {
            exitCode,
            stdout: '',
            stderr: exitCode === 0 ? '' : 'Conversion failed!',
            duration: 5,
            timedOut: false,
            aborted: false,
        };
    });

    return { runner, calls };
}
