import { mkdtemp, rm, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { CancelledError, SynthesisFailure, VerificationFailure } from '@tracksmith/core';
import { FFmpeg, FFMPEG_GLOBAL_ARGS } from '../src/ffmpeg.js';
import { DownmixSynthesizer, buildSynthesisCommand } from '../src/synthesizer.js';
import { PAN_51_TO_STEREO, PAN_71_TO_51, PAN_71_TO_STEREO, getDownmixFilter, sortTargets } from '../src/presets.js';
import type { FFmpegProgress } from '../src/progressParser.js';
import { createFakeFfmpeg } from './helpers.js';

const SOURCE_71 = { streamNumber: 1, streamIndex: 2, channelCount: 8 };

describe('presets', () => {
    test('picks the pan graph for each supported downmix', () => {
        expect(getDownmixFilter('surround51', 8)).toBe('pan=5.1|FL=FL|FR=FR|FC=FC|LFE=LFE|BL=BL|BR=BR');
        expect(getDownmixFilter('stereo', 8)).toBe(PAN_71_TO_STEREO);
        expect(getDownmixFilter('stereo', 6)).toBe(PAN_51_TO_STEREO);
    });

    test('rejects downmixes that make no sense', () => {
        expect(() => getDownmixFilter('surround51', 6)).toThrow('No downmix from 6 channels to 5.1');
        expect(() => getDownmixFilter('stereo', 2)).toThrow('No downmix from 2 channels to stereo');
    });

    test('orders targets 5.1 first', () => {
        expect(sortTargets(['stereo', 'surround51'])).toEqual(['surround51', 'stereo']);
        expect(sortTargets(['stereo'])).toEqual(['stereo']);
    });
});

describe('buildSynthesisCommand', () => {
    test('selects the source by audio stream number', () => {
        expect(buildSynthesisCommand('/lib/movie.mkv', SOURCE_71, 'surround51', '/tmp/out.ac3')).toEqual([
            '-i', '/lib/movie.mkv',
            '-map', '0:a:1',
            '-af', PAN_71_TO_51,
            '-c:a', 'ac3', '-b:a', '640k',
            '/tmp/out.ac3',
        ]);
    });

    test('encodes stereo at 192k', () => {
        const source = { streamNumber: 0, streamIndex: 1, channelCount: 6 };

        expect(buildSynthesisCommand('in.mkv', source, 'stereo', 'out.ac3')).toEqual([
            '-i', 'in.mkv',
            '-map', '0:a:0',
            '-af', PAN_51_TO_STEREO,
            '-c:a', 'ac3', '-b:a', '192k',
            'out.ac3',
        ]);
    });
});

describe('DownmixSynthesizer', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'tracksmith-synth-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    test('runs ffmpeg non-interactively and reports the artifact', async () => {
        const { runner, calls } = createFakeFfmpeg();
        const synthesizer = new DownmixSynthesizer(new FFmpeg('ffmpeg', { runner }));
        const outputPath = join(dir, 'track.ac3');
        const progress: FFmpegProgress[] = [];

        const result = await synthesizer.synthesize({
            sourcePath: '/lib/movie.mkv',
            source: SOURCE_71,
            target: 'surround51',
            outputPath,
            onProgress: (p) => progress.push(p),
        });

        expect(calls[0]).toEqual([
            ...FFMPEG_GLOBAL_ARGS,
            ...buildSynthesisCommand('/lib/movie.mkv', SOURCE_71, 'surround51', outputPath),
        ]);
        expect(result).toEqual({ outputPath, size: 7, duration: 5 });
        expect(await readFile(outputPath, 'utf8')).toBe('encoded');
        expect(progress).toEqual([
            { outTimeMs: 1500, totalSize: 4096, bitrate: '', speed: 0, done: true },
        ]);
    });

    test('a non-zero exit is a synthesis failure carrying the exit code', async () => {
        const { runner } = createFakeFfmpeg({ exitCode: () => 1 });
        const synthesizer = new DownmixSynthesizer(new FFmpeg('ffmpeg', { runner }));

        const error = await synthesizer
            .synthesize({ sourcePath: '/lib/movie.mkv', source: SOURCE_71, target: 'surround51', outputPath: join(dir, 'x.ac3') })
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(SynthesisFailure);
        expect(error).toMatchObject({
            code: 'SYNTHESIS_FAILURE',
            exitCode: 1,
            message: 'Audio synthesis failed for /lib/movie.mkv with exit code 1',
        });
    });

    test('an empty output file fails verification', async () => {
        const { runner } = createFakeFfmpeg({ content: () => '' });
        const synthesizer = new DownmixSynthesizer(new FFmpeg('ffmpeg', { runner }));

        await expect(
            synthesizer.synthesize({ sourcePath: 'in.mkv', source: SOURCE_71, target: 'surround51', outputPath: join(dir, 'x.ac3') })
        ).rejects.toBeInstanceOf(VerificationFailure);
    });

    test('an aborted run is a cancellation', async () => {
        const { runner } = createFakeFfmpeg();
        const synthesizer = new DownmixSynthesizer(new FFmpeg('ffmpeg', { runner }));
        const controller = new AbortController();
        controller.abort();

        await expect(
            synthesizer.synthesize({
                sourcePath: 'in.mkv',
                source: SOURCE_71,
                target: 'surround51',
                outputPath: join(dir, 'x.ac3'),
                signal: controller.signal,
            })
        ).rejects.toBeInstanceOf(CancelledError);
    });
});
