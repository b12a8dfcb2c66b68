import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { PreconditionError, ProbeFailure } from '@tracksmith/core';
import type { CommandRunner } from '@tracksmith/utils';
import type { AudioStreamDescriptor, StreamDescriptor, StreamProber } from '@tracksmith/media';
import {
    DownmixSynthesizer,
    FFmpeg,
    FileProcessor,
    TrackMerger,
    type PipelineEvent,
} from '@tracksmith/processing';
import { BatchDriver } from '../src/batch.js';

function audio(streamIndex: number, streamNumber: number, channelCount: number): AudioStreamDescriptor {
    return { type: 'audio', streamIndex, streamNumber, codecName: 'truehd', channelCount };
}

/**
 * Answers by file name; an Error entry is thrown
 */
class MapProber implements StreamProber {
    private readonly streams: Map<string, AudioStreamDescriptor[] | Error>;

    constructor(streams: Record<string, AudioStreamDescriptor[] | Error>) {
        this.streams = new Map(Object.entries(streams));
    }

    async probeAudioStreams(filePath: string): Promise<AudioStreamDescriptor[]> {
        const name = filePath.split(/[\\/]/).pop() ?? '';
        const entry = this.streams.get(name) ?? [];
        if (entry instanceof Error) {
            throw entry;
        }
        return entry;
    }

    async probeSubtitleStreams(): Promise<StreamDescriptor[]> {
        return [];
    }
}

const fakeFfmpeg = vi.fn<CommandRunner>(async (_command, args) => {
    const output = args[args.length - 1];
    if (output) {
        await writeFile(output, args.includes('-map_chapters') ? 'merged' : 'encoded');
    }
    return { exitCode: 0, stdout: '', stderr: '', duration: 1, timedOut: false, aborted: false };
});

function createDriver(prober: StreamProber): BatchDriver {
    const ffmpeg = new FFmpeg('ffmpeg', { runner: fakeFfmpeg });
    return new BatchDriver(
        new FileProcessor({
            prober,
            synthesizer: new DownmixSynthesizer(ffmpeg),
            merger: new TrackMerger(prober, ffmpeg),
        })
    );
}

describe('BatchDriver', () => {
    let root: string;
    let scratchParent: string;

    beforeEach(async () => {
        fakeFfmpeg.mockClear();
        root = await mkdtemp(join(tmpdir(), 'tracksmith-library-'));
        scratchParent = await mkdtemp(join(tmpdir(), 'tracksmith-scratch-parent-'));
        for (const name of ['a.mkv', 'b.MP4', 'c.avi', 'readme.txt']) {
            await writeFile(join(root, name), 'original');
        }
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
        await rm(scratchParent, { recursive: true, force: true });
    });

    const library = {
        'a.mkv': [audio(1, 0, 8)],
        'b.MP4': [audio(1, 0, 6), audio(2, 1, 2)],
        'c.avi': new ProbeFailure('c.avi', 'invalid data'),
    };

    test('tallies every outcome and keeps walk order', async () => {
        const driver = createDriver(new MapProber(library));

        const result = await driver.run({ root, scratchParent, concurrency: 2 });

        expect(result).toMatchObject({
            root,
            total: 3,
            processed: 1,
            skipped: 1,
            failed: 1,
            interrupted: false,
            dryRun: false,
        });
        expect(result.files.map((file) => [file.filePath, file.status])).toEqual([
            [join(root, 'a.mkv'), 'processed'],
            [join(root, 'b.MP4'), 'skipped'],
            [join(root, 'c.avi'), 'failed'],
        ]);
        expect(result.files[2]?.errorCode).toBe('PROBE_FAILURE');
        expect(await readFile(join(root, 'a.mkv'), 'utf8')).toBe('merged');
        expect(await readdir(scratchParent)).toEqual([]);
    });

    test('forwards file events and announces the batch', async () => {
        const driver = createDriver(new MapProber(library));
        const events: PipelineEvent[] = [];
        const started = vi.fn();
        driver.on('event', (event: PipelineEvent) => events.push(event));
        driver.on('batch:started', started);

        await driver.run({ root, scratchParent });

        expect(started).toHaveBeenCalledWith({ root, total: 3 });
        expect(events.filter((event) => event.type === 'file-start')).toEqual([
            { type: 'file-start', filePath: join(root, 'a.mkv'), position: 1, total: 3 },
            { type: 'file-start', filePath: join(root, 'b.MP4'), position: 2, total: 3 },
            { type: 'file-start', filePath: join(root, 'c.avi'), position: 3, total: 3 },
        ]);
    });

    test('a dry run changes nothing', async () => {
        const driver = createDriver(new MapProber(library));

        const result = await driver.run({ root, scratchParent, dryRun: true });

        expect(result).toMatchObject({ processed: 0, skipped: 2, failed: 1, dryRun: true });
        expect(result.files[0]).toMatchObject({ status: 'skipped', reason: 'dry-run', targets: ['surround51'] });
        expect(fakeFfmpeg).not.toHaveBeenCalled();
        expect(await readFile(join(root, 'a.mkv'), 'utf8')).toBe('original');
    });

    test('an empty library is reported with a zero total', async () => {
        const empty = await mkdtemp(join(tmpdir(), 'tracksmith-empty-'));
        try {
            const result = await createDriver(new MapProber({})).run({ root: empty, scratchParent });

            expect(result).toMatchObject({ total: 0, processed: 0, skipped: 0, failed: 0, files: [] });
            expect(await readdir(scratchParent)).toEqual([]);
        } finally {
            await rm(empty, { recursive: true, force: true });
        }
    });

    test('a missing root is fatal', async () => {
        const driver = createDriver(new MapProber({}));

        await expect(driver.run({ root: join(root, 'missing') })).rejects.toBeInstanceOf(PreconditionError);
    });

    test('an interrupted run starts no new files', async () => {
        const controller = new AbortController();
        controller.abort();

        const result = await createDriver(new MapProber(library)).run({
            root,
            scratchParent,
            signal: controller.signal,
        });

        expect(result).toMatchObject({ total: 3, interrupted: true, files: [] });
        expect(await readFile(join(root, 'a.mkv'), 'utf8')).toBe('original');
    });

    test('aborting mid-merge fails that file, rolls it back and stops the batch', async () => {
        const controller = new AbortController();
        const runner = vi.fn<CommandRunner>(async (_command, args, runOptions) => {
            if (args.includes('-map_chapters')) {
                controller.abort();
            }
            if (runOptions?.signal?.aborted) {
                return { exitCode: 255, stdout: '', stderr: '', duration: 1, timedOut: false, aborted: true };
            }
            const output = args[args.length - 1];
            if (output) {
                await writeFile(output, 'encoded');
            }
            return { exitCode: 0, stdout: '', stderr: '', duration: 1, timedOut: false, aborted: false };
        });
        const prober = new MapProber(library);
        const ffmpeg = new FFmpeg('ffmpeg', { runner });
        const driver = new BatchDriver(
            new FileProcessor({
                prober,
                synthesizer: new DownmixSynthesizer(ffmpeg),
                merger: new TrackMerger(prober, ffmpeg),
            })
        );

        const result = await driver.run({ root, scratchParent, signal: controller.signal });

        expect(result).toMatchObject({ total: 3, processed: 0, skipped: 0, failed: 1, interrupted: true });
        expect(result.files).toHaveLength(1);
        expect(result.files[0]).toMatchObject({ filePath: join(root, 'a.mkv'), status: 'failed', errorCode: 'CANCELLED' });
        expect(await readFile(join(root, 'a.mkv'), 'utf8')).toBe('original');
        expect((await readdir(root)).sort()).toEqual(['a.mkv', 'b.MP4', 'c.avi', 'readme.txt']);
        expect(await readdir(scratchParent)).toEqual([]);
        expect(runner).toHaveBeenCalledTimes(2);
    });

    test('a fatal error stops the batch and still releases scratch', async () => {
        const driver = createDriver(
            new MapProber({ 'a.mkv': new PreconditionError('ffprobe disappeared') })
        );

        await expect(driver.run({ root, scratchParent })).rejects.toBeInstanceOf(PreconditionError);
        expect(await readdir(scratchParent)).toEqual([]);
    });
});
