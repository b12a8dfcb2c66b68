import { describe, expect, test, vi } from 'vitest';
import type { CommandResult, CommandRunner } from '@tracksmith/utils';
import { CancelledError, ProbeFailure } from '@tracksmith/core';
import {
    FFProbe,
    ProbeOutputError,
    parseDuration,
    parseJsonStreams,
    parsePlainStreams,
} from '../src/probes/ffprobe.js';

function result(stdout: string, exitCode = 0, extra: Partial<CommandResult> = {}): CommandResult {
    return { exitCode, stdout, stderr: '', duration: 1, timedOut: false, aborted: false, ...extra };
}

const JSON_OUTPUT = JSON.stringify({
    programs: [],
    streams: [
        { index: 1, codec_name: 'aac', channels: 2 },
        { index: 2, codec_name: 'dts', channels: 8 },
    ],
});

const PLAIN_OUTPUT = [
    'index=1',
    'codec_name=aac',
    'channels=2',
    'index=2',
    'codec_name=dts',
    'channels=8',
    '',
].join('\n');

describe('parsers', () => {
    test('JSON and text writers yield the same entries', () => {
        expect(parseJsonStreams(JSON_OUTPUT)).toEqual(parsePlainStreams(PLAIN_OUTPUT));
        expect(parsePlainStreams(PLAIN_OUTPUT)).toEqual([
            { index: 1, codecName: 'aac', channels: 2 },
            { index: 2, codecName: 'dts', channels: 8 },
        ]);
    });

    test('field order in the text writer does not matter', () => {
        expect(parsePlainStreams('index=3\nchannels=6\ncodec_name=ac3\n')).toEqual([
            { index: 3, codecName: 'ac3', channels: 6 },
        ]);
    });

    test('section wrappers are skipped', () => {
        expect(parsePlainStreams('[STREAM]\nindex=0\ncodec_name=subrip\n[/STREAM]\n')).toEqual([
            { index: 0, codecName: 'subrip' },
        ]);
    });

    test('no streams is an empty list in both writers', () => {
        expect(parseJsonStreams('{"programs":[],"streams":[]}')).toEqual([]);
        expect(parseJsonStreams('{}')).toEqual([]);
        expect(parseJsonStreams('')).toEqual([]);
        expect(parsePlainStreams('')).toEqual([]);
    });

    test('durations are read in seconds and returned in milliseconds', () => {
        expect(parseDuration('5400.125000\n')).toBe(5400125);
        expect(parseDuration('N/A\n')).toBeUndefined();
        expect(parseDuration('')).toBeUndefined();
    });

    test('garbage is a parse error', () => {
        expect(() => parseJsonStreams('not json')).toThrow(ProbeOutputError);
        expect(() => parseJsonStreams('{"streams":[{"codec_name":"aac"}]}')).toThrow(ProbeOutputError);
        expect(() => parsePlainStreams('channels=2\n')).toThrow(ProbeOutputError);
        expect(() => parsePlainStreams('hello world\n')).toThrow(ProbeOutputError);
    });
});

describe('FFProbe', () => {
    test('numbers audio streams by probe order', async () => {
        const runner = vi.fn<CommandRunner>(async () => result(JSON_OUTPUT));
        const probe = new FFProbe('ffprobe', { runner });

        const streams = await probe.probeAudioStreams('/media/film.mkv');

        expect(streams).toEqual([
            { type: 'audio', streamIndex: 1, streamNumber: 0, codecName: 'aac', channelCount: 2 },
            { type: 'audio', streamIndex: 2, streamNumber: 1, codecName: 'dts', channelCount: 8 },
        ]);
        expect(runner).toHaveBeenCalledTimes(1);
        expect(runner.mock.calls[0]?.[1]).toEqual([
            '-v', 'error',
            '-select_streams', 'a',
            '-show_entries', 'stream=index,channels,codec_name',
            '-of', 'json',
            '/media/film.mkv',
        ]);
    });

    test('auto mode falls back to the text writer when JSON is unusable', async () => {
        const runner = vi.fn<CommandRunner>(async (_command, args) =>
            args.includes('json') ? result('{ truncated') : result(PLAIN_OUTPUT));
        const probe = new FFProbe('ffprobe', { runner });

        const streams = await probe.probeAudioStreams('/media/film.mkv');

        expect(streams.map(s => s.channelCount)).toEqual([2, 8]);
        expect(runner).toHaveBeenCalledTimes(2);
        expect(runner.mock.calls[1]?.[1]).toContain('default=noprint_wrappers=1');
    });

    test('json mode does not fall back', async () => {
        const runner = vi.fn<CommandRunner>(async () => result('{ truncated'));
        const probe = new FFProbe('ffprobe', { runner, format: 'json' });

        await expect(probe.probeAudioStreams('/media/film.mkv')).rejects.toBeInstanceOf(ProbeFailure);
        expect(runner).toHaveBeenCalledTimes(1);
    });

    test('plain mode goes straight to the text writer', async () => {
        const runner = vi.fn<CommandRunner>(async () => result(PLAIN_OUTPUT));
        const probe = new FFProbe('ffprobe', { runner, format: 'plain' });

        await probe.probeAudioStreams('/media/film.mkv');

        expect(runner).toHaveBeenCalledTimes(1);
        expect(runner.mock.calls[0]?.[1]).toContain('default=noprint_wrappers=1');
    });

    test('a file without audio is an empty list, not an error', async () => {
        const runner = vi.fn<CommandRunner>(async () => result('{"programs":[],"streams":[]}'));
        const probe = new FFProbe('ffprobe', { runner });

        await expect(probe.probeAudioStreams('/media/silent.mp4')).resolves.toEqual([]);
    });

    test('a non-zero exit is a probe failure without fallback', async () => {
        const runner = vi.fn<CommandRunner>(async () =>
            result('', 1, { stderr: '/media/x.mkv: Invalid data found when processing input' }));
        const probe = new FFProbe('ffprobe', { runner });

        await expect(probe.probeAudioStreams('/media/x.mkv')).rejects.toThrow(
            'Probe failed for /media/x.mkv: /media/x.mkv: Invalid data found when processing input'
        );
        expect(runner).toHaveBeenCalledTimes(1);
    });

    test('a spawn error is a probe failure', async () => {
        const runner = vi.fn<CommandRunner>(async () => {
            throw new Error('spawn ffprobe ENOENT');
        });
        const probe = new FFProbe('ffprobe', { runner });

        await expect(probe.probeAudioStreams('/media/x.mkv')).rejects.toBeInstanceOf(ProbeFailure);
    });

    test('an aborted probe is a cancellation', async () => {
        const runner = vi.fn<CommandRunner>(async () => result('', 130, { aborted: true }));
        const probe = new FFProbe('ffprobe', { runner });

        await expect(probe.probeAudioStreams('/media/x.mkv')).rejects.toBeInstanceOf(CancelledError);
    });

    test('subtitle streams use the subtitle selector', async () => {
        const runner = vi.fn<CommandRunner>(async () =>
            result(JSON.stringify({ streams: [{ index: 3, codec_name: 'subrip' }, { index: 4, codec_name: 'hdmv_pgs_subtitle' }] })));
        const probe = new FFProbe('ffprobe', { runner });

        const subtitles = await probe.probeSubtitleStreams('/media/film.mkv');

        expect(subtitles).toEqual([
            { type: 'subtitle', streamIndex: 3, streamNumber: 0, codecName: 'subrip' },
            { type: 'subtitle', streamIndex: 4, streamNumber: 1, codecName: 'hdmv_pgs_subtitle' },
        ]);
        expect(runner.mock.calls[0]?.[1]).toEqual([
            '-v', 'error',
            '-select_streams', 's',
            '-show_entries', 'stream=index,codec_name',
            '-of', 'json',
            '/media/film.mkv',
        ]);
    });

    test('duration comes from the format section', async () => {
        const runner = vi.fn<CommandRunner>(async () => result('7200.500000\n'));
        const probe = new FFProbe('ffprobe', { runner });

        await expect(probe.probeDurationMs('/media/film.mkv')).resolves.toBe(7200500);
        expect(runner.mock.calls[0]?.[1]).toEqual([
            '-v', 'error',
            '-show_entries', 'format=duration',
            '-of', 'default=noprint_wrappers=1:nokey=1',
            '/media/film.mkv',
        ]);
    });
});
