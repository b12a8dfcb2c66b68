/**
 * Progress Parser
 *
 * Reads the key=value blocks FFmpeg writes with `-progress pipe:1`.
 * A block ends with `progress=continue` or `progress=end`; one snapshot is
 * produced per block.
 */

import { parseTimecode } from '@tracksmith/utils';

export interface FFmpegProgress {
  outTimeMs: number;
  totalSize: number;   // bytes written so far
  bitrate: string;
  speed: number;       // x realtime, 0 when unknown
  percent?: number;    // 0-100, only when the duration is known
  done: boolean;
}

export class FFmpegProgressParser {
  private readonly durationMs: number;
  private current: FFmpegProgress = FFmpegProgressParser.initial();

  constructor(durationMs: number = 0) {
    this.durationMs = durationMs;
  }

  private static initial(): FFmpegProgress {
    return { outTimeMs: 0, totalSize: 0, bitrate: '', speed: 0, done: false };
  }

  /**
   * Feed one line; returns a snapshot when the line closes a block
   */
  parseLine(line: string): FFmpegProgress | null {
    const match = line.trim().match(/^(\w+)=(.*)$/);
    if (!match) return null;

    const key = match[1] ?? '';
    const value = (match[2] ?? '').trim();

    switch (key) {
      case 'out_time': {
        const ms = parseTimecode(value);
        if (ms !== null) this.current.outTimeMs = Math.max(0, ms);
        break;
      }
      case 'out_time_us': {
        const us = parseInt(value, 10);
        if (!Number.isNaN(us)) {
          this.current.outTimeMs = Math.max(0, Math.floor(us / 1000));
        }
        break;
      }
      case 'total_size': {
        const size = parseInt(value, 10);
        if (!Number.isNaN(size)) this.current.totalSize = size;
        break;
      }
      case 'bitrate':
        this.current.bitrate = value;
        break;
      case 'speed': {
        const speed = parseFloat(value.replace('x', ''));
        this.current.speed = Number.isNaN(speed) ? 0 : speed;
        break;
      }
      case 'progress':
        return this.closeBlock(value === 'end');
    }

    return null;
  }

  private closeBlock(done: boolean): FFmpegProgress {
    const snapshot: FFmpegProgress = { ...this.current, done };
    if (this.durationMs > 0) {
      snapshot.percent = done ? 100 : Math.min(100, (snapshot.outTimeMs / this.durationMs) * 100);
    }
    this.current = FFmpegProgressParser.initial();
    return snapshot;
  }
}
