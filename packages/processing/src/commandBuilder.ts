/**
 * FFmpeg Command Builder
 *
 * Fluent API for the two command shapes this tool runs: extracting one
 * remixed audio track, and remuxing a container with extra tracks.
 *
 * CRITICAL: Prefer stream copy over encoding when possible!
 */

export interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g., 'v:0', 'a:1', 's'
  optional?: boolean;     // Add ? for optional
}

/**
 * Codec choice for one output stream specifier ('v', 'a', 'a:2', 's:0', ...)
 */
export interface StreamCodec {
  streamSpec: string;
  codec: string;          // 'copy' keeps the encoded bytes
  bitrate?: string;
}

export class FFmpegCommandBuilder {
  private inputs: string[] = [];
  private mappings: StreamMapping[] = [];
  private codecs: StreamCodec[] = [];
  private audioFilters: string[] = [];
  private outputFile: string = '';
  private globalArgs: string[] = [];
  private mapChapters: number | null = null;
  private mapMetadata: number | null = null;

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Add input file; returns the builder, the input's index is its position
   */
  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  get inputCount(): number {
    return this.inputs.length;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string, optional: boolean = false): this {
    this.mappings.push({ inputIndex, streamSpec, optional });
    return this;
  }

  /**
   * Set the codec for an output stream specifier
   */
  setCodec(streamSpec: string, codec: string, bitrate?: string): this {
    this.codecs.push({ streamSpec, codec, bitrate });
    return this;
  }

  /**
   * Add audio filter
   */
  addAudioFilter(filter: string): this {
    this.audioFilters.push(filter);
    return this;
  }

  /**
   * Copy chapters from input
   */
  copyChapters(inputIndex: number = 0): this {
    this.mapChapters = inputIndex;
    return this;
  }

  /**
   * Copy metadata from input
   */
  copyMetadata(inputIndex: number = 0): this {
    this.mapMetadata = inputIndex;
    return this;
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    if (this.inputs.length === 0) {
      throw new Error('FFmpeg command needs at least one input');
    }
    if (!this.outputFile) {
      throw new Error('FFmpeg command needs an output file');
    }

    const args: string[] = [...this.globalArgs];

    for (const input of this.inputs) {
      args.push('-i', input);
    }

    for (const mapping of this.mappings) {
      const opt = mapping.optional ? '?' : '';
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}${opt}`);
    }

    if (this.audioFilters.length > 0) {
      args.push('-af', this.audioFilters.join(','));
    }

    if (this.mapMetadata !== null) {
      args.push('-map_metadata', this.mapMetadata.toString());
    }

    if (this.mapChapters !== null) {
      args.push('-map_chapters', this.mapChapters.toString());
    }

    for (const codec of this.codecs) {
      args.push(`-c:${codec.streamSpec}`, codec.codec);
      if (codec.codec !== 'copy' && codec.bitrate) {
        args.push(`-b:${codec.streamSpec}`, codec.bitrate);
      }
    }

    args.push(this.outputFile);

    return args;
  }

  /**
   * Get command as a string (for logging)
   */
  toString(): string {
    return this.build().map(arg => (/[\s"']/.test(arg) ? JSON.stringify(arg) : arg)).join(' ');
  }
}
