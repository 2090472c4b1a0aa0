/**
 * FFmpeg Command Builder
 * 
 * Fluent API for building transcode argument lists.
 */

export interface VideoCodecOptions {
  codec: 'libvpx' | 'libvpx-vp9' | 'h264_mediacodec' | 'h264_videotoolbox' | 'h264_nvenc' | 'h264_qsv';
  crf?: number;
  bitrate?: string;
  deadline?: 'realtime' | 'good' | 'best';  // libvpx speed/quality trade-off
  cpuUsed?: number;
  threads?: number;
}

export interface AudioCodecOptions {
  codec: 'libopus' | 'libvorbis' | 'aac';
  bitrate?: string;
}

export class FFmpegCommandBuilder {
  private inputs: string[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private outputFile = '';
  private overwrite: boolean | null = null;

  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  /**
   * -y when true, -n when false
   */
  setOverwrite(overwrite: boolean): this {
    this.overwrite = overwrite;
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    if (this.inputs.length === 0) throw new Error('At least one input is required');
    if (!this.outputFile) throw new Error('Output file is required');

    const args: string[] = [];

    if (this.overwrite !== null) {
      args.push(this.overwrite ? '-y' : '-n');
    }

    for (const input of this.inputs) {
      args.push('-i', input);
    }

    if (this.videoCodec) {
      const video = this.videoCodec;
      args.push('-c:v', video.codec);
      if (video.crf !== undefined) args.push('-crf', video.crf.toString());
      if (video.bitrate !== undefined) args.push('-b:v', video.bitrate);
      if (video.deadline) args.push('-deadline', video.deadline);
      if (video.cpuUsed !== undefined) args.push('-cpu-used', video.cpuUsed.toString());
      if (video.threads !== undefined) args.push('-threads', video.threads.toString());
    }

    if (this.audioCodec) {
      const audio = this.audioCodec;
      args.push('-c:a', audio.codec);
      if (audio.bitrate) args.push('-b:a', audio.bitrate);
    }

    args.push(this.outputFile);

    return args;
  }
}
