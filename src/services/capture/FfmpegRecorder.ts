import { ChildProcessByStdio, spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { Readable } from 'node:stream';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { AudioRecorder, AudioStreamOptions } from './AudioRecorder';

const BYTES_PER_SAMPLE = 4; // f32le mono

export type CaptureProcess = EventEmitter &
  Pick<ChildProcessByStdio<null, Readable, Readable>, 'stdout' | 'stderr' | 'kill' | 'exitCode'>;

export type SpawnCaptureProcess = (command: string, args: string[]) => CaptureProcess;

export interface FfmpegRecorderOptions {
  ffmpegBin: string;
  inputFormat: string;
  device: string;
  logger?: StructuredLogger;
  spawnProcess?: SpawnCaptureProcess;
  startStabilityDelayMs?: number;
}

const spawnFfmpeg: SpawnCaptureProcess = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

const normalizeMicError = (raw: string): string => {
  const detail = raw.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'Microphone permission denied. Grant the terminal microphone access in your system privacy settings, then retry.';
  }

  if (/Input\/output error|No such file|device not found|could not find|No such process/i.test(detail)) {
    return 'Microphone input device is unavailable. Check LIVESCRIBE_INPUT_FORMAT and LIVESCRIBE_AUDIO_DEVICE (or --device).';
  }

  if (detail) {
    return `Microphone capture failed: ${detail}`;
  }

  return 'Microphone capture failed. Verify ffmpeg availability and microphone permissions.';
};

/** Maps a device index or name onto ffmpeg's `-i` target for the input format. */
export const resolveInputTarget = (inputFormat: string, device: string): string => {
  const trimmed = device.trim();

  if (inputFormat === 'avfoundation') {
    return trimmed.startsWith(':') ? trimmed : `:${trimmed || '0'}`;
  }

  if (inputFormat === 'dshow') {
    return trimmed.startsWith('audio=') ? trimmed : `audio=${trimmed || 'default'}`;
  }

  if (inputFormat === 'alsa' && /^\d+$/.test(trimmed)) {
    return `hw:${trimmed}`;
  }

  return trimmed || 'default';
};

export const buildFfmpegArgs = (inputFormat: string, device: string, sampleRate: number): string[] => [
  '-hide_banner',
  '-loglevel',
  'error',
  '-f',
  inputFormat,
  '-i',
  resolveInputTarget(inputFormat, device),
  '-ac',
  '1',
  '-ar',
  String(sampleRate),
  '-f',
  'f32le',
  '-acodec',
  'pcm_f32le',
  'pipe:1'
];

/** Captures the microphone through ffmpeg and delivers fixed-size float blocks. */
export class FfmpegRecorder implements AudioRecorder {
  private process: CaptureProcess | undefined;
  private starting: CaptureProcess | undefined;
  private stopRequested = false;
  private pendingChunks: Buffer[] = [];
  private pendingChunkOffset = 0;
  private pendingBytes = 0;
  private blockByteSize = 0;
  private onBlock: ((block: Float32Array) => void) | undefined;
  private onEnd: ((error: Error) => void) | undefined;

  public constructor(private readonly options: FfmpegRecorderOptions) {}

  public isCapturing(): boolean {
    return Boolean(this.process);
  }

  public async start(options: AudioStreamOptions): Promise<void> {
    if (this.process || this.starting) {
      throw new Error('Recorder is already active');
    }

    if (options.blockDurationMs < 10 || options.blockDurationMs > 2000) {
      throw new Error('blockDurationMs must be between 10 and 2000.');
    }

    this.stopRequested = false;
    this.onBlock = options.onBlock;
    this.onEnd = options.onEnd;
    this.pendingChunks = [];
    this.pendingChunkOffset = 0;
    this.pendingBytes = 0;
    this.blockByteSize =
      Math.max(1, Math.floor((options.sampleRate * options.blockDurationMs) / 1000)) *
      BYTES_PER_SAMPLE;

    const args = buildFfmpegArgs(this.options.inputFormat, this.options.device, options.sampleRate);
    const spawnProcess = this.options.spawnProcess ?? spawnFfmpeg;
    const ffmpeg = spawnProcess(this.options.ffmpegBin, args);
    this.starting = ffmpeg;
    let stderrLog = '';
    let settled = false;

    ffmpeg.stderr.on('data', (chunk: Buffer) => {
      stderrLog += chunk.toString();
    });

    ffmpeg.stdout.on('data', (chunk: Buffer) => {
      this.handleAudioData(chunk);
    });

    ffmpeg.on('close', (code: number | null) => {
      if (this.process !== ffmpeg) {
        return;
      }

      this.process = undefined;
      if (!this.stopRequested) {
        this.flushPendingTail();
        const onEnd = this.onEnd;
        this.resetStreamState();
        this.options.logger?.warn('Recorder exited unexpectedly', { code, stderr: stderrLog.trim() });
        onEnd?.(new Error(normalizeMicError(`${stderrLog}\nexit code=${code}`)));
      }
    });

    // A stop() that lands during the stability delay kills the child; start then resolves without adopting it.
    await new Promise<void>((resolve, reject) => {
      ffmpeg.once('error', (error: Error) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(error);
      });

      ffmpeg.once('spawn', () => {
        setTimeout(() => {
          if (settled) {
            return;
          }

          if (this.stopRequested) {
            settled = true;
            resolve();
            return;
          }

          if (ffmpeg.exitCode !== null) {
            settled = true;
            reject(new Error(normalizeMicError(stderrLog)));
            return;
          }

          this.process = ffmpeg;
          settled = true;
          resolve();
        }, this.options.startStabilityDelayMs ?? 300);
      });

      ffmpeg.once('close', (code: number | null) => {
        if (settled) {
          return;
        }

        settled = true;
        if (this.stopRequested) {
          resolve();
          return;
        }

        reject(new Error(normalizeMicError(`${stderrLog}\nexit code=${code}`)));
      });
    }).finally(() => {
      this.starting = undefined;
    });

    if (this.stopRequested) {
      this.options.logger?.info('Recorder stopped before capture settled');
      return;
    }

    this.options.logger?.info('Recorder started', {
      inputFormat: this.options.inputFormat,
      device: this.options.device,
      sampleRate: options.sampleRate,
      blockByteSize: this.blockByteSize
    });
  }

  public async stop(): Promise<void> {
    const current = this.process ?? this.starting;
    if (!current || this.stopRequested) {
      return;
    }

    this.stopRequested = true;

    await new Promise<void>((resolve, reject) => {
      current.once('close', (code: number | null) => {
        this.process = undefined;
        if (code === 0 || code === 255 || code === null) {
          resolve();
          return;
        }

        reject(new Error(`ffmpeg exited with code ${code}`));
      });

      current.once('error', (error: Error) => {
        this.process = undefined;
        reject(error);
      });

      current.kill('SIGINT');
    }).finally(() => {
      this.flushPendingTail();
      this.resetStreamState();
    });

    this.options.logger?.info('Recorder stopped');
  }

  private resetStreamState(): void {
    this.pendingChunks = [];
    this.pendingChunkOffset = 0;
    this.pendingBytes = 0;
    this.onBlock = undefined;
    this.onEnd = undefined;
  }

  private handleAudioData(chunk: Buffer): void {
    if (!this.onBlock || chunk.length === 0 || this.blockByteSize <= 0) {
      return;
    }

    this.pendingChunks.push(Buffer.from(chunk));
    this.pendingBytes += chunk.length;

    while (this.pendingBytes >= this.blockByteSize) {
      const nextBlock = this.readPendingBytes(this.blockByteSize);
      if (!nextBlock) {
        break;
      }

      this.deliver(nextBlock);
    }
  }

  /** Hands over whatever whole samples remain after the last full block. */
  private flushPendingTail(): void {
    const wholeBytes = this.pendingBytes - (this.pendingBytes % BYTES_PER_SAMPLE);
    if (!this.onBlock || wholeBytes === 0) {
      return;
    }

    const tail = this.readPendingBytes(wholeBytes);
    if (tail) {
      this.deliver(tail);
    }
  }

  private deliver(bytes: Buffer): void {
    const block = new Float32Array(bytes.length / BYTES_PER_SAMPLE);
    for (let index = 0; index < block.length; index += 1) {
      block[index] = bytes.readFloatLE(index * BYTES_PER_SAMPLE);
    }

    try {
      this.onBlock?.(block);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.options.logger?.warn('Recorder block callback failed', { detail });
    }
  }

  private readPendingBytes(byteCount: number): Buffer | undefined {
    if (byteCount <= 0 || byteCount > this.pendingBytes) {
      return undefined;
    }

    const output = Buffer.allocUnsafe(byteCount);
    let writeOffset = 0;

    while (writeOffset < byteCount) {
      const head = this.pendingChunks[0];
      if (!head) {
        break;
      }

      const available = head.length - this.pendingChunkOffset;
      const toCopy = Math.min(available, byteCount - writeOffset);
      head.copy(output, writeOffset, this.pendingChunkOffset, this.pendingChunkOffset + toCopy);

      writeOffset += toCopy;
      this.pendingChunkOffset += toCopy;
      this.pendingBytes -= toCopy;

      if (this.pendingChunkOffset >= head.length) {
        this.pendingChunks.shift();
        this.pendingChunkOffset = 0;
      }
    }

    return writeOffset === byteCount ? output : output.subarray(0, writeOffset);
  }
}
