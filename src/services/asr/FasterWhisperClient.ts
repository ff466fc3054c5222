import { RecognitionEngine } from '../../core/StreamCommitController';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { AppConfig, RecognitionOptions, RecognitionResult } from '../../types';
import { JsonWorker, PersistentJsonWorker } from '../process/PersistentJsonWorker';
import { isLikelyHallucination } from './hallucinations';

const WARMUP_TIMEOUT_MS = 120000;
const TRANSCRIBE_TIMEOUT_MS = 120000;
// Whisper decodes in 30 s windows and misbehaves on clips under a second.
const MIN_AUDIO_SECONDS = 1;

type ClientConfig = Pick<
  AppConfig,
  'pythonBin' | 'asrScriptPath' | 'modelSize' | 'asrDevice' | 'asrComputeType' | 'enforceOffline'
>;

const readOptionalString = (record: Record<string, unknown>, key: string): string | undefined => {
  const value = record[key];
  return typeof value === 'string' && value ? value : undefined;
};

const readOptionalNumber = (record: Record<string, unknown>, key: string): number | undefined => {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const parseRecognitionResponse = (value: unknown): RecognitionResult => {
  if (!isRecord(value)) {
    throw new Error('ASR worker returned a malformed transcription result');
  }

  const text = value.text;
  if (text !== undefined && text !== null && typeof text !== 'string') {
    throw new Error('ASR worker returned a non-string transcript');
  }

  return {
    text: typeof text === 'string' ? text : '',
    language: readOptionalString(value, 'language'),
    confidence: readOptionalNumber(value, 'languageProbability'),
    durationSeconds: readOptionalNumber(value, 'durationSeconds')
  };
};

export const padToMinimumDuration = (samples: Float32Array, sampleRate: number): Float32Array => {
  const minimum = Math.ceil(sampleRate * MIN_AUDIO_SECONDS);
  if (samples.length >= minimum) {
    return samples;
  }

  const padded = new Float32Array(minimum);
  padded.set(samples);
  return padded;
};

export const encodeSamples = (samples: Float32Array): string =>
  Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength).toString('base64');

/** Recognition engine backed by a persistent faster-whisper worker process. */
export class FasterWhisperClient implements RecognitionEngine {
  private readonly worker: JsonWorker;

  public constructor(
    private readonly config: ClientConfig,
    private readonly logger?: StructuredLogger,
    worker?: JsonWorker
  ) {
    this.worker =
      worker ??
      new PersistentJsonWorker({
        name: 'asr',
        command: this.config.pythonBin,
        args: [
          this.config.asrScriptPath,
          '--serve',
          '--model',
          this.config.modelSize,
          '--device',
          this.config.asrDevice,
          '--compute-type',
          this.config.asrComputeType
        ],
        env: makeWorkerEnv(this.config.enforceOffline),
        logger: this.logger
      });
  }

  public async warmup(): Promise<void> {
    await this.worker.start();
    await this.worker.request({ action: 'warmup' }, WARMUP_TIMEOUT_MS);
    this.logger?.info('ASR worker warmed', { model: this.config.modelSize });
  }

  public async transcribe(
    samples: Float32Array,
    sampleRate: number,
    options: RecognitionOptions
  ): Promise<RecognitionResult> {
    const audio = padToMinimumDuration(samples, sampleRate);
    const response = await this.worker.request(
      {
        action: 'transcribe',
        audioBase64: encodeSamples(audio),
        sampleRate,
        beamSize: options.beamSize,
        vadFilter: options.vadFilter,
        minSilenceDurationMs: options.vad.minSilenceDurationMs,
        speechPadMs: options.vad.speechPadMs
      },
      TRANSCRIBE_TIMEOUT_MS
    );

    const result = parseRecognitionResponse(response);
    const text = result.text.trim();

    if (isLikelyHallucination(text)) {
      this.logger?.debug('Discarding likely hallucinated transcript', { text });
      return { ...result, text: '' };
    }

    return { ...result, text };
  }

  public async shutdown(): Promise<void> {
    await this.worker.stop();
  }
}

export const makeWorkerEnv = (enforceOffline: boolean): NodeJS.ProcessEnv => {
  if (!enforceOffline) {
    return { ...process.env };
  }

  return {
    ...process.env,
    HF_HUB_OFFLINE: '1',
    TRANSFORMERS_OFFLINE: '1'
  };
};
