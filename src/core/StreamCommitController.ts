import { EventEmitter } from 'node:events';
import { StructuredLogger } from '../logging/StructuredLogger';
import { LatencySummary, LatencyTracker } from '../perf/LatencyTracker';
import { AudioRecorder } from '../services/capture/AudioRecorder';
import {
  RecognitionOptions,
  RecognitionResult,
  SessionOutcome,
  SessionState,
  StopReason
} from '../types';
import { AudioBuffer } from './AudioBuffer';
import { SilenceGate } from './SilenceGate';

export interface RecognitionEngine {
  transcribe(
    samples: Float32Array,
    sampleRate: number,
    options: RecognitionOptions
  ): Promise<RecognitionResult>;
}

export interface TranscriptSink {
  /** Called after every commit with the whole transcript so far. */
  onPartial(transcript: string): void | Promise<void>;
  /** Called exactly once, when the session reaches `flushed`. */
  onFinal(transcript: string, summary: SessionSummary): void | Promise<void>;
}

export interface StreamCommitOptions {
  sampleRate: number;
  blockDurationMs: number;
  chunkIntervalMs: number;
  minSpanMs: number;
  silenceAmplitudeThreshold: number;
  recognition: RecognitionOptions;
}

export const DEFAULT_STREAM_COMMIT_OPTIONS: StreamCommitOptions = {
  sampleRate: 16000,
  blockDurationMs: 100,
  chunkIntervalMs: 2000,
  minSpanMs: 300,
  silenceAmplitudeThreshold: 0.005,
  recognition: {
    beamSize: 1,
    vadFilter: true,
    vad: {
      minSilenceDurationMs: 300,
      speechPadMs: 100
    }
  }
};

export interface StreamCommitDependencies {
  source: AudioRecorder;
  engine: RecognitionEngine;
  sink: TranscriptSink;
}

export type EvaluationPhase = 'cycle' | 'flush';

export type SpanOutcome =
  | { kind: 'skipped'; state: SessionState }
  | { kind: 'too-short'; spanStart: number; spanEnd: number }
  | { kind: 'silent'; spanStart: number; spanEnd: number; peakAmplitude: number }
  | { kind: 'committed'; spanStart: number; spanEnd: number; text: string }
  | { kind: 'no-speech'; spanStart: number; spanEnd: number }
  | { kind: 'failed'; spanStart: number; spanEnd: number; detail: string };

export interface SessionSummary {
  transcript: string;
  fragments: string[];
  outcome: SessionOutcome;
  stopReason: StopReason;
  captureError?: string;
  totalSamples: number;
  committedSamples: number;
  capturedSeconds: number;
  recognitionCalls: number;
  recognitionFailures: number;
  finalPass: SpanOutcome;
  latency: LatencySummary;
}

export declare interface StreamCommitController {
  on(event: 'stateChanged', listener: (state: SessionState) => void): this;
  on(event: 'span', listener: (outcome: SpanOutcome, phase: EvaluationPhase) => void): this;
  on(event: 'captureFailed', listener: (error: Error) => void): this;
  on(event: 'flushed', listener: (summary: SessionSummary) => void): this;
}

/**
 * Owns one dictation session: the growing sample buffer, the committed
 * watermark and the transcript fragments.
 *
 * The capture callback only appends. Each cycle snapshots the buffer length
 * and copies the pending span synchronously, so no append can land between
 * the two; nothing is held while recognition runs. Cycles are chained, which
 * keeps at most one recognition call in flight and commits in span order.
 */
export class StreamCommitController extends EventEmitter {
  private state: SessionState = 'listening';
  private readonly buffer = new AudioBuffer();
  private readonly gate: SilenceGate;
  private readonly latencyTracker = new LatencyTracker();
  private watermark = 0;
  private fragments: string[] = [];
  private started = false;
  private acceptingAudio = false;
  private cycleTimer: NodeJS.Timeout | undefined;
  private cycleChain: Promise<unknown> = Promise.resolve();
  private drainPromise: Promise<SessionSummary> | undefined;
  private recognitionCalls = 0;
  private recognitionFailures = 0;

  public constructor(
    private readonly deps: StreamCommitDependencies,
    private readonly logger?: StructuredLogger,
    private readonly options: StreamCommitOptions = DEFAULT_STREAM_COMMIT_OPTIONS
  ) {
    super();
    this.gate = new SilenceGate({
      minSpanSamples: this.msToSamples(options.minSpanMs),
      silenceAmplitudeThreshold: options.silenceAmplitudeThreshold
    });
  }

  public getState(): SessionState {
    return this.state;
  }

  public getWatermark(): number {
    return this.watermark;
  }

  public getBufferedSamples(): number {
    return this.buffer.length;
  }

  public getFragments(): string[] {
    return [...this.fragments];
  }

  public getTranscript(): string {
    return this.fragments.join(' ');
  }

  public async start(): Promise<void> {
    if (this.started || this.drainPromise) {
      throw new Error('A stream commit controller runs a single session and was already started');
    }

    this.started = true;
    this.acceptingAudio = true;

    try {
      await this.deps.source.start({
        sampleRate: this.options.sampleRate,
        blockDurationMs: this.options.blockDurationMs,
        onBlock: (block) => {
          this.handleBlock(block);
        },
        onEnd: (error) => {
          this.handleCaptureEnd(error);
        }
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.acceptingAudio = false;
      this.logger?.error('Audio capture failed to start', { detail });
      await this.stop('capture-failure', detail);
      throw error;
    }

    if (this.state !== 'listening') {
      return;
    }

    this.scheduleNextCycle();
    this.logger?.info('Session listening', {
      sampleRate: this.options.sampleRate,
      blockDurationMs: this.options.blockDurationMs,
      chunkIntervalMs: this.options.chunkIntervalMs,
      minSpanMs: this.options.minSpanMs,
      silenceAmplitudeThreshold: this.options.silenceAmplitudeThreshold
    });
  }

  /**
   * Runs one commit cycle now, queued behind any cycle already running.
   * The timer uses the same path.
   */
  public runCycle(): Promise<SpanOutcome> {
    const next = this.cycleChain.then(() => this.executeCycle());
    this.cycleChain = next.catch(() => undefined);
    return next;
  }

  /** Drains and flushes the session. Repeated calls share one result. */
  public stop(reason: StopReason = 'user', captureError?: string): Promise<SessionSummary> {
    if (!this.drainPromise) {
      this.drainPromise = this.drainAndFlush(reason, captureError);
    }

    return this.drainPromise;
  }

  private handleBlock(block: Float32Array): void {
    if (!this.acceptingAudio || block.length === 0) {
      return;
    }

    this.buffer.append(block);
  }

  private handleCaptureEnd(error: Error): void {
    if (this.state !== 'listening') {
      return;
    }

    this.logger?.warn('Audio capture ended unexpectedly; draining session', {
      detail: error.message
    });
    this.emit('captureFailed', error);

    this.stop('capture-failure', error.message).catch((stopError: unknown) => {
      const detail = stopError instanceof Error ? stopError.message : String(stopError);
      this.logger?.error('Session drain after capture failure failed', { detail });
    });
  }

  private scheduleNextCycle(): void {
    if (this.state !== 'listening') {
      return;
    }

    this.cycleTimer = setTimeout(() => {
      this.cycleTimer = undefined;
      void this.runScheduledCycle();
    }, this.options.chunkIntervalMs);
  }

  private async runScheduledCycle(): Promise<void> {
    try {
      await this.runCycle();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.error('Commit cycle failed', { detail });
    } finally {
      this.scheduleNextCycle();
    }
  }

  private async executeCycle(): Promise<SpanOutcome> {
    if (this.state !== 'listening') {
      return { kind: 'skipped', state: this.state };
    }

    const spanStart = this.watermark;
    const snapshotLength = this.buffer.length;
    const span = this.buffer.slice(spanStart, snapshotLength);
    const evaluation = this.gate.evaluate(span);

    let outcome: SpanOutcome;
    if (evaluation.tooShort) {
      outcome = { kind: 'too-short', spanStart, spanEnd: snapshotLength };
    } else if (evaluation.silent) {
      this.advanceWatermark(snapshotLength);
      outcome = {
        kind: 'silent',
        spanStart,
        spanEnd: snapshotLength,
        peakAmplitude: evaluation.peakAmplitude
      };
      this.logger?.debug('Skipping silent span', {
        spanStart,
        spanEnd: snapshotLength,
        peakAmplitude: Number(evaluation.peakAmplitude.toFixed(5))
      });
    } else {
      outcome = await this.recognizeSpan(span, spanStart, snapshotLength, 'cycle');
    }

    this.emit('span', outcome, 'cycle');
    return outcome;
  }

  private async recognizeSpan(
    span: Float32Array,
    spanStart: number,
    spanEnd: number,
    phase: EvaluationPhase
  ): Promise<SpanOutcome> {
    const requestId = ++this.recognitionCalls;
    const audioMs = this.samplesToMs(span.length);
    const startedAt = Date.now();

    let result: RecognitionResult;
    try {
      result = await this.deps.engine.transcribe(
        span,
        this.options.sampleRate,
        this.options.recognition
      );
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.recognitionFailures += 1;
      this.advanceWatermark(spanEnd);
      this.logger?.warn('Recognition failed; span marked committed without text', {
        requestId,
        phase,
        spanStart,
        spanEnd,
        detail
      });
      return { kind: 'failed', spanStart, spanEnd, detail };
    }

    const recognitionMs = Date.now() - startedAt;
    this.latencyTracker.push({ audioMs, recognitionMs });
    this.advanceWatermark(spanEnd);

    const text = result.text.trim();
    if (!text) {
      this.logger?.debug('No speech recognized in span', {
        requestId,
        phase,
        spanStart,
        spanEnd,
        recognitionMs
      });
      return { kind: 'no-speech', spanStart, spanEnd };
    }

    this.fragments.push(text);
    await this.notifyPartial(this.getTranscript());

    this.logger?.info('Span committed', {
      requestId,
      phase,
      spanStart,
      spanEnd,
      audioMs: Math.round(audioMs),
      recognitionMs,
      language: result.language,
      confidence: result.confidence,
      fragments: this.fragments.length,
      pendingMs: Math.round(this.samplesToMs(this.buffer.length - this.watermark))
    });

    return { kind: 'committed', spanStart, spanEnd, text };
  }

  private async drainAndFlush(reason: StopReason, captureError?: string): Promise<SessionSummary> {
    this.started = true;
    this.clearCycleTimer();
    this.setState('draining');

    // Blocks the source delivers while shutting down are still kept.
    try {
      await this.deps.source.stop();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Audio capture did not stop cleanly', { detail });
    }
    this.acceptingAudio = false;

    await this.cycleChain;
    const finalPass = await this.runFinalPass();

    const transcript = this.getTranscript();
    const summary: SessionSummary = {
      transcript,
      fragments: [...this.fragments],
      outcome: this.resolveOutcome(transcript),
      stopReason: reason,
      captureError,
      totalSamples: this.buffer.length,
      committedSamples: this.watermark,
      capturedSeconds: this.buffer.length / this.options.sampleRate,
      recognitionCalls: this.recognitionCalls,
      recognitionFailures: this.recognitionFailures,
      finalPass,
      latency: this.latencyTracker.summarize()
    };

    this.setState('flushed');

    try {
      await this.deps.sink.onFinal(transcript, summary);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.error('Transcript sink failed to accept final transcript', { detail });
    }

    this.buffer.release();
    this.emit('flushed', summary);
    this.logger?.info('Session flushed', {
      outcome: summary.outcome,
      stopReason: reason,
      captureError,
      transcriptLength: transcript.length,
      fragments: summary.fragments.length,
      capturedSeconds: Number(summary.capturedSeconds.toFixed(2)),
      recognitionCalls: summary.recognitionCalls,
      recognitionFailures: summary.recognitionFailures,
      latency: summary.latency
    });

    return summary;
  }

  private async runFinalPass(): Promise<SpanOutcome> {
    const spanStart = this.watermark;
    const spanEnd = this.buffer.length;
    const span = this.buffer.slice(spanStart, spanEnd);
    const evaluation = this.gate.evaluate(span, 'flush');

    let outcome: SpanOutcome;
    if (evaluation.actionable) {
      outcome = await this.recognizeSpan(span, spanStart, spanEnd, 'flush');
    } else {
      this.advanceWatermark(spanEnd);
      outcome = evaluation.silent
        ? { kind: 'silent', spanStart, spanEnd, peakAmplitude: evaluation.peakAmplitude }
        : { kind: 'too-short', spanStart, spanEnd };
    }

    this.emit('span', outcome, 'flush');
    return outcome;
  }

  private resolveOutcome(transcript: string): SessionOutcome {
    if (transcript) {
      return 'transcribed';
    }

    return this.recognitionCalls === 0 ? 'silent-input' : 'no-speech-detected';
  }

  private async notifyPartial(transcript: string): Promise<void> {
    try {
      await this.deps.sink.onPartial(transcript);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Transcript sink failed to render partial transcript', { detail });
    }
  }

  private advanceWatermark(target: number): void {
    const bounded = Math.min(target, this.buffer.length);
    if (bounded > this.watermark) {
      this.watermark = bounded;
    }
  }

  private clearCycleTimer(): void {
    if (this.cycleTimer) {
      clearTimeout(this.cycleTimer);
      this.cycleTimer = undefined;
    }
  }

  private setState(next: SessionState): void {
    this.state = next;
    this.emit('stateChanged', next);
    this.logger?.info('Session state changed', { state: next });
  }

  private msToSamples(ms: number): number {
    return Math.round((this.options.sampleRate * ms) / 1000);
  }

  private samplesToMs(samples: number): number {
    return (samples / this.options.sampleRate) * 1000;
  }
}
