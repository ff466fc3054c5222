import { EventEmitter } from 'node:events';
import { StructuredLogger } from '../logging/StructuredLogger';
import { AudioRecorder } from '../services/capture/AudioRecorder';
import { AppState } from '../types';
import {
  DEFAULT_STREAM_COMMIT_OPTIONS,
  RecognitionEngine,
  SessionSummary,
  StreamCommitController,
  StreamCommitOptions,
  TranscriptSink
} from './StreamCommitController';

interface WarmableService {
  warmup?: () => Promise<void>;
  shutdown?: () => Promise<void>;
}

export interface RecognitionService extends RecognitionEngine, WarmableService {}

export interface SessionReport {
  summary: SessionSummary;
  clipboardAttempted: boolean;
  clipboardTool?: string;
}

export interface TranscriptDisplay {
  showListening(): void;
  renderPartial(transcript: string): void;
  renderFinal(report: SessionReport): void;
}

interface ClipboardService {
  copy: (text: string) => Promise<string | undefined>;
}

interface HistoryService {
  append: (text: string, processTimeMs: number) => Promise<unknown>;
}

export interface LiveDictationDependencies {
  recorder: AudioRecorder;
  engine: RecognitionService;
  display: TranscriptDisplay;
  clipboard?: ClipboardService;
  history?: HistoryService;
}

export declare interface LiveDictationApp {
  on(event: 'stateChanged', listener: (state: AppState) => void): this;
  on(event: 'sessionCompleted', listener: (report: SessionReport) => void): this;
}

/**
 * Runs dictation sessions one after another. Each session gets a fresh
 * StreamCommitController; the app fans its output out to the display,
 * the clipboard and the history file.
 */
export class LiveDictationApp extends EventEmitter {
  private state: AppState = { stage: 'idle' };
  private session: StreamCommitController | undefined;
  private sessionDone: Promise<SessionReport> | undefined;
  private transitionInProgress = false;

  public constructor(
    private readonly deps: LiveDictationDependencies,
    private readonly logger?: StructuredLogger,
    private readonly options: StreamCommitOptions = DEFAULT_STREAM_COMMIT_OPTIONS
  ) {
    super();
  }

  public getState(): AppState {
    return this.state;
  }

  public isListening(): boolean {
    return this.session !== undefined;
  }

  public async warmupWorkers(): Promise<void> {
    this.setState({ stage: 'warming', detail: 'Loading speech model' });

    try {
      await this.deps.engine.warmup?.();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.setState({ stage: 'error', detail });
      this.logger?.error('Recognition worker warmup failed', { detail });
      throw error;
    }

    this.setState({ stage: 'idle' });
    this.logger?.info('Workers warmed and ready');
  }

  public async startListening(): Promise<void> {
    if (this.session || this.transitionInProgress) {
      return;
    }

    if (this.state.stage !== 'idle' && this.state.stage !== 'error') {
      return;
    }

    this.transitionInProgress = true;
    const session = new StreamCommitController(
      {
        source: this.deps.recorder,
        engine: this.deps.engine,
        sink: this.createSink()
      },
      this.logger,
      this.options
    );
    this.session = session;
    this.sessionDone = new Promise<SessionReport>((resolve) => {
      this.once('sessionCompleted', resolve);
    });

    session.on('stateChanged', (sessionState) => {
      if (sessionState === 'draining') {
        this.setState({ stage: 'draining', detail: 'Transcribing remaining audio' });
      }
    });

    try {
      await session.start();
      // Stopped while capture was still starting.
      if (this.session !== session || session.getState() !== 'listening') {
        return;
      }

      this.setState({ stage: 'listening' });
      this.deps.display.showListening();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.setState({ stage: 'error', detail });
      this.logger?.error('Failed to start listening', { detail });
    } finally {
      this.transitionInProgress = false;
    }
  }

  /** Stops the active session and resolves with its report once it is flushed. */
  public async stopListening(): Promise<SessionReport | undefined> {
    const session = this.session;
    const done = this.sessionDone;
    if (!session || !done) {
      return undefined;
    }

    await session.stop('user');
    return done;
  }

  public async toggleListening(): Promise<void> {
    if (this.session) {
      await this.stopListening();
      return;
    }

    await this.startListening();
  }

  public async handlePushToTalkPressed(): Promise<void> {
    await this.startListening();
  }

  public async handlePushToTalkReleased(): Promise<void> {
    await this.stopListening();
  }

  public async shutdown(): Promise<void> {
    await this.stopListening();
    await this.deps.engine.shutdown?.().catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Recognition worker shutdown failed', { detail });
    });
  }

  private createSink(): TranscriptSink {
    return {
      onPartial: (transcript) => {
        this.deps.display.renderPartial(transcript);
      },
      onFinal: async (transcript, summary) => {
        await this.completeSession(transcript, summary);
      }
    };
  }

  private async completeSession(transcript: string, summary: SessionSummary): Promise<void> {
    const clipboardAttempted = Boolean(transcript && this.deps.clipboard);
    let clipboardTool: string | undefined;

    if (transcript && this.deps.clipboard) {
      clipboardTool = await this.deps.clipboard.copy(transcript).catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.warn('Clipboard copy failed', { detail });
        return undefined;
      });
    }

    if (transcript && this.deps.history) {
      await this.deps.history
        .append(transcript, summary.latency.recognitionMs.avg * summary.latency.calls)
        .catch((error: unknown) => {
          const detail = error instanceof Error ? error.message : String(error);
          this.logger?.warn('Saving transcript history failed', { detail });
        });
    }

    const report: SessionReport = { summary, clipboardAttempted, clipboardTool };

    try {
      this.deps.display.renderFinal(report);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Rendering final transcript failed', { detail });
    }

    this.session = undefined;
    this.sessionDone = undefined;

    if (summary.stopReason === 'capture-failure') {
      this.setState({
        stage: 'error',
        detail: summary.captureError ?? 'Audio capture ended unexpectedly'
      });
    } else {
      this.setState({
        stage: 'idle',
        detail: summary.outcome === 'transcribed' ? undefined : 'No speech detected'
      });
    }

    this.emit('sessionCompleted', report);
  }

  private setState(next: AppState): void {
    this.state = next;
    this.emit('stateChanged', next);
    this.logger?.info('State changed', {
      stage: next.stage,
      detail: next.detail
    });
  }
}
