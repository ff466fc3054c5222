export type HotkeyMode = 'toggle' | 'push-to-talk';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type SessionState = 'listening' | 'draining' | 'flushed';
export type StopReason = 'user' | 'capture-failure';
export type SessionOutcome = 'transcribed' | 'silent-input' | 'no-speech-detected';

export type AppStage = 'idle' | 'warming' | 'listening' | 'draining' | 'error';

export interface AppState {
  stage: AppStage;
  detail?: string;
}

export interface VadOptions {
  minSilenceDurationMs: number;
  speechPadMs: number;
}

/** Engine options; the controller forwards them without looking inside. */
export interface RecognitionOptions {
  beamSize: number;
  vadFilter: boolean;
  vad: VadOptions;
}

export interface RecognitionResult {
  text: string;
  language?: string;
  confidence?: number;
  durationSeconds?: number;
}

export interface AppConfig {
  modelSize: string;
  asrDevice: string;
  asrComputeType: string;
  pythonBin: string;
  asrScriptPath: string;
  beamSize: number;
  vadFilter: boolean;
  vadMinSilenceMs: number;
  vadSpeechPadMs: number;
  sampleRate: number;
  blockDurationMs: number;
  chunkIntervalMs: number;
  minSpanMs: number;
  silenceAmplitudeThreshold: number;
  ffmpegBin: string;
  inputFormat: string;
  audioDevice: string;
  copyToClipboard: boolean;
  historyPath: string;
  historyMaxEntries: number;
  logDir: string;
  logLevel: LogLevel;
  hotkey: string;
  hotkeyMode: HotkeyMode;
  enforceOffline: boolean;
}
