import os from 'node:os';
import path from 'node:path';
import { StreamCommitOptions } from './core/StreamCommitController';
import { AppConfig, HotkeyMode, LogLevel } from './types';

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseFloatOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return value.toLowerCase() === 'true';
};

const resolveLogLevel = (value: string | undefined): LogLevel => {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }

  return 'info';
};

const resolveHotkeyMode = (value: string | undefined): HotkeyMode => {
  if (value === 'push-to-talk') {
    return 'push-to-talk';
  }

  return 'toggle';
};

export const defaultInputFormat = (platform: NodeJS.Platform): string => {
  if (platform === 'darwin') {
    return 'avfoundation';
  }

  if (platform === 'win32') {
    return 'dshow';
  }

  return 'pulse';
};

export const defaultAudioDevice = (inputFormat: string): string =>
  inputFormat === 'avfoundation' ? '0' : 'default';

export const resolveConfig = (
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): AppConfig => {
  const rootDir = path.resolve(__dirname, '..');
  const dataDir = path.join(os.homedir(), '.livescribe');
  const inputFormat = env.LIVESCRIBE_INPUT_FORMAT ?? defaultInputFormat(platform);
  const chunkSeconds = parseFloatOrDefault(env.LIVESCRIBE_CHUNK_SECONDS, 2);

  return {
    modelSize: env.LIVESCRIBE_MODEL ?? 'base',
    asrDevice: env.LIVESCRIBE_ASR_DEVICE ?? 'cpu',
    asrComputeType: env.LIVESCRIBE_ASR_COMPUTE_TYPE ?? 'int8',
    pythonBin: env.LIVESCRIBE_PYTHON_BIN ?? 'python3',
    asrScriptPath: env.LIVESCRIBE_ASR_SCRIPT ?? path.join(rootDir, 'python', 'asr_runner.py'),
    beamSize: parseIntOrDefault(env.LIVESCRIBE_BEAM_SIZE, 1),
    vadFilter: parseBoolOrDefault(env.LIVESCRIBE_VAD_FILTER, true),
    vadMinSilenceMs: parseIntOrDefault(env.LIVESCRIBE_VAD_MIN_SILENCE_MS, 300),
    vadSpeechPadMs: parseIntOrDefault(env.LIVESCRIBE_VAD_SPEECH_PAD_MS, 100),
    sampleRate: parseIntOrDefault(env.LIVESCRIBE_SAMPLE_RATE, 16000),
    blockDurationMs: parseIntOrDefault(env.LIVESCRIBE_BLOCK_MS, 100),
    chunkIntervalMs: Math.round(chunkSeconds * 1000),
    minSpanMs: parseIntOrDefault(env.LIVESCRIBE_MIN_SPAN_MS, 300),
    silenceAmplitudeThreshold: parseFloatOrDefault(env.LIVESCRIBE_SILENCE_THRESHOLD, 0.005),
    ffmpegBin: env.LIVESCRIBE_FFMPEG_BIN ?? 'ffmpeg',
    inputFormat,
    audioDevice: env.LIVESCRIBE_AUDIO_DEVICE ?? defaultAudioDevice(inputFormat),
    copyToClipboard: parseBoolOrDefault(env.LIVESCRIBE_COPY_TO_CLIPBOARD, true),
    historyPath: env.LIVESCRIBE_HISTORY_PATH ?? path.join(dataDir, 'transcripts.json'),
    historyMaxEntries: parseIntOrDefault(env.LIVESCRIBE_HISTORY_MAX, 100),
    logDir: env.LIVESCRIBE_LOG_DIR ?? path.join(dataDir, 'logs'),
    logLevel: resolveLogLevel(env.LIVESCRIBE_LOG_LEVEL),
    hotkey: env.LIVESCRIBE_HOTKEY ?? '',
    hotkeyMode: resolveHotkeyMode(env.LIVESCRIBE_HOTKEY_MODE),
    enforceOffline: parseBoolOrDefault(env.LIVESCRIBE_ENFORCE_OFFLINE, true)
  };
};

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (!config.modelSize.trim()) {
    errors.push('LIVESCRIBE_MODEL must not be empty.');
  }

  if (!config.pythonBin.trim()) {
    errors.push('LIVESCRIBE_PYTHON_BIN must not be empty.');
  }

  if (!config.asrScriptPath.trim()) {
    errors.push('LIVESCRIBE_ASR_SCRIPT must not be empty.');
  }

  if (!config.ffmpegBin.trim()) {
    errors.push('LIVESCRIBE_FFMPEG_BIN must not be empty.');
  }

  if (!config.inputFormat.trim()) {
    errors.push('LIVESCRIBE_INPUT_FORMAT must not be empty.');
  }

  if (config.beamSize < 1 || config.beamSize > 10) {
    errors.push('LIVESCRIBE_BEAM_SIZE must be between 1 and 10.');
  }

  if (config.vadMinSilenceMs < 0 || config.vadMinSilenceMs > 5000) {
    errors.push('LIVESCRIBE_VAD_MIN_SILENCE_MS must be between 0 and 5000 milliseconds.');
  }

  if (config.vadSpeechPadMs < 0 || config.vadSpeechPadMs > 2000) {
    errors.push('LIVESCRIBE_VAD_SPEECH_PAD_MS must be between 0 and 2000 milliseconds.');
  }

  if (config.sampleRate < 8000 || config.sampleRate > 48000) {
    errors.push('LIVESCRIBE_SAMPLE_RATE must be between 8000 and 48000 Hz.');
  }

  if (config.blockDurationMs < 10 || config.blockDurationMs > 1000) {
    errors.push('LIVESCRIBE_BLOCK_MS must be between 10 and 1000 milliseconds.');
  }

  if (config.chunkIntervalMs < 250 || config.chunkIntervalMs > 30000) {
    errors.push('LIVESCRIBE_CHUNK_SECONDS must be between 0.25 and 30 seconds.');
  }

  if (config.minSpanMs < 0 || config.minSpanMs > config.chunkIntervalMs) {
    errors.push('LIVESCRIBE_MIN_SPAN_MS must be between 0 and the chunk interval.');
  }

  if (!(config.silenceAmplitudeThreshold >= 0 && config.silenceAmplitudeThreshold < 1)) {
    errors.push('LIVESCRIBE_SILENCE_THRESHOLD must be at least 0 and below 1.');
  }

  if (config.historyMaxEntries < 0) {
    errors.push('LIVESCRIBE_HISTORY_MAX must not be negative.');
  }

  if (!config.logDir.trim()) {
    errors.push('LIVESCRIBE_LOG_DIR must not be empty.');
  }

  return errors;
};

export const toStreamCommitOptions = (config: AppConfig): StreamCommitOptions => ({
  sampleRate: config.sampleRate,
  blockDurationMs: config.blockDurationMs,
  chunkIntervalMs: config.chunkIntervalMs,
  minSpanMs: config.minSpanMs,
  silenceAmplitudeThreshold: config.silenceAmplitudeThreshold,
  recognition: {
    beamSize: config.beamSize,
    vadFilter: config.vadFilter,
    vad: {
      minSilenceDurationMs: config.vadMinSilenceMs,
      speechPadMs: config.vadSpeechPadMs
    }
  }
});
