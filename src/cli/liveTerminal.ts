#!/usr/bin/env node
import readline from 'node:readline';
import { config as loadDotenv } from 'dotenv';
import { runStartupChecks } from '../bootstrap/startupChecks';
import { resolveConfig, toStreamCommitOptions, validateConfig } from '../config';
import { LiveDictationApp } from '../core/LiveDictationApp';
import { StructuredLogger } from '../logging/StructuredLogger';
import { FasterWhisperClient } from '../services/asr/FasterWhisperClient';
import { FfmpegRecorder } from '../services/capture/FfmpegRecorder';
import { TranscriptHistory } from '../services/history/TranscriptHistory';
import { GlobalHotkey } from '../services/hotkey/GlobalHotkey';
import { ClipboardWriter } from '../services/output/ClipboardWriter';
import { TerminalDisplay } from './TerminalDisplay';
import { USAGE, applyCliOverrides, parseCliArgs } from './args';

const printHelp = (): void => {
  process.stdout.write('\n');
  process.stdout.write('Commands:\n');
  process.stdout.write('  <enter>             Start/stop listening\n');
  process.stdout.write('  /status             Print current state\n');
  process.stdout.write('  /help               Show this list\n');
  process.stdout.write('  /quit               Flush the session and exit\n');
  process.stdout.write('  Ctrl+C              Same as /quit\n');
  process.stdout.write('\n');
};

const main = async (): Promise<void> => {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    process.stdout.write(USAGE);
    return;
  }

  loadDotenv();

  const config = applyCliOverrides(resolveConfig(), cli);
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n- ${errors.join('\n- ')}`);
  }

  const logger = await StructuredLogger.create(config.logDir, {
    fileLevel: config.logLevel,
    consoleLevel: 'warn'
  });
  logger.info('Starting livescribe', {
    model: config.modelSize,
    asrDevice: config.asrDevice,
    chunkIntervalMs: config.chunkIntervalMs,
    inputFormat: config.inputFormat,
    audioDevice: config.audioDevice
  });

  await runStartupChecks(config, logger);

  const engine = new FasterWhisperClient(config, logger);
  const app = new LiveDictationApp(
    {
      recorder: new FfmpegRecorder({
        ffmpegBin: config.ffmpegBin,
        inputFormat: config.inputFormat,
        device: config.audioDevice,
        logger
      }),
      engine,
      display: new TerminalDisplay(),
      clipboard: config.copyToClipboard ? new ClipboardWriter({ logger }) : undefined,
      history: config.historyPath
        ? new TranscriptHistory(config.historyPath, config.historyMaxEntries, logger)
        : undefined
    },
    logger,
    toStreamCommitOptions(config)
  );

  let shuttingDown = false;
  let commandChain = Promise.resolve();

  const queue = (fn: () => Promise<void>): void => {
    commandChain = commandChain
      .then(fn)
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        process.stderr.write(`\n[error] ${detail}\n`);
      });
  };

  app.on('stateChanged', (state) => {
    if (state.stage === 'error' && state.detail) {
      process.stderr.write(`\n[state:error] ${state.detail}\n`);
      return;
    }

    if (state.stage === 'draining') {
      process.stdout.write('\n[stopping] Transcribing remaining audio...\n');
      return;
    }

    if (state.stage === 'idle' && !shuttingDown) {
      process.stdout.write('\n[idle] Press Enter to listen again.\n');
    }
  });

  process.stdout.write(`Loading Whisper model '${config.modelSize}' on ${config.asrDevice}...\n`);
  await app.warmupWorkers();
  process.stdout.write('Model loaded.\n');
  process.stdout.write(`Chunk interval: ${config.chunkIntervalMs / 1000}s\n`);
  process.stdout.write(`Log file: ${logger.getLogPath()}\n`);
  printHelp();

  const hotkey = config.hotkey
    ? new GlobalHotkey(
        config.hotkey,
        config.hotkeyMode === 'push-to-talk'
          ? {
              onPress: () => app.handlePushToTalkPressed(),
              onRelease: () => app.handlePushToTalkReleased()
            }
          : {
              onPress: () => app.toggleListening(),
              onRelease: () => undefined
            },
        logger
      )
    : undefined;

  if (hotkey) {
    try {
      await hotkey.start();
      process.stdout.write(`Global hotkey: ${hotkey.describeBinding()} (${config.hotkeyMode})\n`);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.warn('Global hotkey unavailable; keyboard commands still work', { detail });
    }
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true
  });

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    hotkey?.stop();
    await app.shutdown();
    await logger.flush();
    rl.close();
    process.stdout.write('\nBye.\n');
    process.exit(0);
  };

  // readline owns Ctrl+C while the terminal is in raw mode.
  rl.on('SIGINT', () => {
    queue(shutdown);
  });
  process.on('SIGINT', () => {
    queue(shutdown);
  });
  process.on('SIGTERM', () => {
    queue(shutdown);
  });

  rl.on('line', (line) => {
    const input = line.trim();

    if (input === '/quit') {
      queue(shutdown);
      return;
    }

    if (input === '/status') {
      const state = app.getState();
      process.stdout.write(`[status] stage=${state.stage}${state.detail ? ` detail=${state.detail}` : ''}\n`);
      return;
    }

    if (input === '/help') {
      printHelp();
      return;
    }

    if (input.length > 0) {
      process.stdout.write('Unknown command. Use /help, /status, or /quit.\n');
      return;
    }

    queue(() => app.toggleListening());
  });

  queue(() => app.startListening());
};

if (require.main === module) {
  main().catch((error) => {
    const detail = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${detail}\n`);
    process.exit(1);
  });
}
