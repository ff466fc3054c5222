import fs from 'node:fs';
import path from 'node:path';
import { StructuredLogger } from '../logging/StructuredLogger';
import { makeWorkerEnv } from '../services/asr/FasterWhisperClient';
import { CommandRunner, runCommand } from '../services/process/runCommand';
import { AppConfig } from '../types';

type CheckedConfig = Pick<AppConfig, 'asrScriptPath' | 'pythonBin' | 'ffmpegBin' | 'enforceOffline'>;

const assertPathExists = (absolutePath: string, label: string): void => {
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`${label} not found at '${absolutePath}'. Set LIVESCRIBE_ASR_SCRIPT to override.`);
  }
};

export const runStartupChecks = async (
  config: CheckedConfig,
  logger?: StructuredLogger,
  commandRunner: CommandRunner = runCommand
): Promise<void> => {
  logger?.info('Running startup checks');

  assertPathExists(path.resolve(config.asrScriptPath), 'ASR worker script');

  await commandRunner(config.pythonBin, ['--version'], { timeoutMs: 8000 });

  try {
    await commandRunner(config.pythonBin, ['-c', 'import faster_whisper, numpy; print("deps-ok")'], {
      timeoutMs: 20000,
      env: makeWorkerEnv(config.enforceOffline)
    });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(
      `Python dependencies missing for '${config.pythonBin}'. Run: pip install faster-whisper numpy\n${detail}`
    );
  }

  await commandRunner(config.ffmpegBin, ['-version'], { timeoutMs: 8000 });

  logger?.info('Startup checks completed successfully');
};
