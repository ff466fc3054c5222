import { parseArgs } from 'node:util';
import { AppConfig } from '../types';

export interface CliOptions {
  help: boolean;
  model?: string;
  chunkSeconds?: number;
  device?: string;
  asrDevice?: string;
  noClipboard: boolean;
}

export const USAGE = `Usage: livescribe [options]

Live microphone transcription in the terminal.

Options:
  -m, --model <size>      Speech model size (tiny, base, small, medium, large-v3)
  -c, --chunk <seconds>   Seconds of audio between recognition passes
  -d, --device <device>   Audio input device index or name
      --asr-device <dev>  Device for the speech model (cpu, cuda, auto)
      --no-clipboard      Do not copy the final transcript to the clipboard
  -h, --help              Show this help
`;

export const parseCliArgs = (argv: string[]): CliOptions => {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      model: { type: 'string', short: 'm' },
      chunk: { type: 'string', short: 'c' },
      device: { type: 'string', short: 'd' },
      'asr-device': { type: 'string' },
      'no-clipboard': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' }
    }
  });

  let chunkSeconds: number | undefined;
  if (values.chunk !== undefined) {
    chunkSeconds = Number(values.chunk);
    if (!Number.isFinite(chunkSeconds) || chunkSeconds <= 0) {
      throw new Error(`--chunk expects a positive number of seconds, got '${values.chunk}'`);
    }
  }

  return {
    help: values.help ?? false,
    model: values.model,
    chunkSeconds,
    device: values.device,
    asrDevice: values['asr-device'],
    noClipboard: values['no-clipboard'] ?? false
  };
};

/** Flags win over the environment. */
export const applyCliOverrides = (config: AppConfig, options: CliOptions): AppConfig => ({
  ...config,
  modelSize: options.model ?? config.modelSize,
  chunkIntervalMs:
    options.chunkSeconds === undefined ? config.chunkIntervalMs : Math.round(options.chunkSeconds * 1000),
  audioDevice: options.device ?? config.audioDevice,
  asrDevice: options.asrDevice ?? config.asrDevice,
  copyToClipboard: options.noClipboard ? false : config.copyToClipboard
});
