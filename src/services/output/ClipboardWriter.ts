import { StructuredLogger } from '../../logging/StructuredLogger';
import { CommandRunner, runCommand } from '../process/runCommand';

interface ClipboardTool {
  command: string;
  args: string[];
}

export interface ClipboardWriterOptions {
  platform?: NodeJS.Platform;
  commandRunner?: CommandRunner;
  timeoutMs?: number;
  logger?: StructuredLogger;
}

export const clipboardToolsFor = (platform: NodeJS.Platform): ClipboardTool[] => {
  if (platform === 'darwin') {
    return [{ command: 'pbcopy', args: [] }];
  }

  if (platform === 'win32') {
    return [{ command: 'clip', args: [] }];
  }

  return [
    { command: 'wl-copy', args: [] },
    { command: 'xclip', args: ['-selection', 'clipboard'] },
    { command: 'xsel', args: ['--clipboard', '--input'] }
  ];
};

/** Copies text to the system clipboard through the first helper tool that works. */
export class ClipboardWriter {
  private readonly tools: ClipboardTool[];
  private readonly commandRunner: CommandRunner;
  private readonly timeoutMs: number;
  private readonly logger?: StructuredLogger;

  public constructor(options: ClipboardWriterOptions = {}) {
    this.tools = clipboardToolsFor(options.platform ?? process.platform);
    this.commandRunner = options.commandRunner ?? runCommand;
    this.timeoutMs = options.timeoutMs ?? 4000;
    this.logger = options.logger;
  }

  /** Returns the tool that took the text, or undefined when none did. */
  public async copy(text: string): Promise<string | undefined> {
    if (!text) {
      return undefined;
    }

    const failures: string[] = [];

    for (const tool of this.tools) {
      try {
        await this.commandRunner(tool.command, tool.args, {
          stdin: text,
          timeoutMs: this.timeoutMs
        });
        this.logger?.info('Transcript copied to clipboard', {
          tool: tool.command,
          length: text.length
        });
        return tool.command;
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        failures.push(`${tool.command}: ${detail}`);
      }
    }

    this.logger?.warn('No clipboard tool accepted the transcript', { failures });
    return undefined;
  }

  public describeTools(): string[] {
    return this.tools.map((tool) => tool.command);
  }
}
