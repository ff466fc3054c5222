import { spawn } from 'node:child_process';

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdin?: string;
  timeoutMs?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

export class CommandNotFoundError extends Error {
  public constructor(public readonly command: string) {
    super(`Command not found: ${command}`);
    this.name = 'CommandNotFoundError';
  }
}

const isMissingBinary = (error: Error): boolean => 'code' in error && error.code === 'ENOENT';

export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: 'pipe'
    });

    let stdout = '';
    let stderr = '';
    let stdinError: Error | undefined;
    let settled = false;
    let timeoutHandle: NodeJS.Timeout | undefined;

    const settle = (finish: () => void): void => {
      if (settled) {
        return;
      }

      settled = true;
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      finish();
    };

    if (options.timeoutMs && options.timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        child.kill('SIGKILL');
        settle(() => reject(new Error(`Command timed out after ${options.timeoutMs}ms: ${command}`)));
      }, options.timeoutMs);
    }

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (error) => {
      settle(() => reject(isMissingBinary(error) ? new CommandNotFoundError(command) : error));
    });

    child.on('close', (code) => {
      if (code !== 0) {
        const suffix = stderr.trim() ? `\n${stderr.trim()}` : '';
        settle(() => reject(new Error(`Command failed (${code}): ${command}${suffix}`)));
        return;
      }

      if (stdinError) {
        const detail = stdinError.message;
        settle(() => reject(new Error(`Failed to write stdin for ${command}: ${detail}`)));
        return;
      }

      settle(() => resolve({ stdout, stderr }));
    });

    // A child that exits early closes stdin under us; report it once the process closes.
    child.stdin.on('error', (error) => {
      stdinError = error;
    });

    if (options.stdin !== undefined) {
      child.stdin.write(options.stdin);
    }
    child.stdin.end();
  });
