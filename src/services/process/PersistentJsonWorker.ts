import { ChildProcessWithoutNullStreams, spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { StructuredLogger } from '../../logging/StructuredLogger';

interface WorkerResponse {
  id?: string;
  ok?: boolean;
  result?: unknown;
  error?: string;
}

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (reason?: unknown) => void;
  timeoutHandle: NodeJS.Timeout;
}

export type WorkerProcess = EventEmitter &
  Pick<ChildProcessWithoutNullStreams, 'stdin' | 'stdout' | 'stderr' | 'kill'>;

export type SpawnWorkerProcess = (
  command: string,
  args: string[],
  env: NodeJS.ProcessEnv | undefined
) => WorkerProcess;

export interface PersistentJsonWorkerOptions {
  name: string;
  command: string;
  args: string[];
  env?: NodeJS.ProcessEnv;
  logger?: StructuredLogger;
  spawnProcess?: SpawnWorkerProcess;
  stopGraceMs?: number;
}

/** Request/response surface the recognition client depends on. */
export interface JsonWorker {
  start(): Promise<void>;
  request(payload: Record<string, unknown>, timeoutMs: number): Promise<unknown>;
  stop(): Promise<void>;
}

const spawnChild: SpawnWorkerProcess = (command, args, env) =>
  spawn(command, args, { env, stdio: 'pipe' });

const isWorkerResponse = (value: unknown): value is WorkerResponse =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Long-lived child process spoken to with one JSON object per line.
 * Requests carry an id; the worker answers `{ id, ok, result | error }`.
 */
export class PersistentJsonWorker implements JsonWorker {
  private child: WorkerProcess | undefined;
  private startPromise: Promise<void> | undefined;
  private stopping = false;
  private nextRequestId = 0;
  private stdoutBuffer = '';
  private stderrBuffer = '';
  private pending = new Map<string, PendingRequest>();

  public constructor(private readonly options: PersistentJsonWorkerOptions) {}

  public isRunning(): boolean {
    return Boolean(this.child);
  }

  public async start(): Promise<void> {
    if (this.child) {
      return;
    }

    if (this.startPromise) {
      await this.startPromise;
      return;
    }

    this.startPromise = this.spawnWorker();

    try {
      await this.startPromise;
    } finally {
      this.startPromise = undefined;
    }
  }

  public async request(payload: Record<string, unknown>, timeoutMs: number): Promise<unknown> {
    await this.start();

    const current = this.child;
    if (!current) {
      throw new Error(`${this.options.name} worker is not running`);
    }

    const requestId = `${Date.now()}-${++this.nextRequestId}`;

    return new Promise<unknown>((resolve, reject) => {
      const timeoutHandle = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new Error(`${this.options.name} worker request timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.pending.set(requestId, { resolve, reject, timeoutHandle });

      const serialized = JSON.stringify({ ...payload, id: requestId });
      current.stdin.write(`${serialized}\n`, (error) => {
        if (!error) {
          return;
        }

        const pending = this.pending.get(requestId);
        if (!pending) {
          return;
        }

        clearTimeout(pending.timeoutHandle);
        this.pending.delete(requestId);
        pending.reject(error);
      });
    });
  }

  public async stop(): Promise<void> {
    this.stopping = true;

    const current = this.child;
    if (!current) {
      return;
    }

    await new Promise<void>((resolve) => {
      let settled = false;

      const finish = (): void => {
        if (settled) {
          return;
        }

        settled = true;
        clearTimeout(killTimer);
        resolve();
      };

      current.once('close', () => {
        finish();
      });

      const killTimer = setTimeout(() => {
        if (!settled) {
          current.kill('SIGKILL');
          finish();
        }
      }, this.options.stopGraceMs ?? 1500);

      current.kill('SIGTERM');
    });

    this.child = undefined;
  }

  private async spawnWorker(): Promise<void> {
    this.stopping = false;
    const spawnProcess = this.options.spawnProcess ?? spawnChild;

    await new Promise<void>((resolve, reject) => {
      const child = spawnProcess(this.options.command, this.options.args, this.options.env);

      const onError = (error: Error): void => {
        this.child = undefined;
        reject(error);
      };

      child.once('error', onError);
      child.once('spawn', () => {
        child.off('error', onError);

        this.child = child;
        this.stdoutBuffer = '';
        this.stderrBuffer = '';

        child.stdout.on('data', (chunk: Buffer | string) => {
          this.handleStdoutChunk(chunk.toString());
        });

        child.stderr.on('data', (chunk: Buffer | string) => {
          const text = chunk.toString();
          this.stderrBuffer = this.tailString(`${this.stderrBuffer}${text}`, 4000);
          this.options.logger?.debug(`${this.options.name} worker stderr`, {
            detail: text.trim()
          });
        });

        child.on('error', (error: Error) => {
          this.options.logger?.warn(`${this.options.name} worker process error`, {
            detail: error.message
          });
        });

        child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
          if (this.stopping) {
            this.options.logger?.info(`${this.options.name} worker stopped`, { code, signal });
          } else {
            this.options.logger?.warn(`${this.options.name} worker exited`, {
              code,
              signal,
              stderr: this.stderrBuffer.trim()
            });
          }

          if (this.child === child) {
            this.child = undefined;
          }

          this.rejectAllPending(
            new Error(`${this.options.name} worker exited (code=${code}, signal=${signal ?? 'none'})`)
          );
        });

        this.options.logger?.info(`${this.options.name} worker started`, {
          command: this.options.command
        });

        resolve();
      });
    });
  }

  private handleStdoutChunk(chunk: string): void {
    this.stdoutBuffer += chunk;

    while (true) {
      const newlineIndex = this.stdoutBuffer.indexOf('\n');
      if (newlineIndex === -1) {
        break;
      }

      const line = this.stdoutBuffer.slice(0, newlineIndex).trim();
      this.stdoutBuffer = this.stdoutBuffer.slice(newlineIndex + 1);

      if (!line) {
        continue;
      }

      let parsed: unknown;

      try {
        parsed = JSON.parse(line);
      } catch {
        this.options.logger?.debug(`${this.options.name} worker emitted non-JSON line`, { line });
        continue;
      }

      if (!isWorkerResponse(parsed) || typeof parsed.id !== 'string') {
        this.options.logger?.debug(`${this.options.name} worker response missing id`, { line });
        continue;
      }

      const pending = this.pending.get(parsed.id);
      if (!pending) {
        this.options.logger?.debug(`${this.options.name} worker response for unknown request`, {
          responseId: parsed.id
        });
        continue;
      }

      clearTimeout(pending.timeoutHandle);
      this.pending.delete(parsed.id);

      if (parsed.ok === false) {
        pending.reject(new Error(parsed.error ?? `${this.options.name} worker request failed`));
        continue;
      }

      pending.resolve(parsed.result);
    }
  }

  private rejectAllPending(error: Error): void {
    const entries = Array.from(this.pending.values());
    this.pending.clear();

    for (const entry of entries) {
      clearTimeout(entry.timeoutHandle);
      entry.reject(error);
    }
  }

  private tailString(text: string, limit: number): string {
    if (text.length <= limit) {
      return text;
    }

    return text.slice(text.length - limit);
  }
}
