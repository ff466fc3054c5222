import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { PersistentJsonWorker, SpawnWorkerProcess } from '../PersistentJsonWorker';

interface WorkerRequest {
  id: string;
  action?: string;
}

class FakeWorkerProcess extends EventEmitter {
  public readonly stdin = new PassThrough();
  public readonly stdout = new PassThrough();
  public readonly stderr = new PassThrough();
  public readonly signals: Array<NodeJS.Signals | number | undefined> = [];
  public readonly requests: WorkerRequest[] = [];

  public constructor(private readonly closeOnKill: boolean) {
    super();
  }

  public kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    if (this.closeOnKill) {
      setImmediate(() => {
        this.emit('close', null, signal);
      });
    }
    return true;
  }

  /** Answers every request line with whatever `reply` returns. */
  public answer(reply: (request: WorkerRequest) => string | undefined): void {
    let buffered = '';
    this.stdin.on('data', (chunk: Buffer) => {
      buffered += chunk.toString();
      let newline = buffered.indexOf('\n');
      while (newline !== -1) {
        const request: WorkerRequest = JSON.parse(buffered.slice(0, newline));
        buffered = buffered.slice(newline + 1);
        this.requests.push(request);
        const line = reply(request);
        if (line !== undefined) {
          this.stdout.write(line);
        }
        newline = buffered.indexOf('\n');
      }
    });
  }
}

const createWorker = (options: { closeOnKill?: boolean; stopGraceMs?: number } = {}) => {
  const child = new FakeWorkerProcess(options.closeOnKill ?? true);
  const spawned: Array<{ command: string; args: string[] }> = [];
  const spawnProcess: SpawnWorkerProcess = (command, args) => {
    spawned.push({ command, args });
    setImmediate(() => {
      child.emit('spawn');
    });
    return child;
  };
  const worker = new PersistentJsonWorker({
    name: 'asr',
    command: 'python3',
    args: ['runner.py', '--serve'],
    spawnProcess,
    stopGraceMs: options.stopGraceMs
  });

  return { child, spawned, worker };
};

describe('PersistentJsonWorker', () => {
  it('spawns once and matches responses to requests by id', async () => {
    const { child, spawned, worker } = createWorker();
    child.answer((request) => `${JSON.stringify({ id: request.id, ok: true, result: { echo: request.action } })}\n`);

    const first = await worker.request({ action: 'warmup' }, 1000);
    const second = await worker.request({ action: 'transcribe' }, 1000);

    expect(first).toEqual({ echo: 'warmup' });
    expect(second).toEqual({ echo: 'transcribe' });
    expect(spawned).toEqual([{ command: 'python3', args: ['runner.py', '--serve'] }]);
    expect(child.requests.map((request) => typeof request.id)).toEqual(['string', 'string']);
    expect(child.requests[0].id).not.toBe(child.requests[1].id);
    expect(worker.isRunning()).toBe(true);
  });

  it('rejects with the error the worker reports', async () => {
    const { child, worker } = createWorker();
    child.answer((request) => `${JSON.stringify({ id: request.id, ok: false, error: 'model not loaded' })}\n`);

    await expect(worker.request({ action: 'transcribe' }, 1000)).rejects.toThrow('model not loaded');
  });

  it('skips noise on stdout and responses split across chunks', async () => {
    const { child, worker } = createWorker();
    child.answer((request) => {
      const response = JSON.stringify({ id: request.id, ok: true, result: 'done' });
      child.stdout.write('Loading model...\n');
      child.stdout.write('{"ok":true}\n');
      child.stdout.write(response.slice(0, 5));
      return `${response.slice(5)}\n`;
    });

    await expect(worker.request({ action: 'warmup' }, 1000)).resolves.toBe('done');
  });

  it('fails pending requests when the worker exits', async () => {
    const { child, worker } = createWorker();
    child.answer(() => undefined);

    const pending = worker.request({ action: 'transcribe' }, 5000);
    await new Promise<void>((resolve) => {
      setImmediate(resolve);
    });
    child.emit('close', 1, null);

    await expect(pending).rejects.toThrow('asr worker exited (code=1, signal=none)');
    expect(worker.isRunning()).toBe(false);
  });

  it('times out requests the worker never answers', async () => {
    const { child, worker } = createWorker();
    child.answer(() => undefined);

    await expect(worker.request({ action: 'transcribe' }, 20)).rejects.toThrow(
      'asr worker request timed out after 20ms'
    );
  });

  it('rejects start when the process cannot be spawned', async () => {
    const child = new FakeWorkerProcess(true);
    const worker = new PersistentJsonWorker({
      name: 'asr',
      command: 'missing-python',
      args: [],
      spawnProcess: () => {
        setImmediate(() => {
          child.emit('error', new Error('spawn missing-python ENOENT'));
        });
        return child;
      }
    });

    await expect(worker.start()).rejects.toThrow('ENOENT');
    expect(worker.isRunning()).toBe(false);
  });

  it('stops with SIGTERM', async () => {
    const { child, worker } = createWorker();
    await worker.start();

    await worker.stop();

    expect(child.signals).toEqual(['SIGTERM']);
    expect(worker.isRunning()).toBe(false);
  });

  it('escalates to SIGKILL when the worker ignores SIGTERM', async () => {
    const { child, worker } = createWorker({ closeOnKill: false, stopGraceMs: 10 });
    await worker.start();

    await worker.stop();

    expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);
  });
});
