import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_STREAM_COMMIT_OPTIONS,
  RecognitionEngine,
  SessionSummary,
  SpanOutcome,
  StreamCommitController,
  StreamCommitOptions
} from '../StreamCommitController';
import { DeferredEngine, FakeAudioSource, RecordingSink, ScriptedEngine, tone } from './fakes';

// Cycles are driven by hand unless a test turns on fake timers.
const manualOptions: StreamCommitOptions = {
  ...DEFAULT_STREAM_COMMIT_OPTIONS,
  chunkIntervalMs: 60_000
};

const TWO_SECONDS = 32000;

const createSession = (engine: RecognitionEngine, options: StreamCommitOptions = manualOptions) => {
  const source = new FakeAudioSource();
  const sink = new RecordingSink();
  const controller = new StreamCommitController({ source, engine, sink }, undefined, options);
  return { source, sink, controller };
};

describe('StreamCommitController', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('commits each interval once and in order', async () => {
    const engine = new ScriptedEngine((call) => (call === 1 ? 'hello' : 'world'));
    const { source, sink, controller } = createSession(engine);
    await controller.start();

    source.push(tone(TWO_SECONDS));
    const first = await controller.runCycle();
    source.push(tone(TWO_SECONDS));
    const second = await controller.runCycle();

    expect(first).toEqual({ kind: 'committed', spanStart: 0, spanEnd: 32000, text: 'hello' });
    expect(second).toEqual({ kind: 'committed', spanStart: 32000, spanEnd: 64000, text: 'world' });
    expect(engine.calls.map((span) => span.length)).toEqual([32000, 32000]);
    expect(sink.partials).toEqual(['hello', 'hello world']);

    const summary = await controller.stop();

    expect(engine.calls).toHaveLength(2);
    expect(summary.transcript).toBe('hello world');
    expect(summary.outcome).toBe('transcribed');
    expect(summary.finalPass).toEqual({ kind: 'too-short', spanStart: 64000, spanEnd: 64000 });
    expect(summary.committedSamples).toBe(64000);
    expect(summary.capturedSeconds).toBe(4);
    expect(sink.finals).toHaveLength(1);
    expect(sink.finals[0].transcript).toBe('hello world');
  });

  it('flushes the tail after an in-flight recognition settles', async () => {
    const engine = new DeferredEngine();
    const { source, sink, controller } = createSession(engine);
    await controller.start();

    source.push(tone(TWO_SECONDS));
    const cycle = controller.runCycle();
    await vi.waitFor(() => {
      expect(engine.pending).toHaveLength(1);
    });

    source.push(tone(6400));
    const stopping = controller.stop();
    expect(controller.getState()).toBe('draining');

    engine.pending[0].resolve({ text: 'first words' });
    await cycle;
    await vi.waitFor(() => {
      expect(engine.pending).toHaveLength(2);
    });
    engine.pending[1].resolve({ text: 'tail' });

    const summary = await stopping;

    expect(engine.pending[1].samples.length).toBe(6400);
    expect(summary.fragments).toEqual(['first words', 'tail']);
    expect(summary.transcript).toBe('first words tail');
    expect(summary.finalPass).toEqual({ kind: 'committed', spanStart: 32000, spanEnd: 38400, text: 'tail' });
    expect(sink.partials).toEqual(['first words', 'first words tail']);
    expect(sink.finals).toHaveLength(1);
  });

  it('skips silence without calling the engine', async () => {
    const engine = new ScriptedEngine(() => 'unexpected');
    const { source, sink, controller } = createSession(engine);
    await controller.start();

    for (let index = 0; index < 4; index += 1) {
      source.push(tone(8000, 0.0001));
    }

    const first = await controller.runCycle();
    expect(first.kind).toBe('silent');
    expect(controller.getWatermark()).toBe(32000);

    const second = await controller.runCycle();
    expect(second).toEqual({ kind: 'too-short', spanStart: 32000, spanEnd: 32000 });
    expect(controller.getWatermark()).toBe(32000);
    expect(controller.getTranscript()).toBe('');

    source.push(tone(8000, 0.0001));
    const summary = await controller.stop();

    expect(engine.calls).toHaveLength(0);
    expect(summary.committedSamples).toBe(40000);
    expect(summary.totalSamples).toBe(40000);
    expect(summary.finalPass.kind).toBe('silent');
    expect(summary.outcome).toBe('silent-input');
    expect(sink.finals[0].transcript).toBe('');
  });

  it('leaves short spans pending during cycles and recognizes them at flush', async () => {
    const engine = new ScriptedEngine(() => 'hi');
    const { source, controller } = createSession(engine);
    await controller.start();

    source.push(tone(3200));
    const cycle = await controller.runCycle();

    expect(cycle).toEqual({ kind: 'too-short', spanStart: 0, spanEnd: 3200 });
    expect(controller.getWatermark()).toBe(0);
    expect(engine.calls).toHaveLength(0);

    const summary = await controller.stop();

    expect(engine.calls.map((span) => span.length)).toEqual([3200]);
    expect(summary.transcript).toBe('hi');
  });

  it('advances past spans that produce no text', async () => {
    const engine = new ScriptedEngine(() => '   ');
    const { source, sink, controller } = createSession(engine);
    await controller.start();

    source.push(tone(TWO_SECONDS));
    const cycle = await controller.runCycle();
    const summary = await controller.stop();

    expect(cycle).toEqual({ kind: 'no-speech', spanStart: 0, spanEnd: 32000 });
    expect(summary.committedSamples).toBe(32000);
    expect(summary.outcome).toBe('no-speech-detected');
    expect(summary.recognitionCalls).toBe(1);
    expect(sink.partials).toEqual([]);
  });

  it('drops a span whose recognition fails and keeps the session alive', async () => {
    const engine = new ScriptedEngine((call) => (call === 1 ? new Error('worker exited') : 'recovered'));
    const { source, controller } = createSession(engine);
    await controller.start();

    source.push(tone(TWO_SECONDS));
    const failed = await controller.runCycle();
    source.push(tone(TWO_SECONDS));
    const recovered = await controller.runCycle();
    const summary = await controller.stop();

    expect(failed).toEqual({ kind: 'failed', spanStart: 0, spanEnd: 32000, detail: 'worker exited' });
    expect(recovered).toEqual({ kind: 'committed', spanStart: 32000, spanEnd: 64000, text: 'recovered' });
    expect(summary.recognitionCalls).toBe(2);
    expect(summary.recognitionFailures).toBe(1);
    expect(summary.transcript).toBe('recovered');
  });

  it('keeps at most one recognition in flight', async () => {
    const engine = new ScriptedEngine((call) => `part${call}`);
    const { source, controller } = createSession(engine);
    await controller.start();

    source.push(tone(TWO_SECONDS));
    const first = controller.runCycle();
    await vi.waitFor(() => {
      expect(engine.calls).toHaveLength(1);
    });
    source.push(tone(TWO_SECONDS));
    const second = controller.runCycle();

    const outcomes = await Promise.all([first, second]);
    await controller.stop();

    expect(engine.maxInFlight).toBe(1);
    expect(outcomes.map((outcome) => outcome.kind)).toEqual(['committed', 'committed']);
    expect(controller.getFragments()).toEqual(['part1', 'part2']);
  });

  it('keeps blocks delivered while capture shuts down', async () => {
    const engine = new ScriptedEngine((call) => (call === 1 ? 'body' : 'end'));
    const { source, controller } = createSession(engine);
    await controller.start();
    source.blocksOnStop = [tone(1600)];

    source.push(tone(TWO_SECONDS));
    await controller.runCycle();
    const summary = await controller.stop();

    expect(engine.calls.map((span) => span.length)).toEqual([32000, 1600]);
    expect(summary.transcript).toBe('body end');
    expect(summary.totalSamples).toBe(33600);
  });

  it('ignores blocks that arrive after the session flushed', async () => {
    const engine = new ScriptedEngine(() => 'done');
    const { source, controller } = createSession(engine);
    await controller.start();
    source.push(tone(TWO_SECONDS));
    await controller.stop();

    source.push(tone(1600));

    expect(controller.getBufferedSamples()).toBe(32000);
    expect(await controller.runCycle()).toEqual({ kind: 'skipped', state: 'flushed' });
  });

  it('drains and reports when capture ends unexpectedly', async () => {
    const engine = new ScriptedEngine(() => 'partial words');
    const { source, sink, controller } = createSession(engine);
    const failures: string[] = [];
    controller.on('captureFailed', (error) => {
      failures.push(error.message);
    });
    const flushed = new Promise<SessionSummary>((resolve) => {
      controller.on('flushed', resolve);
    });
    await controller.start();

    source.push(tone(TWO_SECONDS));
    source.fail('device unplugged');
    const summary = await flushed;

    expect(failures).toEqual(['device unplugged']);
    expect(summary.stopReason).toBe('capture-failure');
    expect(summary.captureError).toBe('device unplugged');
    expect(summary.transcript).toBe('partial words');
    expect(sink.finals).toHaveLength(1);
    expect(source.stopCalls).toBe(1);
  });

  it('still flushes when capture cannot start, then rethrows', async () => {
    const engine = new ScriptedEngine(() => 'unused');
    const { source, sink, controller } = createSession(engine);
    source.startError = new Error('no microphone');

    await expect(controller.start()).rejects.toThrow('no microphone');

    expect(controller.getState()).toBe('flushed');
    expect(sink.finals).toHaveLength(1);
    expect(sink.finals[0].summary.stopReason).toBe('capture-failure');
    expect(sink.finals[0].summary.captureError).toBe('no microphone');
    expect(sink.finals[0].summary.outcome).toBe('silent-input');
  });

  it('moves through draining to flushed exactly once', async () => {
    const engine = new ScriptedEngine(() => 'x');
    const { controller, sink } = createSession(engine);
    const states: string[] = [];
    controller.on('stateChanged', (state) => {
      states.push(state);
    });
    await controller.start();

    const first = controller.stop();
    const second = controller.stop();
    expect(second).toBe(first);
    await first;

    expect(states).toEqual(['draining', 'flushed']);
    expect(sink.finals).toHaveLength(1);
  });

  it('refuses to start twice or after stopping', async () => {
    const engine = new ScriptedEngine(() => 'x');
    const { controller } = createSession(engine);
    await controller.start();

    await expect(controller.start()).rejects.toThrow('already started');
    await controller.stop();
    await expect(controller.start()).rejects.toThrow('already started');
  });

  it('logs sink failures without failing the session', async () => {
    const engine = new ScriptedEngine(() => 'words');
    const source = new FakeAudioSource();
    const controller = new StreamCommitController(
      {
        source,
        engine,
        sink: {
          onPartial: () => {
            throw new Error('terminal gone');
          },
          onFinal: async () => {
            throw new Error('clipboard gone');
          }
        }
      },
      undefined,
      manualOptions
    );
    await controller.start();

    source.push(tone(TWO_SECONDS));
    const outcome = await controller.runCycle();
    const summary = await controller.stop();

    expect(outcome.kind).toBe('committed');
    expect(summary.transcript).toBe('words');
    expect(controller.getState()).toBe('flushed');
  });

  it('runs cycles on the chunk interval', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const calls: number[] = [];
    const engine: RecognitionEngine = {
      transcribe: async (samples) => {
        calls.push(samples.length);
        return { text: `chunk${calls.length}` };
      }
    };
    const { source, controller } = createSession(engine, DEFAULT_STREAM_COMMIT_OPTIONS);
    await controller.start();

    source.push(tone(TWO_SECONDS));
    const firstSpan = new Promise<SpanOutcome>((resolve) => {
      controller.once('span', resolve);
    });
    await vi.advanceTimersByTimeAsync(1999);
    expect(calls).toEqual([]);
    await vi.advanceTimersByTimeAsync(1);
    await firstSpan;
    expect(calls).toEqual([32000]);

    await vi.advanceTimersByTimeAsync(1);
    source.push(tone(TWO_SECONDS));
    const secondSpan = new Promise<SpanOutcome>((resolve) => {
      controller.once('span', resolve);
    });
    await vi.advanceTimersByTimeAsync(2000);
    await secondSpan;

    const summary = await controller.stop();

    expect(calls).toEqual([32000, 32000]);
    expect(summary.transcript).toBe('chunk1 chunk2');
  });

  it('commits contiguous, non-overlapping spans under random interleavings', async () => {
    let seed = 12345;
    const random = (): number => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed / 2147483648;
    };

    for (let round = 0; round < 5; round += 1) {
      const engine = new ScriptedEngine((call) => {
        if (call % 5 === 0) {
          return new Error('transient');
        }

        return call % 3 === 0 ? '' : `w${call}`;
      });
      const { source, controller } = createSession(engine);
      const advancing: Array<{ spanStart: number; spanEnd: number }> = [];
      controller.on('span', (outcome) => {
        if (outcome.kind !== 'skipped' && outcome.kind !== 'too-short') {
          advancing.push({ spanStart: outcome.spanStart, spanEnd: outcome.spanEnd });
        }
      });
      await controller.start();

      let lastWatermark = 0;
      for (let step = 0; step < 40; step += 1) {
        if (random() < 0.6) {
          const length = 1 + Math.floor(random() * 12000);
          source.push(tone(length, random() < 0.3 ? 0.0001 : 0.3));
        } else {
          await controller.runCycle();
          expect(controller.getWatermark()).toBeGreaterThanOrEqual(lastWatermark);
          lastWatermark = controller.getWatermark();
        }
      }

      const summary = await controller.stop();

      let expectedStart = 0;
      for (const span of advancing) {
        expect(span.spanStart).toBe(expectedStart);
        expect(span.spanEnd).toBeGreaterThan(span.spanStart);
        expectedStart = span.spanEnd;
      }
      expect(expectedStart).toBe(summary.totalSamples);
      expect(summary.committedSamples).toBe(summary.totalSamples);

      const recognized = engine.calls.reduce((total, span) => total + span.length, 0);
      const silentSpans = advancing.length - engine.calls.length;
      expect(silentSpans).toBeGreaterThanOrEqual(0);
      expect(recognized).toBeLessThanOrEqual(summary.totalSamples);
    }
  });
});
