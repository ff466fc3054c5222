import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TranscriptHistory, formatLocalDatetime } from '../TranscriptHistory';

describe('TranscriptHistory', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'livescribe-history-'));
    filePath = path.join(dir, 'nested', 'transcripts.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    await expect(new TranscriptHistory(filePath, 10).load()).resolves.toEqual([]);
  });

  it('appends records and writes them as pretty JSON', async () => {
    const history = new TranscriptHistory(filePath, 10);
    const when = new Date(2024, 2, 5, 9, 7, 3);

    const record = await history.append('first note', 812.4, when);

    expect(record).toEqual({
      timestamp: when.getTime(),
      datetime: '2024-03-05 09:07:03',
      text: 'first note',
      processTimeMs: 812
    });
    const raw = await fs.readFile(filePath, 'utf8');
    expect(raw.endsWith('}\n]\n')).toBe(true);
    await expect(history.load()).resolves.toEqual([record]);
  });

  it('ignores empty transcripts', async () => {
    const history = new TranscriptHistory(filePath, 10);

    await expect(history.append('', 10)).resolves.toBeUndefined();
    await expect(history.load()).resolves.toEqual([]);
  });

  it('keeps only the newest entries', async () => {
    const history = new TranscriptHistory(filePath, 2);

    await Promise.all([
      history.append('one', 1, new Date(2024, 0, 1, 0, 0, 1)),
      history.append('two', 1, new Date(2024, 0, 1, 0, 0, 2)),
      history.append('three', 1, new Date(2024, 0, 1, 0, 0, 3))
    ]);

    const texts = (await history.load()).map((record) => record.text);
    expect(texts).toEqual(['two', 'three']);
  });

  it('keeps everything when the maximum is zero', async () => {
    const history = new TranscriptHistory(filePath, 0);

    for (let index = 0; index < 5; index += 1) {
      await history.append(`note ${index}`, 1, new Date(2024, 0, 1, 0, 0, index));
    }

    await expect(history.load()).resolves.toHaveLength(5);
  });

  it('deletes by timestamp and clears', async () => {
    const history = new TranscriptHistory(filePath, 10);
    const kept = await history.append('keep', 1, new Date(2024, 0, 1, 0, 0, 1));
    const dropped = await history.append('drop', 1, new Date(2024, 0, 1, 0, 0, 2));

    await expect(history.delete(dropped?.timestamp ?? -1)).resolves.toBe(true);
    await expect(history.delete(12345)).resolves.toBe(false);
    await expect(history.load()).resolves.toEqual([kept]);

    await history.clear();
    await expect(history.load()).resolves.toEqual([]);
  });

  it('tells apart sessions finished within the same second', async () => {
    const history = new TranscriptHistory(filePath, 10);
    const first = await history.append('first', 1, new Date(2024, 0, 1, 0, 0, 1, 100));
    const second = await history.append('second', 1, new Date(2024, 0, 1, 0, 0, 1, 900));

    expect(first?.timestamp).not.toBe(second?.timestamp);
    await expect(history.delete(first?.timestamp ?? -1)).resolves.toBe(true);
    await expect(history.load()).resolves.toEqual([second]);
  });

  it('deletes a single entry when timestamps collide', async () => {
    const history = new TranscriptHistory(filePath, 10);
    const when = new Date(2024, 0, 1, 0, 0, 1);
    await history.append('one', 1, when);
    const survivor = await history.append('two', 1, when);

    await expect(history.delete(when.getTime())).resolves.toBe(true);
    await expect(history.load()).resolves.toEqual([survivor]);
  });

  it('recovers from a corrupt file and drops malformed entries', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '{not json', 'utf8');
    const history = new TranscriptHistory(filePath, 10);

    await expect(history.load()).resolves.toEqual([]);

    await fs.writeFile(
      filePath,
      JSON.stringify([{ timestamp: 1, datetime: 'x', text: 'ok' }, { text: 'missing fields' }]),
      'utf8'
    );
    await expect(history.load()).resolves.toEqual([{ timestamp: 1, datetime: 'x', text: 'ok', processTimeMs: 0 }]);
  });
});

describe('formatLocalDatetime', () => {
  it('zero-pads every field', () => {
    expect(formatLocalDatetime(new Date(2025, 10, 2, 3, 4, 5))).toBe('2025-11-02 03:04:05');
  });
});
