import fs from 'node:fs/promises';
import path from 'node:path';
import { StructuredLogger } from '../../logging/StructuredLogger';

export interface TranscriptRecord {
  /** Unix milliseconds. */
  timestamp: number;
  datetime: string;
  text: string;
  processTimeMs: number;
}

const pad = (value: number): string => String(value).padStart(2, '0');

export const formatLocalDatetime = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

const isTranscriptRecord = (value: unknown): value is TranscriptRecord => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'timestamp' in value &&
    typeof value.timestamp === 'number' &&
    'datetime' in value &&
    typeof value.datetime === 'string' &&
    'text' in value &&
    typeof value.text === 'string'
  );
};

const toRecord = (value: TranscriptRecord): TranscriptRecord => ({
  timestamp: value.timestamp,
  datetime: value.datetime,
  text: value.text,
  processTimeMs: typeof value.processTimeMs === 'number' ? value.processTimeMs : 0
});

/**
 * Keeps finished transcripts in a JSON array on disk, oldest first.
 * `maxEntries` of 0 keeps everything.
 */
export class TranscriptHistory {
  private writeQueue: Promise<unknown> = Promise.resolve();

  public constructor(
    private readonly filePath: string,
    private readonly maxEntries: number,
    private readonly logger?: StructuredLogger
  ) {}

  public getPath(): string {
    return this.filePath;
  }

  public async load(): Promise<TranscriptRecord[]> {
    let contents: string;
    try {
      contents = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }

      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch {
      this.logger?.warn('Transcript history is not valid JSON; starting fresh', {
        path: this.filePath
      });
      return [];
    }

    if (!Array.isArray(parsed)) {
      return [];
    }

    return parsed.filter(isTranscriptRecord).map(toRecord);
  }

  public append(text: string, processTimeMs: number, now: Date = new Date()): Promise<TranscriptRecord | undefined> {
    return this.enqueue(async () => {
      if (!text) {
        return undefined;
      }

      const record: TranscriptRecord = {
        timestamp: now.getTime(),
        datetime: formatLocalDatetime(now),
        text,
        processTimeMs: Math.round(processTimeMs)
      };

      const all = await this.load();
      all.push(record);
      await this.save(this.trim(all));
      return record;
    });
  }

  public delete(timestamp: number): Promise<boolean> {
    return this.enqueue(async () => {
      const all = await this.load();
      const index = all.findIndex((record) => record.timestamp === timestamp);
      if (index === -1) {
        return false;
      }

      all.splice(index, 1);
      await this.save(all);
      return true;
    });
  }

  public clear(): Promise<void> {
    return this.enqueue(async () => {
      await this.save([]);
    });
  }

  private trim(records: TranscriptRecord[]): TranscriptRecord[] {
    if (this.maxEntries <= 0 || records.length <= this.maxEntries) {
      return records;
    }

    return records.slice(records.length - this.maxEntries);
  }

  private async save(records: TranscriptRecord[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${JSON.stringify(records, null, 2)}\n`, 'utf8');
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.writeQueue.then(task);
    this.writeQueue = next.catch(() => undefined);
    return next;
  }
}
