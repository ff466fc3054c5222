import fs from 'node:fs/promises';
import path from 'node:path';
import { LogLevel } from '../types';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  message: string;
}

export interface StructuredLoggerOptions {
  fileLevel?: LogLevel;
  consoleLevel?: LogLevel | 'silent';
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class StructuredLogger {
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly filePath: string,
    private readonly fileLevel: LogLevel,
    private readonly consoleLevel: LogLevel | 'silent'
  ) {}

  public static async create(
    logDir: string,
    options: StructuredLoggerOptions = {}
  ): Promise<StructuredLogger> {
    await fs.mkdir(logDir, { recursive: true });

    const datePrefix = new Date().toISOString().slice(0, 10);
    const filePath = path.join(logDir, `livescribe-${datePrefix}.log`);

    return new StructuredLogger(
      filePath,
      options.fileLevel ?? 'debug',
      options.consoleLevel ?? 'info'
    );
  }

  public getLogPath(): string {
    return this.filePath;
  }

  public debug(message: string, context: LogContext = {}): void {
    this.write('debug', message, context);
  }

  public info(message: string, context: LogContext = {}): void {
    this.write('info', message, context);
  }

  public warn(message: string, context: LogContext = {}): void {
    this.write('warn', message, context);
  }

  public error(message: string, context: LogContext = {}): void {
    this.write('error', message, context);
  }

  /** Resolves once every line logged so far has reached the file. */
  public async flush(): Promise<void> {
    await this.writeQueue;
  }

  private write(level: LogLevel, message: string, context: LogContext): void {
    if (LEVEL_RANK[level] >= LEVEL_RANK[this.fileLevel]) {
      const entry: LogEntry = {
        ts: new Date().toISOString(),
        level,
        message,
        ...context
      };

      const line = `${JSON.stringify(entry)}\n`;

      this.writeQueue = this.writeQueue
        .then(async () => {
          await fs.appendFile(this.filePath, line, 'utf8');
        })
        .catch((error) => {
          const detail = error instanceof Error ? error.message : String(error);
          console.error(`[LiveScribe] Failed to write log file: ${detail}`);
        });
    }

    if (this.consoleLevel === 'silent' || LEVEL_RANK[level] < LEVEL_RANK[this.consoleLevel]) {
      return;
    }

    // stdout belongs to the live transcript line.
    if (level === 'error') {
      console.error(`[LiveScribe] ${message}`, context);
      return;
    }

    if (level === 'warn') {
      console.warn(`[LiveScribe] ${message}`, context);
      return;
    }

    console.error(`[LiveScribe] ${message}`, context);
  }
}
