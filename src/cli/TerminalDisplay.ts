import { SessionReport, TranscriptDisplay } from '../core/LiveDictationApp';

export interface TextOutput {
  write(chunk: string): boolean;
  columns?: number;
}

const SEPARATOR = '─'.repeat(50);

const WIDE_RANGES: Array<[number, number]> = [
  [0x1100, 0x115f],
  [0x2e80, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe30, 0xfe4f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f300, 0x1f64f],
  [0x1f900, 0x1f9ff],
  [0x20000, 0x3fffd]
];

/** Terminal cells a code point occupies: two for CJK and emoji, one otherwise. */
export const cellWidth = (char: string): number => {
  const code = char.codePointAt(0) ?? 0;
  return WIDE_RANGES.some(([low, high]) => code >= low && code <= high) ? 2 : 1;
};

/** Keeps the newest part of the transcript that fits on one terminal row. */
export const fitToWidth = (text: string, columns?: number): string => {
  if (!columns || columns < 2) {
    return text;
  }

  const chars = Array.from(text);
  const widths = chars.map(cellWidth);
  if (widths.reduce((total, width) => total + width, 0) < columns) {
    return text;
  }

  // One cell for the ellipsis, one left free so the cursor does not wrap.
  const budget = columns - 2;
  let used = 0;
  let start = chars.length;
  while (start > 0 && used + widths[start - 1] <= budget) {
    start -= 1;
    used += widths[start];
  }

  return `…${chars.slice(start).join('')}`;
};

export class TerminalDisplay implements TranscriptDisplay {
  public constructor(private readonly output: TextOutput = process.stdout) {}

  public showListening(): void {
    this.output.write(`\n[listening] Speak now. Press Enter to stop.\n${SEPARATOR}\n`);
  }

  public renderPartial(transcript: string): void {
    this.output.write(`\r\x1b[K${fitToWidth(transcript, this.output.columns)}`);
  }

  public renderFinal(report: SessionReport): void {
    const { summary } = report;
    const lines: string[] = ['', SEPARATOR];

    if (summary.stopReason === 'capture-failure') {
      lines.push(`[capture ended] ${summary.captureError ?? 'audio input stopped unexpectedly'}`);
    }

    if (summary.transcript) {
      lines.push('', 'Final transcription:', '', summary.transcript);
      if (report.clipboardTool) {
        lines.push('', `Copied to clipboard (via ${report.clipboardTool})`);
      } else if (report.clipboardAttempted) {
        lines.push('', 'No clipboard tool accepted the text; install wl-copy or xclip to auto-copy');
      }
    } else if (summary.outcome === 'silent-input') {
      lines.push('', '(No speech detected: only silence was captured)');
    } else {
      lines.push('', '(No speech detected)');
    }

    this.output.write(`${lines.join('\n')}\n`);
  }
}
