interface RecognitionLatencySample {
  audioMs: number;
  recognitionMs: number;
}

interface PercentileSummary {
  p50: number;
  p95: number;
  max: number;
  avg: number;
}

export interface LatencySummary {
  calls: number;
  audioMs: PercentileSummary;
  recognitionMs: PercentileSummary;
  /** Recognition time over audio time, in thousandths. */
  realTimeFactorMilli: PercentileSummary;
}

const asSummary = (values: number[]): PercentileSummary => {
  if (values.length === 0) {
    return { p50: 0, p95: 0, max: 0, avg: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const pick = (pct: number): number => {
    const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil(sorted.length * pct) - 1));
    return sorted[index];
  };
  const total = sorted.reduce((sum, value) => sum + value, 0);

  return {
    p50: Math.round(pick(0.5)),
    p95: Math.round(pick(0.95)),
    max: Math.round(sorted[sorted.length - 1]),
    avg: Math.round(total / sorted.length)
  };
};

export class LatencyTracker {
  private samples: RecognitionLatencySample[] = [];

  public reset(): void {
    this.samples = [];
  }

  public push(sample: RecognitionLatencySample): void {
    this.samples.push(sample);
  }

  public summarize(): LatencySummary {
    return {
      calls: this.samples.length,
      audioMs: asSummary(this.samples.map((sample) => sample.audioMs)),
      recognitionMs: asSummary(this.samples.map((sample) => sample.recognitionMs)),
      realTimeFactorMilli: asSummary(
        this.samples.map((sample) => (sample.recognitionMs / Math.max(sample.audioMs, 1)) * 1000)
      )
    };
  }
}
