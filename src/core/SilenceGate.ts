export interface SilenceGateOptions {
  minSpanSamples: number;
  silenceAmplitudeThreshold: number;
}

export type SilenceVerdict = 'too-short' | 'silent' | 'actionable';

export interface SilenceEvaluation {
  verdict: SilenceVerdict;
  tooShort: boolean;
  silent: boolean;
  actionable: boolean;
  peakAmplitude: number;
}

/** `flush` waives the minimum length; the final pass never sees its span again. */
export type GateMode = 'cycle' | 'flush';

export const peakAmplitude = (span: Float32Array): number => {
  let peak = 0;
  for (let index = 0; index < span.length; index += 1) {
    const magnitude = Math.abs(span[index]);
    if (magnitude > peak) {
      peak = magnitude;
    }
  }

  return peak;
};

const toEvaluation = (verdict: SilenceVerdict, peak: number): SilenceEvaluation => ({
  verdict,
  tooShort: verdict === 'too-short',
  silent: verdict === 'silent',
  actionable: verdict === 'actionable',
  peakAmplitude: peak
});

export class SilenceGate {
  public constructor(private readonly options: SilenceGateOptions) {
    if (options.minSpanSamples < 0) {
      throw new Error('minSpanSamples must not be negative.');
    }

    if (options.silenceAmplitudeThreshold < 0) {
      throw new Error('silenceAmplitudeThreshold must not be negative.');
    }
  }

  public evaluate(span: Float32Array, mode: GateMode = 'cycle'): SilenceEvaluation {
    const minimum = mode === 'flush' ? 1 : Math.max(1, this.options.minSpanSamples);
    if (span.length < minimum) {
      return toEvaluation('too-short', 0);
    }

    const peak = peakAmplitude(span);
    if (peak < this.options.silenceAmplitudeThreshold) {
      return toEvaluation('silent', peak);
    }

    return toEvaluation('actionable', peak);
  }
}
