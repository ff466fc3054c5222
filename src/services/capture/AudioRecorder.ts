export interface AudioStreamOptions {
  sampleRate: number;
  blockDurationMs: number;
  onBlock: (block: Float32Array) => void;
  /** Raised when capture ends without a stop request (device dropout, process exit). */
  onEnd: (error: Error) => void;
}

export interface AudioRecorder {
  isCapturing(): boolean;
  start(options: AudioStreamOptions): Promise<void>;
  stop(): Promise<void>;
}
