/**
 * Append-only sample store for one dictation session.
 *
 * Blocks are copied on append and never touched again, so any range below
 * the current length is stable. `slice` returns a fresh contiguous copy.
 */
export class AudioBuffer {
  private blocks: Float32Array[] = [];
  private blockStarts: number[] = [];
  private totalSamples = 0;
  private released = false;

  public get length(): number {
    return this.totalSamples;
  }

  public isReleased(): boolean {
    return this.released;
  }

  public append(block: Float32Array): void {
    if (this.released) {
      throw new Error('Cannot append to a released audio buffer');
    }

    if (block.length === 0) {
      return;
    }

    this.blockStarts.push(this.totalSamples);
    this.blocks.push(Float32Array.from(block));
    this.totalSamples += block.length;
  }

  public slice(start: number, end: number = this.totalSamples): Float32Array {
    if (this.released) {
      throw new Error('Cannot read from a released audio buffer');
    }

    if (start < 0 || end > this.totalSamples || start > end) {
      throw new RangeError(
        `Invalid audio range [${start}, ${end}) for buffer of ${this.totalSamples} samples`
      );
    }

    const output = new Float32Array(end - start);
    if (output.length === 0) {
      return output;
    }

    let blockIndex = this.findBlock(start);
    let writeOffset = 0;
    let position = start;

    while (position < end) {
      const block = this.blocks[blockIndex];
      const blockStart = this.blockStarts[blockIndex];
      const from = position - blockStart;
      const to = Math.min(block.length, end - blockStart);

      output.set(block.subarray(from, to), writeOffset);
      writeOffset += to - from;
      position += to - from;
      blockIndex += 1;
    }

    return output;
  }

  /** Drops sample storage. The length stays readable for reporting. */
  public release(): void {
    this.released = true;
    this.blocks = [];
    this.blockStarts = [];
  }

  private findBlock(sampleIndex: number): number {
    let low = 0;
    let high = this.blockStarts.length - 1;

    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.blockStarts[mid] <= sampleIndex) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return low;
  }
}
