export const BYTES_PER_SAMPLE = 2;

export function segmentSizeBytes(sampleRate: number, segmentDurationMs: number): number {
  return Math.floor((sampleRate * BYTES_PER_SAMPLE * segmentDurationMs) / 1000);
}

/**
 * Slices a PCM byte stream into fixed-size segments. Bytes that do not fill a
 * segment stay buffered until the next push or the final drain.
 */
export class AudioSegmenter {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(readonly segmentSize: number) {
    if (!Number.isInteger(segmentSize) || segmentSize <= 0 || segmentSize % BYTES_PER_SAMPLE !== 0) {
      throw new RangeError(`segment size must be a positive whole number of samples, got ${segmentSize}`);
    }
  }

  get bufferedBytes(): number {
    return this.buffer.length;
  }

  push(chunk: Buffer): Buffer[] {
    if (chunk.length > 0) {
      this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
    }
    const segments: Buffer[] = [];
    let offset = 0;
    while (this.buffer.length - offset >= this.segmentSize) {
      segments.push(this.buffer.subarray(offset, offset + this.segmentSize));
      offset += this.segmentSize;
    }
    if (offset > 0) {
      this.buffer = Buffer.from(this.buffer.subarray(offset));
    }
    return segments;
  }

  drainFinal(): Buffer {
    const remainder = this.buffer;
    this.buffer = Buffer.alloc(0);
    return remainder;
  }
}
