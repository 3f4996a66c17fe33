/**
 * Serves an in-memory payload to an engine's read requests.
 *
 * Each `read(size)` returns at most `size` of the bytes not yet delivered;
 * an empty buffer means the payload is exhausted.
 */
export class PayloadSource {
  private readonly payload: Buffer;
  private offset = 0;

  constructor(payload: Buffer | string) {
    this.payload = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
  }

  get bytesRead(): number {
    return this.offset;
  }

  get length(): number {
    return this.payload.length;
  }

  get remaining(): number {
    return this.payload.length - this.offset;
  }

  read(size: number): Buffer {
    const count = Math.min(this.remaining, Math.max(0, size));
    if (count === 0) {
      return Buffer.alloc(0);
    }

    const chunk = this.payload.subarray(this.offset, this.offset + count);
    this.offset += count;
    return chunk;
  }
}
