import { CliError, CliStatus } from '../cli/status.js';

/** Bytes kept free between the write and read positions. */
export const RING_GUARD_BYTES = 4;

/**
 * Fixed-capacity byte FIFO over caller-owned storage.
 *
 * The writer may run from a receive-complete callback while the reader drains
 * from the main loop: only the writer moves `writeIndex` and only the reader
 * moves `readIndex`. The guard gap keeps a full ring distinguishable from an
 * empty one, so at most `size - RING_GUARD_BYTES` bytes are ever stored.
 */
export class RingBuffer {
  private readonly storage: Uint8Array;
  private readIndex = 0;
  private writeIndex = 0;

  constructor(storage: Uint8Array | number) {
    this.storage = typeof storage === 'number' ? new Uint8Array(storage) : storage;
    if (this.storage.length <= RING_GUARD_BYTES) {
      throw new CliError(
        CliStatus.INSUFFICIENT_STATE_MEMORY,
        `ring buffer needs more than ${RING_GUARD_BYTES} bytes, got ${this.storage.length}`,
      );
    }
  }

  get size(): number {
    return this.storage.length;
  }

  bytesAvailable(): number {
    const n = this.writeIndex - this.readIndex;
    return n < 0 ? n + this.storage.length : n;
  }

  spaceAvailable(): number {
    const n = this.readIndex - this.writeIndex - RING_GUARD_BYTES;
    return n < 0 ? n + this.storage.length : n;
  }

  /** All-or-nothing: returns false and stores nothing if `length` bytes don't fit or `source` is shorter. */
  write(source: Uint8Array, length = source.length): boolean {
    if (length > this.spaceAvailable() || length > source.length) return false;
    let w = this.writeIndex;
    for (let i = 0; i < length; i++) {
      this.storage[w] = source[i];
      w = w + 1 === this.storage.length ? 0 : w + 1;
    }
    this.writeIndex = w;
    return true;
  }

  writeByte(byte: number): boolean {
    if (this.spaceAvailable() < 1) return false;
    this.storage[this.writeIndex] = byte & 0xff;
    this.writeIndex = this.writeIndex + 1 === this.storage.length ? 0 : this.writeIndex + 1;
    return true;
  }

  /** All-or-nothing: returns false and consumes nothing if fewer than `length` bytes are stored. */
  read(target: Uint8Array, length = target.length): boolean {
    if (!this.peek(target, length)) return false;
    this.flush(length);
    return true;
  }

  /** Next byte, or -1 when empty. */
  readByte(): number {
    if (this.writeIndex === this.readIndex) return -1;
    const byte = this.storage[this.readIndex];
    this.readIndex = this.readIndex + 1 === this.storage.length ? 0 : this.readIndex + 1;
    return byte;
  }

  /** Copy without consuming. */
  peek(target: Uint8Array, length = target.length): boolean {
    if (length > this.bytesAvailable() || length > target.length) return false;
    let r = this.readIndex;
    for (let i = 0; i < length; i++) {
      target[i] = this.storage[r];
      r = r + 1 === this.storage.length ? 0 : r + 1;
    }
    return true;
  }

  /** Discard up to `length` bytes, clipped to what is stored. */
  flush(length: number): void {
    const n = Math.min(length, this.bytesAvailable());
    this.readIndex = (this.readIndex + n) % this.storage.length;
  }

  reset(): void {
    this.readIndex = 0;
    this.writeIndex = 0;
  }
}
