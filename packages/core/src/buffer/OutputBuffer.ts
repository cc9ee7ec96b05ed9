import { CliStatus, type CliStatusCode } from '../cli/status.js';

/** Hands a filled buffer to the transport. 0 means the transmission was started. */
export type TransmitFn = (buffer: Uint8Array, length: number) => number;

/**
 * Ping-pong output staging.
 *
 * Output accumulates in the active buffer. A flush hands the active buffer to
 * the transport and switches to the other one, so writers keep producing while
 * the transport sends. Only one transmission is in flight at a time; the
 * transport reports completion through markTransmitComplete().
 */
export class OutputBuffer {
  private readonly buffers: readonly [Uint8Array, Uint8Array];
  private readonly limit: number;
  private active: 0 | 1 = 0;
  private stored = 0;
  private txComplete = true;

  constructor(capacity: number, buffers?: readonly [Uint8Array, Uint8Array]) {
    this.limit = capacity;
    this.buffers = buffers ?? [new Uint8Array(capacity), new Uint8Array(capacity)];
  }

  get capacity(): number {
    return this.limit;
  }

  get bytesStored(): number {
    return this.stored;
  }

  get transmitComplete(): boolean {
    return this.txComplete;
  }

  freeSpace(): number {
    return this.limit - this.stored;
  }

  // ─── Writers: a put lands whole or not at all ───

  putByte(byte: number): boolean {
    if (this.stored + 1 >= this.limit) return false;
    this.buffers[this.active][this.stored++] = byte & 0xff;
    return true;
  }

  putString(text: string): boolean {
    if (this.stored + text.length >= this.limit) return false;
    const target = this.buffers[this.active];
    for (let i = 0; i < text.length; i++) {
      target[this.stored++] = text.charCodeAt(i) & 0xff;
    }
    return true;
  }

  putBytes(data: Uint8Array, start = 0, end = data.length): boolean {
    const length = end - start;
    if (length <= 0) return true;
    if (this.stored + length >= this.limit) return false;
    this.buffers[this.active].set(data.subarray(start, end), this.stored);
    this.stored += length;
    return true;
  }

  // ─── Transmission ───

  flush(transmit: TransmitFn): CliStatusCode {
    if (!this.txComplete) return CliStatus.TRANSMISSION_IN_PROGRESS;
    if (this.stored === 0) return CliStatus.SUCCESS;

    const outgoing = this.active;
    const length = this.stored;
    this.txComplete = false;
    if (transmit(this.buffers[outgoing], length) !== 0) {
      this.txComplete = true;
      return CliStatus.COMM_ERROR;
    }
    this.active = outgoing === 0 ? 1 : 0;
    this.stored = 0;
    return CliStatus.SUCCESS;
  }

  markTransmitComplete(): void {
    this.txComplete = true;
  }

  reset(): void {
    this.active = 0;
    this.stored = 0;
    this.txComplete = true;
  }
}
