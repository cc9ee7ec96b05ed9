import type { Readable, Writable } from 'node:stream';
import { ReadStream } from 'node:tty';
import type { CliLogger, CliStatusCode, CliTransport } from '@termline/core';

/** The part of a Cli the transport drives. */
export interface ConsoleEndpoint {
  rxCallback(): CliStatusCode;
  txCallback(): CliStatusCode;
  pump(): CliStatusCode;
  flushMessages(): CliStatusCode;
}

export interface NodeTransportOptions {
  /** Default: process.stdin, switched to raw mode when it is a TTY. */
  input?: Readable;
  /** Default: process.stdout */
  output?: Writable;
  logger?: CliLogger;
}

/** Received bytes handed over between two pumps. Keeps a paste from overrunning the receive ring. */
const PUMP_EVERY = 64;

/**
 * CliTransport over a Node.js readable/writable pair.
 *
 * Every byte read from the input is delivered through the armed receive
 * slot and Cli.rxCallback(), one at a time, the way a UART interrupt would.
 * Each chunk is followed by a pump and a flush; a finished write reports
 * txCallback() and flushes whatever accumulated meanwhile.
 */
export class NodeTransport implements CliTransport {
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly logger: CliLogger;
  private endpoint: ConsoleEndpoint | null = null;
  private slot: Uint8Array | null = null;
  private closing = false;

  constructor(options: NodeTransportOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.logger = options.logger ?? console;
  }

  attach(endpoint: ConsoleEndpoint): void {
    this.endpoint = endpoint;
    if (this.input instanceof ReadStream && this.input.isTTY) {
      this.input.setRawMode(true);
    }
    this.input.on('data', this.onData);
    this.input.once('end', this.onEnd);
    this.input.resume();
  }

  detach(): void {
    this.input.off('data', this.onData);
    this.input.off('end', this.onEnd);
    if (this.input instanceof ReadStream && this.input.isTTY) {
      this.input.setRawMode(false);
    }
    this.input.pause();
    this.endpoint = null;
  }

  /** Detach once the input being processed has run and its output has been handed to the stream. */
  close(): void {
    this.closing = true;
  }

  get attached(): boolean {
    return this.endpoint !== null;
  }

  // ─── CliTransport ───

  receiveAsync(_context: unknown, slot: Uint8Array, length: number): number {
    if (length !== 1) return -1;
    this.slot = slot;
    return 0;
  }

  transmitAsync(_context: unknown, buffer: Uint8Array, length: number): number {
    if (!this.output.writable) return -1;
    // Completions still reach the console after detach, so queued output drains.
    const endpoint = this.endpoint;
    this.output.write(Buffer.from(buffer.buffer, buffer.byteOffset, length), (err) => {
      if (err) this.logger.warn(`write failed: ${err.message}`);
      if (!endpoint) return;
      endpoint.txCallback();
      endpoint.flushMessages();
    });
    return 0;
  }

  /** Process queued input and send pending output. */
  service(): void {
    const endpoint = this.endpoint;
    if (!endpoint) return;
    endpoint.pump();
    endpoint.flushMessages();
    if (this.closing) {
      this.closing = false;
      this.detach();
    }
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const endpoint = this.endpoint;
    if (!endpoint) return;
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk;

    for (let i = 0; i < bytes.length; i++) {
      const slot = this.slot;
      if (!slot) {
        this.logger.warn('receive not armed, dropping input');
        break;
      }
      this.slot = null;
      slot[0] = bytes[i];
      endpoint.rxCallback();
      if ((i + 1) % PUMP_EVERY === 0) {
        endpoint.pump();
        if (this.closing) break;
      }
    }
    this.service();
  };

  private readonly onEnd = (): void => {
    this.service();
    this.detach();
  };
}
