/**
 * Asynchronous byte channel the console talks over.
 *
 * Both calls start an operation and return immediately; 0 means it was
 * accepted. Completion is reported back through Cli.rxCallback() (one byte
 * has landed in the receive slot) and Cli.txCallback() (the buffer passed
 * to transmitAsync may be reused).
 */
export interface CliTransport<TContext = unknown> {
  transmitAsync(context: TContext, buffer: Uint8Array, length: number): number;
  receiveAsync(context: TContext, slot: Uint8Array, length: number): number;
}

export interface CliLogger {
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export type MessageLevel = 'raw' | 'info' | 'warn' | 'error';
