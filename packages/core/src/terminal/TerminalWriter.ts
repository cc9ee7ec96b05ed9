import type { OutputBuffer } from '../buffer/OutputBuffer.js';
import { CliStatus, type CliStatusCode } from '../cli/status.js';
import type { CommandIO } from '../dispatch/types.js';
import { CONTROL_SEQUENCES, Control, type ControlAction } from './controls.js';
import type { CliLogger, MessageLevel } from './transport.js';

const MESSAGE_PREFIX: Record<Exclude<MessageLevel, 'raw'>, string> = {
  info: '',
  warn: 'WARNING: ',
  error: 'ERROR: ',
};

/**
 * Everything that reaches the wire goes through here: plain text, control
 * sequences gated by the echo flags, and formatted messages.
 */
export class TerminalWriter implements CommandIO {
  /** Echo typed characters and cursor controls. */
  echo = true;
  /** Emit control sequences at all. CR and newline ignore `echo`. */
  displayCtrlChars = true;

  private readonly output: OutputBuffer;
  private readonly maxMessageSize: number;
  private readonly logger: CliLogger;
  private overflowReported = false;

  constructor(output: OutputBuffer, maxMessageSize: number, logger: CliLogger) {
    this.output = output;
    this.maxMessageSize = maxMessageSize;
    this.logger = logger;
  }

  control(action: ControlAction): void {
    if (!this.displayCtrlChars) return;
    if (action !== Control.CarriageReturn && action !== Control.NewLine && !this.echo) return;
    this.putString(CONTROL_SEQUENCES[action]);
  }

  putByte(byte: number): CliStatusCode {
    return this.settle(this.output.putByte(byte));
  }

  /** Writes one byte: a number as is, a string's first char. */
  putChar(ch: number | string): CliStatusCode {
    if (typeof ch === 'number') return this.putByte(ch);
    return ch.length === 0 ? CliStatus.SUCCESS : this.putByte(ch.charCodeAt(0));
  }

  putString(text: string): CliStatusCode {
    return this.settle(this.output.putString(text));
  }

  putBytes(data: Uint8Array, start = 0, end = data.length): CliStatusCode {
    return this.settle(this.output.putBytes(data, start, end));
  }

  putBold(text: string): void {
    this.control(Control.Bold);
    this.putString(text);
    this.control(Control.Normal);
  }

  /**
   * Write `text` clipped to the message size limit. `info` ends the line,
   * `warn` and `error` add a prefix; `raw` is written as is.
   */
  printMessage(level: MessageLevel, text: string): CliStatusCode {
    const body = text.length > this.maxMessageSize ? text.slice(0, this.maxMessageSize) : text;
    if (level === 'raw') return this.putString(body);

    if (level === 'error') this.control(Control.Red);
    this.putString(MESSAGE_PREFIX[level]);
    if (level === 'error') this.control(Control.Normal);
    return this.putString(body + '\n\r');
  }

  private settle(accepted: boolean): CliStatusCode {
    if (accepted) {
      this.overflowReported = false;
      return CliStatus.SUCCESS;
    }
    if (!this.overflowReported) {
      this.overflowReported = true;
      this.logger.warn(`output buffer full (${this.output.bytesStored}/${this.output.capacity} bytes), dropping output until the next flush`);
    }
    return CliStatus.BUFFER_FULL;
  }
}
