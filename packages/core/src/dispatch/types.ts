import type { CliStatusCode } from '../cli/status.js';
import type { MessageLevel } from '../terminal/transport.js';

export type ArgValue =
  | { type: 'string'; value: string }
  | { type: 'char'; value: string }
  | { type: 'float'; value: number }
  | { type: 'integer'; value: number };

export type ArgType = ArgValue['type'];

/** Output surface handed to command handlers. */
export interface CommandIO {
  /** False after `echo off off`; escape sequences should not be written then. */
  readonly displayCtrlChars: boolean;
  putChar(ch: number | string): CliStatusCode;
  putString(text: string): CliStatusCode;
  printMessage(level: MessageLevel, text: string): CliStatusCode;
}

/** Returns 0 on success; anything else reports the command as failed. */
export type CommandHandler = (args: Args, io: CommandIO) => number;

export interface Command {
  /** Matched case-insensitively against the first word of the line. */
  name: string;
  /**
   * One character per expected argument: s string, f float, d or x integer
   * (base detected from the token), c char. Upper case is accepted too.
   */
  params: string;
  handler: CommandHandler;
  /** Left out of the command list printed by `help`. */
  hidden?: boolean;
  summary: string;
  synopsis: string;
  description?: string;
  /** Writes extra help text after `description`. */
  describe?: (io: CommandIO) => void;
}

/**
 * Parsed arguments for one command line. Values sit at the position of the
 * type character they were parsed for; `count` is the number converted.
 */
export class Args {
  readonly capacity: number;
  count = 0;
  private readonly values: Array<ArgValue | undefined>;

  constructor(capacity: number) {
    this.capacity = capacity;
    this.values = new Array<ArgValue | undefined>(capacity).fill(undefined);
  }

  clear(): void {
    this.count = 0;
    this.values.fill(undefined);
  }

  set(index: number, value: ArgValue): void {
    this.values[index] = value;
    this.count++;
  }

  get(index: number): ArgValue | undefined {
    return this.values[index];
  }

  getString(index: number): string | undefined {
    const arg = this.values[index];
    return arg?.type === 'string' ? arg.value : undefined;
  }

  getChar(index: number): string | undefined {
    const arg = this.values[index];
    return arg?.type === 'char' ? arg.value : undefined;
  }

  getNumber(index: number): number | undefined {
    const arg = this.values[index];
    return arg?.type === 'float' || arg?.type === 'integer' ? arg.value : undefined;
  }
}
