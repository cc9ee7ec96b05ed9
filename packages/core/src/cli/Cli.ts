import { OutputBuffer } from '../buffer/OutputBuffer.js';
import { RingBuffer } from '../buffer/RingBuffer.js';
import { createBuiltinCommands } from '../dispatch/builtins.js';
import { Dispatcher } from '../dispatch/Dispatcher.js';
import type { Command, CommandIO } from '../dispatch/types.js';
import { LineEditor } from '../editor/LineEditor.js';
import { HistoryRing, historyStorageSize } from '../history/HistoryRing.js';
import { TerminalWriter } from '../terminal/TerminalWriter.js';
import type { CliLogger, CliTransport, MessageLevel } from '../terminal/transport.js';
import {
  commandTableSchema,
  formatIssues,
  settingsSchema,
  type CliOptions,
  type CliSettings,
} from './config.js';
import { CliError, CliStatus, type CliStatusCode } from './status.js';

export type CommandLineResult =
  | { status: typeof CliStatus.SUCCESS; line: string }
  | { status: typeof CliStatus.INVALID_COMMAND; line: null };

export interface CreateCliResult<TContext> {
  status: CliStatusCode;
  cli: Cli<TContext> | null;
}

/**
 * One interactive console instance: receive ring, line editor, history,
 * dispatcher and output buffers over a single transport.
 *
 * The transport side only calls rxCallback()/submitByte() and txCallback().
 * Everything else runs from the host's main loop, normally as
 * `cli.pump(); cli.flushMessages();`.
 */
export class Cli<TContext = unknown> implements CommandIO {
  readonly settings: CliSettings;
  private readonly transport: CliTransport<TContext>;
  private readonly context: TContext;
  private readonly logger: CliLogger;
  private readonly rx: RingBuffer;
  private readonly output: OutputBuffer;
  private readonly terminal: TerminalWriter;
  private readonly history: HistoryRing;
  private readonly editor: LineEditor;
  private readonly dispatcher: Dispatcher;
  private readonly rxSlot = new Uint8Array(1);

  constructor(options: CliOptions<TContext>, settings: CliSettings) {
    this.settings = settings;
    this.transport = options.transport;
    this.context = options.context;
    this.logger = options.logger ?? console;

    const memory = options.memory ?? {};
    this.rx = new RingBuffer(memory.rx ?? settings.rxBufferSize);
    this.output = new OutputBuffer(settings.outputBufferSize, memory.output);
    this.terminal = new TerminalWriter(this.output, settings.maxMessageSize, this.logger);
    this.history = new HistoryRing(settings.historyDepth, settings.maxCmdLength, memory.history);
    this.editor = new LineEditor({
      prompt: settings.prompt,
      buffer: memory.line ? memory.line.subarray(0, settings.maxCmdLength) : new Uint8Array(settings.maxCmdLength),
      rx: this.rx,
      history: this.history,
      terminal: this.terminal,
    });

    const { onExit } = options;
    const builtins: Command[] = createBuiltinCommands({
      terminal: this.terminal,
      commands: () => [...builtins, ...options.commands],
      // No prompt after exit; the host's own prompt follows.
      onExit: onExit && (() => {
        this.editor.deferPrompt(true);
        onExit();
      }),
    });
    this.dispatcher = new Dispatcher({
      builtins,
      commands: options.commands,
      maxParamCount: settings.maxParamCount,
      io: this.terminal,
      logger: this.logger,
    });
  }

  // ─── Lifecycle ───

  /** Arm the receiver, clear the screen, reset history and show the prompt. */
  init(): CliStatusCode {
    const status = this.armReceive();
    this.editor.init();
    return status;
  }

  // ─── Transport callbacks ───

  /** The armed byte has arrived: queue it and re-arm. */
  rxCallback(): CliStatusCode {
    if (!this.rx.writeByte(this.rxSlot[0])) {
      this.logger.warn(`receive ring full, dropped byte 0x${this.rxSlot[0].toString(16).padStart(2, '0')}`);
    }
    return this.armReceive();
  }

  /** Queue one received byte without going through the armed slot. */
  submitByte(byte: number): CliStatusCode {
    return this.rx.writeByte(byte) ? CliStatus.SUCCESS : CliStatus.BUFFER_FULL;
  }

  txCallback(): CliStatusCode {
    this.output.markTransmitComplete();
    return CliStatus.SUCCESS;
  }

  // ─── Processing ───

  /** Process queued input, dispatching every completed line. Returns the last dispatch status. */
  pump(): CliStatusCode {
    let status: CliStatusCode = CliStatus.SUCCESS;
    for (;;) {
      const result = this.editor.poll();
      if (result.kind === 'idle') break;
      if (result.kind === 'complete') status = this.dispatch(result.line);
    }
    return status;
  }

  /** Advance the editor by one byte; yields the line once it is complete. */
  getCommand(): CommandLineResult {
    const result = this.editor.poll();
    if (result.kind === 'complete') return { status: CliStatus.SUCCESS, line: result.line };
    return { status: CliStatus.INVALID_COMMAND, line: null };
  }

  dispatch(line: string): CliStatusCode {
    return this.dispatcher.dispatch(line);
  }

  /** Hand buffered output to the transport. */
  flushMessages(): CliStatusCode {
    const status = this.output.flush((buffer, length) => this.transport.transmitAsync(this.context, buffer, length));
    if (status === CliStatus.COMM_ERROR) {
      this.logger.error(`transmit of ${this.output.bytesStored} bytes failed`);
    }
    return status;
  }

  // ─── Prompt & echo ───

  displayPrompt(): void {
    this.editor.overwriteLineWithPrompt();
  }

  newLine(): void {
    this.editor.newLine();
  }

  deferPrompt(enable: boolean): void {
    this.editor.deferPrompt(enable);
  }

  get userIsTyping(): boolean {
    return this.editor.userIsTyping;
  }

  get echo(): boolean {
    return this.terminal.echo;
  }

  set echo(enable: boolean) {
    this.terminal.echo = enable;
  }

  get displayCtrlChars(): boolean {
    return this.terminal.displayCtrlChars;
  }

  set displayCtrlChars(enable: boolean) {
    this.terminal.displayCtrlChars = enable;
  }

  // ─── Raw I/O ───

  /** Take one byte straight from the receive ring, or null when empty. */
  getChar(): number | null {
    const byte = this.rx.readByte();
    return byte < 0 ? null : byte;
  }

  putChar(ch: number | string): CliStatusCode {
    return this.terminal.putChar(ch);
  }

  putString(text: string): CliStatusCode {
    return this.terminal.putString(text);
  }

  putBuffer(data: Uint8Array, length = data.length): CliStatusCode {
    return this.terminal.putBytes(data, 0, length);
  }

  printMessage(level: MessageLevel, text: string): CliStatusCode {
    return this.terminal.printMessage(level, text);
  }

  getFreeMessageSpace(): number {
    return this.output.freeSpace();
  }

  getNumCharsWaiting(): number {
    return this.rx.bytesAvailable();
  }

  /** Lines kept for recall, oldest first. */
  getHistory(): string[] {
    return this.history.entries();
  }

  private armReceive(): CliStatusCode {
    if (this.transport.receiveAsync(this.context, this.rxSlot, 1) !== 0) {
      this.logger.error('failed to arm receive');
      return CliStatus.COMM_ERROR;
    }
    return CliStatus.SUCCESS;
  }
}

function checkMemory(options: CliOptions<unknown>, settings: CliSettings): CliStatusCode {
  const memory = options.memory;
  if (!memory) return CliStatus.SUCCESS;
  if (memory.line && memory.line.length < settings.maxCmdLength) return CliStatus.INSUFFICIENT_STATE_MEMORY;
  if (memory.rx && memory.rx.length < settings.rxBufferSize) return CliStatus.INSUFFICIENT_STATE_MEMORY;
  if (memory.output && memory.output.some((b) => b.length < settings.outputBufferSize)) {
    return CliStatus.INSUFFICIENT_STATE_MEMORY;
  }
  if (memory.history && memory.history.length < historyStorageSize(settings.historyDepth, settings.maxCmdLength)) {
    return CliStatus.INSUFFICIENT_TEMP_MEMORY;
  }
  return CliStatus.SUCCESS;
}

function hasTransport(options: CliOptions<unknown> | null | undefined): boolean {
  return (
    options != null &&
    options.transport != null &&
    typeof options.transport.transmitAsync === 'function' &&
    typeof options.transport.receiveAsync === 'function' &&
    Array.isArray(options.commands)
  );
}

/**
 * Validate `options` and build a console. Failures come back as a status
 * with `cli: null`; nothing is thrown for bad configuration.
 */
export function createCli<TContext>(options: CliOptions<TContext>): CreateCliResult<TContext> {
  const logger = options?.logger ?? console;
  if (!hasTransport(options)) {
    logger.error('createCli: a transport with transmitAsync/receiveAsync and a command table are required');
    return { status: CliStatus.NULL_PTR, cli: null };
  }

  const settings = settingsSchema.safeParse(options);
  if (!settings.success) {
    logger.error(`createCli: invalid options\n${formatIssues(settings.error)}`);
    return { status: CliStatus.INVALID_CONFIG, cli: null };
  }
  const table = commandTableSchema.safeParse(options.commands);
  if (!table.success) {
    logger.error(`createCli: invalid command table\n${formatIssues(table.error)}`);
    return { status: CliStatus.INVALID_CONFIG, cli: null };
  }

  const memoryStatus = checkMemory(options, settings.data);
  if (memoryStatus !== CliStatus.SUCCESS) {
    logger.error(`createCli: caller-supplied memory too small (${memoryStatus})`);
    return { status: memoryStatus, cli: null };
  }

  try {
    return { status: CliStatus.SUCCESS, cli: new Cli(options, settings.data) };
  } catch (e) {
    if (e instanceof CliError) {
      logger.error(`createCli: ${e.message}`);
      return { status: e.code, cli: null };
    }
    throw e;
  }
}
