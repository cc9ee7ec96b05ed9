import type { RingBuffer } from '../buffer/RingBuffer.js';
import type { HistoryRing } from '../history/HistoryRing.js';
import { Control } from '../terminal/controls.js';
import type { TerminalWriter } from '../terminal/TerminalWriter.js';
import { bytesToString, isControl } from '../utils/text.js';
import { EscapeDecoder, EscapeKey, type EscapeState } from './EscapeDecoder.js';

export type EditorResult =
  | { kind: 'idle' }
  | { kind: 'pending' }
  | { kind: 'complete'; line: string };

const IDLE: EditorResult = { kind: 'idle' };
const PENDING: EditorResult = { kind: 'pending' };

const CTRL_A = 0x01;
const CTRL_B = 0x02;
const CTRL_C = 0x03;
const CTRL_E = 0x05;
const CTRL_F = 0x06;
const BS = 0x08;
const LF = 0x0a;
const CTRL_K = 0x0b;
const CTRL_L = 0x0c;
const CR = 0x0d;
const CTRL_N = 0x0e;
const CTRL_P = 0x10;
const DEL = 0x7f;
const SPACE = 0x20;

export interface LineEditorOptions {
  prompt: string;
  /** Line buffer; its length is the line capacity including one reserved cell. */
  buffer: Uint8Array;
  rx: RingBuffer;
  history: HistoryRing;
  terminal: TerminalWriter;
}

/**
 * Consumes bytes from the receive ring one at a time and maintains the edit
 * line, echoing through the terminal writer.
 *
 * Typed characters are batched: while more input is waiting in the ring the
 * inserted run is only stored (`pendingEcho`), and it is echoed in one go
 * when the ring drains or before any other editing action.
 */
export class LineEditor {
  readonly prompt: string;
  private readonly buffer: Uint8Array;
  private readonly maxLength: number;
  private readonly rx: RingBuffer;
  private readonly history: HistoryRing;
  private readonly terminal: TerminalWriter;
  private readonly decoder = new EscapeDecoder();

  private cursorIndex = 0;
  private endIndex = 0;
  private pending = 0;
  private promptPending = false;
  private promptDeferred = false;
  private typing = false;

  constructor(options: LineEditorOptions) {
    this.prompt = options.prompt;
    this.buffer = options.buffer;
    this.maxLength = options.buffer.length;
    this.rx = options.rx;
    this.history = options.history;
    this.terminal = options.terminal;
  }

  get cursor(): number {
    return this.cursorIndex;
  }

  get end(): number {
    return this.endIndex;
  }

  get pendingEcho(): number {
    return this.pending;
  }

  get text(): string {
    return bytesToString(this.buffer, 0, this.endIndex);
  }

  get userIsTyping(): boolean {
    return this.typing;
  }

  get escapeState(): EscapeState {
    return this.decoder.state;
  }

  init(): void {
    this.terminal.control(Control.ClearScreen);
    this.history.init();
    this.showPrompt();
    this.resetEdit();
    this.decoder.reset();
    this.promptPending = false;
    this.promptDeferred = false;
    this.typing = false;
  }

  /**
   * Process at most one received byte. A completed line is reported once;
   * its prompt is redrawn at the start of the following poll.
   */
  poll(): EditorResult {
    if (this.promptPending) this.overwriteLineWithPrompt();

    const byte = this.rx.readByte();
    if (byte < 0) return IDLE;

    this.typing = true;
    if (this.promptDeferred) {
      this.terminal.control(Control.NewLine);
      this.overwriteLineWithPrompt();
    }

    const decoded = this.decoder.feed(byte);
    if (decoded === null) return PENDING;
    if (typeof decoded !== 'number') {
      this.commitPending();
      this.handleKey(decoded);
      return PENDING;
    }

    const result = this.handleByte(decoded);
    if (result.kind === 'complete') {
      this.promptPending = true;
      this.terminal.control(Control.NewLine);
    }
    return result;
  }

  // ─── Prompt ───

  /** Clear the current line and show the prompt. */
  overwriteLineWithPrompt(): void {
    this.promptDeferred = false;
    this.promptPending = false;
    this.clearLine();
    this.showPrompt();
  }

  newLine(): void {
    this.clearLine();
    this.terminal.control(Control.NewLine);
  }

  /** Hold the prompt back until the next keypress. */
  deferPrompt(enable: boolean): void {
    this.promptDeferred = enable;
    this.promptPending = !enable;
  }

  private showPrompt(): void {
    if (!this.terminal.displayCtrlChars) return;
    this.terminal.control(Control.CarriageReturn);
    this.terminal.putBold(this.prompt);
  }

  private clearLine(): void {
    this.resetEdit();
    this.terminal.control(Control.CarriageReturn);
  }

  private resetLine(): void {
    this.resetEdit();
    this.terminal.control(Control.CarriageReturn);
    this.terminal.control(Control.Kill);
    this.showPrompt();
  }

  private resetEdit(): void {
    this.cursorIndex = 0;
    this.endIndex = 0;
    this.pending = 0;
    this.buffer[0] = 0;
  }

  // ─── Input ───

  private handleByte(byte: number): EditorResult {
    if (!isControl(byte)) {
      this.insert(byte);
      return PENDING;
    }

    this.commitPending();
    switch (byte) {
      case CTRL_A:
        this.moveToStart();
        break;
      case CTRL_E:
        this.moveToEnd();
        break;
      case CTRL_B:
      case CTRL_P:
        this.moveBackward();
        break;
      case CTRL_F:
      case CTRL_N:
        this.moveForward();
        break;
      case CTRL_K:
        this.terminal.control(Control.Kill);
        this.endIndex = this.cursorIndex;
        break;
      case BS:
      case DEL:
        this.deleteBackward();
        break;
      case CR:
      case LF: {
        const line = this.text;
        this.history.append(line);
        this.typing = false;
        return { kind: 'complete', line };
      }
      case CTRL_L:
        this.resetLine();
        break;
      case CTRL_C:
        this.resetEdit();
        return { kind: 'complete', line: '' };
      default:
        this.terminal.control(Control.Alert);
    }
    return PENDING;
  }

  private handleKey(key: EscapeKey): void {
    switch (key) {
      case EscapeKey.Up: {
        const entry = this.history.scrollUp();
        if (entry) this.fillLine(entry);
        break;
      }
      case EscapeKey.Down: {
        const entry = this.history.scrollDown();
        if (entry) this.fillLine(entry);
        else this.resetLine();
        break;
      }
      case EscapeKey.Right:
        this.moveForward();
        break;
      case EscapeKey.Left:
        this.moveBackward();
        break;
      case EscapeKey.Home:
        this.moveToStart();
        break;
      case EscapeKey.End:
        this.moveToEnd();
        break;
    }
  }

  // ─── Editing ───

  private insert(byte: number): void {
    if (this.endIndex < this.maxLength - 1) {
      const at = this.cursorIndex + this.pending;
      this.endIndex++;
      for (let i = this.endIndex; i > at; i--) {
        this.buffer[i] = this.buffer[i - 1];
      }
      this.buffer[at] = byte;
      this.pending++;
    } else {
      // Full: the newest byte replaces the last cell.
      this.buffer[this.endIndex - 1] = byte;
      if (this.pending === 0 && this.cursorIndex === this.endIndex) {
        this.terminal.control(Control.Prev);
        this.cursorIndex--;
        this.pending = 1;
      } else if (this.pending === 0) {
        this.redrawLastCell();
      }
    }

    if (this.rx.bytesAvailable() === 0) this.commitPending();
  }

  /** Echo the batched run, advance the cursor past it and redraw the tail. */
  private commitPending(): void {
    if (this.pending === 0) return;
    const start = this.cursorIndex;
    this.cursorIndex += this.pending;
    this.pending = 0;
    if (!this.terminal.echo) return;

    this.terminal.putBytes(this.buffer, start, this.cursorIndex);
    this.terminal.control(Control.Save);
    this.terminal.putBytes(this.buffer, this.cursorIndex, this.endIndex);
    this.terminal.control(Control.Restore);
  }

  /** Rewrite the last cell of the line without moving the cursor. */
  private redrawLastCell(): void {
    if (!this.terminal.echo) return;
    const last = this.endIndex - 1;
    this.terminal.control(Control.Save);
    for (let i = this.cursorIndex; i < last; i++) {
      this.terminal.control(Control.Next);
    }
    this.terminal.putByte(this.buffer[last]);
    this.terminal.control(Control.Restore);
  }

  private deleteBackward(): void {
    if (this.cursorIndex === 0) return;
    this.cursorIndex--;
    this.terminal.control(Control.Prev);
    this.terminal.control(Control.Save);
    for (let i = this.cursorIndex; i < this.endIndex - 1; i++) {
      this.buffer[i] = this.buffer[i + 1];
      if (this.terminal.echo) this.terminal.putByte(this.buffer[i]);
    }
    if (this.terminal.echo) this.terminal.putByte(SPACE);
    this.terminal.control(Control.Restore);
    this.endIndex--;
  }

  private moveToStart(): void {
    for (let i = this.cursorIndex; i > 0; i--) {
      this.terminal.control(Control.Prev);
    }
    this.cursorIndex = 0;
  }

  private moveToEnd(): void {
    for (let i = this.cursorIndex; i < this.endIndex; i++) {
      this.terminal.control(Control.Next);
    }
    this.cursorIndex = this.endIndex;
  }

  private moveBackward(): void {
    if (this.cursorIndex === 0) return;
    this.cursorIndex--;
    this.terminal.control(Control.Prev);
  }

  private moveForward(): void {
    if (this.cursorIndex >= this.maxLength - 1 || this.cursorIndex >= this.endIndex) return;
    this.cursorIndex++;
    this.terminal.control(Control.Next);
  }

  /** Replace the line with a history entry, leaving the cursor at its end. */
  private fillLine(entry: Uint8Array): void {
    this.resetLine();
    const n = Math.min(entry.length, this.maxLength);
    for (let i = 0; i < n; i++) {
      this.buffer[this.cursorIndex] = entry[i];
      if (this.terminal.echo) this.terminal.putByte(entry[i]);
      if (this.cursorIndex < this.maxLength - 1) this.cursorIndex++;
      if (this.cursorIndex > this.endIndex) this.endIndex = this.cursorIndex;
    }
  }
}
