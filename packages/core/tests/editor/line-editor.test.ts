import { describe, it, expect } from 'vitest';
import { OutputBuffer } from '../../src/buffer/OutputBuffer.js';
import { RingBuffer } from '../../src/buffer/RingBuffer.js';
import { EscapeState } from '../../src/editor/EscapeDecoder.js';
import { LineEditor } from '../../src/editor/LineEditor.js';
import { HistoryRing } from '../../src/history/HistoryRing.js';
import { TerminalWriter } from '../../src/terminal/TerminalWriter.js';
import { bytesToString } from '../../src/utils/text.js';
import { CLS, KILL, NEXT, PREV, PROMPT, RESTORE, SAVE, silentLogger } from '../helpers/fakeTransport.js';

const LEFT = '\x1b[D';
const RIGHT = '\x1b[C';
const UP = '\x1b[A';
const DOWN = '\x1b[B';

function createEditor(maxLength = 16) {
  const rx = new RingBuffer(64);
  const output = new OutputBuffer(1024);
  const terminal = new TerminalWriter(output, 512, silentLogger());
  const history = new HistoryRing(4, maxLength);
  const editor = new LineEditor({ prompt: '> ', buffer: new Uint8Array(maxLength), rx, history, terminal });

  const read = (): string => {
    let text = '';
    output.flush((buffer, length) => {
      text = bytesToString(buffer, 0, length);
      return 0;
    });
    output.markTransmitComplete();
    return text;
  };

  const poll = (): string[] => {
    const lines: string[] = [];
    for (;;) {
      const result = editor.poll();
      if (result.kind === 'idle') return lines;
      if (result.kind === 'complete') lines.push(result.line);
    }
  };

  /** Everything arrives before the editor runs. */
  const burst = (text: string): string[] => {
    for (let i = 0; i < text.length; i++) rx.writeByte(text.charCodeAt(i));
    return poll();
  };

  /** The editor runs after every byte. */
  const keys = (text: string): string[] => {
    const lines: string[] = [];
    for (let i = 0; i < text.length; i++) {
      rx.writeByte(text.charCodeAt(i));
      lines.push(...poll());
    }
    return lines;
  };

  return { editor, history, terminal, read, burst, keys };
}

describe('LineEditor', () => {
  it('init clears the screen and shows the prompt', () => {
    const { editor, read } = createEditor();
    editor.init();
    expect(read()).toBe(CLS + PROMPT);
  });

  describe('insertion', () => {
    it('echoes a burst once the ring drains', () => {
      const { editor, read, burst } = createEditor();
      burst('abc');
      expect(read()).toBe('abc' + SAVE + RESTORE);
      expect(editor.text).toBe('abc');
      expect(editor.cursor).toBe(3);
      expect(editor.pendingEcho).toBe(0);
    });

    it('echoes each key when typed slowly', () => {
      const { read, keys } = createEditor();
      keys('ab');
      expect(read()).toBe('a' + SAVE + RESTORE + 'b' + SAVE + RESTORE);
    });

    it('cursor movement inside a burst sees the inserted text', () => {
      const fast = createEditor();
      fast.burst(`abc${LEFT}${LEFT}X`);
      expect(fast.editor.text).toBe('aXbc');
      expect(fast.editor.cursor).toBe(2);
      expect(fast.editor.end).toBe(4);

      const slow = createEditor();
      slow.keys(`abc${LEFT}${LEFT}X`);
      expect(slow.editor.text).toBe('aXbc');
      expect(slow.editor.cursor).toBe(2);
    });

    it('redraws the tail after a mid-line insert', () => {
      const { read, burst } = createEditor();
      burst('abc');
      read();
      burst(LEFT);
      expect(read()).toBe(PREV);
      burst('X');
      expect(read()).toBe('X' + SAVE + 'c' + RESTORE);
    });

    it('overwrites the last cell when the line is full', () => {
      const { editor, read, burst, keys } = createEditor(4);
      burst('abcd');
      expect(editor.text).toBe('abd');
      expect(read()).toBe('abd' + SAVE + RESTORE);

      keys('e');
      expect(editor.text).toBe('abe');
      expect(editor.cursor).toBe(3);
      expect(read()).toBe(PREV + 'e' + SAVE + RESTORE);
    });

    it('redraws the replaced cell when a full line is edited mid-line', () => {
      const { editor, read, burst, keys } = createEditor(4);
      burst('abc');
      read();
      keys(LEFT + LEFT);
      expect(read()).toBe(PREV + PREV);

      keys('X');
      expect(editor.text).toBe('abX');
      expect(editor.cursor).toBe(1);
      expect(read()).toBe(SAVE + NEXT + 'X' + RESTORE);
    });
  });

  describe('editing keys', () => {
    it('backspace at the end blanks the last cell', () => {
      const { editor, read, burst } = createEditor();
      burst('abc');
      read();
      burst('\x7f');
      expect(editor.text).toBe('ab');
      expect(read()).toBe(PREV + SAVE + ' ' + RESTORE);
    });

    it('backspace mid-line shifts the tail left', () => {
      const { editor, read, burst } = createEditor();
      burst(`abc${LEFT}`);
      read();
      burst('\x08');
      expect(editor.text).toBe('ac');
      expect(editor.cursor).toBe(1);
      expect(read()).toBe(PREV + SAVE + 'c ' + RESTORE);
    });

    it('backspace at column zero does nothing', () => {
      const { editor, read, burst } = createEditor();
      burst('\x7f');
      expect(editor.end).toBe(0);
      expect(read()).toBe('');
    });

    it('Home and End move across the line', () => {
      const { editor, read, burst } = createEditor();
      burst('abc');
      read();
      burst('\x1b[1~');
      expect(editor.cursor).toBe(0);
      expect(read()).toBe(PREV + PREV + PREV);
      burst('\x1b[4~');
      expect(editor.cursor).toBe(3);
      expect(read()).toBe(NEXT + NEXT + NEXT);
      expect(editor.escapeState).toBe(EscapeState.Idle);
    });

    it('Ctrl-A, Ctrl-E, Ctrl-B and Ctrl-F move the cursor', () => {
      const { editor, burst } = createEditor();
      burst('abcd\x01');
      expect(editor.cursor).toBe(0);
      burst('\x06\x06');
      expect(editor.cursor).toBe(2);
      burst('\x02');
      expect(editor.cursor).toBe(1);
      burst('\x05');
      expect(editor.cursor).toBe(4);
    });

    it('does not move right past the end', () => {
      const { editor, read, burst } = createEditor();
      burst('ab');
      read();
      burst(RIGHT);
      expect(editor.cursor).toBe(2);
      expect(read()).toBe('');
    });

    it('Ctrl-K kills to the end of the line', () => {
      const { editor, read, burst } = createEditor();
      burst(`abcd${LEFT}${LEFT}`);
      read();
      burst('\x0b');
      expect(editor.text).toBe('ab');
      expect(read()).toBe(KILL);
    });

    it('Ctrl-L resets the line', () => {
      const { editor, read, burst } = createEditor();
      burst('ab\x0c');
      expect(editor.text).toBe('');
      expect(read()).toBe('ab' + SAVE + RESTORE + '\r' + KILL + PROMPT);
    });

    it('other control bytes ring the bell', () => {
      const { read, burst } = createEditor();
      burst('\x12');
      expect(read()).toBe('\x07');
    });

    it('unknown escape sequences swallow input until ~', () => {
      const { editor, burst } = createEditor();
      burst('\x1b[Zab~c');
      expect(editor.text).toBe('c');
    });
  });

  describe('line completion', () => {
    it('returns the line, records it and redraws the prompt', () => {
      const { editor, history, read, burst } = createEditor();
      expect(burst('ls\r')).toEqual(['ls']);
      expect(history.entries()).toEqual(['ls']);
      expect(read()).toBe('ls' + SAVE + RESTORE + '\r\n' + '\r' + PROMPT);
      expect(editor.end).toBe(0);
    });

    it('Ctrl-C completes with an empty line and skips history', () => {
      const { history, burst } = createEditor();
      expect(burst('abc\x03')).toEqual(['']);
      expect(history.size).toBe(0);
    });

    it('tracks whether the user is typing', () => {
      const { editor, keys } = createEditor();
      keys('a');
      expect(editor.userIsTyping).toBe(true);
      keys('\r');
      expect(editor.userIsTyping).toBe(false);
    });
  });

  describe('history recall', () => {
    it('fills the line from older and newer entries', () => {
      const { editor, read, burst } = createEditor();
      burst('one\rtwo\r');
      read();

      burst(UP);
      expect(editor.text).toBe('two');
      expect(editor.cursor).toBe(3);
      expect(read()).toBe('\r' + KILL + PROMPT + 'two');

      burst(UP);
      expect(editor.text).toBe('one');
      burst(UP);
      expect(editor.text).toBe('one');

      burst(DOWN);
      expect(editor.text).toBe('two');
      read();
      burst(DOWN);
      expect(editor.text).toBe('');
      expect(read()).toBe('\r' + KILL + PROMPT);
    });

    it('leaves the line alone with no history', () => {
      const { editor, read, burst } = createEditor();
      burst(`ab${UP}`);
      expect(editor.text).toBe('ab');
      expect(read()).toBe('ab' + SAVE + RESTORE);
    });
  });

  describe('echo flags', () => {
    it('echo off keeps editing silent', () => {
      const { editor, terminal, read, burst } = createEditor();
      terminal.echo = false;
      burst(`abc${LEFT}`);
      expect(editor.text).toBe('abc');
      expect(editor.cursor).toBe(2);
      expect(read()).toBe('');
    });

    it('echo off still moves to a new line and shows the prompt text', () => {
      const { terminal, read, burst } = createEditor();
      terminal.echo = false;
      burst('x\r');
      expect(read()).toBe('\r\n\r\r> ');
    });

    it('without control chars the prompt is not shown', () => {
      const { terminal, read, burst } = createEditor();
      terminal.displayCtrlChars = false;
      burst('x\r');
      expect(read()).toBe('x');
    });
  });

  describe('prompt', () => {
    it('a deferred prompt appears on the next key', () => {
      const { editor, read, keys } = createEditor();
      editor.deferPrompt(true);
      keys('');
      expect(read()).toBe('');
      keys('a');
      expect(read()).toBe('\r\n\r' + PROMPT + 'a' + SAVE + RESTORE);
    });

    it('newLine clears the edit state and moves down', () => {
      const { editor, read, burst } = createEditor();
      burst('abc');
      read();
      editor.newLine();
      expect(editor.end).toBe(0);
      expect(read()).toBe('\r\r\n');
    });
  });
});
