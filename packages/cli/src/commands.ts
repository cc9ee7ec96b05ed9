import { green, matchChoice, yellow, type Command, type CommandIO } from '@termline/core';
import type { DemoBoard } from './board.js';

const LED_STATES = ['off', 'on'] as const;

function hex(value: number, width = 2): string {
  return '0x' + value.toString(16).toUpperCase().padStart(width, '0');
}

/** Colored only while the console writes control sequences. */
function paint(io: CommandIO, color: (text: string) => string, text: string): string {
  return io.displayCtrlChars ? color(text) : text;
}

function registerAddress(io: CommandIO, address: number | undefined, registers: Uint8Array): number | null {
  if (address === undefined) {
    io.printMessage('warn', 'Missing register address');
    return null;
  }
  if (address < 0 || address >= registers.length) {
    io.printMessage('warn', `Register ${hex(address)} out of range`);
    return null;
  }
  return address;
}

/**
 * Demo command table for the host console. `history` reads the recall list
 * through a callback because the console is created from this table.
 */
export function createDemoCommands(board: DemoBoard, history: () => readonly string[]): Command[] {
  return [
    {
      name: 'led',
      params: 's',
      summary: 'Switch the status LED',
      synopsis: '[on|off]',
      description: '\t  Without an argument the current state is shown.\r\n',
      handler: (args, io) => {
        const state = args.getString(0);
        const choice = matchChoice(state, LED_STATES);
        if (choice >= 0) board.led = LED_STATES[choice] === 'on';
        else if (state !== undefined) {
          io.printMessage('warn', `Unknown LED state '${state}'`);
          return 1;
        }
        io.printMessage('info', `LED is ${board.led ? paint(io, green, 'on') : 'off'}`);
        return 0;
      },
    },
    {
      name: 'add',
      params: 'dd',
      summary: 'Add two integers',
      synopsis: '<a> <b>',
      description: '\t  Integers may be decimal, 0x hex or 0 octal.\r\n',
      handler: (args, io) => {
        if (args.count < 2) {
          io.printMessage('warn', 'add needs two numbers');
          return 1;
        }
        const sum = (args.getNumber(0) ?? 0) + (args.getNumber(1) ?? 0);
        io.printMessage('info', `${sum} (${hex(sum >>> 0, 8)})`);
        return 0;
      },
    },
    {
      name: 'scale',
      params: 'ff',
      summary: 'Multiply a reading by a factor',
      synopsis: '<value> [factor]',
      handler: (args, io) => {
        const value = args.getNumber(0);
        if (value === undefined) {
          io.printMessage('warn', 'scale needs a value');
          return 1;
        }
        const factor = args.getNumber(1) ?? 1;
        io.printMessage('info', (value * factor).toFixed(3));
        return 0;
      },
    },
    {
      name: 'peek',
      params: 'x',
      summary: 'Read a register',
      synopsis: '<address>',
      handler: (args, io) => {
        const address = registerAddress(io, args.getNumber(0), board.registers);
        if (address === null) return 1;
        io.printMessage('info', `${hex(address)}: ${hex(board.registers[address])}`);
        return 0;
      },
    },
    {
      name: 'poke',
      params: 'xx',
      summary: 'Write a register',
      synopsis: '<address> <value>',
      describe: (io) => {
        io.putString('\t  Values are truncated to one byte.\r\n');
      },
      handler: (args, io) => {
        const address = registerAddress(io, args.getNumber(0), board.registers);
        if (address === null) return 1;
        const value = args.getNumber(1);
        if (value === undefined) {
          io.printMessage('warn', 'Missing value');
          return 1;
        }
        board.registers[address] = value & 0xff;
        io.printMessage('info', `${hex(address)} <- ${hex(board.registers[address])}`);
        return 0;
      },
    },
    {
      name: 'say',
      params: 'sc',
      summary: 'Print a message',
      synopsis: '<"text"> [suffix char]',
      handler: (args, io) => {
        const text = args.getString(0) ?? '';
        io.printMessage('info', text + (args.getChar(1) ?? ''));
        return 0;
      },
    },
    {
      name: 'history',
      params: '',
      summary: 'List recalled lines',
      synopsis: '',
      handler: (_args, io) => {
        const entries = history();
        entries.forEach((line, i) => io.putString(`${String(i + 1).padStart(4)}  ${line}\r\n`));
        return 0;
      },
    },
    {
      name: 'uptime',
      params: '',
      summary: 'Seconds since start',
      synopsis: '',
      handler: (_args, io) => {
        io.printMessage('info', `up ${board.uptimeSeconds()}s`);
        return 0;
      },
    },
    {
      name: 'reset',
      params: '',
      hidden: true,
      summary: 'Clear the LED and registers',
      synopsis: '',
      handler: (_args, io) => {
        board.reset();
        io.printMessage('info', paint(io, yellow, 'board reset'));
        return 0;
      },
    },
  ];
}
