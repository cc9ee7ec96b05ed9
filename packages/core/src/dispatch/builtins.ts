import { Control } from '../terminal/controls.js';
import type { TerminalWriter } from '../terminal/TerminalWriter.js';
import { matchChoice, matchCommand } from './match.js';
import type { Args, Command } from './types.js';

export interface BuiltinHost {
  terminal: TerminalWriter;
  /** Built-ins followed by the user table, in listing order. */
  commands(): readonly Command[];
  onExit?: () => void;
}

const HELP_HINT = "\r\nCommand specific help is displayed with 'help <command>'";
const ECHO_USAGE = 'Invalid configuration choice. Usage: echo on/off';
const ECHO_CHOICES = ['on', 'off'] as const;

export function createBuiltinCommands(host: BuiltinHost): Command[] {
  const builtins: Command[] = [
    {
      name: 'help',
      params: 's',
      summary: 'Display help for commands',
      synopsis: '[command]',
      description: '\t  Lists every command, or shows the details of one command.\r\n',
      handler: (args) => {
        const topic = args.getString(0);
        if (topic === undefined) {
          listCommands(host, false);
          return 0;
        }
        const command = matchCommand(topic, host.commands());
        if (!command) {
          host.terminal.printMessage('warn', `Command '${topic}' not found`);
          return 1;
        }
        describeCommand(host, command);
        return 0;
      },
    },
    {
      name: 'echo',
      params: 'ss',
      summary: 'Turn character echo on or off',
      synopsis: '[on|off [off]]',
      description: "\t  'echo off off' also turns off terminal control sequences.\r\n",
      handler: (args) => echo(host.terminal, args),
    },
    {
      name: 'expert',
      params: '',
      hidden: true,
      summary: 'List the hidden commands',
      synopsis: '',
      handler: () => {
        listCommands(host, true);
        return 0;
      },
    },
  ];

  const { onExit } = host;
  if (onExit) {
    builtins.push({
      name: 'exit',
      params: 's',
      summary: 'Leave the console',
      synopsis: '',
      handler: (args, io) => {
        if (args.count > 0) {
          io.printMessage('warn', "Incorrect usage: 'exit' takes no arguments");
          return 1;
        }
        host.terminal.control(Control.NewLine);
        onExit();
        return 0;
      },
    });
  }
  return builtins;
}

/** Lists either the visible or the hidden commands; the name column fits every command. */
function listCommands(host: BuiltinHost, showHidden: boolean): void {
  const { terminal } = host;
  const commands = host.commands();
  const width = commands.reduce((max, c) => Math.max(max, c.name.length), 0) + 1;

  terminal.putBold(`\r\n\t ${'COMMANDS'.padEnd(width)}  PARAMETERS\r\n`);
  for (const command of commands) {
    if ((command.hidden ?? false) !== showHidden) continue;
    terminal.putString(`\t  ${command.name.padEnd(width)}  ${command.synopsis}\r\n`);
  }
  terminal.printMessage('info', HELP_HINT);
}

function describeCommand(host: BuiltinHost, command: Command): void {
  const { terminal } = host;
  terminal.control(Control.NewLine);
  terminal.putBold('\tCOMMAND:\r\n');
  terminal.putString(`\t  ${command.name} - ${command.summary}\r\n`);
  terminal.control(Control.CarriageReturn);
  terminal.putBold('\n\tSYNOPSIS:\r\n');
  terminal.putString(`\t  ${command.name} ${command.synopsis}`);
  terminal.control(Control.NewLine);

  if (command.description === undefined && command.describe === undefined) return;
  terminal.putBold('\n\tDESCRIPTION:\r\n');
  if (command.description !== undefined) terminal.putString(command.description);
  command.describe?.(terminal);
  terminal.control(Control.NewLine);
}

function echo(terminal: TerminalWriter, args: Args): number {
  const choice = args.getString(0);
  if (choice === undefined) {
    terminal.printMessage('info', terminal.echo ? 'echo on' : 'echo off');
    return 0;
  }

  switch (ECHO_CHOICES[matchChoice(choice, ECHO_CHOICES)]) {
    case 'on':
      terminal.echo = true;
      terminal.displayCtrlChars = true;
      terminal.printMessage('info', 'echo on');
      return 0;
    case 'off':
      terminal.echo = false;
      if (matchChoice(args.getString(1), ['off']) === 0) terminal.displayCtrlChars = false;
      terminal.printMessage('info', 'echo off');
      return 0;
    default:
      terminal.printMessage('warn', ECHO_USAGE);
      return 1;
  }
}
