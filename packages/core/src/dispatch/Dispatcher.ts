import { CliStatus, type CliStatusCode } from '../cli/status.js';
import type { CliLogger } from '../terminal/transport.js';
import { trim } from '../utils/text.js';
import { matchCommand } from './match.js';
import { parseParams, type ParamIssue } from './params.js';
import { FIELD_DELIMITERS, LineTokenizer } from './tokenizer.js';
import { Args, type Command, type CommandIO } from './types.js';

export interface DispatcherOptions {
  /** Checked before `commands`, so a built-in shadows a user command of the same name. */
  builtins: readonly Command[];
  commands: readonly Command[];
  maxParamCount: number;
  io: CommandIO;
  logger: CliLogger;
}

/** Resolves a completed line to a command, parses its arguments and runs it. */
export class Dispatcher {
  readonly args: Args;
  private readonly builtins: readonly Command[];
  private readonly commands: readonly Command[];
  private readonly io: CommandIO;
  private readonly logger: CliLogger;

  constructor(options: DispatcherOptions) {
    this.builtins = options.builtins;
    this.commands = options.commands;
    this.io = options.io;
    this.logger = options.logger;
    this.args = new Args(options.maxParamCount);
  }

  dispatch(line: string): CliStatusCode {
    const tokens = new LineTokenizer(trim(line));
    const name = tokens.next(FIELD_DELIMITERS);
    if (name === null) return CliStatus.SUCCESS;

    const builtin = matchCommand(name, this.builtins);
    const command = builtin ?? matchCommand(name, this.commands);
    if (!command) {
      this.io.printMessage('warn', `Command '${name}' not found`);
      return CliStatus.INVALID_COMMAND;
    }

    this.args.clear();
    const report = parseParams(command.params, tokens, this.args);
    for (const issue of report.issues) {
      this.io.printMessage('warn', describeIssue(issue));
    }
    if (report.failures > 0) {
      this.printUsageHint(name);
      return CliStatus.INVALID_COMMAND;
    }

    try {
      if (command.handler(this.args, this.io) === 0) return CliStatus.SUCCESS;
      // Built-ins report their own usage errors.
      if (!builtin) this.printUsageHint(name);
      return CliStatus.INVALID_COMMAND;
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      this.logger.error(`command '${command.name}' threw`, e);
      this.io.printMessage('error', `${command.name}: ${message}`);
      return CliStatus.INVALID_COMMAND;
    }
  }

  private printUsageHint(name: string): void {
    this.io.printMessage('info', `Incorrect usage: Enter 'help ${name}' for details`);
  }
}

function describeIssue(issue: ParamIssue): string {
  switch (issue.kind) {
    case 'invalid':
      return `Invalid ${issue.type} argument '${issue.token}'`;
    case 'extra':
      return `Extra parameter '${issue.token}' ignored`;
    case 'too-many':
      return `Too many parameters declared (${issue.declared}, limit ${issue.limit})`;
  }
}
