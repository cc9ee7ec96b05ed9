/**
 * index.ts: interactive console on the host terminal.
 *
 *   npm start                          demo console with the default prompt
 *   npm start -- --prompt 'dev$ '      custom prompt (or TERMLINE_PROMPT)
 *   npm start -- --history 32          history depth (or TERMLINE_HISTORY_DEPTH)
 *
 * Type `help` for the command list and `exit` to leave.
 */

import { CliStatus, createCli, type CreateCliResult } from '@termline/core';
import { DemoBoard } from './board.js';
import { createDemoCommands } from './commands.js';
import { loadHostConfig } from './config.js';
import { NodeTransport } from './NodeTransport.js';

function main(): void {
  const config = loadHostConfig();
  const transport = new NodeTransport();
  const board = new DemoBoard();

  const result: CreateCliResult<null> = createCli<null>({
    transport,
    context: null,
    commands: createDemoCommands(board, () => result.cli?.getHistory() ?? []),
    prompt: config.prompt,
    historyDepth: config.historyDepth,
    onExit: () => transport.close(),
  });
  const { cli } = result;
  if (!cli) {
    console.error(`Failed to start console: ${result.status}`);
    process.exitCode = 1;
    return;
  }

  transport.attach(cli);
  const status = cli.init();
  if (status !== CliStatus.SUCCESS) {
    console.error(`Failed to start console: ${status}`);
    transport.detach();
    process.exitCode = 1;
    return;
  }
  cli.printMessage('info', "\rtermline demo console. Type 'help' for commands, 'exit' to leave.");
  cli.displayPrompt();
  transport.service();
}

main();
