import { describe, it, expect } from 'vitest';
import { createCli } from '../../src/cli/Cli.js';
import type { CliOptions } from '../../src/cli/config.js';
import { CliStatus } from '../../src/cli/status.js';
import type { Command } from '../../src/dispatch/types.js';
import { FakeTransport, silentLogger } from '../helpers/fakeTransport.js';

const noop: Command = { name: 'noop', params: '', summary: '', synopsis: '', handler: () => 0 };

function options(overrides: Partial<CliOptions<null>> = {}): CliOptions<null> {
  return { transport: new FakeTransport(), context: null, commands: [noop], logger: silentLogger(), ...overrides };
}

describe('createCli', () => {
  it('applies defaults', () => {
    const { status, cli } = createCli(options());
    expect(status).toBe(CliStatus.SUCCESS);
    expect(cli?.settings).toEqual({
      prompt: '> ',
      maxCmdLength: 128,
      maxParamCount: 8,
      historyDepth: 16,
      rxBufferSize: 256,
      outputBufferSize: 10240,
      maxMessageSize: 512,
    });
  });

  it('requires both transport functions', () => {
    const transport = { transmitAsync: () => 0 };
    const result = createCli({ ...options(), transport } as unknown as CliOptions<null>);
    expect(result).toEqual({ status: CliStatus.NULL_PTR, cli: null });
  });

  it('requires a command table', () => {
    const result = createCli({ ...options(), commands: undefined } as unknown as CliOptions<null>);
    expect(result.status).toBe(CliStatus.NULL_PTR);
  });

  it('rejects out-of-range sizes', () => {
    const logger = silentLogger();
    expect(createCli(options({ maxCmdLength: 1, logger })).status).toBe(CliStatus.INVALID_CONFIG);
    expect(createCli(options({ rxBufferSize: 4 })).status).toBe(CliStatus.INVALID_CONFIG);
    expect(createCli(options({ historyDepth: 2.5 })).status).toBe(CliStatus.INVALID_CONFIG);
    expect(logger.error).toHaveBeenCalledWith('createCli: invalid options\nmaxCmdLength: Number must be greater than or equal to 2');
  });

  it('rejects malformed commands', () => {
    expect(createCli(options({ commands: [{ ...noop, params: 'dq' }] })).status).toBe(CliStatus.INVALID_CONFIG);
    expect(createCli(options({ commands: [{ ...noop, name: 'two words' }] })).status).toBe(CliStatus.INVALID_CONFIG);
    expect(createCli(options({ commands: [{ ...noop, name: '' }] })).status).toBe(CliStatus.INVALID_CONFIG);
  });

  it('checks caller-supplied state buffers', () => {
    const small = new Uint8Array(16);
    expect(createCli(options({ memory: { line: small } })).status).toBe(CliStatus.INSUFFICIENT_STATE_MEMORY);
    expect(createCli(options({ memory: { rx: small } })).status).toBe(CliStatus.INSUFFICIENT_STATE_MEMORY);
    expect(createCli(options({ memory: { output: [new Uint8Array(10240), small] } })).status).toBe(
      CliStatus.INSUFFICIENT_STATE_MEMORY,
    );
  });

  it('needs history storage for depth + 1 entries', () => {
    const opts = { historyDepth: 4, maxCmdLength: 32 };
    expect(createCli(options({ ...opts, memory: { history: new Uint8Array(4 * 32) } })).status).toBe(
      CliStatus.INSUFFICIENT_TEMP_MEMORY,
    );
    expect(createCli(options({ ...opts, memory: { history: new Uint8Array(5 * 32) } })).status).toBe(CliStatus.SUCCESS);
  });

  it('runs on caller-supplied memory', () => {
    const memory = {
      line: new Uint8Array(32),
      rx: new Uint8Array(16),
      output: [new Uint8Array(64), new Uint8Array(64)] as const,
      history: new Uint8Array(5 * 32),
    };
    const transport = new FakeTransport();
    const { cli } = createCli(
      options({ transport, maxCmdLength: 32, rxBufferSize: 16, outputBufferSize: 64, historyDepth: 4, memory }),
    );
    expect(cli).not.toBeNull();
    if (!cli) return;
    cli.submitByte(0x6f);
    cli.submitByte(0x6b);
    cli.pump();
    expect(Array.from(memory.line.subarray(0, 2))).toEqual([0x6f, 0x6b]);

    cli.submitByte(0x0d);
    cli.pump();
    expect(cli.getHistory()).toEqual(['ok']);
    expect(Array.from(memory.history.subarray(0, 2))).toEqual([0x6f, 0x6b]);
  });
});
