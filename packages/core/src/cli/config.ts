import { z } from 'zod';
import { RING_GUARD_BYTES } from '../buffer/RingBuffer.js';
import type { Command } from '../dispatch/types.js';
import type { CliLogger, CliTransport } from '../terminal/transport.js';

/** Caller-owned storage; anything left out is allocated at the declared size. */
export interface CliMemory {
  /** Edit line, at least `maxCmdLength` bytes. */
  line?: Uint8Array;
  /** Receive ring, at least `rxBufferSize` bytes. */
  rx?: Uint8Array;
  /** Ping-pong output pair, each at least `outputBufferSize` bytes. */
  output?: readonly [Uint8Array, Uint8Array];
  /** History slab, at least `(historyDepth + 1) * maxCmdLength` bytes. */
  history?: Uint8Array;
}

export interface CliOptions<TContext = unknown> {
  transport: CliTransport<TContext>;
  /** Passed back to every transport call. */
  context: TContext;
  commands: readonly Command[];
  /** Shown bold at the start of every line. Default: "> " */
  prompt?: string;
  /** Edit line capacity in bytes, one of which stays reserved. Default: 128 */
  maxCmdLength?: number;
  /** Arguments a command may declare. Default: 8 */
  maxParamCount?: number;
  /** Lines kept for up/down recall. Default: 16 */
  historyDepth?: number;
  /** Receive ring size in bytes. Default: 256 */
  rxBufferSize?: number;
  /** Size of each output buffer in bytes. Default: 10240 */
  outputBufferSize?: number;
  /** Messages longer than this are clipped. Default: 512 */
  maxMessageSize?: number;
  /** Adds the `exit` built-in, which calls this. */
  onExit?: () => void;
  /** Host diagnostics. Default: console */
  logger?: CliLogger;
  memory?: CliMemory;
}

const size = (min: number) => z.number().int().min(min);

export const settingsSchema = z.object({
  prompt: z.string().default('> '),
  maxCmdLength: size(2).default(128),
  maxParamCount: size(2).default(8),
  historyDepth: size(1).default(16),
  rxBufferSize: size(RING_GUARD_BYTES + 1).default(256),
  outputBufferSize: size(2).default(10 * 1024),
  maxMessageSize: size(1).default(512),
});

export type CliSettings = z.infer<typeof settingsSchema>;

const isFunction = (value: unknown): boolean => typeof value === 'function';

export const commandSchema = z.object({
  name: z.string().min(1).regex(/^[^ ,;\t]+$/, 'command names cannot contain delimiters'),
  params: z.string().regex(/^[sfdxcSFDXC]*$/, 'parameter types are s, f, d, x and c'),
  handler: z.custom<Command['handler']>(isFunction, 'handler must be a function'),
  hidden: z.boolean().optional(),
  summary: z.string(),
  synopsis: z.string(),
  description: z.string().optional(),
  describe: z.custom<NonNullable<Command['describe']>>(isFunction, 'describe must be a function').optional(),
});

export const commandTableSchema = z.array(commandSchema);

/** Human-readable summary of a zod failure, one issue per line. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}
