import { z } from 'zod';

export interface HostConfig {
  prompt?: string;
  historyDepth?: number;
}

const envSchema = z.object({
  TERMLINE_PROMPT: z.string().min(1).optional(),
  TERMLINE_HISTORY_DEPTH: z.coerce.number().int().min(1).max(1024).optional(),
});

/**
 * Read host settings from the environment, then from `--prompt <text>` and
 * `--history <depth>` arguments, which take precedence. Invalid values are
 * reported and left at the console defaults.
 */
export function loadHostConfig(
  env: Record<string, string | undefined> = process.env,
  argv: string[] = process.argv.slice(2),
  warn: (message: string) => void = console.warn,
): HostConfig {
  const fromArgs: Record<string, string | undefined> = {};
  for (let i = 0; i < argv.length; i++) {
    const next = argv[i + 1];
    if ((argv[i] === '--prompt' || argv[i] === '-p') && next !== undefined) {
      fromArgs.TERMLINE_PROMPT = next;
      i++;
    } else if (argv[i] === '--history' && next !== undefined) {
      fromArgs.TERMLINE_HISTORY_DEPTH = next;
      i++;
    }
  }

  const raw = {
    TERMLINE_PROMPT: fromArgs.TERMLINE_PROMPT ?? env.TERMLINE_PROMPT,
    TERMLINE_HISTORY_DEPTH: fromArgs.TERMLINE_HISTORY_DEPTH ?? env.TERMLINE_HISTORY_DEPTH,
  };
  const config: HostConfig = {};

  const prompt = envSchema.shape.TERMLINE_PROMPT.safeParse(raw.TERMLINE_PROMPT);
  if (prompt.success) config.prompt = prompt.data;
  else warn(`ignoring prompt: ${prompt.error.issues[0]?.message ?? 'invalid'}`);

  const depth = envSchema.shape.TERMLINE_HISTORY_DEPTH.safeParse(raw.TERMLINE_HISTORY_DEPTH);
  if (depth.success) config.historyDepth = depth.data;
  else warn(`ignoring history depth '${raw.TERMLINE_HISTORY_DEPTH}': ${depth.error.issues[0]?.message ?? 'invalid'}`);

  return config;
}
