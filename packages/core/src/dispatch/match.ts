/** First entry whose name equals `token` ignoring case, or null. */
export function matchCommand<T extends { name: string }>(token: string, table: readonly T[]): T | null {
  const wanted = token.toLowerCase();
  for (const entry of table) {
    if (entry.name.length !== wanted.length) continue;
    if (entry.name.toLowerCase() === wanted) return entry;
  }
  return null;
}

/**
 * Index of the first choice equal to `arg` ignoring case, or -1. A missing
 * argument matches nothing.
 */
export function matchChoice(arg: string | undefined, choices: readonly string[]): number {
  if (arg === undefined) return -1;
  const wanted = arg.toLowerCase();
  return choices.findIndex((choice) => choice.toLowerCase() === wanted);
}
