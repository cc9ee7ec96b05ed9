export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';

// Reset attributes then select red, so the color never inherits bold.
export const RED = '\x1b[0;31m';
export const GREEN = '\x1b[32m';
export const YELLOW = '\x1b[33m';

export function green(s: string): string { return GREEN + s + RESET; }
export function yellow(s: string): string { return YELLOW + s + RESET; }
