/** Delimiters between the command word and non-string arguments. */
export const FIELD_DELIMITERS = ' ,;\t';

const QUOTES = '"\'';

/**
 * Walks a command line token by token. Each call picks its own delimiter
 * set, the way successive strtok() calls on the same line can.
 */
export class LineTokenizer {
  private readonly line: string;
  private pos = 0;

  constructor(line: string) {
    this.line = line;
  }

  /** Next run of non-delimiter characters, or null at the end of the line. */
  next(delimiters: string = FIELD_DELIMITERS): string | null {
    const { line } = this;
    while (this.pos < line.length && delimiters.includes(line[this.pos])) this.pos++;
    if (this.pos >= line.length) return null;

    const start = this.pos;
    while (this.pos < line.length && !delimiters.includes(line[this.pos])) this.pos++;
    const token = line.slice(start, this.pos);
    if (this.pos < line.length) this.pos++;
    return token;
  }

  /**
   * Next string argument. A token opening with a quote runs to the matching
   * quote (or the end of the line) and may contain spaces; otherwise spaces
   * and quotes end it.
   */
  nextString(): string | null {
    const { line } = this;
    while (this.pos < line.length && line[this.pos] === ' ') this.pos++;
    if (this.pos >= line.length) return null;

    const open = line[this.pos];
    if (QUOTES.includes(open)) {
      const start = this.pos + 1;
      const close = line.indexOf(open, start);
      const stop = close < 0 ? line.length : close;
      this.pos = close < 0 ? line.length : close + 1;
      return line.slice(start, stop);
    }

    const start = this.pos;
    while (this.pos < line.length && line[this.pos] !== ' ' && !QUOTES.includes(line[this.pos])) this.pos++;
    const token = line.slice(start, this.pos);
    if (this.pos < line.length && line[this.pos] === ' ') this.pos++;
    return token;
  }
}
