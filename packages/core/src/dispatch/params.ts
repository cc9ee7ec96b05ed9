import type { ArgType, Args, ArgValue } from './types.js';
import type { LineTokenizer } from './tokenizer.js';

export type ParamIssue =
  | { kind: 'invalid'; index: number; type: ArgType; token: string }
  | { kind: 'extra'; token: string }
  | { kind: 'too-many'; declared: number; limit: number };

export interface ParseReport {
  /** Conversions that failed, plus one if too many parameters are declared. */
  failures: number;
  issues: ParamIssue[];
}

const INTEGER_PREFIX = /^([+-]?)(0[xX][0-9a-fA-F]+|0[0-7]*|[1-9][0-9]*)/;
const FLOAT_PREFIX = /^([+-]?)(0[xX][0-9a-fA-F]+|(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?|inf(?:inity)?|nan)/i;

/**
 * Integer from the longest valid prefix of `token`. The base follows the
 * prefix: 0x hex, leading 0 octal, otherwise decimal. Null when no digits.
 */
export function parseInteger(token: string): number | null {
  const match = INTEGER_PREFIX.exec(token);
  if (!match) return null;
  const [, sign, body] = match;

  let value: number;
  if (body.length > 2 && (body[1] === 'x' || body[1] === 'X')) {
    value = parseInt(body.slice(2), 16);
  } else if (body.length > 1 && body[0] === '0') {
    value = parseInt(body, 8);
  } else {
    value = parseInt(body, 10);
  }
  if (value === 0) return 0;
  return sign === '-' ? -value : value;
}

/** Float from the longest valid prefix of `token`; hex integers are accepted. */
export function parseFloatPrefix(token: string): number | null {
  const match = FLOAT_PREFIX.exec(token);
  if (!match) return null;
  const [, sign, body] = match;
  const lower = body.toLowerCase();

  let value: number;
  if (lower.startsWith('0x')) value = parseInt(lower.slice(2), 16);
  else if (lower.startsWith('inf')) value = Infinity;
  else if (lower === 'nan') value = NaN;
  else value = Number(body);

  if (value === 0) return 0;
  return sign === '-' ? -value : value;
}

function convert(type: string, token: string): ArgValue | null {
  switch (type) {
    case 's':
    case 'S':
      return { type: 'string', value: token };
    case 'c':
    case 'C':
      return { type: 'char', value: token[0] };
    case 'f':
    case 'F': {
      const value = parseFloatPrefix(token);
      return value === null ? null : { type: 'float', value };
    }
    case 'd':
    case 'D':
    case 'x':
    case 'X': {
      const value = parseInteger(token);
      return value === null ? null : { type: 'integer', value };
    }
    default:
      return null;
  }
}

function argTypeOf(type: string): ArgType | null {
  switch (type.toLowerCase()) {
    case 's':
      return 'string';
    case 'c':
      return 'char';
    case 'f':
      return 'float';
    case 'd':
    case 'x':
      return 'integer';
    default:
      return null;
  }
}

/**
 * Convert the remaining tokens of a line into `args` following `paramTypes`.
 * A missing token ends nothing: the argument is simply not counted. Tokens
 * left over after the last type are reported as extras.
 */
export function parseParams(paramTypes: string, tokens: LineTokenizer, args: Args): ParseReport {
  const report: ParseReport = { failures: 0, issues: [] };

  if (paramTypes.length > args.capacity) {
    report.failures++;
    report.issues.push({ kind: 'too-many', declared: paramTypes.length, limit: args.capacity });
  } else {
    for (let i = 0; i < paramTypes.length; i++) {
      const type = argTypeOf(paramTypes[i]);
      if (type === null) continue;

      const token = type === 'string' ? tokens.nextString() : tokens.next();
      if (token === null) continue;

      const value = convert(paramTypes[i], token);
      if (value === null) {
        report.failures++;
        report.issues.push({ kind: 'invalid', index: i, type, token });
      } else {
        args.set(i, value);
      }
    }
  }

  for (let token = tokens.next(); token !== null; token = tokens.next()) {
    report.issues.push({ kind: 'extra', token });
  }
  return report;
}
