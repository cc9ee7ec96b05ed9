export const CliStatus = {
  SUCCESS: 'SUCCESS',
  NULL_PTR: 'NULL_PTR',
  INSUFFICIENT_STATE_MEMORY: 'INSUFFICIENT_STATE_MEMORY',
  INSUFFICIENT_TEMP_MEMORY: 'INSUFFICIENT_TEMP_MEMORY',
  INVALID_CONFIG: 'INVALID_CONFIG',
  COMM_ERROR: 'COMM_ERROR',
  BUFFER_FULL: 'BUFFER_FULL',
  INVALID_COMMAND: 'INVALID_COMMAND',
  TRANSMISSION_IN_PROGRESS: 'TRANSMISSION_IN_PROGRESS',
} as const;

export type CliStatusCode = (typeof CliStatus)[keyof typeof CliStatus];

export class CliError extends Error {
  code: CliStatusCode;

  constructor(code: CliStatusCode, message: string) {
    super(`${code}: ${message}`);
    this.name = 'CliError';
    this.code = code;
  }
}
