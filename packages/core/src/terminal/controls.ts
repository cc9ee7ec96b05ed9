import { BOLD, RED, RESET } from '../utils/colors.js';

export const Control = {
  Alert: 'alert',
  Bold: 'bold',
  CarriageReturn: 'cr',
  ClearScreen: 'cls',
  Kill: 'kill',
  NewLine: 'newline',
  Next: 'next',
  Normal: 'normal',
  Prev: 'prev',
  Red: 'red',
  Restore: 'restore',
  Save: 'save',
} as const;

export type ControlAction = (typeof Control)[keyof typeof Control];

export const CONTROL_SEQUENCES: Record<ControlAction, string> = {
  alert: '\x07',
  bold: BOLD,
  cr: '\r',
  cls: '\x1b[2J\x1b[H',
  kill: '\x1b[K',
  newline: '\r\n',
  next: '\x1b[1C',
  normal: RESET,
  prev: '\x1b[1D',
  red: RED,
  restore: '\x1b8',
  save: '\x1b7',
};
