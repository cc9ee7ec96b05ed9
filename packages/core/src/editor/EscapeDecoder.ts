export enum EscapeState {
  Idle,
  SawEsc,
  SawBracket,
  AwaitFinal,
}

export const EscapeKey = {
  Up: 'up',
  Down: 'down',
  Right: 'right',
  Left: 'left',
  Home: 'home',
  End: 'end',
} as const;

export type EscapeKey = (typeof EscapeKey)[keyof typeof EscapeKey];

/** A plain byte, a decoded key, or null when the byte was absorbed by a sequence. */
export type DecodeResult = number | EscapeKey | null;

const ESC = 0x1b;

const FINAL_KEYS: Record<number, EscapeKey> = {
  0x41: EscapeKey.Up, // A
  0x42: EscapeKey.Down, // B
  0x43: EscapeKey.Right, // C
  0x44: EscapeKey.Left, // D
};

/**
 * Recognizes the VT100 cursor and Home/End sequences in a byte stream.
 *
 * Home and End fire on their lead digit ('1' / '4'); the decoder then waits
 * for '~'. Any other byte after "ESC [" also waits for '~', so an unknown
 * sequence without a '~' swallows input until one arrives.
 */
export class EscapeDecoder {
  private current = EscapeState.Idle;

  get state(): EscapeState {
    return this.current;
  }

  reset(): void {
    this.current = EscapeState.Idle;
  }

  feed(byte: number): DecodeResult {
    switch (this.current) {
      case EscapeState.Idle:
        if (byte === ESC) {
          this.current = EscapeState.SawEsc;
          return null;
        }
        return byte;

      case EscapeState.SawEsc:
        this.current = byte === 0x5b ? EscapeState.SawBracket : EscapeState.Idle;
        return null;

      case EscapeState.SawBracket: {
        const key = FINAL_KEYS[byte];
        if (key !== undefined) {
          this.current = EscapeState.Idle;
          return key;
        }
        this.current = EscapeState.AwaitFinal;
        if (byte === 0x31) return EscapeKey.Home;
        if (byte === 0x34) return EscapeKey.End;
        return null;
      }

      case EscapeState.AwaitFinal:
        if (byte === 0x7e) this.current = EscapeState.Idle;
        return null;
    }
  }
}
