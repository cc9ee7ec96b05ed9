import { CliError, CliStatus } from '../cli/status.js';
import { bytesToString, trim, writeString } from '../utils/text.js';

/**
 * Storage bytes a history of `depth` entries of `entryLength` bytes needs.
 * One extra slot separates the newest entry from the oldest.
 */
export function historyStorageSize(depth: number, entryLength: number): number {
  return (depth + 1) * entryLength;
}

/**
 * Circular list of previously entered lines with a scroll cursor.
 *
 * Slots live in a single flat slab. `head` is the next slot to write, `tail`
 * the oldest entry, `cursor` the slot scrolling is positioned on. The ring is
 * empty when head === tail; a cursor equal to head means "not scrolled".
 */
export class HistoryRing {
  readonly depth: number;
  readonly entryLength: number;
  private readonly slots: number;
  private readonly storage: Uint8Array;
  private readonly lengths: Uint32Array;
  private head = 0;
  private tail = 0;
  private cursor = 0;

  constructor(depth: number, entryLength: number, storage?: Uint8Array) {
    this.depth = depth;
    this.entryLength = entryLength;
    this.slots = depth + 1;
    const needed = historyStorageSize(depth, entryLength);
    if (storage && storage.length < needed) {
      throw new CliError(
        CliStatus.INSUFFICIENT_TEMP_MEMORY,
        `history needs ${needed} bytes, got ${storage.length}`,
      );
    }
    this.storage = storage ?? new Uint8Array(needed);
    this.lengths = new Uint32Array(this.slots);
  }

  /** Number of retained entries. */
  get size(): number {
    const n = this.head - this.tail;
    return n < 0 ? n + this.slots : n;
  }

  /** True when no scrolling has happened since the last append or reset. */
  isAtLatest(): boolean {
    return this.cursor === this.head;
  }

  init(): void {
    this.storage.fill(0);
    this.lengths.fill(0);
    this.head = 0;
    this.tail = 0;
    this.cursor = 0;
  }

  flush(): void {
    this.init();
  }

  /**
   * Store a trimmed copy of `line`. Empty lines and repeats of the newest
   * entry are skipped; either way the scroll cursor returns to the latest.
   */
  append(line: string): void {
    const text = trim(line);
    if (text.length > 0 && !this.isNewest(text)) {
      const offset = this.head * this.entryLength;
      this.storage.fill(0, offset, offset + this.entryLength);
      this.lengths[this.head] = writeString(this.storage, offset, text, this.entryLength - 1);
      this.head = this.next(this.head);
      if (this.head === this.tail) {
        this.tail = this.next(this.tail);
      }
    }
    this.cursor = this.head;
  }

  /** Step to an older entry. Returns null (cursor unchanged) at the oldest. */
  scrollUp(): Uint8Array | null {
    if (this.cursor === this.tail) return null;
    this.cursor = this.prev(this.cursor);
    return this.slot(this.cursor);
  }

  /**
   * Step to a newer entry. Returns null once the cursor is back at the
   * latest position, meaning the line should be cleared.
   */
  scrollDown(): Uint8Array | null {
    if (this.cursor === this.head) return null;
    this.cursor = this.next(this.cursor);
    if (this.cursor === this.head) return null;
    return this.slot(this.cursor);
  }

  /** Retained entries, oldest first. */
  entries(): string[] {
    const out: string[] = [];
    for (let i = this.tail; i !== this.head; i = this.next(i)) {
      out.push(bytesToString(this.slot(i)));
    }
    return out;
  }

  private isNewest(text: string): boolean {
    if (this.head === this.tail) return false;
    const newest = this.prev(this.head);
    const stored = this.slot(newest);
    return bytesToString(stored) === text.slice(0, this.entryLength - 1);
  }

  private slot(index: number): Uint8Array {
    const offset = index * this.entryLength;
    return this.storage.subarray(offset, offset + this.lengths[index]);
  }

  private next(index: number): number {
    return index + 1 === this.slots ? 0 : index + 1;
  }

  private prev(index: number): number {
    return index === 0 ? this.slots - 1 : index - 1;
  }
}
