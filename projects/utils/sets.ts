export type ConstSet<T> = Pick<Set<T>, 'size' | 'has'> & Iterable<T>;

/**
 * The read-only half of a StateSet.
 */
export interface ConstStateSet extends ConstSet<number> {
  readonly capacity: number;
  isEmpty(): boolean;
  equals(other: ConstStateSet): boolean;
  key(): string;
  toDebugStr(): string;
}

const WORD_BITS = 32;

function popCount(word: number): number {
  let count = 0;
  while (word != 0) {
    word &= word - 1;
    count++;
  }
  return count;
}

/**
 * A set of state indices in [0, capacity), stored as a fixed-width
 * bitset. Two sets of the same capacity have the same key() exactly
 * when they have the same members, so the key can be used to look up
 * previously seen subsets.
 */
export class StateSet implements ConstStateSet {
  readonly capacity: number;
  private readonly words: Uint32Array;
  private frozen = false;

  constructor(capacity: number, items: Iterable<number> = []) {
    this.capacity = capacity;
    this.words = new Uint32Array(Math.ceil(capacity / WORD_BITS));
    for (const item of items) {
      this.add(item);
    }
  }

  get size(): number {
    let size = 0;
    for (const word of this.words) {
      size += popCount(word);
    }
    return size;
  }

  isEmpty(): boolean {
    return this.words.every((word) => word == 0);
  }

  add(index: number): this {
    if (this.frozen) {
      throw new Error(`StateSet ${this.toDebugStr()} is frozen`);
    }
    if (!Number.isInteger(index) || index < 0 || index >= this.capacity) {
      throw new Error(
        `IndexError: ${index} is not valid. Must be < ${this.capacity}`
      );
    }
    this.words[index >>> 5] |= 1 << (index & 31);
    return this;
  }

  has(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.capacity) {
      return false;
    }
    return (this.words[index >>> 5] & (1 << (index & 31))) != 0;
  }

  *[Symbol.iterator](): IterableIterator<number> {
    for (let wi = 0; wi < this.words.length; wi++) {
      const word = this.words[wi];
      if (word == 0) {
        continue;
      }
      for (let bit = 0; bit < WORD_BITS; bit++) {
        if (word & (1 << bit)) {
          yield wi * WORD_BITS + bit;
        }
      }
    }
  }

  /**
   * Reject any further add() calls.
   */
  freeze(): ConstStateSet {
    this.frozen = true;
    return this;
  }

  equals(other: ConstStateSet): boolean {
    return this.key() == other.key();
  }

  /**
   * Fixed-width hex encoding of the underlying words.
   */
  key(): string {
    let out = '';
    for (const word of this.words) {
      out += word.toString(16).padStart(8, '0');
    }
    return out;
  }

  toDebugStr(): string {
    return `{${[...this].join(',')}}`;
  }
}
