/**
 * Fixed-capacity bitset of state indices. Capacity is the automaton's state
 * count, known once the automaton is built, so membership and union are word
 * operations instead of hashing.
 */
export class StateSet implements Iterable<number> {
  readonly capacity: number;
  private readonly words: Uint32Array;

  constructor(capacity: number) {
    this.capacity = capacity;
    this.words = new Uint32Array((capacity + 31) >>> 5);
  }

  static of(capacity: number, states: Iterable<number>): StateSet {
    const set = new StateSet(capacity);
    for (const state of states) set.add(state);
    return set;
  }

  /** Returns true when the state was not already present. */
  add(state: number): boolean {
    if (state < 0 || state >= this.capacity) {
      throw new RangeError(`State ${state} is outside a set of capacity ${this.capacity}`);
    }
    const word = state >>> 5;
    const bit = 1 << (state & 31);
    if ((this.words[word] & bit) !== 0) return false;
    this.words[word] |= bit;
    return true;
  }

  has(state: number): boolean {
    if (state < 0 || state >= this.capacity) return false;
    return (this.words[state >>> 5] & (1 << (state & 31))) !== 0;
  }

  clear(): void {
    this.words.fill(0);
  }

  isEmpty(): boolean {
    for (let i = 0; i < this.words.length; i++) {
      if (this.words[i] !== 0) return false;
    }
    return true;
  }

  get size(): number {
    let count = 0;
    for (let i = 0; i < this.words.length; i++) {
      let word = this.words[i];
      while (word !== 0) {
        word &= word - 1;
        count++;
      }
    }
    return count;
  }

  /** Adds every member of `other`; returns true if this set grew. */
  union(other: StateSet): boolean {
    this.assertSameCapacity(other);
    let changed = false;
    for (let i = 0; i < this.words.length; i++) {
      const merged = (this.words[i] | other.words[i]) >>> 0;
      if (merged !== this.words[i]) {
        this.words[i] = merged;
        changed = true;
      }
    }
    return changed;
  }

  intersects(other: StateSet): boolean {
    this.assertSameCapacity(other);
    for (let i = 0; i < this.words.length; i++) {
      if ((this.words[i] & other.words[i]) !== 0) return true;
    }
    return false;
  }

  equals(other: StateSet): boolean {
    if (this.capacity !== other.capacity) return false;
    for (let i = 0; i < this.words.length; i++) {
      if (this.words[i] !== other.words[i]) return false;
    }
    return true;
  }

  copyFrom(other: StateSet): void {
    this.assertSameCapacity(other);
    this.words.set(other.words);
  }

  clone(): StateSet {
    const copy = new StateSet(this.capacity);
    copy.words.set(this.words);
    return copy;
  }

  /** Visits members in ascending order. */
  forEach(visit: (state: number) => void): void {
    for (let i = 0; i < this.words.length; i++) {
      let word = this.words[i];
      const base = i << 5;
      while (word !== 0) {
        const lowest = word & -word;
        visit(base + 31 - Math.clz32(lowest));
        word ^= lowest;
      }
    }
  }

  toArray(): number[] {
    const states: number[] = [];
    this.forEach((state) => states.push(state));
    return states;
  }

  /** Stable string identity of the contents, for use as a map key. */
  key(): string {
    return Array.from(this.words, (word) => word.toString(36)).join('.');
  }

  [Symbol.iterator](): Iterator<number> {
    return this.toArray()[Symbol.iterator]();
  }

  private assertSameCapacity(other: StateSet): void {
    if (other.capacity !== this.capacity) {
      throw new RangeError(`Cannot combine state sets of capacity ${this.capacity} and ${other.capacity}`);
    }
  }
}
