export class BitSet {
  private readonly words: Uint32Array;

  constructor(readonly size: number) {
    this.words = new Uint32Array(Math.ceil(size / 32));
  }

  add(index: number): void {
    this.words[index >>> 5] |= 1 << (index & 31);
  }

  has(index: number): boolean {
    return (this.words[index >>> 5] & (1 << (index & 31))) !== 0;
  }

  union(other: BitSet): void {
    for (let i = 0; i < this.words.length; i++) {
      this.words[i] |= other.words[i];
    }
  }

  /** Members in increasing order. */
  toArray(): number[] {
    const members: number[] = [];
    for (let index = 0; index < this.size; index++) {
      if (this.has(index)) {
        members.push(index);
      }
    }
    return members;
  }
}
