import { createHash } from 'node:crypto';
import { BitString } from './bits.ts';
import { DEFAULT_CONFIG, type CellConfig } from './config.ts';
import { SizeExceededError } from './errors.ts';
import { CellSlice } from './slice.ts';

/**
 * Cell - the atomic unit of encoded data.
 *
 * A cell holds up to `maxBits` data bits and up to `maxRefs` references to
 * child cells. Cells are immutable: builders produce them, slices read them.
 *
 * @example
 * ```typescript
 * const cell = new CellBuilder().storeUint(7, 32).storeBit(true).endCell();
 * cell.toString(); // 'x{00000007C_}'
 * ```
 */
export class Cell {
  static readonly EMPTY = new Cell(BitString.EMPTY, []);

  readonly bits: BitString;
  readonly refs: readonly Cell[];
  private cachedHash: Uint8Array | null = null;
  private cachedDepth = -1;

  constructor(bits: BitString, refs: readonly Cell[], config: CellConfig = DEFAULT_CONFIG) {
    if (bits.length > config.maxBits) {
      throw new SizeExceededError('bits', bits.length, config.maxBits);
    }
    if (refs.length > config.maxRefs) {
      throw new SizeExceededError('refs', refs.length, config.maxRefs);
    }
    this.bits = bits;
    this.refs = Object.freeze([...refs]);
  }

  /**
   * Open a read cursor at the start of the cell.
   */
  beginParse(): CellSlice {
    return new CellSlice(this);
  }

  get isEmpty(): boolean {
    return this.bits.length === 0 && this.refs.length === 0;
  }

  /**
   * Longest path to a leaf; 0 for a cell without references.
   */
  get depth(): number {
    if (this.cachedDepth < 0) {
      let max = -1;
      for (const ref of this.refs) max = Math.max(max, ref.depth);
      this.cachedDepth = max + 1;
    }
    return this.cachedDepth;
  }

  /**
   * SHA-256 of the standard representation of an ordinary cell:
   * two descriptor bytes, the data with completion tag, the depth of every
   * child (2 bytes each) and the hash of every child.
   */
  hash(): Uint8Array {
    return this.representationHash().slice();
  }

  private representationHash(): Uint8Array {
    if (this.cachedHash === null) {
      const d1 = this.refs.length;
      const d2 = Math.floor(this.bits.length / 8) + Math.ceil(this.bits.length / 8);
      const h = createHash('sha256');
      h.update(Uint8Array.of(d1, d2));
      h.update(this.bits.toPaddedBytes());
      for (const ref of this.refs) h.update(Uint8Array.of(ref.depth >> 8, ref.depth & 0xff));
      for (const ref of this.refs) h.update(ref.representationHash());
      this.cachedHash = new Uint8Array(h.digest());
    }
    return this.cachedHash;
  }

  equals(other: Cell): boolean {
    if (this === other) return true;
    const a = this.representationHash();
    const b = other.representationHash();
    return a.every((byte, i) => byte === b[i]);
  }

  /**
   * Fift-style dump, one cell per line, children indented by one space.
   */
  toString(indent: string = ''): string {
    let out = `${indent}x{${this.bits.toHex()}}`;
    for (const ref of this.refs) out += '\n' + ref.toString(indent + ' ');
    return out;
  }
}
