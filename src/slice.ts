import { Address } from './address.ts';
import { BitString } from './bits.ts';
import type { Cell } from './cell.ts';
import { MalformedDataError, TrailingDataError, TruncatedDataError } from './errors.ts';

/** Widest integer that still round-trips through a JS number. */
export const MAX_NUMBER_BITS = 53;

/**
 * Read position inside a cell: data bits consumed and references consumed.
 */
export interface SlicePosition {
  readonly bits: number;
  readonly refs: number;
}

/**
 * CellSlice is a read cursor over a single cell.
 *
 * Data bits and references are consumed independently. `load*` methods
 * advance the cursor, `preload*` methods only peek. A read that asks for more
 * than remains raises {@link TruncatedDataError} and leaves the cursor where
 * it was.
 */
export class CellSlice {
  readonly cell: Cell;
  private bitPos: number;
  private refPos: number;

  constructor(cell: Cell, position: SlicePosition = { bits: 0, refs: 0 }) {
    if (position.bits > cell.bits.length || position.refs > cell.refs.length) {
      throw new RangeError(`slice position ${position.bits}/${position.refs} past end of cell`);
    }
    this.cell = cell;
    this.bitPos = position.bits;
    this.refPos = position.refs;
  }

  get position(): SlicePosition {
    return { bits: this.bitPos, refs: this.refPos };
  }

  get remainingBits(): number {
    return this.cell.bits.length - this.bitPos;
  }

  get remainingRefs(): number {
    return this.cell.refs.length - this.refPos;
  }

  get isEnd(): boolean {
    return this.remainingBits === 0 && this.remainingRefs === 0;
  }

  clone(): CellSlice {
    return new CellSlice(this.cell, this.position);
  }

  private ensureBits(count: number): void {
    if (count > this.remainingBits) {
      throw new TruncatedDataError('bits', count, this.remainingBits);
    }
  }

  private ensureRefs(count: number): void {
    if (count > this.remainingRefs) {
      throw new TruncatedDataError('refs', count, this.remainingRefs);
    }
  }

  // === Bits ===

  preloadBit(): boolean {
    this.ensureBits(1);
    return this.cell.bits.at(this.bitPos) === 1;
  }

  loadBit(): boolean {
    const bit = this.preloadBit();
    this.bitPos++;
    return bit;
  }

  preloadBits(count: number): BitString {
    this.ensureBits(count);
    return this.cell.bits.substring(this.bitPos, count);
  }

  loadBits(count: number): BitString {
    const bits = this.preloadBits(count);
    this.bitPos += count;
    return bits;
  }

  skipBits(count: number): this {
    this.ensureBits(count);
    this.bitPos += count;
    return this;
  }

  // === Integers ===

  preloadBigUint(bits: number): bigint {
    this.ensureBits(bits);
    const data = this.cell.bits;
    let value = 0n;
    for (let i = 0; i < bits; i++) {
      value = (value << 1n) | BigInt(data.at(this.bitPos + i));
    }
    return value;
  }

  loadBigUint(bits: number): bigint {
    const value = this.preloadBigUint(bits);
    this.bitPos += bits;
    return value;
  }

  loadBigInt(bits: number): bigint {
    const raw = this.loadBigUint(bits);
    if (bits > 0 && raw >= 1n << BigInt(bits - 1)) return raw - (1n << BigInt(bits));
    return raw;
  }

  loadUint(bits: number): number {
    checkNumberWidth(bits);
    return Number(this.loadBigUint(bits));
  }

  preloadUint(bits: number): number {
    checkNumberWidth(bits);
    return Number(this.preloadBigUint(bits));
  }

  loadInt(bits: number): number {
    checkNumberWidth(bits);
    return Number(this.loadBigInt(bits));
  }

  /**
   * Variable-length unsigned integer: a `lengthBits`-wide byte count followed
   * by that many bytes.
   */
  loadVarUint(lengthBits: number): bigint {
    const bytes = this.preloadUint(lengthBits);
    this.ensureBits(lengthBits + bytes * 8);
    this.bitPos += lengthBits;
    return this.loadBigUint(bytes * 8);
  }

  loadVarInt(lengthBits: number): bigint {
    const bytes = this.preloadUint(lengthBits);
    this.ensureBits(lengthBits + bytes * 8);
    this.bitPos += lengthBits;
    return this.loadBigInt(bytes * 8);
  }

  /**
   * Advance past a variable-length integer, reading only its length prefix.
   */
  skipVarUint(lengthBits: number): this {
    const bytes = this.preloadUint(lengthBits);
    return this.skipBits(lengthBits + bytes * 8);
  }

  /**
   * Coins are a VarUInteger 16: 4-bit byte count plus payload.
   */
  loadCoins(): bigint {
    return this.loadVarUint(4);
  }

  // === References ===

  preloadRef(index: number = 0): Cell {
    this.ensureRefs(index + 1);
    return this.cell.refs[this.refPos + index];
  }

  loadRef(): Cell {
    const ref = this.preloadRef();
    this.refPos++;
    return ref;
  }

  loadMaybeRef(): Cell | null {
    const present = this.preloadBit();
    if (present) this.ensureRefs(1);
    this.bitPos++;
    return present ? this.loadRef() : null;
  }

  skipRefs(count: number): this {
    this.ensureRefs(count);
    this.refPos += count;
    return this;
  }

  // === Composite ===

  loadAddress(): Address {
    this.ensureBits(Address.BITS);
    const tag = this.preloadUint(3);
    if (tag !== 0b100) {
      throw new MalformedDataError(
        `expected a standard internal address (tag 100), got ${tag.toString(2).padStart(3, '0')}`,
      );
    }
    this.bitPos += 3;
    const workchain = this.loadInt(8);
    const hash = this.loadBits(256).toBytes();
    return new Address(workchain, hash);
  }

  /**
   * Throw unless every bit and reference has been consumed.
   */
  assertEnd(): void {
    if (!this.isEnd) {
      throw new TrailingDataError(this.remainingBits, this.remainingRefs);
    }
  }
}

function checkNumberWidth(bits: number): void {
  if (bits > MAX_NUMBER_BITS) {
    throw new RangeError(`${bits}-bit integers do not fit a number; use the bigint variant`);
  }
}
