import { Address } from './address.ts';
import { BitString } from './bits.ts';
import { Cell } from './cell.ts';
import { DEFAULT_CONFIG, type CellConfig } from './config.ts';
import {
  IntegerOutOfRangeError,
  InvalidValueError,
  SizeExceededError,
  UseAfterCloseError,
} from './errors.ts';
import type { CellSlice } from './slice.ts';

/**
 * CellBuilder accumulates bits and references for a single cell.
 *
 * Store methods return the builder so calls can be chained. `endCell()`
 * consumes the builder: the cell it returns is immutable, and any later store
 * raises {@link UseAfterCloseError}. Writes that would push the cell past the
 * configured limits raise {@link SizeExceededError} without writing anything.
 */
export class CellBuilder {
  readonly config: CellConfig;
  private data: Uint8Array;
  private length: number;
  private readonly refs: Cell[];
  private sealed: boolean;

  constructor(config: CellConfig = DEFAULT_CONFIG) {
    this.config = config;
    this.data = new Uint8Array(Math.ceil(config.maxBits / 8));
    this.length = 0;
    this.refs = [];
    this.sealed = false;
  }

  /** Bits written so far. */
  get bits(): number {
    return this.length;
  }

  /** References written so far. */
  get refCount(): number {
    return this.refs.length;
  }

  get availableBits(): number {
    return this.config.maxBits - this.length;
  }

  get availableRefs(): number {
    return this.config.maxRefs - this.refs.length;
  }

  private reserveBits(count: number): void {
    if (this.sealed) throw new UseAfterCloseError('builder');
    if (count > this.availableBits) {
      throw new SizeExceededError('bits', this.length + count, this.config.maxBits);
    }
  }

  private pushBit(bit: boolean): void {
    if (bit) this.data[this.length >> 3] |= 0x80 >> (this.length & 7);
    this.length++;
  }

  // === Bits ===

  storeBit(bit: boolean): this {
    this.reserveBits(1);
    this.pushBit(bit);
    return this;
  }

  storeBits(bits: BitString): this {
    this.reserveBits(bits.length);
    for (let i = 0; i < bits.length; i++) this.pushBit(bits.at(i) === 1);
    return this;
  }

  // === Integers ===

  storeUint(value: number | bigint, bits: number): this {
    const v = toBigInt(value);
    if (v < 0n || v >= 1n << BigInt(bits)) {
      throw new IntegerOutOfRangeError(v, bits, false);
    }
    this.reserveBits(bits);
    for (let i = bits - 1; i >= 0; i--) this.pushBit(((v >> BigInt(i)) & 1n) === 1n);
    return this;
  }

  storeInt(value: number | bigint, bits: number): this {
    const v = toBigInt(value);
    const half = bits > 0 ? 1n << BigInt(bits - 1) : 0n;
    if (bits === 0 ? v !== 0n : v < -half || v >= half) {
      throw new IntegerOutOfRangeError(v, bits, true);
    }
    return this.storeUint(v < 0n ? v + (1n << BigInt(bits)) : v, bits);
  }

  /**
   * Variable-length unsigned integer: byte count in `lengthBits` bits, then
   * the value in that many bytes (zero is stored as a zero count).
   */
  storeVarUint(value: number | bigint, lengthBits: number): this {
    const v = toBigInt(value);
    if (v < 0n) throw new IntegerOutOfRangeError(v, lengthBits, false);
    const bytes = byteLength(v);
    if (bytes >= 1 << lengthBits) {
      throw new IntegerOutOfRangeError(v, ((1 << lengthBits) - 1) * 8, false);
    }
    this.reserveBits(lengthBits + bytes * 8);
    return this.storeUint(bytes, lengthBits).storeUint(v, bytes * 8);
  }

  storeVarInt(value: number | bigint, lengthBits: number): this {
    const v = toBigInt(value);
    let bytes = v === 0n ? 0 : 1;
    while (bytes > 0 && (v < -(1n << BigInt(bytes * 8 - 1)) || v >= 1n << BigInt(bytes * 8 - 1))) {
      bytes++;
    }
    if (bytes >= 1 << lengthBits) {
      throw new IntegerOutOfRangeError(v, ((1 << lengthBits) - 1) * 8, true);
    }
    this.reserveBits(lengthBits + bytes * 8);
    return this.storeUint(bytes, lengthBits).storeInt(v, bytes * 8);
  }

  storeCoins(value: number | bigint): this {
    return this.storeVarUint(value, 4);
  }

  // === References ===

  storeRef(cell: Cell): this {
    if (this.sealed) throw new UseAfterCloseError('builder');
    if (this.availableRefs < 1) {
      throw new SizeExceededError('refs', this.refs.length + 1, this.config.maxRefs);
    }
    this.refs.push(cell);
    return this;
  }

  storeMaybeRef(cell: Cell | null): this {
    if (cell === null) return this.storeBit(false);
    if (this.availableRefs < 1) {
      throw new SizeExceededError('refs', this.refs.length + 1, this.config.maxRefs);
    }
    return this.storeBit(true).storeRef(cell);
  }

  // === Composite ===

  /**
   * Append everything a slice has left: its remaining bits and references.
   */
  storeSlice(slice: CellSlice): this {
    const copy = slice.clone();
    const bits = copy.loadBits(copy.remainingBits);
    const refs: Cell[] = [];
    while (copy.remainingRefs > 0) refs.push(copy.loadRef());
    if (refs.length > this.availableRefs) {
      throw new SizeExceededError('refs', this.refs.length + refs.length, this.config.maxRefs);
    }
    this.storeBits(bits);
    for (const ref of refs) this.storeRef(ref);
    return this;
  }

  storeAddress(address: Address): this {
    this.reserveBits(Address.BITS);
    return this.storeUint(0b100, 3)
      .storeInt(address.workchain, 8)
      .storeBits(BitString.fromBytes(address.hash));
  }

  /**
   * Finalize into an immutable cell. The builder cannot be used afterwards.
   */
  endCell(): Cell {
    if (this.sealed) throw new UseAfterCloseError('builder');
    this.sealed = true;
    return new Cell(BitString.fromPacked(this.data, this.length), this.refs, this.config);
  }
}

export function beginCell(config: CellConfig = DEFAULT_CONFIG): CellBuilder {
  return new CellBuilder(config);
}

function toBigInt(value: number | bigint): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isSafeInteger(value)) {
    throw new InvalidValueError(`${value} is not a safe integer`);
  }
  return BigInt(value);
}

function byteLength(value: bigint): number {
  let bytes = 0;
  for (let v = value; v > 0n; v >>= 8n) bytes++;
  return bytes;
}
