import { InvalidValueError } from './errors.ts';

/**
 * Internal standard address: a signed 8-bit workchain and a 256-bit account
 * hash. Encoded as `10` (tag) `0` (no anycast) `int8` `bits256`.
 */
export class Address {
  /** Encoded width in bits. */
  static readonly BITS = 267;

  readonly workchain: number;
  readonly hash: Uint8Array;

  constructor(workchain: number, hash: Uint8Array) {
    if (!Number.isInteger(workchain) || workchain < -128 || workchain > 127) {
      throw new InvalidValueError(`workchain ${workchain} does not fit in int8`);
    }
    if (hash.length !== 32) {
      throw new InvalidValueError(`address hash must be 32 bytes, got ${hash.length}`);
    }
    this.workchain = workchain;
    this.hash = hash.slice();
  }

  /**
   * Parse the raw form `<workchain>:<64 hex digits>`.
   */
  static parseRaw(text: string): Address {
    const match = /^(-?\d+):([0-9a-fA-F]{64})$/.exec(text);
    if (match === null) {
      throw new InvalidValueError(`invalid raw address '${text}'`);
    }
    const hash = new Uint8Array(32);
    for (let i = 0; i < 32; i++) {
      hash[i] = parseInt(match[2].slice(i * 2, i * 2 + 2), 16);
    }
    return new Address(Number(match[1]), hash);
  }

  equals(other: Address): boolean {
    return this.workchain === other.workchain && this.hash.every((b, i) => b === other.hash[i]);
  }

  toRawString(): string {
    let hex = '';
    for (const b of this.hash) hex += b.toString(16).padStart(2, '0');
    return `${this.workchain}:${hex}`;
  }

  toString(): string {
    return this.toRawString();
  }
}
