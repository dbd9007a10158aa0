/**
 * BitString - an immutable sequence of bits.
 *
 * Bits are packed MSB-first: bit 0 is the high bit of byte 0. This is the
 * order in which a cell's data is written and read.
 */
export class BitString {
  static readonly EMPTY = new BitString(new Uint8Array(0), 0);

  private readonly data: Uint8Array;
  readonly length: number;

  private constructor(data: Uint8Array, length: number) {
    if (length < 0 || length > data.length * 8) {
      throw new RangeError(`BitString length ${length} out of bounds for ${data.length} bytes`);
    }
    this.data = data;
    this.length = length;
  }

  /**
   * Copy packed bits out of a buffer.
   *
   * @param data - packed bits; trailing bits past `length` are ignored
   * @param length - number of meaningful bits
   */
  static fromPacked(data: Uint8Array, length: number): BitString {
    if (length < 0 || length > data.length * 8) {
      throw new RangeError(`BitString length ${length} out of bounds for ${data.length} bytes`);
    }
    return new BitString(data.slice(0, (length + 7) >> 3), length);
  }

  /**
   * Parse a string of `0` and `1` characters.
   */
  static fromBinary(text: string): BitString {
    const data = new Uint8Array(Math.ceil(text.length / 8));
    for (let i = 0; i < text.length; i++) {
      const ch = text[i];
      if (ch === '1') data[i >> 3] |= 0x80 >> (i & 7);
      else if (ch !== '0') throw new SyntaxError(`invalid binary digit '${ch}' at ${i}`);
    }
    return new BitString(data, text.length);
  }

  /**
   * Parse fift-style hex. A trailing `_` means the last nibble carries a
   * completion tag: the final `1` bit and the zeros after it are dropped.
   */
  static fromHex(text: string): BitString {
    const completed = text.endsWith('_');
    const digits = completed ? text.slice(0, -1) : text;
    let binary = '';
    for (const ch of digits) {
      const nibble = parseInt(ch, 16);
      if (Number.isNaN(nibble)) throw new SyntaxError(`invalid hex digit '${ch}'`);
      binary += nibble.toString(2).padStart(4, '0');
    }
    if (completed) {
      const tag = binary.lastIndexOf('1');
      if (tag === -1) throw new SyntaxError(`missing completion tag in '${text}'`);
      binary = binary.slice(0, tag);
    }
    return BitString.fromBinary(binary);
  }

  /**
   * Wrap whole bytes.
   */
  static fromBytes(bytes: Uint8Array): BitString {
    return new BitString(bytes.slice(), bytes.length * 8);
  }

  /**
   * Big-endian bits of a non-negative integer, `length` bits wide.
   */
  static fromBigInt(value: bigint, length: number): BitString {
    if (value < 0n || value >= 1n << BigInt(length)) {
      throw new RangeError(`${value} does not fit in ${length} bits`);
    }
    const data = new Uint8Array(Math.ceil(length / 8));
    for (let i = 0; i < length; i++) {
      if ((value >> BigInt(length - 1 - i)) & 1n) data[i >> 3] |= 0x80 >> (i & 7);
    }
    return new BitString(data, length);
  }

  at(index: number): 0 | 1 {
    if (index < 0 || index >= this.length) {
      throw new RangeError(`bit index ${index} out of bounds (length ${this.length})`);
    }
    return (this.data[index >> 3] & (0x80 >> (index & 7))) !== 0 ? 1 : 0;
  }

  substring(offset: number, length: number = this.length - offset): BitString {
    if (offset < 0 || length < 0 || offset + length > this.length) {
      throw new RangeError(`substring(${offset}, ${length}) out of bounds (length ${this.length})`);
    }
    if ((offset & 7) === 0) {
      return new BitString(this.data.subarray(offset >> 3, (offset + length + 7) >> 3), length);
    }
    const out = new Uint8Array(Math.ceil(length / 8));
    for (let i = 0; i < length; i++) {
      if (this.at(offset + i)) out[i >> 3] |= 0x80 >> (i & 7);
    }
    return new BitString(out, length);
  }

  concat(...others: BitString[]): BitString {
    const total = others.reduce((sum, b) => sum + b.length, this.length);
    const out = new Uint8Array(Math.ceil(total / 8));
    let pos = 0;
    for (const part of [this, ...others]) {
      for (let i = 0; i < part.length; i++, pos++) {
        if (part.at(i)) out[pos >> 3] |= 0x80 >> (pos & 7);
      }
    }
    return new BitString(out, total);
  }

  /**
   * Length of the common prefix with another bit string.
   */
  commonPrefix(other: BitString): number {
    const max = Math.min(this.length, other.length);
    let i = 0;
    while (i < max && this.at(i) === other.at(i)) i++;
    return i;
  }

  startsWith(prefix: BitString): boolean {
    return prefix.length <= this.length && this.commonPrefix(prefix) === prefix.length;
  }

  equals(other: BitString): boolean {
    return this.length === other.length && this.commonPrefix(other) === this.length;
  }

  /**
   * Interpret the bits as an unsigned big-endian integer.
   */
  toBigInt(): bigint {
    let value = 0n;
    for (let i = 0; i < this.length; i++) {
      value = (value << 1n) | BigInt(this.at(i));
    }
    return value;
  }

  /**
   * Bytes padded with zero bits to a whole byte.
   */
  toBytes(): Uint8Array {
    const out = new Uint8Array(Math.ceil(this.length / 8));
    out.set(this.data.subarray(0, out.length));
    const tail = this.length & 7;
    if (tail !== 0) out[out.length - 1] &= 0xff << (8 - tail);
    return out;
  }

  /**
   * Bytes with the completion tag appended when the length is not a multiple
   * of 8 (a single `1` bit followed by zeros).
   */
  toPaddedBytes(): Uint8Array {
    const out = this.toBytes();
    const tail = this.length & 7;
    if (tail !== 0) out[out.length - 1] |= 0x80 >> tail;
    return out;
  }

  /**
   * Fift-style hex: uppercase nibbles, with `_` marking a completion tag when
   * the length is not a multiple of 4.
   */
  toHex(): string {
    const tail = this.length & 3;
    let bits = this.toString();
    if (tail !== 0) bits = bits + '1' + '0'.repeat(3 - tail);
    let hex = '';
    for (let i = 0; i < bits.length; i += 4) {
      hex += parseInt(bits.slice(i, i + 4), 2).toString(16).toUpperCase();
    }
    return tail !== 0 ? hex + '_' : hex;
  }

  toString(): string {
    let out = '';
    for (let i = 0; i < this.length; i++) out += this.at(i);
    return out;
  }
}
