import { describe, it, expect } from 'vitest';
import { BitString } from '../src/index.ts';

describe('BitString', () => {
  it('should parse and print binary', () => {
    expect(BitString.fromBinary('1011').toString()).toBe('1011');
    expect(BitString.fromBinary('').length).toBe(0);
  });

  it('should reject non-binary digits', () => {
    expect(() => BitString.fromBinary('102')).toThrow(SyntaxError);
  });

  it('should print fift hex with a completion tag', () => {
    const bits = BitString.fromBinary('0'.repeat(29) + '111' + '1');
    expect(bits.toHex()).toBe('00000007C_');
    expect(BitString.fromBinary('1010').toHex()).toBe('A');
  });

  it('should parse fift hex with a completion tag', () => {
    const bits = BitString.fromHex('00000007C_');
    expect(bits.length).toBe(33);
    expect(bits.toString()).toBe('0'.repeat(29) + '1111');
    expect(BitString.fromHex('A').toString()).toBe('1010');
  });

  it('should copy packed bytes', () => {
    const data = Uint8Array.of(0b1011_0000);
    const bits = BitString.fromPacked(data, 4);
    data[0] = 0;
    expect(bits.toString()).toBe('1011');
    expect(() => BitString.fromPacked(data, 9)).toThrow(RangeError);
  });

  it('should build from a bigint', () => {
    expect(BitString.fromBigInt(5n, 4).toString()).toBe('0101');
    expect(() => BitString.fromBigInt(16n, 4)).toThrow(RangeError);
  });

  it('should take unaligned substrings', () => {
    const bits = BitString.fromBinary('110100');
    expect(bits.substring(1, 3).toString()).toBe('101');
    expect(bits.substring(4).toString()).toBe('00');
  });

  it('should concatenate', () => {
    const joined = BitString.fromBinary('10').concat(BitString.fromBinary('01'), BitString.fromBinary('1'));
    expect(joined.toString()).toBe('10011');
  });

  it('should compare prefixes', () => {
    const a = BitString.fromBinary('1100');
    expect(a.commonPrefix(BitString.fromBinary('1110'))).toBe(2);
    expect(a.startsWith(BitString.fromBinary('11'))).toBe(true);
    expect(a.startsWith(BitString.fromBinary('111'))).toBe(false);
    expect(a.equals(BitString.fromBinary('1100'))).toBe(true);
  });

  it('should convert to integers and bytes', () => {
    expect(BitString.fromBinary('1011').toBigInt()).toBe(11n);
    expect([...BitString.fromBinary('101').toBytes()]).toEqual([0xa0]);
    expect([...BitString.fromBinary('101').toPaddedBytes()]).toEqual([0xb0]);
  });
});
