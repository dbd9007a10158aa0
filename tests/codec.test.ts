import { describe, it, expect } from 'vitest';
import {
  Address,
  BitString,
  Dictionary,
  IntegerOutOfRangeError,
  InvalidValueError,
  LayoutRegistry,
  OpcodePrefixMismatchError,
  SizeExceededError,
  TrailingDataError,
  TruncatedDataError,
  beginCell,
  decodeEager,
  decodeLazy,
  encode,
  t,
} from '../src/index.ts';
import { storeRecord } from '../src/engine.ts';

const owner = Address.parseRaw('0:' + '11'.repeat(32));

function pattern(length: number): BitString {
  return BitString.fromBinary('10'.repeat(Math.ceil(length / 2)).slice(0, length));
}

describe('encode / decodeEager', () => {
  it('should lay out a record bit for bit', () => {
    const registry = new LayoutRegistry();
    const Pair = registry.registerRecord('Pair', { a: t.uint(32), b: t.bool });
    const cell = encode({ a: 7, b: true }, Pair);
    expect(cell.bits.toString()).toBe('00000000000000000000000000000111' + '1');
    expect(cell.bits.length).toBe(33);
    expect(cell.refs).toHaveLength(0);
    expect(decodeEager(cell, Pair)).toEqual({ a: 7, b: true });
  });

  it('should round-trip a message with an opcode', () => {
    const registry = new LayoutRegistry();
    const Transfer = registry.registerRecord(
      'Transfer',
      {
        queryId: t.bigUint(64),
        amount: t.coins,
        destination: t.address,
        forward: t.maybe(t.cell),
        bounce: t.bool,
        delta: t.int(16),
      },
      { opcode: '0x0f8a7ea5' },
    );
    const value = { queryId: 42n, amount: 1_000_000n, destination: owner, forward: null, bounce: false, delta: -3 };
    const cell = encode(value, Transfer);
    expect(cell.bits.substring(0, 32).toHex()).toBe('0F8A7EA5');
    expect(decodeEager(cell, Transfer, { assertEnd: true })).toEqual(value);
  });

  it('should store a nullable absent value as a single bit', () => {
    const registry = new LayoutRegistry();
    const Opt = registry.registerRecord('Opt', { a: t.uint(8), b: t.maybe(t.uint(16)) });
    const cell = encode({ a: 5, b: null }, Opt);
    expect(cell.bits.toString()).toBe('00000101' + '0');
    expect(decodeEager(cell, Opt, { assertEnd: true })).toEqual({ a: 5, b: null });

    const present = encode({ a: 5, b: 513 }, Opt);
    expect(present.bits.toString()).toBe('00000101' + '1' + '0000001000000001');
    expect(decodeEager(present, Opt)).toEqual({ a: 5, b: 513 });
  });

  it('should keep child cells as references', () => {
    const registry = new LayoutRegistry();
    const Holder = registry.registerRecord('Holder', { id: t.uint(8), inner: t.ref(t.uint(32)), raw: t.cell });
    const raw = beginCell().storeUint(0xff, 8).endCell();
    const cell = encode({ id: 1, inner: 77, raw }, Holder);
    expect(cell.toString()).toBe('x{01}\n x{0000004D}\n x{FF}');
    const decoded = decodeEager(cell, Holder);
    expect(decoded.inner).toBe(77);
    expect(decoded.raw.equals(raw)).toBe(true);
  });

  it('should inline nested records', () => {
    const registry = new LayoutRegistry();
    registry.registerRecord('Point', { x: t.int(8), y: t.int(8) });
    const Line = registry.registerRecord('Line', { from: t.named<{ x: number; y: number }>('Point'), width: t.uint(4) });
    const cell = encode({ from: { x: -1, y: 2 }, width: 3 }, Line);
    expect(cell.toString()).toBe('x{FF023}');
    expect(decodeEager(cell, Line)).toEqual({ from: { x: -1, y: 2 }, width: 3 });
  });

  it('should take bit widths from an earlier field', () => {
    const registry = new LayoutRegistry();
    const Sized = registry.registerRecord('Sized', { len: t.uint(8), data: t.sizedBits('len'), tail: t.uint(4) });
    const cell = encode({ len: 5, data: BitString.fromBinary('10110'), tail: 9 }, Sized);
    expect(cell.bits.length).toBe(17);
    const decoded = decodeEager(cell, Sized);
    expect(decoded.len).toBe(5);
    expect(decoded.data.toString()).toBe('10110');
    expect(decoded.tail).toBe(9);
    expect(() => encode({ len: 4, data: BitString.fromBinary('10110'), tail: 0 }, Sized)).toThrow(
      InvalidValueError,
    );
  });

  it('should take a bigint width source', () => {
    const registry = new LayoutRegistry();
    const Sized = registry.registerRecord('Sized', { len: t.uint(8), data: t.sizedBits('len') });
    const builder = beginCell();
    storeRecord(builder, Sized, { len: 5n, data: BitString.fromBinary('10110') });
    const cell = builder.endCell();
    expect(cell.bits.toString()).toBe('00000101' + '10110');
    expect(cell.equals(encode({ len: 5, data: BitString.fromBinary('10110') }, Sized))).toBe(true);
  });

  it('should round-trip dictionaries as fields', () => {
    const registry = new LayoutRegistry();
    const Wallet = registry.registerRecord('Wallet', { seqno: t.uint(32), balances: t.dict(t.uint(16), t.coins) });
    const balances = Dictionary.empty(t.uint(16), t.coins).set(1, 5n).set(300, 7n);
    const cell = encode({ seqno: 1, balances }, Wallet);
    expect(cell.refs).toHaveLength(1);
    const decoded = decodeEager(cell, Wallet);
    expect([...decoded.balances.entries()]).toEqual([
      [1, 5n],
      [300, 7n],
    ]);

    const empty = encode({ seqno: 1, balances: Dictionary.empty(t.uint(16), t.coins) }, Wallet);
    expect(empty.bits.length).toBe(33);
    expect(decodeEager(empty, Wallet).balances.isEmpty).toBe(true);
  });

  it('should reject a dictionary of another key or value type', () => {
    const registry = new LayoutRegistry();
    const Wallet = registry.registerRecord('Wallet', { balances: t.dict(t.uint(16), t.uint(8)) });
    const narrow = Dictionary.empty(t.uint(8), t.uint(8)).set(3, 9);
    expect(() => encode({ balances: narrow }, Wallet)).toThrow(
      'balances: expected map<uint16, uint8>, got map<uint8, uint8>',
    );
    expect(() => encode({ balances: Dictionary.empty(t.int(16), t.uint(8)) }, Wallet)).toThrow(InvalidValueError);
    expect(() => encode({ balances: Dictionary.empty(t.uint(16), t.uint(16)) }, Wallet)).toThrow(InvalidValueError);

    const decoded = decodeEager(encode({ balances: Dictionary.empty(t.uint(16), t.uint(8)).set(3, 9) }, Wallet), Wallet);
    expect(encode(decoded, Wallet).refs).toHaveLength(1);
  });

  it('should decode a record without fields from nothing', () => {
    const registry = new LayoutRegistry();
    const Empty = registry.registerRecord('Empty', {});
    const cell = encode({}, Empty);
    expect(cell.isEmpty).toBe(true);
    expect(decodeEager(cell, Empty, { assertEnd: true })).toEqual({});
  });

  describe('errors', () => {
    it('should name the field of an out-of-range integer', () => {
      const registry = new LayoutRegistry();
      const Small = registry.registerRecord('Small', { a: t.uint(8) });
      try {
        encode({ a: 300 }, Small);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(IntegerOutOfRangeError);
        if (e instanceof IntegerOutOfRangeError) {
          expect(e.field).toBe('a');
          expect(e.exitCode).toBe(5);
          expect(e.message).toBe('a: 300 does not fit in uint8');
        }
      }
    });

    it('should name the field a short buffer runs out in', () => {
      const registry = new LayoutRegistry();
      const Two = registry.registerRecord('Two', { a: t.uint(32), b: t.uint(16) });
      const cell = beginCell().storeUint(7, 32).storeUint(0, 12).endCell();
      try {
        decodeEager(cell, Two);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(TruncatedDataError);
        if (e instanceof TruncatedDataError) {
          expect(e.field).toBe('b');
          expect(e.shortBy).toBe(4);
          expect(e.message).toBe('b: needs 16 bits but only 12 remain');
        }
      }
    });

    it('should build nested field paths', () => {
      const registry = new LayoutRegistry();
      const Inner = registry.registerRecord('Inner', { x: t.uint(8) });
      const Outer = registry.registerRecord('Outer', { inner: t.inline(Inner) });
      const cell = beginCell().storeUint(1, 4).endCell();
      expect(() => decodeEager(cell, Outer)).toThrow('inner.x: needs 8 bits but only 4 remain');
    });

    it('should report trailing data only when asked', () => {
      const registry = new LayoutRegistry();
      const One = registry.registerRecord('One', { a: t.uint(8) });
      const cell = beginCell().storeUint(1, 8).storeUint(0, 4).endCell();
      expect(decodeEager(cell, One)).toEqual({ a: 1 });
      expect(() => decodeEager(cell, One, { assertEnd: true })).toThrow(TrailingDataError);
    });

    it('should check the opcode with an overridable exit code', () => {
      const registry = new LayoutRegistry();
      const Ping = registry.registerRecord('Ping', { id: t.uint(8) }, { opcode: '0x01' });
      const cell = beginCell().storeUint(2, 8).storeUint(0, 8).endCell();
      try {
        decodeEager(cell, Ping);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(OpcodePrefixMismatchError);
        if (e instanceof OpcodePrefixMismatchError) {
          expect(e.exitCode).toBe(63);
          expect(e.actual).toBe(2n);
        }
      }
      try {
        decodeEager(cell, Ping, { errorCode: 100 });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(OpcodePrefixMismatchError);
        if (e instanceof OpcodePrefixMismatchError) expect(e.exitCode).toBe(100);
      }
    });

    it('should reject values of the wrong shape', () => {
      const registry = new LayoutRegistry();
      registry.registerRecord('Point', { x: t.int(8), y: t.int(8) });
      const Wrap = registry.registerRecord('Wrap', { p: t.named('Point') });
      expect(() => encode({ p: 5 }, Wrap)).toThrow('p: expected a Point object, got number');
    });
  });

  describe('size boundary', () => {
    it('should encode a record that exactly fills a cell', () => {
      const registry = new LayoutRegistry();
      const Full = registry.registerRecord('Full', { data: t.bits(1023) });
      const cell = encode({ data: pattern(1023) }, Full);
      expect(cell.bits.length).toBe(1023);
    });

    it('should fail when a variable field pushes past capacity', () => {
      const registry = new LayoutRegistry();
      const Over = registry.registerRecord('Over', { head: t.bits(1000), extra: t.maybe(t.bits(100)) });
      expect(encode({ head: pattern(1000), extra: null }, Over).bits.length).toBe(1001);
      try {
        encode({ head: pattern(1000), extra: pattern(100) }, Over);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(SizeExceededError);
        if (e instanceof SizeExceededError) {
          expect(e.field).toBe('extra');
          expect(e.needed).toBe(1101);
        }
      }
    });
  });

  describe('remainder', () => {
    const registry = new LayoutRegistry();
    const Tail = registry.registerRecord('Tail', { op: t.uint(8), payload: t.rest });
    const aa = beginCell().storeUint(0xaa, 8).endCell();
    const bb = beginCell().storeUint(0xbb, 8).endCell();
    const message = beginCell()
      .storeUint(1, 8)
      .storeBits(BitString.fromBinary('0011'))
      .storeRef(aa)
      .storeRef(bb)
      .endCell();

    it('should take the remaining bits and every reference', () => {
      const { op, payload } = decodeEager(message, Tail, { assertEnd: true });
      expect(op).toBe(1);
      expect(payload.bits.toString()).toBe('0011');
      expect(payload.refs).toHaveLength(2);
      expect(payload.refs[0].equals(aa)).toBe(true);
      expect(payload.refs[1].equals(bb)).toBe(true);
      expect(encode({ op, payload }, Tail).equals(message)).toBe(true);
    });

    it('should skip the whole remainder when read lazily', () => {
      expect(() => decodeLazy(message, Tail).assertEnd()).not.toThrow();
      const lazy = decodeLazy(message, Tail);
      expect(lazy.get('payload').refs).toHaveLength(2);
      lazy.assertEnd();
    });

    it('should store a cell as the remainder', () => {
      const payload = beginCell().storeUint(0xff, 8).storeRef(aa).endCell();
      expect(encode({ op: 2, payload }, Tail).toString()).toBe('x{02FF}\n x{AA}');
    });

    it('should fail when the remainder does not fit', () => {
      try {
        encode({ op: 1, payload: { bits: pattern(1016), refs: [] } }, Tail);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(SizeExceededError);
        if (e instanceof SizeExceededError) {
          expect(e.field).toBe('payload');
          expect(e.needed).toBe(1024);
        }
      }
      expect(() => encode({ op: 1, payload: { bits: BitString.EMPTY, refs: [aa, aa, aa, aa, aa] } }, Tail)).toThrow(
        SizeExceededError,
      );
    });

    it('should reject a value without bits and refs', () => {
      const registry = new LayoutRegistry();
      const Loose = registry.registerRecord('Loose', { payload: t.rest });
      expect(() => storeRecord(beginCell(), Loose, { payload: { bits: '0011', refs: [] } })).toThrow(
        'payload: expected bits and refs, got Object',
      );
    });
  });

  describe('snake data', () => {
    const registry = new LayoutRegistry();
    const Tail = registry.registerRecord('Tail', { op: t.uint(8), data: t.snake });

    it('should keep short data inline', () => {
      const cell = encode({ op: 1, data: pattern(1015) }, Tail);
      expect(cell.bits.length).toBe(1023);
      expect(cell.refs).toHaveLength(0);
      expect(decodeEager(cell, Tail).data.equals(pattern(1015))).toBe(true);
    });

    it('should continue long data in chained cells', () => {
      const data = pattern(3000);
      const cell = encode({ op: 1, data }, Tail);
      expect(cell.bits.length).toBe(1023);
      expect(cell.refs).toHaveLength(1);
      expect(cell.refs[0].bits.length).toBe(1023);
      expect(cell.refs[0].refs[0].bits.length).toBe(962);
      expect(cell.depth).toBe(2);
      const decoded = decodeEager(cell, Tail, { assertEnd: true });
      expect(decoded.op).toBe(1);
      expect(decoded.data.equals(data)).toBe(true);
    });

    it('should fail when no reference is free for the chain', () => {
      const Packed = registry.registerRecord('Packed', {
        a: t.cell,
        b: t.cell,
        c: t.cell,
        d: t.cell,
        data: t.snake,
      });
      const value = { a: beginCell().endCell(), b: beginCell().endCell(), c: beginCell().endCell(), d: beginCell().endCell() };
      expect(() => encode({ ...value, data: pattern(1100) }, Packed)).toThrow(SizeExceededError);
      expect(encode({ ...value, data: pattern(1000) }, Packed).refs).toHaveLength(4);
    });
  });
});
