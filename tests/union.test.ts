import { describe, it, expect, vi } from 'vitest';
import {
  LayoutRegistry,
  UnionView,
  UnmatchedVariantError,
  UseAfterCloseError,
  beginCell,
  decodeEager,
  decodeLazy,
  encode,
  match,
  openLazyUnion,
  t,
} from '../src/index.ts';

function counterUnion() {
  const registry = new LayoutRegistry();
  const Reset = registry.registerRecord('Reset', { to: t.uint(16) }, { opcode: '0x01' });
  const Add = registry.registerRecord('Add', { x: t.uint(8) }, { opcode: '0x02' });
  const Msg = registry.registerUnion('Msg', [Reset, Add]);
  return { registry, Reset, Add, Msg };
}

describe('openLazyUnion', () => {
  it('should resolve the variant from its discriminant', () => {
    const { Msg } = counterUnion();
    const cell = encode({ tag: 'Add', value: { x: 9 } }, Msg);
    expect(cell.toString()).toBe('x{0209}');

    const view = openLazyUnion(cell, Msg);
    expect(view.state).toBe('variantSelected');
    expect(view.tag).toBe('Add');
    expect(view.discriminantWidth).toBe(8);
    expect(view.bodyOffset).toBe(8);
    expect(view.get('x')).toBe(9);
    expect(view.state).toBe('fieldsBeingAccessed');
  });

  it('should run only the arm of the resolved variant', () => {
    const { Msg } = counterUnion();
    const cell = encode({ tag: 'Add', value: { x: 9 } }, Msg);
    const onReset = vi.fn(() => 0);
    const result = openLazyUnion(cell, Msg).match({
      Reset: onReset,
      Add: (v) => v.get('x') * 2,
    });
    expect(result).toBe(18);
    expect(onReset).not.toHaveBeenCalled();
  });

  it('should resolve every variant of a union', () => {
    const registry = new LayoutRegistry();
    const A = registry.registerRecord('A', { v: t.uint(4) }, { opcode: '0b0' });
    const B = registry.registerRecord('B', { v: t.uint(4) }, { opcode: '0b10' });
    const C = registry.registerRecord('C', { v: t.uint(4) }, { opcode: '0b110' });
    const D = registry.registerRecord('D', { v: t.uint(4) }, { opcode: '0b111' });
    const U = registry.registerUnion('U', [A, B, C, D]);
    const tags = ['A', 'B', 'C', 'D'] as const;
    tags.forEach((tag, i) => {
      const view = openLazyUnion(encode({ tag, value: { v: i } }, U), U);
      expect(view.tag).toBe(tag);
      expect(view.get('v')).toBe(i);
    });
    expect(openLazyUnion(encode({ tag: 'C', value: { v: 1 } }, U), U).discriminantWidth).toBe(3);
  });

  it('should never peek past the data', () => {
    const registry = new LayoutRegistry();
    const Short = registry.registerRecord('Short', {}, { opcode: '0x01' });
    const Long = registry.registerRecord('Long', {}, { opcode: '0x00000002' });
    const U = registry.registerUnion('ShortLong', [Short, Long]);
    const cell = beginCell().storeUint(0xff, 8).endCell();
    expect(() => openLazyUnion(cell, U)).toThrow(UnmatchedVariantError);
  });

  it('should decode a union eagerly', () => {
    const { Msg } = counterUnion();
    const cell = encode({ tag: 'Reset', value: { to: 300 } }, Msg);
    expect(decodeEager(cell, Msg, { assertEnd: true })).toEqual({ tag: 'Reset', value: { to: 300 } });
    expect(decodeLazy(cell, Msg)).toBeInstanceOf(UnionView);
  });

  describe('unmatched discriminants', () => {
    const unknown = beginCell().storeUint(0x07, 8).storeUint(1, 8).endCell();

    it('should fail at once under the error policy', () => {
      const { Msg } = counterUnion();
      try {
        openLazyUnion(unknown, Msg);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(UnmatchedVariantError);
        if (e instanceof UnmatchedVariantError) {
          expect(e.exitCode).toBe(63);
          expect(e.tag).toBeNull();
        }
      }
    });

    it('should use the policy or call exit code', () => {
      const registry = new LayoutRegistry();
      const Ping = registry.registerRecord('Ping', {}, { opcode: '0x01' });
      const Strict = registry.registerUnion('Strict', [Ping], { onUnmatched: 'error', errorCode: 77 });
      for (const [options, code] of [[{}, 77], [{ errorCode: 88 }, 88]] as const) {
        try {
          openLazyUnion(unknown, Strict, options);
          expect.unreachable();
        } catch (e) {
          expect(e).toBeInstanceOf(UnmatchedVariantError);
          if (e instanceof UnmatchedVariantError) expect(e.exitCode).toBe(code);
        }
      }
    });

    it('should run the fallback arm under the fallback policy', () => {
      const registry = new LayoutRegistry();
      const Ping = registry.registerRecord('Ping', {}, { opcode: '0x01' });
      const Loose = registry.registerUnion('Loose', [Ping], { onUnmatched: 'fallback' });
      const view = openLazyUnion(unknown, Loose);
      expect(view.matched).toBe(false);
      expect(view.state).toBe('discriminantRead');
      expect(view.tag).toBeNull();
      const ping = vi.fn(() => 'ping');
      expect(view.match({ Ping: ping }, () => 'else')).toBe('else');
      expect(ping).not.toHaveBeenCalled();
      expect(view.state).toBe('closed');
    });

    it('should fail without a fallback arm', () => {
      const registry = new LayoutRegistry();
      const Ping = registry.registerRecord('Ping', {}, { opcode: '0x01' });
      const Loose = registry.registerUnion('Loose', [Ping], { onUnmatched: 'fallback' });
      const view = openLazyUnion(unknown, Loose);
      expect(() => view.match({ Ping: () => 1 })).toThrow(UnmatchedVariantError);
      expect(view.state).toBe('closed');
    });

    it('should fail eager decoding even under the fallback policy', () => {
      const registry = new LayoutRegistry();
      const Ping = registry.registerRecord('Ping', {}, { opcode: '0x01' });
      const Loose = registry.registerUnion('Loose', [Ping], { onUnmatched: 'fallback' });
      expect(() => decodeEager(unknown, Loose)).toThrow(UnmatchedVariantError);
    });
  });

  describe('match', () => {
    it('should send a variant without an arm to otherwise', () => {
      const { Msg } = counterUnion();
      const view = openLazyUnion(encode({ tag: 'Reset', value: { to: 1 } }, Msg), Msg);
      expect(match(view, { Add: () => 'add' }, (v) => `other ${v.tag}`)).toBe('other Reset');
    });

    it('should report the variant that has no arm', () => {
      const { Msg } = counterUnion();
      const view = openLazyUnion(encode({ tag: 'Reset', value: { to: 1 } }, Msg), Msg);
      try {
        view.match({ Add: () => 'add' });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(UnmatchedVariantError);
        if (e instanceof UnmatchedVariantError) expect(e.tag).toBe('Reset');
      }
    });

    it('should close the view when the handler throws', () => {
      const { Msg } = counterUnion();
      const view = openLazyUnion(encode({ tag: 'Add', value: { x: 1 } }, Msg), Msg);
      const seen: Array<{ get(name: 'x'): number }> = [];
      expect(() =>
        view.match({
          Add: (v) => {
            seen.push(v);
            throw new Error('handler failed');
          },
        }),
      ).toThrow('handler failed');
      expect(view.state).toBe('closed');
      expect(() => view.get('x')).toThrow(UseAfterCloseError);
      expect(seen).toHaveLength(1);
      expect(() => seen[0].get('x')).toThrow(UseAfterCloseError);
      expect(() => view.match({})).toThrow(UseAfterCloseError);
    });
  });
});
