import { CellBuilder } from './builder.ts';
import { Cell } from './cell.ts';
import { openLazyUnion, type UnionView, type VariantLike } from './dispatch.ts';
import { loadLayout, storeLayout } from './engine.ts';
import { LazyValue } from './lazy.ts';
import type { RecordLayout, TypeLayout, UnionLayout } from './layout.ts';
import type { CellSlice } from './slice.ts';

export interface DecodeOptions {
  /** Fail with TrailingData when bits or refs are left after the value. */
  assertEnd?: boolean;
  /** Exit code for an opcode mismatch or an unmatched union. */
  errorCode?: number;
}

export interface LazyOptions {
  errorCode?: number;
}

/**
 * Encode a value into a cell tree.
 *
 * @example
 * ```typescript
 * const cell = encode({ queryId: 7n, amount: 1_000n }, Transfer);
 * cell.toString(); // x{...}
 * ```
 */
export function encode<T>(value: NoInfer<T>, layout: TypeLayout<T>): Cell {
  const builder = new CellBuilder(layout.config);
  storeLayout(builder, layout, value);
  return builder.endCell();
}

/**
 * Decode every field of a value into a plain object.
 *
 * Use this when all fields are needed, or when passing the result to code
 * that doesn't work well with Proxies. A slice argument is read from its
 * current position and is left where it was.
 */
export function decodeEager<T>(
  source: Cell | CellSlice,
  layout: TypeLayout<T>,
  options: DecodeOptions = {},
): T {
  const slice = source instanceof Cell ? source.beginParse() : source.clone();
  const value = loadLayout(slice, layout, options.errorCode);
  if (options.assertEnd) slice.assertEnd();
  return value as T;
}

/**
 * Open a value for lazy reading. Records give a {@link LazyValue}; unions
 * give a {@link UnionView} with the variant already selected.
 */
export function decodeLazy<T>(
  source: Cell | CellSlice,
  layout: RecordLayout<T>,
  options?: LazyOptions,
): LazyValue<T>;
export function decodeLazy<U extends VariantLike>(
  source: Cell | CellSlice,
  layout: UnionLayout<U>,
  options?: LazyOptions,
): UnionView<U>;
export function decodeLazy(
  source: Cell | CellSlice,
  layout: RecordLayout | UnionLayout<VariantLike>,
  options: LazyOptions = {},
): LazyValue<unknown> | UnionView<VariantLike> {
  if (layout.kind === 'record') return new LazyValue(source, layout, options.errorCode);
  return openLazyUnion(source, layout, options);
}
