/**
 * tolk-codec: a type-directed codec for cell-based smart-contract data.
 *
 * Records and unions are declared once in a registry, which computes their
 * bit layout. Values encode to trees of cells and decode either eagerly into
 * plain objects or lazily, one field at a time.
 *
 * @example
 * ```typescript
 * import { LayoutRegistry, t, encode, decodeLazy } from 'tolk-codec';
 *
 * const registry = new LayoutRegistry();
 * const Increment = registry.registerRecord('Increment', {
 *   queryId: t.bigUint(64),
 *   by: t.uint(32),
 * }, { opcode: '0x7e8764ef' });
 *
 * const cell = encode({ queryId: 1n, by: 5 }, Increment);
 * const msg = decodeLazy(cell, Increment);
 * console.log(msg.get('by')); // only queryId is skipped, by is decoded
 * ```
 *
 * @packageDocumentation
 */

export { DEFAULT_CONFIG, resolveConfig } from './config.ts';
export type { CellConfig } from './config.ts';

export {
  CodecError,
  LayoutError,
  AmbiguousDiscriminantError,
  AmbiguousWidthError,
  UnknownTypeError,
  DuplicateTypeError,
  InvalidFieldError,
  SizeExceededError,
  TruncatedDataError,
  TrailingDataError,
  OpcodePrefixMismatchError,
  UnmatchedVariantError,
  IntegerOutOfRangeError,
  InvalidValueError,
  MalformedDataError,
  UseAfterCloseError,
  ExitCode,
} from './errors.ts';
export type { ErrorKind, LayoutErrorKind, CellUnit } from './errors.ts';

// === Cells ===

export { BitString } from './bits.ts';
export { Cell } from './cell.ts';
export { CellBuilder, beginCell } from './builder.ts';
export { CellSlice, MAX_NUMBER_BITS } from './slice.ts';
export type { SlicePosition } from './slice.ts';
export { Address } from './address.ts';

// === Layouts ===

export { t, describeField, sameField } from './types.ts';
export type {
  FieldSpec,
  FieldKind,
  FieldType,
  IntegerSpec,
  KeyType,
  Infer,
  InferFields,
  Remainder,
} from './types.ts';

export { LayoutRegistry, parseOpcode, widthOf } from './layout.ts';
export type {
  Opcode,
  OpcodeInput,
  WidthRule,
  FieldLayout,
  Shape,
  RecordLayout,
  UnionLayout,
  UnionVariant,
  DiscriminantBucket,
  FallbackPolicy,
  TypeLayout,
  LayoutValue,
  VariantValue,
  RecordOptions,
} from './layout.ts';

// === Codec ===

export { encode, decodeEager, decodeLazy } from './codec.ts';
export type { DecodeOptions, LazyOptions } from './codec.ts';
export { LazyValue } from './lazy.ts';
export { UnionView, openLazyUnion, match } from './dispatch.ts';
export type { MatchArms, UnionViewState, VariantLike, OpenUnionOptions } from './dispatch.ts';

// === Dictionaries ===

export { Dictionary } from './dict.ts';
export type { MapEntry } from './dict.ts';
