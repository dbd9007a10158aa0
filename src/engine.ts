import { Address } from './address.ts';
import { BitString } from './bits.ts';
import { CellBuilder } from './builder.ts';
import { Cell } from './cell.ts';
import type { CellConfig } from './config.ts';
import { Dictionary } from './dict.ts';
import {
  ExitCode,
  InvalidValueError,
  MalformedDataError,
  OpcodePrefixMismatchError,
  SizeExceededError,
  UnknownTypeError,
  UnmatchedVariantError,
  inField,
} from './errors.ts';
import type { RecordLayout, TypeLayout, UnionLayout, UnionVariant } from './layout.ts';
import type { CellSlice } from './slice.ts';
import { describeField, sameField } from './types.ts';
import type { FieldSpec, Remainder } from './types.ts';

/**
 * State shared by the fields of one record while it is encoded or decoded.
 */
export interface FieldContext {
  readonly config: CellConfig;
  /** Values of fields that give another field its width. */
  readonly lengths: Map<string, number>;
}

export function newContext(config: CellConfig): FieldContext {
  return { config, lengths: new Map() };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isInteger(value: unknown): value is number | bigint {
  return typeof value === 'bigint' || (typeof value === 'number' && Number.isInteger(value));
}

function isRemainder(value: unknown): value is Remainder {
  return (
    isRecord(value) &&
    value.bits instanceof BitString &&
    Array.isArray(value.refs) &&
    value.refs.every((ref: unknown) => ref instanceof Cell)
  );
}

function expected(what: string, value: unknown): InvalidValueError {
  const got = value === null ? 'null' : typeof value === 'object' ? value.constructor.name : typeof value;
  return new InvalidValueError(`expected ${what}, got ${got}`);
}

function lengthOf(ctx: FieldContext, field: string): number {
  const length = ctx.lengths.get(field);
  if (length === undefined) {
    throw new MalformedDataError(`width source '${field}' has not been read`);
  }
  return length;
}

// ============================================================================
// Single values
// ============================================================================

/**
 * Append a value to the builder according to its field spec.
 */
export function storeValue(builder: CellBuilder, spec: FieldSpec, value: unknown, ctx: FieldContext): void {
  switch (spec.kind) {
    case 'uint':
    case 'bigUint':
      if (!isInteger(value)) throw expected('an integer', value);
      builder.storeUint(value, spec.bits);
      return;
    case 'int':
    case 'bigInt':
      if (!isInteger(value)) throw expected('an integer', value);
      builder.storeInt(value, spec.bits);
      return;
    case 'bool':
      if (typeof value !== 'boolean') throw expected('a boolean', value);
      builder.storeBit(value);
      return;
    case 'varUint':
      if (!isInteger(value)) throw expected('an integer', value);
      builder.storeVarUint(value, spec.lengthBits);
      return;
    case 'varInt':
      if (!isInteger(value)) throw expected('an integer', value);
      builder.storeVarInt(value, spec.lengthBits);
      return;
    case 'bits':
    case 'sizedBits': {
      if (!(value instanceof BitString)) throw expected('a BitString', value);
      const width = spec.kind === 'bits' ? spec.bits : lengthOf(ctx, spec.lengthFrom);
      if (value.length !== width) {
        throw new InvalidValueError(`expected ${width} bits, got ${value.length}`);
      }
      builder.storeBits(value);
      return;
    }
    case 'address':
      if (!(value instanceof Address)) throw expected('an Address', value);
      builder.storeAddress(value);
      return;
    case 'cell':
      if (!(value instanceof Cell)) throw expected('a Cell', value);
      builder.storeRef(value);
      return;
    case 'ref': {
      const child = new CellBuilder(ctx.config);
      storeValue(child, spec.inner, value, ctx);
      builder.storeRef(child.endCell());
      return;
    }
    case 'nullable':
      if (value === null || value === undefined) {
        builder.storeBit(false);
      } else {
        builder.storeBit(true);
        storeValue(builder, spec.inner, value, ctx);
      }
      return;
    case 'inline':
      storeLayout(builder, spec.layout, value);
      return;
    case 'dict': {
      if (!(value instanceof Dictionary)) throw expected('a Dictionary', value);
      const actual: FieldSpec = { kind: 'dict', key: value.keyType, value: value.valueType };
      if (!sameField(actual, spec)) {
        throw new InvalidValueError(`expected ${describeField(spec)}, got ${describeField(actual)}`);
      }
      builder.storeMaybeRef(value.root);
      return;
    }
    case 'rest':
      if (spec.chain) {
        if (!(value instanceof BitString)) throw expected('a BitString', value);
        storeSnake(builder, value);
      } else {
        if (!isRemainder(value)) throw expected('bits and refs', value);
        storeRemainder(builder, value);
      }
      return;
    case 'named':
      throw new UnknownTypeError(spec.name);
  }
}

/**
 * Read a value according to its field spec, advancing the slice.
 */
export function loadValue(slice: CellSlice, spec: FieldSpec, ctx: FieldContext): unknown {
  switch (spec.kind) {
    case 'uint':
      return slice.loadUint(spec.bits);
    case 'int':
      return slice.loadInt(spec.bits);
    case 'bigUint':
      return slice.loadBigUint(spec.bits);
    case 'bigInt':
      return slice.loadBigInt(spec.bits);
    case 'bool':
      return slice.loadBit();
    case 'varUint':
      return slice.loadVarUint(spec.lengthBits);
    case 'varInt':
      return slice.loadVarInt(spec.lengthBits);
    case 'bits':
      return slice.loadBits(spec.bits);
    case 'sizedBits':
      return slice.loadBits(lengthOf(ctx, spec.lengthFrom));
    case 'address':
      return slice.loadAddress();
    case 'cell':
      return slice.loadRef();
    case 'ref':
      return loadValue(slice.loadRef().beginParse(), spec.inner, ctx);
    case 'nullable':
      return slice.loadBit() ? loadValue(slice, spec.inner, ctx) : null;
    case 'inline':
      return loadLayout(slice, spec.layout);
    case 'dict':
      return Dictionary.fromRoot(spec.key, spec.value, slice.loadMaybeRef(), ctx.config);
    case 'rest':
      return spec.chain ? loadSnake(slice) : loadRemainder(slice);
    case 'named':
      throw new UnknownTypeError(spec.name);
  }
}

/**
 * Advance the slice past a value without decoding it. Variable-width values
 * read only what tells their width: length prefixes, presence bits and
 * discriminants.
 */
export function skipValue(slice: CellSlice, spec: FieldSpec, ctx: FieldContext): void {
  switch (spec.kind) {
    case 'uint':
    case 'int':
    case 'bigUint':
    case 'bigInt':
    case 'bits':
      slice.skipBits(spec.bits);
      return;
    case 'bool':
      slice.skipBits(1);
      return;
    case 'address':
      slice.skipBits(Address.BITS);
      return;
    case 'varUint':
    case 'varInt':
      slice.skipVarUint(spec.lengthBits);
      return;
    case 'sizedBits':
      slice.skipBits(lengthOf(ctx, spec.lengthFrom));
      return;
    case 'cell':
    case 'ref':
      slice.skipRefs(1);
      return;
    case 'nullable':
      if (slice.loadBit()) skipValue(slice, spec.inner, ctx);
      return;
    case 'inline':
      skipLayout(slice, spec.layout);
      return;
    case 'dict':
      slice.loadMaybeRef();
      return;
    case 'rest':
      slice.skipBits(slice.remainingBits);
      if (spec.chain) {
        if (slice.remainingRefs > 0) slice.skipRefs(1);
      } else {
        slice.skipRefs(slice.remainingRefs);
      }
      return;
    case 'named':
      throw new UnknownTypeError(spec.name);
  }
}

// ============================================================================
// Remainder and snake data
// ============================================================================

/**
 * Store a remainder's bits and references as they are.
 */
export function storeRemainder(builder: CellBuilder, remainder: Remainder): void {
  builder.storeBits(remainder.bits);
  for (const ref of remainder.refs) builder.storeRef(ref);
}

/**
 * Take every bit and reference left in the slice.
 */
export function loadRemainder(slice: CellSlice): Remainder {
  const bits = slice.loadBits(slice.remainingBits);
  const refs: Cell[] = [];
  while (slice.remainingRefs > 0) refs.push(slice.loadRef());
  return { bits, refs };
}

/**
 * Store snake data. What does not fit in the current cell continues in a
 * chain of child cells, each linked through its only reference.
 */
export function storeSnake(builder: CellBuilder, bits: BitString): void {
  if (bits.length <= builder.availableBits) {
    builder.storeBits(bits);
    return;
  }
  if (builder.availableRefs < 1) {
    throw new SizeExceededError('bits', builder.bits + bits.length, builder.config.maxBits);
  }
  const head = builder.availableBits;
  builder.storeBits(bits.substring(0, head));
  builder.storeRef(chainCell(bits.substring(head), builder.config));
}

function chainCell(bits: BitString, config: CellConfig): Cell {
  const builder = new CellBuilder(config);
  if (bits.length <= config.maxBits) {
    builder.storeBits(bits);
  } else {
    builder.storeBits(bits.substring(0, config.maxBits));
    builder.storeRef(chainCell(bits.substring(config.maxBits), config));
  }
  return builder.endCell();
}

/**
 * Read snake data: the bits left in this cell, followed by the bits of every
 * cell in the continuation chain.
 */
export function loadSnake(slice: CellSlice): BitString {
  const parts = [slice.loadBits(slice.remainingBits)];
  let next = slice.remainingRefs > 0 ? slice.loadRef() : null;
  while (next !== null) {
    const s = next.beginParse();
    parts.push(s.loadBits(s.remainingBits));
    next = s.remainingRefs > 0 ? s.loadRef() : null;
  }
  return BitString.EMPTY.concat(...parts);
}

// ============================================================================
// Records
// ============================================================================

export function storeRecord(builder: CellBuilder, layout: RecordLayout, value: unknown): void {
  if (!isRecord(value)) throw expected(`a ${layout.name} object`, value);
  if (layout.opcode !== null) builder.storeUint(layout.opcode.value, layout.opcode.width);
  const ctx = newContext(layout.config);
  for (const field of layout.fields) {
    const fieldValue = value[field.name];
    inField(field.name, () => storeValue(builder, field.type, fieldValue, ctx));
    if (field.lengthSource && isInteger(fieldValue)) {
      ctx.lengths.set(field.name, Number(fieldValue));
    }
  }
}

/**
 * Check a record's opcode and advance past it.
 */
export function checkOpcode(slice: CellSlice, layout: RecordLayout, errorCode?: number): void {
  const opcode = layout.opcode;
  if (opcode === null || opcode.width === 0) return;
  const actual = slice.preloadBigUint(opcode.width);
  if (actual !== opcode.value) {
    throw new OpcodePrefixMismatchError(
      layout.name,
      opcode.value,
      opcode.width,
      actual,
      errorCode ?? ExitCode.WrongOpcode,
    );
  }
  slice.skipBits(opcode.width);
}

export function loadRecord(slice: CellSlice, layout: RecordLayout, errorCode?: number): Record<string, unknown> {
  checkOpcode(slice, layout, errorCode);
  const ctx = newContext(layout.config);
  const result: Record<string, unknown> = {};
  for (const field of layout.fields) {
    const value = inField(field.name, () => loadValue(slice, field.type, ctx));
    if (field.lengthSource && typeof value === 'number') ctx.lengths.set(field.name, value);
    result[field.name] = value;
  }
  return result;
}

export function skipRecord(slice: CellSlice, layout: RecordLayout): void {
  if (layout.opcode !== null) slice.skipBits(layout.opcode.width);
  const ctx = newContext(layout.config);
  for (const field of layout.fields) {
    inField(field.name, () => skipField(slice, field.type, field.name, field.lengthSource, ctx));
  }
}

/**
 * Skip one field of a record. Width sources are still decoded, since later
 * fields need their value to know how far to skip.
 */
export function skipField(
  slice: CellSlice,
  spec: FieldSpec,
  name: string,
  lengthSource: boolean,
  ctx: FieldContext,
): void {
  if (!lengthSource) {
    skipValue(slice, spec, ctx);
    return;
  }
  const value = loadValue(slice, spec, ctx);
  if (typeof value === 'number') ctx.lengths.set(name, value);
}

// ============================================================================
// Unions
// ============================================================================

/**
 * Find the variant whose discriminant prefixes the slice. Widths are tried
 * shortest first and never beyond the bits that remain; the slice does not
 * move.
 */
export function selectVariant(slice: CellSlice, layout: UnionLayout): UnionVariant | null {
  for (const bucket of layout.dispatch) {
    if (bucket.width > slice.remainingBits) break;
    const variant = bucket.byValue.get(slice.preloadBigUint(bucket.width));
    if (variant !== undefined) return variant;
  }
  return null;
}

export function unmatchedCode(layout: UnionLayout, errorCode?: number): number {
  if (errorCode !== undefined) return errorCode;
  if (layout.policy.onUnmatched === 'error' && layout.policy.errorCode !== undefined) {
    return layout.policy.errorCode;
  }
  return ExitCode.WrongOpcode;
}

export function storeUnion(builder: CellBuilder, layout: UnionLayout, value: unknown): void {
  if (!isRecord(value) || typeof value.tag !== 'string') {
    throw expected(`a ${layout.name} variant`, value);
  }
  const tag = value.tag;
  const variant = layout.variants.find((v) => v.tag === tag);
  if (variant === undefined) throw new UnknownTypeError(`${layout.name}.${tag}`);
  storeRecord(builder, variant.layout, value.value);
}

export function loadUnion(
  slice: CellSlice,
  layout: UnionLayout,
  errorCode?: number,
): { tag: string; value: Record<string, unknown> } {
  const variant = selectVariant(slice, layout);
  if (variant === null) {
    throw new UnmatchedVariantError(layout.name, null, unmatchedCode(layout, errorCode));
  }
  return { tag: variant.tag, value: loadRecord(slice, variant.layout) };
}

export function skipUnion(slice: CellSlice, layout: UnionLayout): void {
  const variant = selectVariant(slice, layout);
  if (variant === null) {
    throw new UnmatchedVariantError(layout.name, null, unmatchedCode(layout));
  }
  skipRecord(slice, variant.layout);
}

// ============================================================================
// Any layout
// ============================================================================

export function storeLayout(builder: CellBuilder, layout: TypeLayout, value: unknown): void {
  if (layout.kind === 'record') storeRecord(builder, layout, value);
  else storeUnion(builder, layout, value);
}

export function loadLayout(slice: CellSlice, layout: TypeLayout, errorCode?: number): unknown {
  return layout.kind === 'record'
    ? loadRecord(slice, layout, errorCode)
    : loadUnion(slice, layout, errorCode);
}

export function skipLayout(slice: CellSlice, layout: TypeLayout): void {
  if (layout.kind === 'record') skipRecord(slice, layout);
  else skipUnion(slice, layout);
}
