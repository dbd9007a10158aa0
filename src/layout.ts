import { Address } from './address.ts';
import { resolveConfig, type CellConfig } from './config.ts';
import {
  AmbiguousDiscriminantError,
  AmbiguousWidthError,
  DuplicateTypeError,
  InvalidFieldError,
  SizeExceededError,
  UnknownTypeError,
} from './errors.ts';
import { MAX_NUMBER_BITS } from './slice.ts';
import type { FieldSpec, FieldType, InferFields } from './types.ts';

/**
 * Fixed bit prefix identifying a record. Inside a union it doubles as the
 * variant's discriminant.
 */
export interface Opcode {
  readonly value: bigint;
  readonly width: number;
}

/**
 * Opcode as written in a declaration: `'0x7362d09c'` (4 bits per digit),
 * `'0b0110'` (1 bit per digit), or an explicit value and width.
 */
export type OpcodeInput = string | { readonly value: number | bigint; readonly width: number };

/**
 * How many bits and refs a field occupies.
 */
export type WidthRule =
  | { readonly kind: 'fixed'; readonly bits: number; readonly refs: number }
  /** Byte count in `lengthBits` bits, then that many bytes. */
  | { readonly kind: 'prefixed'; readonly lengthBits: number }
  /** Width is the value of an earlier field. */
  | { readonly kind: 'fromField'; readonly field: string }
  /** One presence bit, then the inner rule when present. */
  | { readonly kind: 'presence'; readonly inner: WidthRule }
  /** Nested record or union whose width depends on its contents. */
  | { readonly kind: 'composite'; readonly minBits: number; readonly minRefs: number }
  /** Everything left in the cell. */
  | { readonly kind: 'remainder' };

export interface FieldLayout {
  readonly name: string;
  readonly index: number;
  /** Field spec with every named reference resolved. */
  readonly type: FieldSpec;
  readonly width: WidthRule;
  readonly nullable: boolean;
  readonly childRef: boolean;
  readonly remainder: boolean;
  /** Another field takes its width from this one. */
  readonly lengthSource: boolean;
}

/**
 * Static shape of a layout: the least it can occupy, and whether that is
 * also the most.
 */
export interface Shape {
  readonly minBits: number;
  readonly minRefs: number;
  readonly fixed: boolean;
}

export interface RecordLayout<T = unknown, N extends string = string> {
  readonly kind: 'record';
  readonly name: N;
  readonly opcode: Opcode | null;
  readonly fields: readonly FieldLayout[];
  readonly fieldIndex: ReadonlyMap<string, number>;
  readonly shape: Shape;
  readonly config: CellConfig;
  readonly __value?: T;
}

export type FallbackPolicy =
  | { readonly onUnmatched: 'error'; readonly errorCode?: number }
  | { readonly onUnmatched: 'fallback' };

export interface UnionVariant {
  readonly tag: string;
  readonly layout: RecordLayout;
  readonly discriminant: bigint;
  readonly width: number;
}

/**
 * All variants whose discriminant has the same width.
 */
export interface DiscriminantBucket {
  readonly width: number;
  readonly byValue: ReadonlyMap<bigint, UnionVariant>;
}

export interface UnionLayout<T = unknown, N extends string = string> {
  readonly kind: 'union';
  readonly name: N;
  readonly variants: readonly UnionVariant[];
  readonly policy: FallbackPolicy;
  /** Buckets in ascending width order. */
  readonly dispatch: readonly DiscriminantBucket[];
  readonly shape: Shape;
  readonly config: CellConfig;
  readonly __value?: T;
}

export type TypeLayout<T = unknown> = RecordLayout<T> | UnionLayout<T>;

/**
 * Infer the value type described by a layout.
 */
export type LayoutValue<L> = L extends TypeLayout<infer T> ? T : never;

/**
 * Value of a union: the variant's name and its fields.
 */
export type VariantValue<L> = L extends RecordLayout<infer T, infer N> ? { tag: N; value: T } : never;

export type UnionValueOf<V extends readonly RecordLayout[]> = VariantValue<V[number]>;

export interface RecordOptions {
  opcode?: OpcodeInput;
}

/**
 * Parse an opcode declaration.
 */
export function parseOpcode(input: OpcodeInput): Opcode {
  if (typeof input === 'string') {
    if (/^0x[0-9a-fA-F]*$/.test(input)) {
      const digits = input.slice(2);
      return { value: digits === '' ? 0n : BigInt(input), width: digits.length * 4 };
    }
    if (/^0b[01]*$/.test(input)) {
      const digits = input.slice(2);
      return { value: digits === '' ? 0n : BigInt(input), width: digits.length };
    }
    throw new InvalidFieldError(`invalid opcode '${input}'`);
  }
  const value = BigInt(input.value);
  if (!Number.isInteger(input.width) || input.width < 0) {
    throw new InvalidFieldError(`invalid opcode width ${input.width}`);
  }
  if (value < 0n || value >= 1n << BigInt(input.width)) {
    throw new InvalidFieldError(`opcode ${value} does not fit in ${input.width} bits`);
  }
  return { value, width: input.width };
}

/**
 * Width rule of a resolved field spec.
 */
export function widthOf(spec: FieldSpec): WidthRule {
  switch (spec.kind) {
    case 'uint':
    case 'int':
    case 'bigUint':
    case 'bigInt':
    case 'bits':
      return { kind: 'fixed', bits: spec.bits, refs: 0 };
    case 'bool':
      return { kind: 'fixed', bits: 1, refs: 0 };
    case 'address':
      return { kind: 'fixed', bits: Address.BITS, refs: 0 };
    case 'cell':
    case 'ref':
      return { kind: 'fixed', bits: 0, refs: 1 };
    case 'varUint':
    case 'varInt':
      return { kind: 'prefixed', lengthBits: spec.lengthBits };
    case 'sizedBits':
      return { kind: 'fromField', field: spec.lengthFrom };
    case 'nullable':
      return { kind: 'presence', inner: widthOf(spec.inner) };
    case 'dict':
      return { kind: 'presence', inner: { kind: 'fixed', bits: 0, refs: 1 } };
    case 'inline': {
      const { minBits, minRefs, fixed } = spec.layout.shape;
      return fixed
        ? { kind: 'fixed', bits: minBits, refs: minRefs }
        : { kind: 'composite', minBits, minRefs };
    }
    case 'rest':
      return { kind: 'remainder' };
    case 'named':
      throw new UnknownTypeError(spec.name);
  }
}

/**
 * Least number of bits and refs a width rule occupies.
 */
export function minShapeOf(rule: WidthRule): { bits: number; refs: number } {
  switch (rule.kind) {
    case 'fixed':
      return { bits: rule.bits, refs: rule.refs };
    case 'prefixed':
      return { bits: rule.lengthBits, refs: 0 };
    case 'presence':
      return { bits: 1, refs: 0 };
    case 'composite':
      return { bits: rule.minBits, refs: rule.minRefs };
    case 'fromField':
    case 'remainder':
      return { bits: 0, refs: 0 };
  }
}

/**
 * TypeLayout registry.
 *
 * Computes the canonical encoding of every declared record and union once,
 * validates it, and hands out the shared read-only layout afterwards. One
 * registry is meant to span one compilation or execution unit; pass it to
 * whatever needs lookups instead of keeping it in a global.
 *
 * @example
 * ```typescript
 * const registry = new LayoutRegistry();
 * const Point = registry.registerRecord('Point', { x: t.int(32), y: t.int(32) });
 * registry.layoutOf('Point') === Point; // true
 * ```
 */
export class LayoutRegistry {
  readonly config: CellConfig;
  private readonly types = new Map<string, TypeLayout>();

  constructor(config: Partial<CellConfig> = {}) {
    this.config = resolveConfig(config);
  }

  /**
   * Register a record. Fields are encoded in declaration order, after the
   * opcode if one is given.
   */
  registerRecord<N extends string, F extends Record<string, FieldType<unknown>>>(
    name: N,
    fields: F,
    options: RecordOptions = {},
  ): RecordLayout<InferFields<F>, N> {
    this.ensureFree(name);
    const opcode = options.opcode === undefined ? null : parseOpcode(options.opcode);
    const entries = Object.entries(fields);

    const resolved = entries.map(([fieldName, spec], index) => {
      const type = this.resolve(spec, `${name}.${fieldName}`, true);
      if (type.kind === 'rest' && index !== entries.length - 1) {
        throw new AmbiguousWidthError(
          `${name}.${fieldName}: a remainder field must be the last field`,
        );
      }
      return { name: fieldName, type };
    });

    const sources = new Set<string>();
    resolved.forEach(({ name: fieldName, type }, index) => {
      for (const lengthFrom of sizedReferences(type)) {
        const sourceIndex = resolved.findIndex((f) => f.name === lengthFrom);
        if (sourceIndex === -1 || sourceIndex >= index) {
          throw new AmbiguousWidthError(
            `${name}.${fieldName}: width source '${lengthFrom}' must be an earlier field`,
          );
        }
        if (resolved[sourceIndex].type.kind !== 'uint') {
          throw new AmbiguousWidthError(
            `${name}.${fieldName}: width source '${lengthFrom}' must be a plain uint field`,
          );
        }
        sources.add(lengthFrom);
      }
    });

    const layoutFields: FieldLayout[] = resolved.map(({ name: fieldName, type }, index) => ({
      name: fieldName,
      index,
      type,
      width: widthOf(type),
      nullable: type.kind === 'nullable',
      childRef: isChildRef(type),
      remainder: type.kind === 'rest',
      lengthSource: sources.has(fieldName),
    }));

    let minBits = opcode?.width ?? 0;
    let minRefs = 0;
    let fixed = true;
    for (const field of layoutFields) {
      const min = minShapeOf(field.width);
      minBits += min.bits;
      minRefs += min.refs;
      if (field.width.kind !== 'fixed') fixed = false;
    }
    if (minBits > this.config.maxBits) {
      throw new SizeExceededError('bits', minBits, this.config.maxBits).atField(name);
    }
    if (minRefs > this.config.maxRefs) {
      throw new SizeExceededError('refs', minRefs, this.config.maxRefs).atField(name);
    }

    const layout: RecordLayout<InferFields<F>, N> = {
      kind: 'record',
      name,
      opcode,
      fields: layoutFields,
      fieldIndex: new Map(layoutFields.map((f) => [f.name, f.index])),
      shape: { minBits, minRefs, fixed },
      config: this.config,
    };
    this.types.set(name, layout);
    return layout;
  }

  /**
   * Register a union of records. Each variant's opcode is its discriminant;
   * the union adds no tag of its own.
   */
  registerUnion<N extends string, V extends readonly RecordLayout[]>(
    name: N,
    variants: V,
    policy: FallbackPolicy = { onUnmatched: 'error' },
  ): UnionLayout<UnionValueOf<V>, N> {
    this.ensureFree(name);
    if (variants.length === 0) {
      throw new InvalidFieldError(`union ${name} needs at least one variant`);
    }

    const list: UnionVariant[] = [];
    for (const layout of variants) {
      if (list.some((v) => v.tag === layout.name)) {
        throw new DuplicateTypeError(layout.name).atField(name);
      }
      const opcode = layout.opcode ?? { value: 0n, width: 0 };
      const variant = { tag: layout.name, layout, discriminant: opcode.value, width: opcode.width };
      for (const other of list) {
        if (prefixesCollide(variant, other)) {
          throw new AmbiguousDiscriminantError(name, [other.tag, variant.tag]);
        }
      }
      list.push(variant);
    }

    const buckets = new Map<number, Map<bigint, UnionVariant>>();
    for (const variant of list) {
      let bucket = buckets.get(variant.width);
      if (bucket === undefined) {
        bucket = new Map();
        buckets.set(variant.width, bucket);
      }
      bucket.set(variant.discriminant, variant);
    }
    const dispatch = [...buckets.entries()]
      .sort(([a], [b]) => a - b)
      .map(([width, byValue]) => ({ width, byValue }));

    const layout: UnionLayout<UnionValueOf<V>, N> = {
      kind: 'union',
      name,
      variants: list,
      policy,
      dispatch,
      shape: {
        minBits: Math.min(...list.map((v) => v.layout.shape.minBits)),
        minRefs: Math.min(...list.map((v) => v.layout.shape.minRefs)),
        fixed: false,
      },
      config: this.config,
    };
    this.types.set(name, layout);
    return layout;
  }

  /**
   * Look up a registered layout by name.
   */
  layoutOf(name: string): TypeLayout {
    const layout = this.types.get(name);
    if (layout === undefined) throw new UnknownTypeError(name);
    return layout;
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  names(): string[] {
    return [...this.types.keys()];
  }

  private ensureFree(name: string): void {
    if (this.types.has(name)) throw new DuplicateTypeError(name);
  }

  /**
   * Validate a field spec and replace named references with their layouts.
   */
  private resolve(spec: FieldSpec, path: string, topLevel: boolean): FieldSpec {
    switch (spec.kind) {
      case 'uint':
      case 'int':
        checkWidth(spec.bits, 1, MAX_NUMBER_BITS, `${spec.kind}${spec.bits}`, path);
        return spec;
      case 'bigUint':
        checkWidth(spec.bits, 1, 256, `uint${spec.bits}`, path);
        return spec;
      case 'bigInt':
        checkWidth(spec.bits, 1, 257, `int${spec.bits}`, path);
        return spec;
      case 'bits':
        checkWidth(spec.bits, 0, Number.MAX_SAFE_INTEGER, `bits${spec.bits}`, path);
        return spec;
      case 'varUint':
      case 'varInt':
        checkWidth(spec.lengthBits, 1, 8, `length prefix of ${spec.lengthBits} bits`, path);
        return spec;
      case 'bool':
      case 'address':
      case 'cell':
      case 'sizedBits':
        return spec;
      case 'ref':
        return { kind: 'ref', inner: this.resolve(spec.inner, path, false) };
      case 'nullable':
        return { kind: 'nullable', inner: this.resolve(spec.inner, path, false) };
      case 'dict': {
        this.resolve(spec.key, path, false);
        const value = this.resolve(spec.value, path, false);
        if (sizedReferences(value).length > 0) {
          throw new InvalidFieldError(`${path}: dictionary values cannot take widths from fields`);
        }
        return { kind: 'dict', key: spec.key, value };
      }
      case 'inline':
        return spec;
      case 'named':
        return { kind: 'inline', layout: this.layoutOf(spec.name) };
      case 'rest':
        if (!topLevel) {
          throw new InvalidFieldError(`${path}: a remainder cannot be nested`);
        }
        return spec;
    }
  }
}

function checkWidth(bits: number, min: number, max: number, what: string, path: string): void {
  if (!Number.isInteger(bits) || bits < min || bits > max) {
    throw new InvalidFieldError(`${path}: invalid width for ${what}`);
  }
}

function isChildRef(spec: FieldSpec): boolean {
  switch (spec.kind) {
    case 'cell':
    case 'ref':
    case 'dict':
      return true;
    case 'nullable':
      return isChildRef(spec.inner);
    default:
      return false;
  }
}

function sizedReferences(spec: FieldSpec): string[] {
  switch (spec.kind) {
    case 'sizedBits':
      return [spec.lengthFrom];
    case 'ref':
    case 'nullable':
      return sizedReferences(spec.inner);
    default:
      return [];
  }
}

/**
 * Two discriminants collide when they agree on every bit of the shorter one.
 */
function prefixesCollide(a: UnionVariant, b: UnionVariant): boolean {
  const width = Math.min(a.width, b.width);
  const aPrefix = a.discriminant >> BigInt(a.width - width);
  const bPrefix = b.discriminant >> BigInt(b.width - width);
  return aPrefix === bPrefix;
}
