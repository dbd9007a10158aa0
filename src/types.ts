import type { Address } from './address.ts';
import type { BitString } from './bits.ts';
import type { Cell } from './cell.ts';
import type { Dictionary } from './dict.ts';
import type { TypeLayout } from './layout.ts';

/**
 * Integer field kinds. `uint`/`int` decode to numbers (up to 53 bits),
 * `bigUint`/`bigInt` to bigints (up to 256/257 bits).
 */
export type IntegerSpec =
  | { readonly kind: 'uint'; readonly bits: number }
  | { readonly kind: 'int'; readonly bits: number }
  | { readonly kind: 'bigUint'; readonly bits: number }
  | { readonly kind: 'bigInt'; readonly bits: number };

/**
 * Closed set of field kinds understood by the codec engine.
 */
export type FieldSpec =
  | IntegerSpec
  | { readonly kind: 'bool' }
  | { readonly kind: 'varUint'; readonly lengthBits: number }
  | { readonly kind: 'varInt'; readonly lengthBits: number }
  | { readonly kind: 'bits'; readonly bits: number }
  | { readonly kind: 'sizedBits'; readonly lengthFrom: string }
  | { readonly kind: 'address' }
  | { readonly kind: 'cell' }
  | { readonly kind: 'ref'; readonly inner: FieldSpec }
  | { readonly kind: 'nullable'; readonly inner: FieldSpec }
  | { readonly kind: 'inline'; readonly layout: TypeLayout }
  | { readonly kind: 'named'; readonly name: string }
  | { readonly kind: 'dict'; readonly key: IntegerSpec; readonly value: FieldSpec }
  | { readonly kind: 'rest'; readonly chain: boolean };

export type FieldKind = FieldSpec['kind'];

/**
 * `RemainingBitsAndRefs`: the data bits and references left in a cell after
 * the fields before it. A {@link Cell} has this shape, so any cell can be
 * stored as a remainder.
 */
export interface Remainder {
  readonly bits: BitString;
  readonly refs: readonly Cell[];
}

/**
 * A field spec tagged with the JS type its values take.
 */
export type FieldType<T> = FieldSpec & { readonly __value?: T };

/**
 * An integer field spec usable as a dictionary key.
 */
export type KeyType<K> = IntegerSpec & { readonly __value?: K };

/**
 * Infer the JS value type of a field type.
 */
export type Infer<F> = F extends { readonly __value?: infer T } ? T : never;

/**
 * Infer the object type of a set of named fields.
 */
export type InferFields<F extends Record<string, FieldType<unknown>>> = {
  [K in keyof F]: Infer<F[K]>;
};

function uint(bits: number): KeyType<number> {
  return { kind: 'uint', bits };
}

function int(bits: number): KeyType<number> {
  return { kind: 'int', bits };
}

function bigUint(bits: number): KeyType<bigint> {
  return { kind: 'bigUint', bits };
}

function bigInt(bits: number): KeyType<bigint> {
  return { kind: 'bigInt', bits };
}

function varUint(lengthBits: number): FieldType<bigint> {
  return { kind: 'varUint', lengthBits };
}

function varInt(lengthBits: number): FieldType<bigint> {
  return { kind: 'varInt', lengthBits };
}

function bits(count: number): FieldType<BitString> {
  return { kind: 'bits', bits: count };
}

/**
 * Bits whose width is the value of an earlier `uint` field of the same record.
 */
function sizedBits(lengthFrom: string): FieldType<BitString> {
  return { kind: 'sizedBits', lengthFrom };
}

/**
 * `Cell<T>`: the value is stored in a child cell reached through a reference.
 */
function ref<T>(inner: FieldType<T>): FieldType<T> {
  return { kind: 'ref', inner };
}

/**
 * `T?`: a presence bit, followed by the payload when present.
 */
function maybe<T>(inner: FieldType<T>): FieldType<T | null> {
  return { kind: 'nullable', inner };
}

/**
 * Embed another record or union inline.
 */
function inline<T>(layout: TypeLayout<T>): FieldType<T> {
  return { kind: 'inline', layout };
}

/**
 * Refer to a type by its registered name. Resolved when the enclosing record
 * is registered.
 */
function named<T = unknown>(name: string): FieldType<T> {
  return { kind: 'named', name };
}

/**
 * `map<K, V>`: an optional reference to a dictionary trie.
 */
function dict<K extends number | bigint, V>(
  key: KeyType<K>,
  value: FieldType<V>,
): FieldType<Dictionary<K, V>> {
  return { kind: 'dict', key, value };
}

const bool: FieldType<boolean> = { kind: 'bool' };
const coins: FieldType<bigint> = varUint(4);
const address: FieldType<Address> = { kind: 'address' };
const cell: FieldType<Cell> = { kind: 'cell' };
const rest: FieldType<Remainder> = { kind: 'rest', chain: false };

/**
 * Bits of any length. What does not fit in the cell continues in a chain of
 * child cells, each holding one reference to the next.
 */
const snake: FieldType<BitString> = { kind: 'rest', chain: true };

/**
 * Field type constructors.
 *
 * @example
 * ```typescript
 * const Transfer = registry.registerRecord('Transfer', {
 *   queryId: t.bigUint(64),
 *   amount: t.coins,
 *   destination: t.address,
 *   payload: t.maybe(t.cell),
 * }, { opcode: '0x0f8a7ea5' });
 * ```
 */
export const t = {
  uint,
  int,
  bigUint,
  bigInt,
  bool,
  coins,
  varUint,
  varInt,
  bits,
  sizedBits,
  address,
  cell,
  ref,
  maybe,
  inline,
  named,
  dict,
  rest,
  snake,
} as const;

/**
 * Human-readable rendering of a field spec, e.g. `uint32`, `Cell<Foo>`, `coins?`.
 */
export function describeField(spec: FieldSpec): string {
  switch (spec.kind) {
    case 'uint':
    case 'int':
      return `${spec.kind}${spec.bits}`;
    case 'bigUint':
      return `uint${spec.bits}`;
    case 'bigInt':
      return `int${spec.bits}`;
    case 'bool':
      return 'bool';
    case 'varUint':
      return spec.lengthBits === 4 ? 'coins' : `varuint${1 << spec.lengthBits}`;
    case 'varInt':
      return `varint${1 << spec.lengthBits}`;
    case 'bits':
      return `bits${spec.bits}`;
    case 'sizedBits':
      return `bits(${spec.lengthFrom})`;
    case 'address':
      return 'address';
    case 'cell':
      return 'cell';
    case 'ref':
      return `Cell<${describeField(spec.inner)}>`;
    case 'nullable':
      return `${describeField(spec.inner)}?`;
    case 'inline':
      return spec.layout.name;
    case 'named':
      return spec.name;
    case 'dict':
      return `map<${describeField(spec.key)}, ${describeField(spec.value)}>`;
    case 'rest':
      return spec.chain ? 'snake' : 'RemainingBitsAndRefs';
  }
}

/**
 * Whether two field specs describe the same encoding. Inline layouts compare
 * by identity.
 */
export function sameField(a: FieldSpec, b: FieldSpec): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case 'uint':
    case 'int':
    case 'bigUint':
    case 'bigInt':
    case 'bits':
      return b.kind === a.kind && 'bits' in b && b.bits === a.bits;
    case 'varUint':
    case 'varInt':
      return b.kind === a.kind && 'lengthBits' in b && b.lengthBits === a.lengthBits;
    case 'bool':
    case 'address':
    case 'cell':
      return b.kind === a.kind;
    case 'sizedBits':
      return b.kind === 'sizedBits' && b.lengthFrom === a.lengthFrom;
    case 'ref':
    case 'nullable':
      return b.kind === a.kind && 'inner' in b && sameField(a.inner, b.inner);
    case 'inline':
      return b.kind === 'inline' && b.layout === a.layout;
    case 'named':
      return b.kind === 'named' && b.name === a.name;
    case 'dict':
      return b.kind === 'dict' && sameField(a.key, b.key) && sameField(a.value, b.value);
    case 'rest':
      return b.kind === 'rest' && b.chain === a.chain;
  }
}
