import { BitString } from './bits.ts';
import { CellBuilder } from './builder.ts';
import type { Cell } from './cell.ts';
import { DEFAULT_CONFIG, type CellConfig } from './config.ts';
import { loadValue, newContext, storeValue } from './engine.ts';
import {
  IntegerOutOfRangeError,
  InvalidFieldError,
  InvalidValueError,
  MalformedDataError,
} from './errors.ts';
import { MAX_NUMBER_BITS, type CellSlice } from './slice.ts';
import type { FieldType, KeyType } from './types.ts';

/**
 * Result of a lookup.
 */
export type MapEntry<K, V> = { found: true; key: K; value: V } | { found: false };

const NOT_FOUND = { found: false } as const;

// ============================================================================
// Edge labels
// ============================================================================

/**
 * Bits needed to write a label length when at most `max` bits can follow:
 * ceil(log2(max + 1)).
 */
function lengthBitsFor(max: number): number {
  return max === 0 ? 0 : max.toString(2).length;
}

/**
 * Write an edge label in the shortest of its three forms. On a tie the short
 * form wins over the long one, and the long one over the repeated-bit one.
 */
export function storeLabel(builder: CellBuilder, label: BitString, max: number): void {
  const n = label.length;
  const k = lengthBitsFor(max);
  const shortCost = 2 * n + 2;
  const longCost = 2 + k + n;
  const uniform = n > 0 && label.equals(repeat(label.at(0), n));
  const sameCost = uniform ? 3 + k : Infinity;

  if (shortCost <= longCost && shortCost <= sameCost) {
    builder.storeBit(false);
    for (let i = 0; i < n; i++) builder.storeBit(true);
    builder.storeBit(false);
    builder.storeBits(label);
  } else if (longCost <= sameCost) {
    builder.storeBit(true).storeBit(false);
    builder.storeUint(n, k);
    builder.storeBits(label);
  } else {
    builder.storeBit(true).storeBit(true);
    builder.storeBit(label.at(0) === 1);
    builder.storeUint(n, k);
  }
}

/**
 * Read an edge label written by {@link storeLabel}.
 */
export function loadLabel(slice: CellSlice, max: number): BitString {
  const k = lengthBitsFor(max);
  let label: BitString;
  if (!slice.loadBit()) {
    let n = 0;
    while (slice.loadBit()) n++;
    if (n > max) throw new MalformedDataError(`label of ${n} bits where at most ${max} remain`);
    label = slice.loadBits(n);
  } else if (!slice.loadBit()) {
    const n = slice.loadUint(k);
    if (n > max) throw new MalformedDataError(`label of ${n} bits where at most ${max} remain`);
    label = slice.loadBits(n);
  } else {
    const bit = slice.loadBit() ? 1 : 0;
    const n = slice.loadUint(k);
    if (n > max) throw new MalformedDataError(`label of ${n} bits where at most ${max} remain`);
    label = repeat(bit, n);
  }
  return label;
}

function repeat(bit: 0 | 1, n: number): BitString {
  return BitString.fromBinary(String(bit).repeat(n));
}

function bitOf(bit: 0 | 1): BitString {
  return bit === 1 ? ONE : ZERO;
}

const ZERO = BitString.fromBinary('0');
const ONE = BitString.fromBinary('1');

// ============================================================================
// Dictionary
// ============================================================================

interface Node {
  /** Label of the edge leading to this node. */
  readonly label: BitString;
  /** Slice positioned right after the label. */
  readonly body: CellSlice;
  /** Key bits left below the label; 0 means a leaf. */
  readonly below: number;
}

/**
 * Dictionary - a persistent map stored as a binary radix trie of cells.
 *
 * Keys are fixed-width integers, written big-endian (two's complement for
 * signed keys). Each edge carries a label; a fork has its two subtrees as
 * references and a leaf carries its value inline after the label.
 *
 * Every update returns a new Dictionary and leaves the receiver unchanged.
 * Subtrees an update does not touch are shared between the two.
 *
 * @example
 * ```typescript
 * const empty = Dictionary.empty(t.uint(32), t.coins);
 * const balances = empty.set(1, 100n).set(7, 250n);
 * balances.get(7); // { found: true, key: 7, value: 250n }
 * empty.isEmpty; // still true
 * ```
 */
export class Dictionary<K extends number | bigint, V> {
  readonly keyType: KeyType<K>;
  readonly valueType: FieldType<V>;
  /** Root cell of the trie, or null when the dictionary is empty. */
  readonly root: Cell | null;
  readonly config: CellConfig;

  private constructor(keyType: KeyType<K>, valueType: FieldType<V>, root: Cell | null, config: CellConfig) {
    this.keyType = keyType;
    this.valueType = valueType;
    this.root = root;
    this.config = config;
  }

  static empty<K extends number | bigint, V>(
    keyType: KeyType<K>,
    valueType: FieldType<V>,
    config: CellConfig = DEFAULT_CONFIG,
  ): Dictionary<K, V> {
    return Dictionary.fromRoot(keyType, valueType, null, config);
  }

  /**
   * Wrap an existing trie. The trie is only parsed when it is read.
   */
  static fromRoot<K extends number | bigint, V>(
    keyType: KeyType<K>,
    valueType: FieldType<V>,
    root: Cell | null,
    config: CellConfig = DEFAULT_CONFIG,
  ): Dictionary<K, V> {
    const limit = keyType.kind === 'uint' || keyType.kind === 'int' ? MAX_NUMBER_BITS : 257;
    if (!Number.isInteger(keyType.bits) || keyType.bits < 1 || keyType.bits > limit) {
      throw new InvalidFieldError(`invalid dictionary key width ${keyType.bits}`);
    }
    return new Dictionary(keyType, valueType, root, config);
  }

  get keyBits(): number {
    return this.keyType.bits;
  }

  get isEmpty(): boolean {
    return this.root === null;
  }

  /** Number of entries. Walks the whole trie. */
  get size(): number {
    let count = 0;
    if (this.root !== null) this.forEachLeaf(this.root, this.keyBits, () => count++);
    return count;
  }

  // === Lookup ===

  get(key: K): MapEntry<K, V> {
    const path = this.keyToBits(key);
    let cell = this.root;
    let offset = 0;
    while (cell !== null) {
      const node = this.parse(cell, this.keyBits - offset);
      if (!path.substring(offset).startsWith(node.label)) return NOT_FOUND;
      offset += node.label.length;
      if (node.below === 0) return { found: true, key, value: this.readValue(node.body) };
      cell = node.body.preloadRef(path.at(offset));
      offset++;
    }
    return NOT_FOUND;
  }

  has(key: K): boolean {
    return this.get(key).found;
  }

  // === Updates ===

  set(key: K, value: V): Dictionary<K, V> {
    const path = this.keyToBits(key);
    const root = this.root === null
      ? this.leaf(path, this.keyBits, value)
      : this.insert(this.root, path, this.keyBits, value);
    return this.withRoot(root);
  }

  /**
   * Insert only when the key is absent.
   */
  setIfAbsent(key: K, value: V): { dict: Dictionary<K, V>; inserted: boolean } {
    if (this.has(key)) return { dict: this, inserted: false };
    return { dict: this.set(key, value), inserted: true };
  }

  /**
   * Replace only when the key is present.
   */
  setIfPresent(key: K, value: V): { dict: Dictionary<K, V>; replaced: boolean } {
    if (!this.has(key)) return { dict: this, replaced: false };
    return { dict: this.set(key, value), replaced: true };
  }

  setAndGetPrevious(key: K, value: V): { dict: Dictionary<K, V>; previous: MapEntry<K, V> } {
    return { dict: this.set(key, value), previous: this.get(key) };
  }

  delete(key: K): { dict: Dictionary<K, V>; deleted: boolean } {
    if (this.root === null) return { dict: this, deleted: false };
    const result = this.remove(this.root, this.keyToBits(key), this.keyBits);
    if (result === undefined) return { dict: this, deleted: false };
    return { dict: this.withRoot(result), deleted: true };
  }

  deleteAndGet(key: K): { dict: Dictionary<K, V>; previous: MapEntry<K, V> } {
    const previous = this.get(key);
    if (!previous.found) return { dict: this, previous };
    return { dict: this.delete(key).dict, previous };
  }

  // === Ordered access ===

  first(): MapEntry<K, V> {
    return this.root === null ? NOT_FOUND : this.extreme(this.root, BitString.EMPTY, this.keyBits, false);
  }

  last(): MapEntry<K, V> {
    return this.root === null ? NOT_FOUND : this.extreme(this.root, BitString.EMPTY, this.keyBits, true);
  }

  /** Smallest entry with a key greater than `key`. */
  next(key: K): MapEntry<K, V> {
    return this.nearest(key, true, false);
  }

  /** Largest entry with a key less than `key`. */
  prev(key: K): MapEntry<K, V> {
    return this.nearest(key, false, false);
  }

  nextOrEqual(key: K): MapEntry<K, V> {
    return this.nearest(key, true, true);
  }

  prevOrEqual(key: K): MapEntry<K, V> {
    return this.nearest(key, false, true);
  }

  /**
   * Entries in increasing key order.
   */
  *entries(): IterableIterator<[K, V]> {
    if (this.root === null) return;
    yield* this.walk(this.root, BitString.EMPTY, this.keyBits);
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.entries()) yield key;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  /**
   * Same key width and the same trie, compared by cell hash.
   */
  equals(other: Dictionary<K, V>): boolean {
    if (this.keyBits !== other.keyBits) return false;
    if (this.root === null || other.root === null) return this.root === other.root;
    return this.root.equals(other.root);
  }

  // === Internals ===

  private withRoot(root: Cell | null): Dictionary<K, V> {
    return new Dictionary(this.keyType, this.valueType, root, this.config);
  }

  private get signed(): boolean {
    return this.keyType.kind === 'int' || this.keyType.kind === 'bigInt';
  }

  private keyToBits(key: K): BitString {
    if (typeof key === 'number' && !Number.isSafeInteger(key)) {
      throw new InvalidValueError(`dictionary key ${key} is not a safe integer`);
    }
    const n = this.keyBits;
    let value = BigInt(key);
    if (this.signed) {
      const half = 1n << BigInt(n - 1);
      if (value < -half || value >= half) throw new IntegerOutOfRangeError(value, n, true);
      if (value < 0n) value += 1n << BigInt(n);
    } else if (value < 0n || value >= 1n << BigInt(n)) {
      throw new IntegerOutOfRangeError(value, n, false);
    }
    return BitString.fromBigInt(value, n);
  }

  private bitsToKey(bits: BitString): K {
    let value = bits.toBigInt();
    if (this.signed && bits.at(0) === 1) value -= 1n << BigInt(bits.length);
    const kind = this.keyType.kind;
    return (kind === 'uint' || kind === 'int' ? Number(value) : value) as K;
  }

  /**
   * Branch order at a key bit: 0 before 1, except at the sign bit of a signed
   * key, where negative keys come first.
   */
  private order(index: number): readonly [0 | 1, 0 | 1] {
    return this.signed && index === 0 ? [1, 0] : [0, 1];
  }

  private parse(cell: Cell, max: number): Node {
    const body = cell.beginParse();
    const label = loadLabel(body, max);
    return { label, body, below: max - label.length };
  }

  private readValue(body: CellSlice): V {
    return loadValue(body.clone(), this.valueType, newContext(this.config)) as V;
  }

  private leaf(label: BitString, max: number, value: V): Cell {
    const builder = new CellBuilder(this.config);
    storeLabel(builder, label, max);
    storeValue(builder, this.valueType, value, newContext(this.config));
    return builder.endCell();
  }

  private fork(label: BitString, max: number, zero: Cell, one: Cell): Cell {
    const builder = new CellBuilder(this.config);
    storeLabel(builder, label, max);
    builder.storeRef(zero).storeRef(one);
    return builder.endCell();
  }

  /** Re-label a node, keeping what follows its label. */
  private relabel(label: BitString, max: number, body: CellSlice): Cell {
    const builder = new CellBuilder(this.config);
    storeLabel(builder, label, max);
    builder.storeSlice(body);
    return builder.endCell();
  }

  private insert(cell: Cell, path: BitString, max: number, value: V): Cell {
    const node = this.parse(cell, max);
    const common = node.label.commonPrefix(path);

    if (common === node.label.length) {
      if (node.below === 0) return this.leaf(path, max, value);
      const bit = path.at(common);
      const child = this.insert(node.body.preloadRef(bit), path.substring(common + 1), node.below - 1, value);
      return bit === 0
        ? this.fork(node.label, max, child, node.body.preloadRef(1))
        : this.fork(node.label, max, node.body.preloadRef(0), child);
    }

    // The paths part inside this label: split it with a new fork.
    const below = max - common - 1;
    const old = this.relabel(node.label.substring(common + 1), below, node.body);
    const added = this.leaf(path.substring(common + 1), below, value);
    const prefix = path.substring(0, common);
    return path.at(common) === 0
      ? this.fork(prefix, max, added, old)
      : this.fork(prefix, max, old, added);
  }

  /**
   * Remove a key below `cell`. Returns the replacement node (null when the
   * subtree becomes empty) or undefined when the key is absent.
   */
  private remove(cell: Cell, path: BitString, max: number): Cell | null | undefined {
    const node = this.parse(cell, max);
    if (!path.startsWith(node.label)) return undefined;
    if (node.below === 0) return null;

    const at = node.label.length;
    const bit = path.at(at);
    const child = this.remove(node.body.preloadRef(bit), path.substring(at + 1), node.below - 1);
    if (child === undefined) return undefined;
    if (child !== null) {
      return bit === 0
        ? this.fork(node.label, max, child, node.body.preloadRef(1))
        : this.fork(node.label, max, node.body.preloadRef(0), child);
    }

    // Only the sibling is left: fold its edge into this one.
    const siblingBit = bit === 0 ? 1 : 0;
    const sibling = this.parse(node.body.preloadRef(siblingBit), node.below - 1);
    return this.relabel(node.label.concat(bitOf(siblingBit), sibling.label), max, sibling.body);
  }

  private extreme(cell: Cell, prefix: BitString, max: number, largest: boolean): MapEntry<K, V> {
    const node = this.parse(cell, max);
    const path = prefix.concat(node.label);
    if (node.below === 0) {
      return { found: true, key: this.bitsToKey(path), value: this.readValue(node.body) };
    }
    const [low, high] = this.order(path.length);
    const bit = largest ? high : low;
    return this.extreme(node.body.preloadRef(bit), path.concat(bitOf(bit)), node.below - 1, largest);
  }

  private nearest(key: K, upward: boolean, inclusive: boolean): MapEntry<K, V> {
    if (this.root === null) return NOT_FOUND;
    return this.search(this.root, BitString.EMPTY, this.keyToBits(key), this.keyBits, upward, inclusive);
  }

  /**
   * Closest entry to `pivot` in one direction, below a node reached through
   * `prefix`. `pivot` holds the full key.
   */
  private search(
    cell: Cell,
    prefix: BitString,
    pivot: BitString,
    max: number,
    upward: boolean,
    inclusive: boolean,
  ): MapEntry<K, V> {
    const node = this.parse(cell, max);
    const rest = pivot.substring(prefix.length);
    const common = node.label.commonPrefix(rest);

    if (common < node.label.length) {
      // The whole subtree lies on one side of the pivot.
      const [low] = this.order(prefix.length + common);
      const subtreeAbove = node.label.at(common) !== low;
      if (subtreeAbove === upward) return this.extreme(cell, prefix, max, !upward);
      return NOT_FOUND;
    }

    const path = prefix.concat(node.label);
    if (node.below === 0) {
      return inclusive
        ? { found: true, key: this.bitsToKey(path), value: this.readValue(node.body) }
        : NOT_FOUND;
    }

    const bit = pivot.at(path.length);
    const inner = this.search(
      node.body.preloadRef(bit),
      path.concat(bitOf(bit)),
      pivot,
      node.below - 1,
      upward,
      inclusive,
    );
    if (inner.found) return inner;

    const [low] = this.order(path.length);
    const other = bit === 0 ? 1 : 0;
    const otherAbove = other !== low;
    if (otherAbove !== upward) return NOT_FOUND;
    return this.extreme(node.body.preloadRef(other), path.concat(bitOf(other)), node.below - 1, !upward);
  }

  private *walk(cell: Cell, prefix: BitString, max: number): Generator<[K, V]> {
    const node = this.parse(cell, max);
    const path = prefix.concat(node.label);
    if (node.below === 0) {
      yield [this.bitsToKey(path), this.readValue(node.body)];
      return;
    }
    for (const bit of this.order(path.length)) {
      yield* this.walk(node.body.preloadRef(bit), path.concat(bitOf(bit)), node.below - 1);
    }
  }

  private forEachLeaf(cell: Cell, max: number, visit: () => void): void {
    const node = this.parse(cell, max);
    if (node.below === 0) {
      visit();
      return;
    }
    this.forEachLeaf(node.body.preloadRef(0), node.below - 1, visit);
    this.forEachLeaf(node.body.preloadRef(1), node.below - 1, visit);
  }
}
