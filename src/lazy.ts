import { Cell } from './cell.ts';
import { checkOpcode, loadValue, newContext, skipField, type FieldContext } from './engine.ts';
import { InvalidValueError, UseAfterCloseError, inField } from './errors.ts';
import type { FieldLayout, RecordLayout } from './layout.ts';
import { CellSlice, type SlicePosition } from './slice.ts';

/**
 * A record decoded on demand.
 *
 * Opening only checks the opcode. Each field is decoded the first time it is
 * read and cached afterwards; reaching a field walks the cursor over the
 * fields before it without decoding them. Start positions of walked fields
 * are remembered, so fields can be read in any order.
 *
 * @example
 * ```typescript
 * const msg = decodeLazy(cell, Transfer);
 * if (msg.get('amount') > 0n) {
 *   // only the fields up to `amount` were looked at
 * }
 * ```
 */
export class LazyValue<T = Record<string, unknown>> {
  readonly layout: RecordLayout<T>;
  readonly cell: Cell;

  private cursor: CellSlice;
  private walked = 0;
  private readonly starts: SlicePosition[] = [];
  private readonly cache: unknown[];
  private readonly loaded: boolean[];
  private readonly ctx: FieldContext;
  private closed = false;

  constructor(source: Cell | CellSlice, layout: RecordLayout<T>, errorCode?: number) {
    const slice = source instanceof Cell ? source.beginParse() : source.clone();
    checkOpcode(slice, layout, errorCode);
    this.layout = layout;
    this.cell = slice.cell;
    this.cursor = slice;
    this.cache = new Array<unknown>(layout.fields.length);
    this.loaded = new Array<boolean>(layout.fields.length).fill(false);
    this.ctx = newContext(layout.config);
  }

  /**
   * Read a field, decoding it on first access.
   */
  get<K extends keyof T & string>(name: K): T[K] {
    return this.getField(name) as T[K];
  }

  /**
   * Read a field by a name known only at run time.
   */
  getField(name: string): unknown {
    this.ensureOpen();
    const index = this.layout.fieldIndex.get(name);
    if (index === undefined) {
      throw new InvalidValueError(`${this.layout.name} has no field '${name}'`);
    }
    return this.read(index);
  }

  isCached(name: string): boolean {
    const index = this.layout.fieldIndex.get(name);
    return index !== undefined && this.loaded[index];
  }

  get cachedCount(): number {
    return this.loaded.filter(Boolean).length;
  }

  /** Position of the walking cursor: everything before it has been located. */
  get position(): SlicePosition {
    return this.cursor.position;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Decode every field into a plain object.
   */
  toObject(): T {
    this.ensureOpen();
    const result: Record<string, unknown> = {};
    for (const field of this.layout.fields) {
      result[field.name] = this.read(field.index);
    }
    return result as T;
  }

  /**
   * Property-style access. The returned object is a Proxy; use `toObject()`
   * where a plain object is needed.
   */
  view(): T {
    const fields = this.layout.fieldIndex;
    const names = this.layout.fields.map((f) => f.name);
    return new Proxy({} as T & object, {
      get: (target, prop) => {
        if (typeof prop === 'string' && fields.has(prop)) return this.getField(prop);
        return Reflect.get(target, prop);
      },
      has(target, prop) {
        if (typeof prop === 'string' && fields.has(prop)) return true;
        return Reflect.has(target, prop);
      },
      ownKeys() {
        return names;
      },
      getOwnPropertyDescriptor(target, prop) {
        if (typeof prop === 'string' && fields.has(prop)) {
          return { enumerable: true, configurable: true, writable: false };
        }
        return Reflect.getOwnPropertyDescriptor(target, prop);
      },
    });
  }

  /**
   * Walk past every remaining field and fail if anything is left in the cell.
   */
  assertEnd(): void {
    this.ensureOpen();
    while (this.walked < this.layout.fields.length) this.skipNext();
    this.cursor.assertEnd();
  }

  /**
   * Release the view. Reads afterwards raise {@link UseAfterCloseError}.
   */
  close(): void {
    this.closed = true;
    this.cache.length = 0;
    this.loaded.fill(false);
  }

  private ensureOpen(): void {
    if (this.closed) throw new UseAfterCloseError(`lazy ${this.layout.name}`);
  }

  private read(index: number): unknown {
    if (this.loaded[index]) return this.cache[index];
    while (this.walked < index) this.skipNext();

    const field = this.layout.fields[index];
    let value: unknown;
    if (this.walked === index) {
      const probe = this.cursor.clone();
      value = inField(field.name, () => loadValue(probe, field.type, this.ctx));
      this.starts[index] = this.cursor.position;
      this.cursor = probe;
      this.walked++;
    } else {
      const slice = new CellSlice(this.cell, this.starts[index]);
      value = inField(field.name, () => loadValue(slice, field.type, this.ctx));
    }
    this.remember(field, value);
    this.cache[index] = value;
    this.loaded[index] = true;
    return value;
  }

  private skipNext(): void {
    const field = this.layout.fields[this.walked];
    const probe = this.cursor.clone();
    inField(field.name, () => skipField(probe, field.type, field.name, field.lengthSource, this.ctx));
    this.starts[this.walked] = this.cursor.position;
    this.cursor = probe;
    this.walked++;
  }

  private remember(field: FieldLayout, value: unknown): void {
    if (field.lengthSource && typeof value === 'number') this.ctx.lengths.set(field.name, value);
  }
}
