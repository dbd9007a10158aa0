import { Cell } from './cell.ts';
import { selectVariant, unmatchedCode } from './engine.ts';
import { UnmatchedVariantError, UseAfterCloseError } from './errors.ts';
import { LazyValue } from './lazy.ts';
import type { UnionLayout, UnionVariant } from './layout.ts';
import type { CellSlice } from './slice.ts';

/**
 * Shape of a decoded union value.
 */
export interface VariantLike {
  readonly tag: string;
  readonly value: unknown;
}

export type UnionViewState =
  | 'unopened'
  | 'discriminantRead'
  | 'variantSelected'
  | 'fieldsBeingAccessed'
  | 'closed';

/**
 * Handlers keyed by variant name. Each receives the variant's lazy fields.
 */
export type MatchArms<U extends VariantLike, R> = {
  [V in U as V['tag']]?: (value: LazyValue<V['value']>, view: UnionView<U>) => R;
};

type Arm<U extends VariantLike, R> = (value: LazyValue<unknown>, view: UnionView<U>) => R;

export interface OpenUnionOptions {
  /** Exit code for an unmatched discriminant, overriding the union's policy. */
  errorCode?: number;
}

/**
 * A union value whose variant has been identified but whose fields are read
 * on demand.
 *
 * Opening peeks discriminant widths shortest first and stops at the first
 * width that names a variant. Under the `fallback` policy a view may stay
 * unmatched; `match` then runs its `otherwise` handler.
 */
export class UnionView<U extends VariantLike = VariantLike> {
  readonly layout: UnionLayout<U>;
  private readonly slice: CellSlice;
  private readonly errorCode: number | undefined;
  private current: UnionViewState = 'unopened';
  private selected: UnionVariant | null = null;
  private fields: LazyValue<unknown> | null = null;
  private start = 0;

  constructor(source: Cell | CellSlice, layout: UnionLayout<U>, options: OpenUnionOptions = {}) {
    this.slice = source instanceof Cell ? source.beginParse() : source.clone();
    this.layout = layout;
    this.errorCode = options.errorCode;
  }

  get state(): UnionViewState {
    return this.current;
  }

  /** Whether a variant's discriminant was found. */
  get matched(): boolean {
    return this.selected !== null;
  }

  get tag(): U['tag'] | null {
    return this.selected === null ? null : (this.selected.tag as U['tag']);
  }

  get variant(): UnionVariant | null {
    return this.selected;
  }

  get discriminantWidth(): number | null {
    return this.selected === null ? null : this.selected.width;
  }

  /** Bit offset where the selected variant's fields begin. */
  get bodyOffset(): number | null {
    return this.selected === null ? null : this.start + this.selected.width;
  }

  /**
   * Read the discriminant and select the variant. Called once by
   * {@link openLazyUnion}.
   */
  open(): this {
    if (this.current !== 'unopened') return this;
    this.start = this.slice.position.bits;
    const variant = selectVariant(this.slice, this.layout);
    this.current = 'discriminantRead';
    if (variant === null) {
      if (this.layout.policy.onUnmatched === 'error') {
        this.current = 'closed';
        throw new UnmatchedVariantError(this.layout.name, null, this.code());
      }
      return this;
    }
    this.selected = variant;
    this.fields = new LazyValue(this.slice, variant.layout);
    this.current = 'variantSelected';
    return this;
  }

  /**
   * Read a field of the selected variant.
   */
  get(name: string): unknown {
    const fields = this.lazyFields();
    const value = fields.getField(name);
    this.current = 'fieldsBeingAccessed';
    return value;
  }

  /**
   * Run exactly one handler: the selected variant's arm, or `otherwise` when
   * the view is unmatched or the arm is missing. The view is closed once the
   * handler returns or throws.
   */
  match<R>(arms: MatchArms<U, R>, otherwise?: (view: UnionView<U>) => R): R {
    if (this.current === 'closed') throw new UseAfterCloseError(`union ${this.layout.name}`);
    try {
      const table = arms as unknown as Partial<Record<string, Arm<U, R>>>;
      const arm = this.selected === null ? undefined : table[this.selected.tag];
      if (arm !== undefined && this.fields !== null) {
        this.current = 'fieldsBeingAccessed';
        return arm(this.fields, this);
      }
      if (otherwise !== undefined) return otherwise(this);
      throw new UnmatchedVariantError(this.layout.name, this.tag, this.code());
    } finally {
      this.close();
    }
  }

  close(): void {
    this.fields?.close();
    this.current = 'closed';
  }

  private lazyFields(): LazyValue<unknown> {
    if (this.current === 'closed') throw new UseAfterCloseError(`union ${this.layout.name}`);
    if (this.fields === null) {
      throw new UnmatchedVariantError(this.layout.name, null, this.code());
    }
    return this.fields;
  }

  private code(): number {
    return unmatchedCode(this.layout, this.errorCode);
  }
}

/**
 * Open a union for lazy reading. Under the `error` policy a discriminant that
 * names no variant fails here.
 */
export function openLazyUnion<U extends VariantLike>(
  source: Cell | CellSlice,
  layout: UnionLayout<U>,
  options: OpenUnionOptions = {},
): UnionView<U> {
  return new UnionView(source, layout, options).open();
}

/**
 * Free-function form of {@link UnionView.match}.
 */
export function match<U extends VariantLike, R>(
  view: UnionView<U>,
  arms: MatchArms<U, R>,
  otherwise?: (view: UnionView<U>) => R,
): R {
  return view.match(arms, otherwise);
}
