/**
 * Error taxonomy of the codec.
 *
 * Every failure raised by this library is a {@link CodecError}. The `kind`
 * discriminant lets callers narrow without `instanceof`, and `exitCode`
 * mirrors the numeric code a contract would throw with on the virtual machine.
 *
 * Errors raised while a field is being encoded or decoded get the field path
 * prefixed on the way out (`Outer.inner.x`), so a diagnostic always points at
 * the offending field.
 */

export type LayoutErrorKind =
  | 'AmbiguousDiscriminant'
  | 'AmbiguousWidth'
  | 'UnknownType'
  | 'DuplicateType'
  | 'InvalidField';

export type ErrorKind =
  | LayoutErrorKind
  | 'SizeExceeded'
  | 'TruncatedData'
  | 'TrailingData'
  | 'OpcodePrefixMismatch'
  | 'UnmatchedVariant'
  | 'IntegerOutOfRange'
  | 'InvalidValue'
  | 'MalformedData'
  | 'UseAfterClose';

/** Exit codes used by the virtual machine for the matching failures. */
export const ExitCode = {
  IntegerOutOfRange: 5,
  InvalidValue: 7,
  CellOverflow: 8,
  CellUnderflow: 9,
  WrongOpcode: 63,
} as const;

export abstract class CodecError extends Error {
  abstract readonly kind: ErrorKind;
  readonly exitCode: number;
  readonly path: string[] = [];
  private readonly detail: string;

  constructor(detail: string, exitCode: number) {
    super(detail);
    this.name = new.target.name;
    this.detail = detail;
    this.exitCode = exitCode;
  }

  /** Dotted field path, or undefined when the error is not tied to a field. */
  get field(): string | undefined {
    return this.path.length > 0 ? this.path.join('.') : undefined;
  }

  /**
   * Prefix the field path with an enclosing field name.
   */
  atField(name: string): this {
    this.path.unshift(name);
    this.message = `${this.path.join('.')}: ${this.detail}`;
    return this;
  }
}

// ============================================================================
// Layout errors (registration time)
// ============================================================================

export abstract class LayoutError extends CodecError {
  abstract override readonly kind: LayoutErrorKind;

  constructor(detail: string) {
    super(detail, 0);
  }
}

export class AmbiguousDiscriminantError extends LayoutError {
  readonly kind = 'AmbiguousDiscriminant';

  constructor(
    readonly union: string,
    readonly variants: readonly [string, string],
  ) {
    super(
      `union ${union}: variants ${variants[0]} and ${variants[1]} cannot be told apart by their prefixes`,
    );
  }
}

export class AmbiguousWidthError extends LayoutError {
  readonly kind = 'AmbiguousWidth';
}

export class UnknownTypeError extends LayoutError {
  readonly kind = 'UnknownType';

  constructor(readonly typeName: string) {
    super(`unknown type ${typeName}`);
  }
}

export class DuplicateTypeError extends LayoutError {
  readonly kind = 'DuplicateType';

  constructor(readonly typeName: string) {
    super(`type ${typeName} is already registered`);
  }
}

export class InvalidFieldError extends LayoutError {
  readonly kind = 'InvalidField';
}

// ============================================================================
// Encode / decode errors
// ============================================================================

export type CellUnit = 'bits' | 'refs';

export class SizeExceededError extends CodecError {
  readonly kind = 'SizeExceeded';

  constructor(
    readonly unit: CellUnit,
    readonly needed: number,
    readonly available: number,
  ) {
    super(`needs ${needed} ${unit} but only ${available} fit`, ExitCode.CellOverflow);
  }
}

export class TruncatedDataError extends CodecError {
  readonly kind = 'TruncatedData';

  constructor(
    readonly unit: CellUnit,
    readonly needed: number,
    readonly available: number,
  ) {
    super(`needs ${needed} ${unit} but only ${available} remain`, ExitCode.CellUnderflow);
  }

  /** How many bits (or refs) the data was short by. */
  get shortBy(): number {
    return this.needed - this.available;
  }
}

export class TrailingDataError extends CodecError {
  readonly kind = 'TrailingData';

  constructor(
    readonly remainingBits: number,
    readonly remainingRefs: number,
  ) {
    super(
      `expected end of data, ${remainingBits} bits and ${remainingRefs} refs left unread`,
      ExitCode.CellUnderflow,
    );
  }
}

export class OpcodePrefixMismatchError extends CodecError {
  readonly kind = 'OpcodePrefixMismatch';

  constructor(
    readonly typeName: string,
    readonly expected: bigint,
    readonly width: number,
    readonly actual: bigint,
    exitCode: number = ExitCode.WrongOpcode,
  ) {
    super(
      `${typeName}: expected ${width}-bit opcode 0x${expected.toString(16)}, got 0x${actual.toString(16)}`,
      exitCode,
    );
  }
}

export class UnmatchedVariantError extends CodecError {
  readonly kind = 'UnmatchedVariant';

  constructor(
    readonly union: string,
    readonly tag: string | null,
    exitCode: number = ExitCode.WrongOpcode,
  ) {
    super(
      tag === null
        ? `${union}: no variant matches the data`
        : `${union}: no handler for variant ${tag}`,
      exitCode,
    );
  }
}

export class IntegerOutOfRangeError extends CodecError {
  readonly kind = 'IntegerOutOfRange';

  constructor(
    readonly value: bigint,
    readonly bits: number,
    readonly signed: boolean,
  ) {
    super(
      `${value} does not fit in ${signed ? 'int' : 'uint'}${bits}`,
      ExitCode.IntegerOutOfRange,
    );
  }
}

export class InvalidValueError extends CodecError {
  readonly kind = 'InvalidValue';

  constructor(detail: string) {
    super(detail, ExitCode.InvalidValue);
  }
}

export class MalformedDataError extends CodecError {
  readonly kind = 'MalformedData';

  constructor(detail: string) {
    super(detail, ExitCode.CellUnderflow);
  }
}

export class UseAfterCloseError extends CodecError {
  readonly kind = 'UseAfterClose';

  constructor(what: string) {
    super(`${what} is already closed`, 0);
  }
}

/**
 * Run `fn` and prefix the field name onto any codec error it raises.
 */
export function inField<T>(name: string, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof CodecError) throw e.atField(name);
    throw e;
  }
}
