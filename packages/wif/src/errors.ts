/**
 * WIF error types.
 *
 * Structured errors for field decoding, section lookup and cross-section
 * consistency failures. Every decode failure raised below a section is
 * wrapped in a FieldParseError carrying the section and field it came from.
 */

export class WifError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WifError';
  }
}

// ============================================================================
// Field-level decode errors
// ============================================================================

export class InvalidIntegerError extends WifError {
  public readonly raw: string;

  constructor(raw: string) {
    super(`Invalid integer: "${raw}"`);
    this.name = 'InvalidIntegerError';
    this.raw = raw;
  }
}

export class InvalidFloatError extends WifError {
  public readonly raw: string;

  constructor(raw: string) {
    super(`Invalid float: "${raw}"`);
    this.name = 'InvalidFloatError';
    this.raw = raw;
  }
}

export class InvalidDateError extends WifError {
  public readonly raw: string;

  constructor(raw: string, reason: string) {
    super(`Invalid date "${raw}": ${reason}`);
    this.name = 'InvalidDateError';
    this.raw = raw;
  }
}

export class ExpectedPairError extends WifError {
  public readonly saw: string;

  constructor(saw: string) {
    super(`Expected a comma-separated pair but got "${saw}"`);
    this.name = 'ExpectedPairError';
    this.saw = saw;
  }
}

export class ExpectedBooleanError extends WifError {
  public readonly saw: string;

  constructor(saw: string) {
    super(`Expected a boolean but got "${saw}"`);
    this.name = 'ExpectedBooleanError';
    this.saw = saw;
  }
}

export class ColorPartsError extends WifError {
  public readonly saw: string;

  constructor(saw: string) {
    super('Color value must have exactly three comma-separated parts');
    this.name = 'ColorPartsError';
    this.saw = saw;
  }
}

export class InvalidSymbolError extends WifError {
  public readonly saw: string;

  constructor(saw: string, reason: string) {
    super(`Invalid symbol "${saw}": ${reason}`);
    this.name = 'InvalidSymbolError';
    this.saw = saw;
  }
}

// ============================================================================
// Section-level errors
// ============================================================================

export class MissingRequiredFieldError extends WifError {
  public readonly section: string;
  public readonly field: string;

  constructor(section: string, field: string) {
    super(`Section [${section}] is missing required field '${field}'`);
    this.name = 'MissingRequiredFieldError';
    this.section = section;
    this.field = field;
  }
}

export class FieldParseError extends WifError {
  public readonly section: string;
  public readonly field: string;
  declare readonly cause: WifError;

  constructor(section: string, field: string, cause: WifError) {
    super(`Error parsing [${section}].${field}: ${cause.message}`, { cause });
    this.name = 'FieldParseError';
    this.section = section;
    this.field = field;
  }
}

export class MissingSectionError extends WifError {
  public readonly section: string;

  constructor(section: string) {
    super(`Section [${section}] is listed in CONTENTS but could not be found`);
    this.name = 'MissingSectionError';
    this.section = section;
  }
}

export class TableKeyError extends WifError {
  public readonly section: string;
  public readonly key: string;

  constructor(section: string, key: string) {
    super(`Could not parse table key for section [${section}]: saw "${key}"`);
    this.name = 'TableKeyError';
    this.section = section;
    this.key = key;
  }
}

// ============================================================================
// Document-level errors
// ============================================================================

export class LiftplanMismatchError extends WifError {
  /** First weft row whose composed shafts differ from the supplied liftplan. */
  public readonly weft: number | undefined;

  constructor(weft?: number) {
    super(
      weft !== undefined
        ? `Liftplan does not match treadling and tieup (first difference at weft ${weft})`
        : 'Liftplan does not match treadling and tieup',
    );
    this.name = 'LiftplanMismatchError';
    this.weft = weft;
  }
}

/**
 * Wrap any decode failure with the section/field it was read from.
 * Non-WIF errors are rethrown untouched.
 */
export function withFieldContext<T>(section: string, field: string, decode: () => T): T {
  try {
    return decode();
  } catch (err) {
    if (err instanceof WifError) {
      throw new FieldParseError(section, field, err);
    }
    throw err;
  }
}
