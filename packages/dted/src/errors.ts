/**
 * Error taxonomy for DTED decoding and querying.
 *
 * Every failure raised by this package extends DtedError. I/O errors from
 * node:fs are not wrapped and reach the caller unchanged.
 */

/** Base class for all decode, model and grid errors */
export class DtedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DtedError";
  }
}

/** Fewer bytes were available than the fixed layout requires */
export class IncompleteInputError extends DtedError {
  constructor(
    readonly offset: number,
    readonly needed: number,
    readonly available: number,
  ) {
    super(
      `Incomplete input at offset ${offset}: needed ${needed} bytes, ${available} available`,
    );
    this.name = "IncompleteInputError";
  }
}

/** A sentinel or fixed tag did not match the expected literal */
export class SentinelMismatchError extends DtedError {
  constructor(
    readonly offset: number,
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`Expected sentinel ${expected} at offset ${offset}, found ${actual}`);
    this.name = "SentinelMismatchError";
  }
}

/** A fixed-width numeric ASCII field contained a non-digit byte */
export class InvalidFieldError extends DtedError {
  constructor(
    readonly offset: number,
    readonly field: string,
  ) {
    super(`Invalid numeric field ${JSON.stringify(field)} at offset ${offset}`);
    this.name = "InvalidFieldError";
  }
}

/** An Angle construction invariant was violated */
export class AngleRangeError extends DtedError {
  constructor(message: string) {
    super(message);
    this.name = "AngleRangeError";
  }
}

/** A value could not be represented in the requested numeric kind */
export class NumericConversionError extends DtedError {
  constructor(
    readonly value: number,
    readonly kind: string,
  ) {
    super(`Cannot represent ${value} as ${kind}`);
    this.name = "NumericConversionError";
  }
}

/** A data record's stored checksum disagrees with its contents */
export class ChecksumMismatchError extends DtedError {
  constructor(
    readonly offset: number,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(
      `Checksum mismatch for record at offset ${offset}: stored ${expected}, computed ${actual}`,
    );
    this.name = "ChecksumMismatchError";
  }
}

/** Bytes remained after the last data record */
export class TrailingBytesError extends DtedError {
  constructor(
    readonly offset: number,
    readonly remaining: number,
  ) {
    super(`${remaining} unexpected trailing bytes at offset ${offset}`);
    this.name = "TrailingBytesError";
  }
}

/** Header and records do not describe a queryable grid */
export class InvalidGridError extends DtedError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidGridError";
  }
}
