/**
 * A (latitude, longitude) pair of values of the same type.
 *
 * Used for every "one value per axis" quantity in a DTED file: origin,
 * interval, point count and bounds. Operations always act on each axis
 * independently; the two axes never interact.
 */

import { NumericConversionError } from "../errors.js";

export type Axis = "lat" | "lon";

export class AxisElement<T> {
  constructor(
    readonly lat: T,
    readonly lon: T,
  ) {}

  /** The same value on both axes. */
  static splat<T>(value: T): AxisElement<T> {
    return new AxisElement(value, value);
  }

  get(axis: Axis): T {
    return axis === "lat" ? this.lat : this.lon;
  }

  map<U>(fn: (value: T, axis: Axis) => U): AxisElement<U> {
    return new AxisElement(fn(this.lat, "lat"), fn(this.lon, "lon"));
  }

  zip<U, R>(other: AxisElement<U>, fn: (a: T, b: U, axis: Axis) => R): AxisElement<R> {
    return new AxisElement(fn(this.lat, other.lat, "lat"), fn(this.lon, other.lon, "lon"));
  }

  equals(other: AxisElement<T>, eq: (a: T, b: T) => boolean = Object.is): boolean {
    return eq(this.lat, other.lat) && eq(this.lon, other.lon);
  }

  toJSON(): { lat: T; lon: T } {
    return { lat: this.lat, lon: this.lon };
  }
}

/** A per-axis operand: either a pair, or a scalar broadcast to both axes */
export type AxisOperand<T> = T | AxisElement<T>;

export function toAxis<T>(operand: AxisOperand<T>): AxisElement<T> {
  return operand instanceof AxisElement ? operand : AxisElement.splat(operand);
}

// ─── Numeric kinds ──────────────────────────────────────────────────────────

/**
 * Numeric representations that appear in DTED fields.
 *
 * JavaScript numbers are all doubles, so a kind is a contract on the range
 * and integrality of a value rather than a storage type.
 */
export type NumericKind = "u8" | "u16" | "u32" | "i16" | "i32" | "f64";

const INTEGER_RANGES: Record<Exclude<NumericKind, "f64">, [number, number]> = {
  u8: [0, 0xff],
  u16: [0, 0xffff],
  u32: [0, 0xffffffff],
  i16: [-0x8000, 0x7fff],
  i32: [-0x80000000, 0x7fffffff],
};

/**
 * Convert a value into a numeric kind.
 *
 * Integer kinds truncate toward zero and reject anything outside their
 * range; every kind rejects NaN and infinities.
 *
 * @throws NumericConversionError
 */
export function convertNumeric(value: number, kind: NumericKind): number {
  if (!Number.isFinite(value)) {
    throw new NumericConversionError(value, kind);
  }
  if (kind === "f64") return value;

  const [min, max] = INTEGER_RANGES[kind];
  const truncated = Math.trunc(value);
  if (truncated < min || truncated > max) {
    throw new NumericConversionError(value, kind);
  }
  // Math.trunc(-0.5) is -0
  return truncated === 0 ? 0 : truncated;
}

function combine(
  lhs: AxisElement<number>,
  rhs: AxisOperand<number>,
  kind: NumericKind,
  op: (a: number, b: number) => number,
): AxisElement<number> {
  return lhs.zip(toAxis(rhs), (a, b) => convertNumeric(op(a, b), kind));
}

/**
 * Component-wise arithmetic on numeric pairs.
 *
 * Operands of any kind are combined in floating point, then converted into
 * the requested output kind (default "f64").
 *
 * ```ts
 * const degrees = axisMath.div(header.interval, 36000);
 * const span = axisMath.mul(degrees, axisMath.sub(header.count, 1, "u16"));
 * ```
 */
export const axisMath = {
  add(lhs: AxisElement<number>, rhs: AxisOperand<number>, kind: NumericKind = "f64") {
    return combine(lhs, rhs, kind, (a, b) => a + b);
  },
  sub(lhs: AxisElement<number>, rhs: AxisOperand<number>, kind: NumericKind = "f64") {
    return combine(lhs, rhs, kind, (a, b) => a - b);
  },
  mul(lhs: AxisElement<number>, rhs: AxisOperand<number>, kind: NumericKind = "f64") {
    return combine(lhs, rhs, kind, (a, b) => a * b);
  },
  div(lhs: AxisElement<number>, rhs: AxisOperand<number>, kind: NumericKind = "f64") {
    return combine(lhs, rhs, kind, (a, b) => a / b);
  },
  /** Convert both axes into another kind without arithmetic. */
  cast(value: AxisElement<number>, kind: NumericKind) {
    return value.map((v) => convertNumeric(v, kind));
  },
};
