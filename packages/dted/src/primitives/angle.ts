/**
 * Fixed-point geographic angle in degrees, minutes and seconds.
 *
 * The sign is carried once for the whole angle; degrees, minutes and
 * seconds are magnitudes. Arithmetic goes through total arc-seconds and
 * always produces a new Angle.
 */

import { AngleRangeError } from "../errors.js";
import { AxisElement, toAxis, type AxisOperand } from "./axis-element.js";

export const SECONDS_PER_DEGREE = 3600;
export const SECONDS_PER_MINUTE = 60;
export const MINUTES_PER_DEGREE = 60;

/** Largest representable degree magnitude (unsigned 16-bit) */
export const MAX_DEGREES = 0xffff;

const MAX_TOTAL_SECONDS = MAX_DEGREES * SECONDS_PER_DEGREE;

/** Seconds within noise of a whole micro-arc-second are snapped onto it */
const MICROS_PER_SECOND = 1_000_000;

/**
 * Floating-point noise allowed on arc-seconds derived from a total of
 * magnitude `total`. Totals are doubles, so a few ulps are lost whenever
 * degrees, minutes and seconds are summed.
 */
function secondsNoise(total: number): number {
  return 4 * Number.EPSILON * Math.max(Math.abs(total), SECONDS_PER_MINUTE);
}

/** `value`, or `snapped` when the two differ by no more than `noise` */
function snap(value: number, snapped: number, noise: number): number {
  return Math.abs(value - snapped) <= noise ? snapped : value;
}

/** Normalized (deg, min, sec, negative) tuple; zero is never negative */
export interface AngleParts {
  deg: number;
  min: number;
  sec: number;
  negative: boolean;
}

export class Angle {
  readonly deg: number;
  readonly min: number;
  readonly sec: number;
  readonly negative: boolean;

  /**
   * @throws AngleRangeError when minutes or seconds are outside [0, 60), or
   *   degrees/minutes are not non-negative integers within range.
   */
  constructor(deg: number, min: number, sec: number, negative = false) {
    if (!Number.isInteger(deg) || deg < 0 || deg > MAX_DEGREES) {
      throw new AngleRangeError(`Degrees must be an integer in [0, ${MAX_DEGREES}], got ${deg}`);
    }
    if (!Number.isInteger(min) || min < 0) {
      throw new AngleRangeError(`Minutes must be a non-negative integer, got ${min}`);
    }
    if (min >= MINUTES_PER_DEGREE) {
      throw new AngleRangeError(`Minutes must be less than 60, got ${min}`);
    }
    if (Number.isNaN(sec) || sec < 0) {
      throw new AngleRangeError(
        `Seconds must be non-negative (use the sign flag for negative angles), got ${sec}`,
      );
    }
    if (sec >= SECONDS_PER_MINUTE) {
      throw new AngleRangeError(`Seconds must be less than 60, got ${sec}`);
    }
    this.deg = deg;
    this.min = min;
    this.sec = sec;
    this.negative = negative;
  }

  static readonly ZERO = new Angle(0, 0, 0);

  /**
   * Build an angle from a signed total of arc-seconds.
   *
   * @throws AngleRangeError when the magnitude exceeds 65535 degrees
   */
  static fromTotalSeconds(totalSeconds: number): Angle {
    if (!Number.isFinite(totalSeconds)) {
      throw new AngleRangeError(`${totalSeconds}s is not a finite angle`);
    }
    const abs = Math.abs(totalSeconds);
    if (abs > MAX_TOTAL_SECONDS) {
      throw new AngleRangeError(`${totalSeconds}s is too large to be an Angle`);
    }

    const noise = secondsNoise(abs);
    // A total within noise of a whole second is that second, so the
    // remainder below can never round up to 60
    const total = snap(abs, Math.round(abs), noise);

    const whole = Math.floor(total);
    const deg = Math.floor(whole / SECONDS_PER_DEGREE);
    const min = Math.floor((whole % SECONDS_PER_DEGREE) / SECONDS_PER_MINUTE);
    const rest = total - (deg * SECONDS_PER_DEGREE + min * SECONDS_PER_MINUTE);
    const sec = snap(rest, Math.round(rest * MICROS_PER_SECOND) / MICROS_PER_SECOND, noise);

    return new Angle(deg, min, sec, totalSeconds < 0);
  }

  static fromDegrees(degrees: number): Angle {
    return Angle.fromTotalSeconds(degrees * SECONDS_PER_DEGREE);
  }

  isZero(): boolean {
    return this.deg === 0 && this.min === 0 && this.sec === 0;
  }

  totalSeconds(): number {
    const abs = this.deg * SECONDS_PER_DEGREE + this.min * SECONDS_PER_MINUTE + this.sec;
    return this.negative ? -abs : abs;
  }

  /** Decimal degrees: sign × (deg + min/60 + sec/3600) */
  toDegrees(): number {
    const abs = this.deg + this.min / MINUTES_PER_DEGREE + this.sec / SECONDS_PER_DEGREE;
    return this.negative ? -abs : abs;
  }

  /** The comparison tuple. A zero angle is reported as positive. */
  normalized(): AngleParts {
    return {
      deg: this.deg,
      min: this.min,
      sec: this.sec,
      negative: this.negative && !this.isZero(),
    };
  }

  /**
   * Compare normalized tuples. Seconds match within the floating-point
   * noise of the larger total, so an angle equals its own round trip
   * through {@link totalSeconds} and {@link fromTotalSeconds}.
   */
  equals(other: Angle): boolean {
    const a = this.normalized();
    const b = other.normalized();
    const magnitude = Math.max(Math.abs(this.totalSeconds()), Math.abs(other.totalSeconds()));
    return (
      a.deg === b.deg &&
      a.min === b.min &&
      a.negative === b.negative &&
      Math.abs(a.sec - b.sec) <= 2 * secondsNoise(magnitude)
    );
  }

  compare(other: Angle): number {
    return this.totalSeconds() - other.totalSeconds();
  }

  add(other: Angle): Angle {
    return Angle.fromTotalSeconds(this.totalSeconds() + other.totalSeconds());
  }

  sub(other: Angle): Angle {
    return Angle.fromTotalSeconds(this.totalSeconds() - other.totalSeconds());
  }

  /** Multiply by a plain factor, or by another angle's arc-seconds. */
  mul(factor: number | Angle): Angle {
    const f = factor instanceof Angle ? factor.totalSeconds() : factor;
    return Angle.fromTotalSeconds(this.totalSeconds() * f);
  }

  /** Divide by a plain divisor, or by another angle's arc-seconds. */
  div(divisor: number | Angle): Angle {
    const d = divisor instanceof Angle ? divisor.totalSeconds() : divisor;
    return Angle.fromTotalSeconds(this.totalSeconds() / d);
  }

  /**
   * Format as D°MM'SS.ss" with an optional hemisphere suffix.
   *
   * ```ts
   * new Angle(42, 5, 30).format("N", "S"); // 42°05'30.00"N
   * ```
   */
  format(positive?: string, negative?: string): string {
    const mm = String(this.min).padStart(2, "0");
    const ss = this.sec.toFixed(2).padStart(5, "0");
    const body = `${this.deg}°${mm}'${ss}"`;
    const isNegative = this.normalized().negative;
    if (positive !== undefined && negative !== undefined) {
      return `${body}${isNegative ? negative : positive}`;
    }
    return isNegative ? `-${body}` : body;
  }

  toString(): string {
    return this.format();
  }

  toJSON(): AngleParts {
    return this.normalized();
  }
}

// ─── Angle pairs ────────────────────────────────────────────────────────────

/** Component-wise arithmetic on (lat, lon) angle pairs. */
export const angleAxis = {
  add(lhs: AxisElement<Angle>, rhs: AxisOperand<Angle>): AxisElement<Angle> {
    return lhs.zip(toAxis(rhs), (a, b) => a.add(b));
  },
  sub(lhs: AxisElement<Angle>, rhs: AxisOperand<Angle>): AxisElement<Angle> {
    return lhs.zip(toAxis(rhs), (a, b) => a.sub(b));
  },
  mul(lhs: AxisElement<Angle>, factor: AxisOperand<number>): AxisElement<Angle> {
    return lhs.zip(toAxis(factor), (a, f) => a.mul(f));
  },
  div(lhs: AxisElement<Angle>, divisor: AxisOperand<number>): AxisElement<Angle> {
    return lhs.zip(toAxis(divisor), (a, d) => a.div(d));
  },
  toDegrees(value: AxisElement<Angle>): AxisElement<number> {
    return value.map((a) => a.toDegrees());
  },
  equals(lhs: AxisElement<Angle>, rhs: AxisElement<Angle>): boolean {
    return lhs.equals(rhs, (a, b) => a.equals(b));
  },
};
