/**
 * Fixed point number with a signed byte integer part and a fractional part
 * counted in 360ths.
 *
 * The two parts may carry different signs: `new FixedPoint(1, -180)` and
 * `new FixedPoint(0, 180)` both represent one half. Only the integer part
 * decides which grid cell a value falls in.
 */
export const FIXED_POINT_SCALE = 360;

const INTEGER_MIN = -128;
const INTEGER_MAX = 127;
const FRACTIONAL_LIMIT = FIXED_POINT_SCALE - 1;

const assertInteger = (value: number, label: string): void => {
  if (!Number.isInteger(value)) {
    throw new RangeError(`${label} must be an integer, got ${value}`);
  }
};

export class FixedPoint {
  readonly integer: number;
  readonly fractional: number;

  constructor(integer: number, fractional: number) {
    assertInteger(integer, "FixedPoint integer part");
    assertInteger(fractional, "FixedPoint fractional part");

    if (integer < INTEGER_MIN || integer > INTEGER_MAX) {
      throw new RangeError(`FixedPoint integer part ${integer} does not fit in a signed byte`);
    }
    if (fractional < -FRACTIONAL_LIMIT || fractional > FRACTIONAL_LIMIT) {
      throw new RangeError(
        `FixedPoint fractional part ${fractional} is outside [-${FRACTIONAL_LIMIT}, ${FRACTIONAL_LIMIT}]`,
      );
    }

    this.integer = integer;
    this.fractional = fractional;
  }

  static readonly ZERO = new FixedPoint(0, 0);

  static fromFloat(value: number): FixedPoint {
    // `|| 0` folds the -0 that Math.trunc yields for small negative inputs.
    const integer = Math.trunc(value) || 0;
    const fractional = Math.trunc((value - integer) * FIXED_POINT_SCALE) || 0;
    return new FixedPoint(integer, fractional);
  }

  add(other: FixedPoint): FixedPoint {
    return FixedPoint.normalized(this.integer + other.integer, this.fractional + other.fractional);
  }

  sub(other: FixedPoint): FixedPoint {
    return FixedPoint.normalized(this.integer - other.integer, this.fractional - other.fractional);
  }

  /** True when the integer part differs from `previous`, i.e. a cell boundary was crossed. */
  didOverflow(previous: FixedPoint): boolean {
    return this.integer !== previous.integer;
  }

  integerPart(): number {
    return this.integer;
  }

  toScaled(): number {
    return this.integer * FIXED_POINT_SCALE + this.fractional;
  }

  equals(other: FixedPoint): boolean {
    return this.integer === other.integer && this.fractional === other.fractional;
  }

  /**
   * Linearly maps this value from [fromMin, fromMax] onto [toMin, toMax].
   * Inputs outside the source interval map outside the target interval.
   */
  mapToLinearRange(fromMin: FixedPoint, fromMax: FixedPoint, toMin: number, toMax: number): number {
    const toDelta = toMax - toMin;
    const fromMinScaled = fromMin.toScaled();
    const fromDeltaScaled = fromMax.toScaled() - fromMinScaled;
    if (fromDeltaScaled === 0) {
      throw new RangeError("mapToLinearRange requires a non-empty source interval");
    }

    // Truncating division, as a 32-bit integer divide would.
    return toMin + Math.trunc(((this.toScaled() - fromMinScaled) * toDelta) / fromDeltaScaled);
  }

  toString(): string {
    return `${this.integer}+${this.fractional}/${FIXED_POINT_SCALE}`;
  }

  private static normalized(integer: number, fractional: number): FixedPoint {
    if (fractional >= FIXED_POINT_SCALE) {
      return new FixedPoint(integer + 1, fractional - FIXED_POINT_SCALE);
    }
    if (fractional <= -FIXED_POINT_SCALE) {
      return new FixedPoint(integer - 1, fractional + FIXED_POINT_SCALE);
    }
    return new FixedPoint(integer, fractional);
  }
}
