import type { FlagIdentifier, IntegerWidth } from './interfaces/index.js';

const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;

export class Utils {
  /**
   * Checks for a finite number or a decimal string such as `'7'`, `'+3'` or
   * `'-1.5'`.
   */
  public static isNumericLike(value: unknown): value is number | string {
    if (typeof value === 'number') {
      return Number.isFinite(value);
    }
    return typeof value === 'string' && DECIMAL_LITERAL.test(value.trim());
  }

  /**
   * Converts a numeric value into a `bigint` without losing precision.
   * Fractions are truncated toward zero.
   *
   * @param value - Finite number, bigint or decimal string
   * @returns The value as `bigint`
   * @throws TypeError when `value` is not numeric
   *
   * @example
   * ```typescript
   * Utils.toInteger('18446744073709551626'); // 18446744073709551626n
   * Utils.toInteger('-1.5'); // -1n
   * Utils.toInteger(7.9); // 7n
   * ```
   */
  public static toInteger(value: FlagIdentifier): bigint {
    if (typeof value === 'bigint') {
      return value;
    }
    if (!Utils.isNumericLike(value)) {
      throw new TypeError(`Numeric value expected, got \`${value}\``);
    }
    if (typeof value === 'number') {
      return BigInt(Math.trunc(value));
    }
    const [whole] = value.trim().split('.');
    const digits = BigInt(whole.replace(/^[+-]/, '') || '0');
    return whole.startsWith('-') ? -digits : digits;
  }

  /**
   * Largest unsigned value representable in `width` bits.
   */
  public static maxUnsigned(width: IntegerWidth): bigint {
    return (1n << BigInt(width)) - 1n;
  }

  /**
   * Bounds a flag space to `[1, 2^width - 1]`. Out of range values are
   * clamped, never rejected: `Infinity` becomes the maximum, `-Infinity` and
   * `NaN` become 1.
   */
  public static clampFlagSpace(
    flagSpace: FlagIdentifier,
    width: IntegerWidth
  ): bigint {
    const max = Utils.maxUnsigned(width);
    if (typeof flagSpace === 'number' && !Number.isFinite(flagSpace)) {
      return flagSpace === Infinity ? max : 1n;
    }
    const value = Utils.toInteger(flagSpace);
    if (value > max) {
      return max;
    }
    return value < 1n ? 1n : value;
  }

  /**
   * Reduces a flag identifier to a bit index. Negative identifiers wrap
   * around to a nonnegative index, so `-1` maps to `flagSpace - 1`.
   *
   * @param flag - Flag identifier
   * @param flagSpace - Positive modulus
   * @returns Index in `[0, flagSpace)`
   */
  public static flagIndex(flag: FlagIdentifier, flagSpace: bigint): bigint {
    const remainder = Utils.toInteger(flag) % flagSpace;
    return remainder < 0n ? remainder + flagSpace : remainder;
  }

  /**
   * Single-bit mask for an index. An index at or beyond `width` overflows
   * to `0n`, the way a fixed-width shift does.
   */
  public static flagBit(index: bigint, width: IntegerWidth): bigint {
    if (index >= BigInt(width)) {
      return 0n;
    }
    return 1n << index;
  }

  /**
   * Mask with the low `min(flagSpace, width)` bits set.
   */
  public static addressableMask(
    flagSpace: bigint,
    width: IntegerWidth
  ): bigint {
    if (flagSpace >= BigInt(width)) {
      return Utils.maxUnsigned(width);
    }
    return (1n << flagSpace) - 1n;
  }
}
