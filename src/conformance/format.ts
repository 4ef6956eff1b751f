/**
 * printf-style fixed-point formatting of IEEE doubles
 */

const float64 = new Float64Array(1);
const words = new Uint32Array(float64.buffer);

const MANTISSA_BITS = 52;
const EXPONENT_BIAS = 1075; // 1023 + 52

/**
 * Splits a finite, non-negative double into an integer significand and a
 * power-of-two exponent so that value === significand * 2 ** exponent.
 * Assumes a little-endian host, as Node.js platforms are.
 */
function decompose(value: number): { significand: bigint; exponent: number } {
  float64[0] = value;
  const low = BigInt(words[0]);
  const high = words[1];
  const biased = (high >>> 20) & 0x7ff;
  const fraction = (BigInt(high & 0xfffff) << 32n) | low;

  if (biased === 0) {
    // Subnormal
    return { significand: fraction, exponent: 1 - EXPONENT_BIAS };
  }
  return {
    significand: fraction | (1n << BigInt(MANTISSA_BITS)),
    exponent: biased - EXPONENT_BIAS
  };
}

/**
 * Rounds value * 10^precision to an integer, half to even, on the exact
 * binary value rather than its shortest decimal form.
 */
function scaleAndRound(value: number, precision: number): bigint {
  const { significand, exponent } = decompose(value);
  const numerator = significand * 10n ** BigInt(precision);

  if (exponent >= 0) {
    return numerator << BigInt(exponent);
  }

  const denominator = 1n << BigInt(-exponent);
  const quotient = numerator / denominator;
  const twiceRemainder = (numerator % denominator) * 2n;

  if (twiceRemainder > denominator) {
    return quotient + 1n;
  }
  if (twiceRemainder === denominator && quotient % 2n === 1n) {
    return quotient + 1n;
  }
  return quotient;
}

/**
 * Formats a number the way C's printf formats a double with "%.<precision>f".
 * Non-finite values render as inf, -inf and nan.
 */
export function formatFixed(value: number, precision: number = 6): string {
  if (!Number.isInteger(precision) || precision < 0) {
    throw new RangeError(`Precision must be a non-negative integer, got ${precision}`);
  }
  if (Number.isNaN(value)) {
    return 'nan';
  }

  const negative = value < 0 || Object.is(value, -0);
  const sign = negative ? '-' : '';
  const magnitude = Math.abs(value);

  if (magnitude === Infinity) {
    return `${sign}inf`;
  }

  const digits = scaleAndRound(magnitude, precision).toString().padStart(precision + 1, '0');
  if (precision === 0) {
    return sign + digits;
  }

  const split = digits.length - precision;
  return `${sign}${digits.slice(0, split)}.${digits.slice(split)}`;
}
