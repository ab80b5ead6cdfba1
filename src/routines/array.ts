const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

/**
 * Sums the squares of the first `length` values in index order.
 *
 * Every value read must be a 32-bit signed integer. The sum is accumulated as
 * a bigint, so neither a squared term nor the running total can overflow.
 */
export function sumOfSquares(values: ArrayLike<number>, length: number = values.length): bigint {
  if (!Number.isInteger(length) || length < 0 || length > values.length) {
    throw new RangeError(`length must be an integer in [0, ${values.length}], got ${length}`);
  }

  let result = 0n;
  for (let i = 0; i < length; i++) {
    const value = values[i];
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw new RangeError(`values[${i}] is not a 32-bit signed integer: ${value}`);
    }
    const term = BigInt(value);
    result += term * term;
  }
  return result;
}
