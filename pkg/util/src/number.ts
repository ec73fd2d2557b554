/**
 * Ensure n is an integer within `[MIN,MAX]` range.
 * @param n - Input number.
 * @param typeName - Description of the number, used in error message.
 * @param MIN - Minimum value, inclusive.
 * @param MAX - Maximum value, inclusive.
 * @returns n.
 *
 * @throws RangeError
 * Thrown if n is not an integer or falls outside the range.
 */
export function constrain(n: number, typeName: string, MIN = 0, MAX = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(n) || n < MIN || n > MAX) {
    throw new RangeError(`${n} is out of ${typeName} range [${MIN},${MAX}]`);
  }
  return n;
}
