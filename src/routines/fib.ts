/**
 * Returns the nth Fibonacci number, with F(0) = 0 and F(1) = 1.
 */
export function fibonacci(n: number): bigint {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`Fibonacci index must be a non-negative integer, got ${n}`);
  }
  if (n <= 1) return BigInt(n);

  let prev = 0n;
  let current = 1n;
  for (let i = 2; i <= n; i++) {
    const next = prev + current;
    prev = current;
    current = next;
  }
  return current;
}
