export async function later(n: number): Promise<number> {
  if (n < 0) throw new Error('negative');
  return n * 2;
}
