/**
 * Low `length` bits of `value`, least significant first. Negative values are
 * read as their two's-complement bit pattern.
 */
export function toBitArray(value: number | bigint, length: number): boolean[] {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`invalid bit length ${length}`);
  }
  let v = BigInt(value) & ((1n << BigInt(length)) - 1n);
  const out: boolean[] = [];
  for (let i = 0; i < length; i++) {
    out.push((v & 1n) === 1n);
    v >>= 1n;
  }
  return out;
}
