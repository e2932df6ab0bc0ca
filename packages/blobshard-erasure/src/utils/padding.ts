/**
 * Smallest multiple of `divisor` that is >= `length`.
 */
export function paddedLength(length: number, divisor: number): number {
  if (!Number.isInteger(divisor) || divisor < 1) {
    throw new RangeError(`divisor must be a positive integer, got ${divisor}`);
  }
  const remainder = length % divisor;
  return remainder === 0 ? length : length + (divisor - remainder);
}

/**
 * Copy `data` and append trailing zero bytes up to `paddedLength(data.length, divisor)`.
 */
export function padToMultiple(data: Uint8Array, divisor: number): Buffer {
  const padded = Buffer.alloc(paddedLength(data.length, divisor), 0);
  padded.set(data, 0);
  return padded;
}
