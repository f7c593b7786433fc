/** Largest supported bit-length exponent: 2^33 bits = 1 GiB */
export const MAX_LOG2_NUM_BITS = 33;

/**
 * Hash count minimizing the false positive rate for a filter of `numBits`
 * bits holding up to `maxEntries` items, assuming bits are set independently.
 * Truncates toward zero, so the result can be 0 (or non-finite for
 * `maxEntries = 0`); callers clamp.
 */
export function optimalNumHashes(numBits: number, maxEntries: number): number {
  // k = (m/n) * ln(2)
  return Math.trunc((Math.LN2 * numBits) / maxEntries);
}

/**
 * Expected false positive rate after inserting `numEntries` items into a
 * filter of `numBits` bits using `numHashes` hash functions:
 * `(1 - (1 - 1/m)^(kn))^k ≈ (1 - e^(-kn/m))^k`
 */
export function estimateFalsePositiveRate(
  numBits: number,
  numHashes: number,
  numEntries: number
): number {
  const m = numBits;
  const k = numHashes;
  const n = numEntries;
  return Math.exp(k * Math.log(1 - Math.exp(k * n * Math.log(1 - 1 / m))));
}

/**
 * Calculate power-of-two Bloom filter parameters
 * @param capacity Expected number of items (n)
 * @param errorRate Desired false positive rate (p)
 * @returns Bit-length exponent (log2 m) and hash count (k)
 * @throws {Error} If capacity is not positive or errorRate is not in (0, 1)
 */
export function calculateOptimalParams(
  capacity: number,
  errorRate: number
): { log2NumBits: number; numHashes: number } {
  if (!(capacity > 0)) {
    throw new Error('capacity must be positive');
  }
  if (!(errorRate > 0 && errorRate < 1)) {
    throw new Error('errorRate must be between 0 and 1');
  }

  // m = -n * ln(p) / (ln(2)^2), rounded up to a power of two
  const size = Math.ceil((-capacity * Math.log(errorRate)) / (Math.LN2 * Math.LN2));
  const log2NumBits = Math.max(1, Math.ceil(Math.log2(size)));

  const numHashes = Math.max(1, optimalNumHashes(2 ** log2NumBits, capacity));

  return { log2NumBits, numHashes };
}
