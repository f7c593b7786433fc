import { hash128x64 } from 'murmur-hash';

const DJB2_SEED = 5381n;
const encoder = new TextEncoder();

/**
 * Daniel J. Bernstein's string hash (`h = h * 33 + c`, seed 5381) over the
 * UTF-8 bytes of `text`, wrapped to an unsigned 64-bit value.
 * @see http://www.cse.yorku.ca/~oz/hash.html
 */
export function djb2(text: string): bigint {
  let hash = DJB2_SEED;
  for (const byte of encoder.encode(text)) {
    hash = BigInt.asUintN(64, (hash << 5n) + hash + BigInt(byte));
  }
  return hash;
}

/**
 * General-purpose hash over an entry's native byte representation:
 * the lower 64 bits of 128-bit MurmurHash3 (x64).
 */
export function nativeHash(bytes: Uint8Array): bigint {
  const hash = hash128x64(bytes, { output: 'bigint' });
  if (typeof hash !== 'bigint') {
    throw new TypeError('murmur-hash did not return a bigint digest');
  }
  return BigInt.asUintN(64, hash);
}
