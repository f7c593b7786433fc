import { BitVector } from './bit-vector.js';
import { codecFor, type EntryCodec, type EntryKind, type EntryOf } from './entry.js';
import { ParameterError } from './errors.js';
import { djb2, nativeHash } from './hash.js';
import {
  MAX_LOG2_NUM_BITS,
  calculateOptimalParams,
  estimateFalsePositiveRate,
  optimalNumHashes,
} from './optimal.js';

const DEFAULT_LOG2_NUM_BITS = 8;
const DEFAULT_NUM_HASHES = 5;

export interface BloomFilterOptions<K extends EntryKind> {
  /** Kind of entries the filter holds */
  kind: K;
  /** Base-2 logarithm of the bit array length (default 8, at most 33) */
  log2NumBits?: number;
  /** Number of hash functions (default 5, at least 1) */
  numHashes?: number;
}

/**
 * A Bloom filter over a power-of-two bit array.
 * Probe positions come from enhanced double hashing of two base hashes:
 * MurmurHash3 over the entry's native bytes, and djb2 over its text form.
 *
 * Invalid configuration never throws: it is clamped to a usable value and
 * recorded in {@link BloomFilter.parameterErrorFlags} until cleared.
 *
 * @example
 * ```typescript
 * const filter = new BloomFilter({ kind: 'string', log2NumBits: 16 });
 * filter.setOptimalNumHashes(5000);
 * filter.insert('hello');
 * filter.contains('hello'); // true
 * filter.contains('world'); // false (probably)
 * ```
 */
export class BloomFilter<K extends EntryKind> {
  readonly kind: K;
  private readonly codec: EntryCodec<EntryOf<K>>;
  private readonly bits: BitVector;
  private _log2NumBits = DEFAULT_LOG2_NUM_BITS;
  private _numHashes = DEFAULT_NUM_HASHES;
  private _size = 0;
  private _parameterErrorFlags = 0;

  /**
   * @throws {TypeError} If `options.kind` is not a supported entry kind
   */
  constructor(options: BloomFilterOptions<K>) {
    this.kind = options.kind;
    this.codec = codecFor(options.kind);
    this.bits = new BitVector(2 ** DEFAULT_LOG2_NUM_BITS);
    this.setLog2NumBits(options.log2NumBits ?? DEFAULT_LOG2_NUM_BITS);
    this.setNumHashes(options.numHashes ?? DEFAULT_NUM_HASHES);
  }

  /**
   * Creates a filter sized for `capacity` entries at the given false positive rate.
   * @throws {Error} If capacity is not positive or errorRate is not in (0, 1)
   */
  static forCapacity<K extends EntryKind>(
    kind: K,
    capacity: number,
    errorRate: number
  ): BloomFilter<K> {
    const { log2NumBits, numHashes } = calculateOptimalParams(capacity, errorRate);
    return new BloomFilter({ kind, log2NumBits, numHashes });
  }

  /** Number of bits in the filter, always a power of two */
  get numBits(): number {
    return this.bits.length;
  }

  get log2NumBits(): number {
    return this._log2NumBits;
  }

  /** Number of hash functions (k) */
  get numHashes(): number {
    return this._numHashes;
  }

  /** Number of insertions, duplicates included */
  get size(): number {
    return this._size;
  }

  /** Fraction of bits currently set (0 to 1) */
  get fillRatio(): number {
    return this.bits.count() / this.numBits;
  }

  /** Analytic false positive rate for the current parameters and size */
  get estimatedFalsePositiveRate(): number {
    return estimateFalsePositiveRate(this.numBits, this._numHashes, this._size);
  }

  get parameterErrorFlags(): number {
    return this._parameterErrorFlags;
  }

  hasParameterError(): boolean {
    return this._parameterErrorFlags !== 0;
  }

  clearParameterError(flag: number = ParameterError.All): void {
    this._parameterErrorFlags &= ~flag;
  }

  /**
   * Sets the bit array length to `2^log2NumBits`.
   *
   * Values above 33 clamp to 33 (1 GiB); values below 1 or non-integers
   * clamp into range. Either way `InvalidBitLength` is raised and `false`
   * returned. Bits below the new length are kept.
   */
  setLog2NumBits(log2NumBits: number): boolean {
    const valid =
      Number.isInteger(log2NumBits) && log2NumBits >= 1 && log2NumBits <= MAX_LOG2_NUM_BITS;
    const applied = valid
      ? log2NumBits
      : Number.isNaN(log2NumBits)
        ? 1
        : Math.min(MAX_LOG2_NUM_BITS, Math.max(1, Math.floor(log2NumBits)));

    this.bits.resize(2 ** applied);
    this._log2NumBits = applied;

    if (!valid) {
      this._parameterErrorFlags |= ParameterError.InvalidBitLength;
      return false;
    }
    this.clearParameterError(ParameterError.InvalidBitLength);
    return true;
  }

  /**
   * Sets the number of hash functions. Values below 1 (or non-integers)
   * set a usable fallback, raise `InvalidHashCount` and return `false`.
   */
  setNumHashes(numHashes: number): boolean {
    if (!Number.isInteger(numHashes) || numHashes < 1) {
      this._numHashes = Number.isFinite(numHashes) ? Math.max(1, Math.floor(numHashes)) : 1;
      this._parameterErrorFlags |= ParameterError.InvalidHashCount;
      return false;
    }

    this._numHashes = numHashes;
    this.clearParameterError(ParameterError.InvalidHashCount);
    return true;
  }

  /**
   * Sets the hash count minimizing false positives for up to `maxEntries`
   * insertions. Returns `false` when the optimum is below 1 and the count
   * falls back to 1; that case is not recorded as a parameter error.
   */
  setOptimalNumHashes(maxEntries: number): boolean {
    const successful = this.setNumHashes(optimalNumHashes(this.numBits, maxEntries));
    this.clearParameterError(ParameterError.InvalidHashCount);
    return successful;
  }

  /**
   * Adds an entry to the filter.
   */
  insert(entry: EntryOf<K>): void {
    for (const index of this.hash(entry)) {
      this.bits.set(index);
    }
    this._size++;
  }

  /**
   * Checks if an entry might be in the filter.
   * @returns `true` if the entry might be present, `false` if definitely not present
   */
  contains(entry: EntryOf<K>): boolean {
    for (const index of this.hash(entry)) {
      if (!this.bits.get(index)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Probe positions for `entry` by enhanced double hashing:
   * `h[i] = h1 + i*h2 + (i^3 - i)/6 (mod m)`, computed incrementally.
   * @see https://www.khoury.northeastern.edu/~pete/pub/bloom-filters-verification.pdf
   */
  hash(entry: EntryOf<K>): number[] {
    const m = this.numBits;
    let a = this.firstHash(entry);
    let b = this.secondHash(entry);
    const hashes = [a];
    // m can exceed 2^32, so reduce with % instead of a 32-bit mask
    for (let i = 1; i < this._numHashes; i++) {
      a = (a + b) % m;
      b = (b + i) % m;
      hashes.push(a);
    }
    return hashes;
  }

  /** MurmurHash3 of the entry's native bytes, in [0, numBits) */
  firstHash(entry: EntryOf<K>): number {
    const value = this.codec.canonical(entry);
    return this.modNumBits(nativeHash(this.codec.toBytes(value)));
  }

  /**
   * Odd value in [1, numBits), hence coprime with the power-of-two length:
   * `2 * djb2(text) + 1` reduced mod numBits.
   */
  secondHash(entry: EntryOf<K>): number {
    const value = this.codec.canonical(entry);
    return this.modNumBits((djb2(this.codec.toText(value)) << 1n) | 1n);
  }

  private modNumBits(hash: bigint): number {
    return Number(hash & BigInt(this.numBits - 1));
  }
}
