import type { ILoggerComponent } from '@well-known-components/interfaces';
import seedrandom from 'seedrandom';
import { BloomFilter } from './bloom-filter.js';
import { ParameterError } from './errors.js';
import { estimateFalsePositiveRate } from './optimal.js';

export interface DemoSettings {
  /** Base-2 logarithm of the filter length */
  log2NumBits: number;
  /** Number of entries inserted into the filter */
  numEntries: number;
  /** Number of never-inserted entries used to measure false positives */
  numChallenges: number;
  /** Random seed; a fresh one is drawn when absent */
  seed?: number;
}

export interface DemoReport {
  numEntries: number;
  /** Total NUL-terminated UTF-8 size of the inserted entries, in bits */
  totalDataBits: number;
  numBits: number;
  numHashes: number;
  truePositiveRate: number;
  estimatedTruePositiveRate: number;
  falsePositiveRate: number;
  estimatedFalsePositiveRate: number;
}

const encoder = new TextEncoder();

/**
 * Returns a generator of random entries: decimal strings of unsigned
 * 64-bit integers. The same seed yields the same sequence.
 */
export function createEntryGenerator(seed?: number): () => string {
  const random = seedrandom(seed === undefined ? undefined : String(seed));
  return () => {
    const high = BigInt(random.int32() >>> 0);
    const low = BigInt(random.int32() >>> 0);
    return ((high << 32n) | low).toString();
  };
}

/**
 * Draws `size` distinct entries from `next`, skipping any in `exclude`.
 */
export function generateTestSet(
  size: number,
  next: () => string,
  exclude: ReadonlySet<string> = new Set()
): Set<string> {
  const set = new Set<string>();
  while (set.size < size) {
    const entry = next();
    if (!exclude.has(entry)) {
      set.add(entry);
    }
  }
  return set;
}

/** Size of `entries` in bits, counting a terminating NUL byte per entry */
export function totalDataBits(entries: Iterable<string>): number {
  let total = 0;
  for (const entry of entries) {
    total += (encoder.encode(entry).length + 1) * 8;
  }
  return total;
}

/**
 * Fills a string filter with random entries and measures its empirical
 * true and false positive rates against the analytic estimates.
 * @throws {Error} If the filter cannot be given the requested size
 */
export function runDemo(settings: DemoSettings, logger: ILoggerComponent.ILogger): DemoReport {
  const filter = new BloomFilter({ kind: 'string', log2NumBits: settings.log2NumBits });
  if ((filter.parameterErrorFlags & ParameterError.InvalidBitLength) !== 0) {
    throw new Error('Failed to set the size of the filter');
  }

  const next = createEntryGenerator(settings.seed);
  const testSet = generateTestSet(settings.numEntries, next);

  if (!filter.setOptimalNumHashes(settings.numEntries)) {
    logger.warn('Failed to set optimal number of hash functions', {
      numBits: filter.numBits,
      numEntries: settings.numEntries,
    });
  }
  logger.debug('Filter configured', { numBits: filter.numBits, numHashes: filter.numHashes });

  for (const entry of testSet) {
    filter.insert(entry);
  }

  let found = 0;
  for (const entry of testSet) {
    if (filter.contains(entry)) {
      found++;
    }
  }

  const challengeSet = generateTestSet(settings.numChallenges, next, testSet);
  let falsePositives = 0;
  for (const entry of challengeSet) {
    if (filter.contains(entry)) {
      falsePositives++;
    }
  }
  logger.debug('Measurement done', { found, falsePositives });

  return {
    numEntries: settings.numEntries,
    totalDataBits: totalDataBits(testSet),
    numBits: filter.numBits,
    numHashes: filter.numHashes,
    truePositiveRate: found / settings.numEntries,
    estimatedTruePositiveRate: 1,
    falsePositiveRate: falsePositives / settings.numChallenges,
    estimatedFalsePositiveRate: estimateFalsePositiveRate(
      filter.numBits,
      filter.numHashes,
      settings.numEntries
    ),
  };
}

function formatNumber(value: number): string {
  return String(Number(value.toPrecision(6)));
}

/** Renders a report as the lines printed by the demo CLI */
export function formatReport(report: DemoReport): string[] {
  return [
    '[Test setting]',
    `The number of entries         : ${report.numEntries}`,
    `The total data size           : ${report.totalDataBits} [bits]`,
    '',
    '[Bloom filter setting]',
    `The filter size               : ${report.numBits} [bits]`,
    `The number of hash functions  : ${report.numHashes}`,
    '',
    '[Bloom filter test]',
    `True Positive Rate            : ${formatNumber(report.truePositiveRate)}`,
    `Estimated True Positive Rate  : ${formatNumber(report.estimatedTruePositiveRate)}`,
    `False Positive Rate           : ${formatNumber(report.falsePositiveRate)}`,
    `Estimated False Positive Rate : ${formatNumber(report.estimatedFalsePositiveRate)}`,
  ];
}
