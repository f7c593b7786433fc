export { BloomFilter, type BloomFilterOptions } from './bloom-filter.js';
export { BitVector } from './bit-vector.js';
export { ParameterError, type ParameterErrorFlag } from './errors.js';
export { djb2, nativeHash } from './hash.js';
export {
  ENTRY_KINDS,
  codecFor,
  isEntryKind,
  type BigIntegerKind,
  type EntryCodec,
  type EntryKind,
  type EntryOf,
  type FloatKind,
  type IntegerKind,
} from './entry.js';
export {
  MAX_LOG2_NUM_BITS,
  calculateOptimalParams,
  estimateFalsePositiveRate,
  optimalNumHashes,
} from './optimal.js';
export {
  createEntryGenerator,
  formatReport,
  totalDataBits,
  generateTestSet,
  runDemo,
  type DemoReport,
  type DemoSettings,
} from './demo.js';
export { helpText, parseDemoCommand, type DemoCommand } from './settings.js';
export { runCli } from './run.js';
