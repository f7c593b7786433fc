import type { IConfigComponent } from '@well-known-components/interfaces';
import type { DemoSettings } from './demo.js';

export type DemoCommand = { kind: 'help' } | { kind: 'run'; settings: DemoSettings };

const DEFAULT_LOG2_NUM_BITS = 13;
const DEFAULT_NUM_ENTRIES = 1024;
const DEFAULT_NUM_CHALLENGES = 1024;

function parseInteger(arg: string | undefined): number | undefined {
  if (arg === undefined) return undefined;
  const value = Number.parseInt(arg, 10);
  return Number.isNaN(value) ? undefined : value;
}

// Configuration values parse as floats; truncate them like positional arguments
async function configInteger(config: IConfigComponent, key: string): Promise<number | undefined> {
  const value = await config.getNumber(key);
  return value !== undefined && Number.isFinite(value) ? Math.trunc(value) : undefined;
}

function positive(value: number | undefined): number | undefined {
  return value !== undefined && value > 0 ? value : undefined;
}

/**
 * Resolves demo settings from positional arguments
 * `[log2_num_bits] [num_entries] [num_challenges] [seed]`, falling back to
 * the `BLOOM_*` configuration keys and then to built-in defaults.
 * Unparsable arguments are ignored, fractional configuration values are
 * truncated, and entry and challenge counts must be positive.
 */
export async function parseDemoCommand(
  config: IConfigComponent,
  args: readonly string[]
): Promise<DemoCommand> {
  if (args[0] === '--help' || args[0] === '-h') {
    return { kind: 'help' };
  }

  const log2NumBits =
    parseInteger(args[0]) ?? (await configInteger(config, 'BLOOM_LOG2_NUM_BITS')) ?? DEFAULT_LOG2_NUM_BITS;
  const numEntries =
    positive(parseInteger(args[1])) ??
    positive(await configInteger(config, 'BLOOM_NUM_ENTRIES')) ??
    DEFAULT_NUM_ENTRIES;
  const numChallenges =
    positive(parseInteger(args[2])) ??
    positive(await configInteger(config, 'BLOOM_NUM_CHALLENGES')) ??
    DEFAULT_NUM_CHALLENGES;
  const seed = parseInteger(args[3]) ?? (await configInteger(config, 'BLOOM_SEED'));

  const settings: DemoSettings = { log2NumBits, numEntries, numChallenges };
  if (seed !== undefined) {
    settings.seed = seed;
  }
  return { kind: 'run', settings };
}

export function helpText(program: string): string[] {
  return [
    'Measures the true and false positive rates of a Bloom filter on random entries.',
    '',
    'Usage:',
    `  ${program} [log2_num_bits] [num_entries] [num_challenges] [seed]`,
    `  ${program} --help`,
    '',
    'Arguments:',
    `  log2_num_bits: base-2 logarithm of the filter size in bits (default ${DEFAULT_LOG2_NUM_BITS})`,
    `  num_entries: number of entries to insert (default ${DEFAULT_NUM_ENTRIES})`,
    `  num_challenges: number of entries used to measure false positives (default ${DEFAULT_NUM_CHALLENGES})`,
    '  seed: random seed (default: random)',
    '',
    'Examples:',
    `  ${program}`,
    `  ${program} 15`,
    `  ${program} 15 4096`,
    `  ${program} 15 4096 1000000`,
    `  ${program} 15 4096 1000000 1234`,
  ];
}
