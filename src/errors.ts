/**
 * Bit flags recording the most recent invalid configuration request.
 * Flags are sticky until cleared with `BloomFilter.clearParameterError`.
 */
export const ParameterError = {
  /** Requested bit length was out of range and got clamped */
  InvalidBitLength: 0x1,
  /** Requested hash count was below 1 and got clamped to 1 */
  InvalidHashCount: 0x2,
  All: 0x3,
} as const;

export type ParameterErrorFlag = (typeof ParameterError)[keyof typeof ParameterError];
