import { describe, it, expect } from 'vitest';
import { calculateOptimalParams, estimateFalsePositiveRate, optimalNumHashes } from '../src/index.js';

describe('optimalNumHashes', () => {
  it('should truncate ln(2) * m / n toward zero', () => {
    // 0.693 * 8192 / 1024 = 5.545
    expect(optimalNumHashes(8192, 1024)).toBe(5);
    // 0.693 * 32768 / 1024 = 22.18
    expect(optimalNumHashes(32768, 1024)).toBe(22);
    // 0.693 * 4 / 2 = 1.386
    expect(optimalNumHashes(4, 2)).toBe(1);
  });

  it('should return 0 when entries outnumber bits', () => {
    expect(optimalNumHashes(4, 8192)).toBe(0);
  });
});

describe('estimateFalsePositiveRate', () => {
  it('should be 0 for an empty filter', () => {
    expect(estimateFalsePositiveRate(256, 5, 0)).toBe(0);
  });

  it('should approximate (1 - e^(-kn/m))^k', () => {
    const exact = estimateFalsePositiveRate(8192, 5, 1024);
    const approx = Math.pow(1 - Math.exp((-5 * 1024) / 8192), 5);

    expect(exact).toBeCloseTo(0.021684, 5);
    expect(exact).toBeCloseTo(approx, 4);
  });

  it('should grow with the number of entries', () => {
    const few = estimateFalsePositiveRate(1024, 4, 10);
    const many = estimateFalsePositiveRate(1024, 4, 500);

    expect(many).toBeGreaterThan(few);
  });
});

describe('calculateOptimalParams', () => {
  it('should calculate correct parameters for capacity=1000, errorRate=0.01', () => {
    const { log2NumBits, numHashes } = calculateOptimalParams(1000, 0.01);

    // m = -1000 * ln(0.01) / (ln(2)^2) ≈ 9586 → 2^14
    // k = trunc(16384 / 1000 * ln(2)) = trunc(11.36) = 11
    expect(log2NumBits).toBe(14);
    expect(numHashes).toBe(11);
  });

  it('should calculate correct parameters for capacity=100, errorRate=0.001', () => {
    const { log2NumBits, numHashes } = calculateOptimalParams(100, 0.001);

    // m ≈ 1438 → 2^11, k = trunc(20.48 * ln(2)) = 14
    expect(log2NumBits).toBe(11);
    expect(numHashes).toBe(14);
  });

  it('should never return fewer than 2 bits or 1 hash', () => {
    const { log2NumBits, numHashes } = calculateOptimalParams(1, 0.9);

    expect(log2NumBits).toBe(1);
    expect(numHashes).toBe(1);
  });

  it('should reject non-positive capacity', () => {
    expect(() => calculateOptimalParams(0, 0.01)).toThrow('capacity must be positive');
    expect(() => calculateOptimalParams(-1, 0.01)).toThrow('capacity must be positive');
  });

  it('should reject invalid errorRate', () => {
    expect(() => calculateOptimalParams(1000, 0)).toThrow('errorRate must be between 0 and 1');
    expect(() => calculateOptimalParams(1000, 1)).toThrow('errorRate must be between 0 and 1');
    expect(() => calculateOptimalParams(1000, 1.5)).toThrow('errorRate must be between 0 and 1');
  });
});
