import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../core/errors';
import { adjustPValues, correct, parseCorrectionMethod } from '../../corrections/MultipleTestingCorrection';
import { expectExperimentError } from '../utilities/expectError';

function expectCloseArray(actual: number[], expected: number[]): void {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((value, i) => {
    expect(actual[i]).toBeCloseTo(value, 12);
  });
}

describe('adjustPValues', () => {
  describe('bonferroni', () => {
    it('should multiply by the family size', () => {
      expectCloseArray(adjustPValues([0.01, 0.02, 0.03, 0.04], 'bonferroni'), [0.04, 0.08, 0.12, 0.16]);
    });

    it('should cap at 1', () => {
      expectCloseArray(adjustPValues([0.3, 0.6], 'bonferroni'), [0.6, 1]);
    });
  });

  describe('holm', () => {
    it('should step down with a running maximum', () => {
      expectCloseArray(adjustPValues([0.01, 0.02, 0.03, 0.04], 'holm'), [0.04, 0.06, 0.06, 0.06]);
    });

    it('should keep the input order for unsorted input', () => {
      expectCloseArray(adjustPValues([0.04, 0.01, 0.03, 0.02], 'holm'), [0.06, 0.04, 0.06, 0.06]);
      expectCloseArray(adjustPValues([0.01, 0.04, 0.03, 0.005], 'holm'), [0.03, 0.06, 0.06, 0.02]);
    });

    it('should cap at 1', () => {
      expectCloseArray(adjustPValues([0.5, 0.9], 'holm'), [1, 1]);
    });
  });

  describe('fdr_bh', () => {
    it('should take a running minimum from the largest p-value down', () => {
      expectCloseArray(adjustPValues([0.01, 0.02, 0.03, 0.04], 'fdr_bh'), [0.04, 0.04, 0.04, 0.04]);
      expectCloseArray(adjustPValues([0.01, 0.04, 0.03, 0.005], 'fdr_bh'), [0.02, 0.04, 0.04, 0.02]);
      expectCloseArray(adjustPValues([0.5, 0.9], 'fdr_bh'), [0.9, 0.9]);
    });
  });

  describe('ordering between methods', () => {
    it('should give bh <= holm <= bonferroni', () => {
      const pValues = [0.001, 0.013, 0.02, 0.04, 0.2];
      const bonferroni = adjustPValues(pValues, 'bonferroni');
      const holm = adjustPValues(pValues, 'holm');
      const bh = adjustPValues(pValues, 'fdr_bh');

      pValues.forEach((p, i) => {
        expect(holm[i]).toBeLessThanOrEqual(bonferroni[i]);
        expect(bh[i]).toBeLessThanOrEqual(holm[i]);
        expect(bh[i]).toBeGreaterThanOrEqual(p);
      });
    });
  });

  describe('edge cases', () => {
    it('should return an empty list for an empty family', () => {
      expect(adjustPValues([], 'bonferroni')).toEqual([]);
      expect(adjustPValues([], 'holm')).toEqual([]);
      expect(adjustPValues([], 'fdr_bh')).toEqual([]);
    });

    it('should leave a single p-value unchanged', () => {
      expect(adjustPValues([0.03], 'bonferroni')).toEqual([0.03]);
      expect(adjustPValues([0.03], 'holm')).toEqual([0.03]);
      expect(adjustPValues([0.03], 'fdr_bh')).toEqual([0.03]);
    });

    it('should give tied p-values the same adjustment', () => {
      expectCloseArray(adjustPValues([0.02, 0.02, 0.5], 'holm'), [0.06, 0.06, 0.5]);
      expectCloseArray(adjustPValues([0.02, 0.02, 0.5], 'fdr_bh'), [0.03, 0.03, 0.5]);
    });

    it('should keep p-values of 0 and 1 inside [0, 1]', () => {
      expect(adjustPValues([0, 1, 0.5], 'bonferroni')).toEqual([0, 1, 1]);
      expect(adjustPValues([0, 1, 0.5], 'holm')).toEqual([0, 1, 1]);
      expect(adjustPValues([0, 1, 0.5], 'fdr_bh')).toEqual([0, 1, 0.75]);
    });

    it('should reject p-values outside [0, 1]', () => {
      const error = expectExperimentError(() => adjustPValues([0.01, 1.2], 'holm'), ErrorCode.INVALID_PVALUE);
      expect(error.message).toBe('p-value at position 1 must be a number in [0, 1], got 1.2');
      expectExperimentError(() => adjustPValues([NaN], 'bonferroni'), ErrorCode.INVALID_PVALUE);
      expectExperimentError(() => adjustPValues([-0.1], 'fdr_bh'), ErrorCode.INVALID_PVALUE);
    });

    it('should reject an unknown method', () => {
      const error = expectExperimentError(() => adjustPValues([0.01], 'sidak'), ErrorCode.UNSUPPORTED_CORRECTION);
      expect(error.message).toBe('Unsupported correction method: sidak. Choose from bonferroni, holm, fdr_bh.');
      expectExperimentError(() => parseCorrectionMethod('Holm'), ErrorCode.UNSUPPORTED_CORRECTION);
    });
  });
});

describe('correct', () => {
  it('should pair each group with its original and corrected p-value', () => {
    const results = correct(
      [
        { groupName: 'test1', pValue: 0.01 },
        { groupName: 'test2', pValue: 0.04 },
      ],
      'holm'
    );

    expect(results).toHaveLength(2);
    expect(results[0].groupName).toBe('test1');
    expect(results[0].originalPValue).toBe(0.01);
    expect(results[0].correctedPValue).toBeCloseTo(0.02, 12);
    expect(results[1]).toEqual({ groupName: 'test2', originalPValue: 0.04, correctedPValue: 0.04 });
    expect(Object.isFrozen(results[0])).toBe(true);
  });
});
