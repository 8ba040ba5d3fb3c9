import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../core/errors';
import { FrequentistEngine } from '../../frequentist/FrequentistEngine';
import { calculatePValue, parseAltHypothesis, twoProportionZ } from '../../frequentist/calculations';
import type { StreamObservation } from '../../frequentist/types';
import { expectExperimentError } from '../utilities/expectError';

const twoTailed = new FrequentistEngine({ alpha: 0.05, altHypothesis: 'two_tailed' });
const oneTailed = new FrequentistEngine({ alpha: 0.05, altHypothesis: 'one_tailed' });

describe('FrequentistEngine', () => {
  describe('conduct', () => {
    it('should compute the pooled z statistic and two-tailed p-value', () => {
      const result = twoTailed.conduct(300, 1000, 350, 1000);

      expect(result.propNull).toBe(0.3);
      expect(result.propAlt).toBe(0.35);
      expect(result.statistic).toBeCloseTo(2.3870495801314426, 10);
      expect(result.pvalue).toBeCloseTo(0.01698420058213057, 8);
      expect(result.significant).toBe(true);
      expect(result.degenerate).toBe(false);
      expect(result.observedEffectSize).toBeCloseTo(0.05, 12);
      expect(result.groupName).toBe('treatment');
    });

    it('should halve the p-value for a one-tailed test in the observed direction', () => {
      const result = oneTailed.conduct(300, 1000, 350, 1000);
      expect(result.pvalue).toBeCloseTo(0.008492100291065285, 8);
      expect(result.altHypothesis).toBe('one_tailed');
    });

    it('should use the lower tail for a negative statistic', () => {
      const result = oneTailed.conduct(350, 1000, 300, 1000);
      expect(result.statistic).toBeCloseTo(-2.3870495801314426, 10);
      expect(result.pvalue).toBeCloseTo(0.008492100291065285, 8);
    });

    it('should flip the sign and keep the two-tailed p-value when arms swap', () => {
      const forward = twoTailed.conduct(300, 1000, 350, 1000);
      const swapped = twoTailed.conduct(350, 1000, 300, 1000);

      expect(swapped.statistic).toBeCloseTo(-forward.statistic, 12);
      expect(swapped.pvalue).toBeCloseTo(forward.pvalue, 12);
    });

    it('should not reject for a small difference', () => {
      const result = twoTailed.conduct(300, 1000, 310, 1000, 'test1');
      expect(result.statistic).toBeCloseTo(0.4856715683182145, 10);
      expect(result.pvalue).toBeCloseTo(0.627200045007045, 8);
      expect(result.significant).toBe(false);
      expect(result.groupName).toBe('test1');
    });

    it('should report a degenerate test when both arms are all failures', () => {
      const result = twoTailed.conduct(0, 100, 0, 100);

      expect(result.degenerate).toBe(true);
      expect(Number.isNaN(result.statistic)).toBe(true);
      expect(Number.isNaN(result.pvalue)).toBe(true);
      expect(result.significant).toBe(false);
    });

    it('should report a degenerate test when both arms are all successes', () => {
      const result = twoTailed.conduct(50, 50, 80, 80);
      expect(result.degenerate).toBe(true);
      expect(Number.isNaN(result.pvalue)).toBe(true);
    });

    it('should fail on zero trials', () => {
      expectExperimentError(() => twoTailed.conduct(0, 0, 5, 10), ErrorCode.DIVISION_BY_ZERO);
      expectExperimentError(() => twoTailed.conduct(5, 10, 0, 0), ErrorCode.DIVISION_BY_ZERO);
    });

    it('should reject impossible counts', () => {
      expectExperimentError(() => twoTailed.conduct(11, 10, 5, 10), ErrorCode.INVALID_INPUT);
      expectExperimentError(() => twoTailed.conduct(-1, 10, 5, 10), ErrorCode.INVALID_INPUT);
      expectExperimentError(() => twoTailed.conduct(1.5, 10, 5, 10), ErrorCode.INVALID_INPUT);
    });

    it('should attach a 40-point power curve', () => {
      const result = twoTailed.conduct(300, 1000, 350, 1000);

      expect(result.powerCurve).toHaveLength(40);
      expect(result.powerCurve[0].effectSize).toBe(0);
      expect(result.powerCurve[0].power).toBeCloseTo(0.025, 8);
      expect(result.powerCurve[39].effectSize).toBe(0.195);
    });

    it('should return frozen results', () => {
      const result = twoTailed.conduct(300, 1000, 350, 1000);
      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.powerCurve)).toBe(true);
    });
  });

  describe('configuration', () => {
    it('should accept hypothesis names in any case', () => {
      const engine = new FrequentistEngine({ alpha: 0.05, altHypothesis: 'Two_Tailed' });
      expect(engine.altHypothesis).toBe('two_tailed');
    });

    it('should reject an unknown hypothesis', () => {
      const error = expectExperimentError(
        () => new FrequentistEngine({ alpha: 0.05, altHypothesis: 'three_tailed' }),
        ErrorCode.INVALID_CONFIG
      );
      expect(error.message).toBe('Invalid hypothesis type: three_tailed. Choose from one_tailed, two_tailed.');
    });

    it('should reject alpha outside (0, 1)', () => {
      const error = expectExperimentError(
        () => new FrequentistEngine({ alpha: 1.5, altHypothesis: 'two_tailed' }),
        ErrorCode.INVALID_CONFIG
      );
      expect(error.message).toBe('alpha should be between 0 and 1, but got 1.5.');
      expectExperimentError(
        () => new FrequentistEngine({ alpha: 0, altHypothesis: 'two_tailed' }),
        ErrorCode.INVALID_CONFIG
      );
    });
  });

  describe('compare', () => {
    it('should test a treatment aggregate against control', async () => {
      const result = await twoTailed.compare(
        { groupName: 'control', successCount: 300, trialCount: 1000 },
        { groupName: 'test1', successCount: 350, trialCount: 1000 }
      );

      expect(twoTailed.kind).toBe('frequentist');
      expect(result.groupName).toBe('test1');
      expect(result.pvalue).toBeCloseTo(0.01698420058213057, 8);
    });
  });

  describe('conductSequential', () => {
    it('should stop at the first arrival whose p-value crosses the threshold', () => {
      const result = twoTailed.conductSequential(300, 1000, 350, 1000, 0.05);

      expect(result.stoppedEarly).toBe(true);
      expect(result.stoppingStep).toBe(1349);
      expect(result.totalSteps).toBe(2000);
      expect(result.trialsNull).toBe(675);
      expect(result.trialsAlt).toBe(674);
      expect(result.successNull).toBeCloseTo(202.5, 10);
      expect(result.successAlt).toBeCloseTo(235.9, 10);
      expect(result.statistic).toBeCloseTo(1.960463306497736, 8);
      expect(result.pvalue).toBeCloseTo(0.049941662739706016, 8);
    });

    it('should stop sooner under a one-tailed hypothesis', () => {
      const result = oneTailed.conductSequential(300, 1000, 350, 1000, 0.05);

      expect(result.stoppingStep).toBe(950);
      expect(result.trialsNull).toBe(475);
      expect(result.trialsAlt).toBe(475);
    });

    it('should report the full totals when the threshold is never crossed', () => {
      const result = twoTailed.conductSequential(300, 1000, 310, 1000, 0.05, 'test1');
      const batch = twoTailed.conduct(300, 1000, 310, 1000, 'test1');

      expect(result.stoppedEarly).toBe(false);
      expect(result.stoppingStep).toBe(2000);
      expect(result.totalSteps).toBe(2000);
      expect(result.statistic).toBe(batch.statistic);
      expect(result.pvalue).toBe(batch.pvalue);
    });

    it('should not stop early under a stricter threshold the final totals miss', () => {
      const result = twoTailed.conductSequential(300, 1000, 350, 1000, 0.01);
      expect(result.stoppedEarly).toBe(false);
      expect(result.pvalue).toBeCloseTo(0.01698420058213057, 8);
    });

    it('should validate inputs like the batch test', () => {
      expectExperimentError(
        () => twoTailed.conductSequential(0, 0, 1, 10),
        ErrorCode.DIVISION_BY_ZERO
      );
      expectExperimentError(
        () => twoTailed.conductSequential(3, 10, 1, 10, 2),
        ErrorCode.INVALID_CONFIG
      );
    });
  });

  describe('conductStreaming', () => {
    it('should stop reading at the first crossing', () => {
      const observations: StreamObservation[] = [
        { arm: 'null', outcome: 0 },
        { arm: 'alt', outcome: 1 }, // z = 1.414
        { arm: 'null', outcome: 0 }, // z = 1.732
        { arm: 'alt', outcome: 1 }, // z = 2, p = 0.0455
        { arm: 'null', outcome: 1 },
      ];
      let reads = 0;
      function* stream(): Generator<StreamObservation> {
        for (const observation of observations) {
          reads++;
          yield observation;
        }
      }

      const result = twoTailed.conductStreaming(stream(), 0.05);

      expect(reads).toBe(4);
      expect(result.stoppedEarly).toBe(true);
      expect(result.stoppingStep).toBe(4);
      expect(result.totalSteps).toBeNull();
      expect(result.successNull).toBe(0);
      expect(result.trialsNull).toBe(2);
      expect(result.successAlt).toBe(2);
      expect(result.trialsAlt).toBe(2);
      expect(result.statistic).toBeCloseTo(2, 12);
    });

    it('should run to the end of the stream without a crossing', () => {
      const result = twoTailed.conductStreaming(
        [
          { arm: 'null', outcome: 1 },
          { arm: 'alt', outcome: 1 },
          { arm: 'null', outcome: 0 },
          { arm: 'alt', outcome: 0 },
        ],
        0.05
      );

      expect(result.stoppedEarly).toBe(false);
      expect(result.stoppingStep).toBe(4);
      expect(result.totalSteps).toBe(4);
      expect(result.statistic).toBe(0);
      expect(result.pvalue).toBeCloseTo(1, 10);
    });

    it('should fail when the stream leaves an arm empty', () => {
      expectExperimentError(
        () =>
          twoTailed.conductStreaming([
            { arm: 'null', outcome: 1 },
            { arm: 'null', outcome: 0 },
          ]),
        ErrorCode.DIVISION_BY_ZERO
      );
    });
  });
});

describe('z-test arithmetic', () => {
  it('should expose the pooled proportion and standard error', () => {
    const stats = twoProportionZ(300, 1000, 350, 1000);
    expect(stats.pooledProp).toBeCloseTo(0.325, 12);
    expect(stats.standardError).toBeCloseTo(Math.sqrt(0.325 * 0.675 * 0.002), 12);
  });

  it('should map NaN statistics to NaN p-values', () => {
    expect(Number.isNaN(calculatePValue(NaN, 'two_tailed'))).toBe(true);
    expect(Number.isNaN(calculatePValue(NaN, 'one_tailed'))).toBe(true);
  });

  it('should give p = 1 two-tailed and 0.5 one-tailed at z = 0', () => {
    expect(calculatePValue(0, 'two_tailed')).toBeCloseTo(1, 10);
    expect(calculatePValue(0, 'one_tailed')).toBeCloseTo(0.5, 10);
  });

  it('should normalise hypothesis names', () => {
    expect(parseAltHypothesis('ONE_TAILED')).toBe('one_tailed');
  });
});
