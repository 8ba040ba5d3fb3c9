import { describe, it, expect } from 'vitest';
import { formatCsvCell } from '../../domain/results/AnalysisResult';
import { ExperimentResult, type GroupComparison } from '../../domain/results/ExperimentResult';
import type { GroupAggregate } from '../../domain/types';
import { FrequentistEngine } from '../../frequentist/FrequentistEngine';

const engine = new FrequentistEngine({ alpha: 0.05, altHypothesis: 'two_tailed' });

function buildResult(): ExperimentResult {
  const aggregates = new Map<string, GroupAggregate>([
    ['control', { groupName: 'control', successCount: 300, trialCount: 1000 }],
    ['test1', { groupName: 'test1', successCount: 350, trialCount: 1000 }],
  ]);
  const result = engine.conduct(300, 1000, 350, 1000, 'test1');
  const comparisons = new Map<string, GroupComparison>([
    [
      'test1',
      {
        kind: 'frequentist',
        result,
        correction: { groupName: 'test1', originalPValue: result.pvalue, correctedPValue: result.pvalue },
      },
    ],
  ]);

  return new ExperimentResult(
    aggregates,
    comparisons,
    {
      timestamp: new Date('2024-03-01T12:00:00.000Z'),
      method: 'frequentist',
      computeTime: 3,
      sampleSize: 2000,
      warnings: [],
    },
    { method: 'holm', alpha: 0.05 }
  );
}

describe('ExperimentResult', () => {
  it('should export JSON with metadata, aggregates and group results', () => {
    const parsed: unknown = JSON.parse(buildResult().export('json'));

    expect(parsed).toMatchObject({
      metadata: {
        timestamp: '2024-03-01T12:00:00.000Z',
        method: 'frequentist',
        sampleSize: 2000,
      },
      correction: { method: 'holm', alpha: 0.05 },
      aggregates: {
        control: { groupName: 'control', successCount: 300, trialCount: 1000 },
        test1: { groupName: 'test1', successCount: 350, trialCount: 1000 },
      },
      groups: {
        test1: { kind: 'frequentist', groupName: 'test1', significant: true },
      },
    });
  });

  it('should export one CSV row per treatment group', () => {
    const lines = buildResult().export('csv').split('\n');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe(
      'group,control_success,control_trials,treatment_success,treatment_trials,statistic,pvalue,corrected_pvalue,significant'
    );
    expect(lines[1].startsWith('test1,300,1000,350,1000,2.38704958')).toBe(true);
    expect(lines[1].endsWith(',true')).toBe(true);
  });

  it('should list groups significant after correction', () => {
    expect(buildResult().significantGroups()).toEqual(['test1']);
  });

  it('should expose the control aggregate', () => {
    expect(buildResult().getControlAggregate()).toEqual({
      groupName: 'control',
      successCount: 300,
      trialCount: 1000,
    });
  });
});

describe('formatCsvCell', () => {
  it('should leave plain values unquoted', () => {
    expect(formatCsvCell('test1')).toBe('test1');
    expect(formatCsvCell(0.5)).toBe('0.5');
    expect(formatCsvCell(false)).toBe('false');
    expect(formatCsvCell(undefined)).toBe('');
  });

  it('should quote separators and double embedded quotes', () => {
    expect(formatCsvCell('a,b')).toBe('"a,b"');
    expect(formatCsvCell('say "hi"')).toBe('"say ""hi"""');
    expect(formatCsvCell('two\nlines')).toBe('"two\nlines"');
  });
});
