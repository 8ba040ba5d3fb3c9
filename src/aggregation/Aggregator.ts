/**
 * Aggregation of subject records into per-group success/trial counts
 *
 * Counting is commutative and associative, so records can be split across
 * workers, aggregated separately and combined with mergeAggregates.
 */

import { assign } from '../bucketing/GroupAssigner';
import type { GroupBucketMap } from '../bucketing/GroupBucketMap';
import { ExperimentError, ErrorCode } from '../core/errors';
import { createLogger } from '../core/logging/logger';
import type { GroupAggregate, SubjectRecord } from '../domain/types';
import { RecordValidator } from '../domain/validation';

const logger = createLogger('aggregator');

export type GroupAggregates = ReadonlyMap<string, GroupAggregate>;

interface Counter {
  successCount: number;
  trialCount: number;
}

/**
 * Fold subject records into one aggregate per group of the map.
 * Every group appears in the result, in map order, even with zero trials.
 */
export function aggregate(
  records: Iterable<SubjectRecord>,
  groupBucketMap: GroupBucketMap
): GroupAggregates {
  const counters = new Map<string, Counter>();
  for (const groupName of groupBucketMap.getGroupNames()) {
    counters.set(groupName, { successCount: 0, trialCount: 0 });
  }

  let index = 0;
  for (const candidate of records) {
    const record = RecordValidator.validateRecord(candidate, index);
    const groupName = assign(record.subjectId, groupBucketMap);
    const counter = counters.get(groupName);
    if (!counter) {
      throw new ExperimentError(ErrorCode.INTERNAL_ERROR, `No counter for group '${groupName}'`, {
        groupName,
      });
    }
    counter.trialCount += 1;
    counter.successCount += record.outcome;
    index++;
  }

  logger.debug({ records: index, groups: counters.size }, 'aggregation finished');
  return freeze(counters);
}

/**
 * Combine partial aggregations of disjoint record batches.
 * All partials must cover the same groups.
 */
export function mergeAggregates(partials: Iterable<GroupAggregates>): GroupAggregates {
  const counters = new Map<string, Counter>();
  let expectedGroups: string[] | undefined;

  for (const partial of partials) {
    const groups = Array.from(partial.keys());
    if (expectedGroups === undefined) {
      expectedGroups = groups;
      for (const groupName of groups) {
        counters.set(groupName, { successCount: 0, trialCount: 0 });
      }
    } else if (!sameGroups(expectedGroups, groups)) {
      throw new ExperimentError(
        ErrorCode.INVALID_INPUT,
        'Partial aggregates cover different groups and cannot be merged',
        { expectedGroups, actualGroups: groups }
      );
    }

    for (const [groupName, aggregateForGroup] of partial) {
      const counter = counters.get(groupName);
      if (!counter) {
        throw new ExperimentError(ErrorCode.INTERNAL_ERROR, `No counter for group '${groupName}'`, {
          groupName,
        });
      }
      counter.successCount += aggregateForGroup.successCount;
      counter.trialCount += aggregateForGroup.trialCount;
    }
  }

  return freeze(counters);
}

function sameGroups(expected: string[], actual: string[]): boolean {
  if (expected.length !== actual.length) return false;
  const actualSet = new Set(actual);
  return expected.every((groupName) => actualSet.has(groupName));
}

function freeze(counters: Map<string, Counter>): GroupAggregates {
  const result = new Map<string, GroupAggregate>();
  for (const [groupName, counter] of counters) {
    result.set(
      groupName,
      Object.freeze({
        groupName,
        successCount: counter.successCount,
        trialCount: counter.trialCount,
      })
    );
  }
  return result;
}
