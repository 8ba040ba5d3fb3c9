/**
 * Record Validator
 *
 * Validates subject records at the boundary of the engine.
 * Structural checks only: identifier type and a 0/1 outcome.
 */

import { z } from 'zod';
import { ExperimentError, ErrorCode } from '../../core/errors';
import type { SubjectRecord } from '../types';

export const subjectRecordSchema = z.object({
  // Numeric ids must be safe integers so String() yields their decimal digits
  subjectId: z.union([z.string(), z.number().int().safe()]),
  outcome: z.union([z.literal(0), z.literal(1)]),
});

export class RecordValidator {
  /**
   * Validate one record, returning it typed
   *
   * @param index - Position of the record in its batch, reported on failure
   */
  static validateRecord(record: unknown, index?: number): SubjectRecord {
    const parsed = subjectRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new ExperimentError(ErrorCode.INVALID_RECORD, describeFailure(parsed.error, index), {
        index,
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
    }
    return parsed.data;
  }

  /**
   * Validate a batch of records
   */
  static validateRecords(records: Iterable<unknown>): SubjectRecord[] {
    const validated: SubjectRecord[] = [];
    let index = 0;
    for (const record of records) {
      validated.push(this.validateRecord(record, index));
      index++;
    }
    return validated;
  }
}

function describeFailure(error: z.ZodError, index: number | undefined): string {
  const where = index === undefined ? 'Subject record' : `Subject record ${index}`;
  const fields = Array.from(new Set(error.issues.map((issue) => issue.path.join('.') || 'record')));
  return `${where} is invalid: check ${fields.join(', ')} (outcome must be exactly 0 or 1)`;
}
