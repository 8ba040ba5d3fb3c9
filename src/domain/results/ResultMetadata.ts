/**
 * Metadata structure for analysis results
 */

import type { EngineKind } from '../types';

export interface ResultMetadata {
  /** When the analysis was performed */
  timestamp: Date;

  /** Engine family that produced the comparisons */
  method: EngineKind;

  /** Time taken to compute results in milliseconds */
  computeTime?: number;

  /** Number of subject records aggregated */
  sampleSize?: number;

  /** Conditions worth surfacing to the caller, e.g. degenerate tests */
  warnings?: string[];
}
