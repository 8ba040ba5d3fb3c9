/**
 * Base class for analysis results
 */

import type { ResultMetadata } from './ResultMetadata';

type CsvCell = string | number | boolean;

/**
 * Abstract base class that all analysis results extend
 * Provides common functionality for serialization and export
 */
export abstract class AnalysisResult {
  constructor(protected readonly metadata: ResultMetadata) {}

  getMetadata(): ResultMetadata {
    return this.metadata;
  }

  /**
   * Convert the result to a JSON-serializable object
   */
  abstract toJSON(): object;

  /**
   * Export the result as a JSON or CSV string
   */
  export(format: 'json' | 'csv'): string {
    if (format === 'json') {
      return JSON.stringify(this.toJSON(), nonFiniteAsString, 2);
    }
    return this.exportCSV();
  }

  /**
   * CSV rendering; each result type picks its own row layout
   */
  protected abstract exportCSV(): string;
}

/**
 * JSON has no NaN or Infinity; write them as the strings CSV export uses
 */
function nonFiniteAsString(_key: string, value: unknown): unknown {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return String(value);
  }
  return value;
}

/**
 * Quote a CSV cell when it contains a separator, quote or newline
 */
export function formatCsvCell(value: CsvCell | null | undefined): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}
