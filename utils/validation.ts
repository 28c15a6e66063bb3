import { DelimitedTable, SampleMetadata } from '../types';
import { GENE_NAME_COLUMN } from '../constants';
import { AnalysisError } from './errors';

export type ValidationResult =
  | { ok: true; counts: DelimitedTable }
  | { ok: false; error: AnalysisError };

export const dropColumn = (table: DelimitedTable, column: string): DelimitedTable => {
  const idx = table.columnIds.indexOf(column);
  if (idx < 0) return table;
  return {
    rowIds: table.rowIds,
    columnIds: table.columnIds.filter((_, j) => j !== idx),
    cells: table.cells.map(row => row.filter((_, j) => j !== idx)),
  };
};

/**
 * Every metadata sample must be a counts column. On success the counts table
 * comes back without the `Gene Name` column some exports carry.
 */
export const validateInputs = (counts: DelimitedTable, metadata: SampleMetadata): ValidationResult => {
  const available = new Set(counts.columnIds);
  const missing = [...new Set(metadata.sampleIds.filter(id => !available.has(id)))];

  if (missing.length > 0) {
    return {
      ok: false,
      error: new AnalysisError('SampleMismatch', 'Metadata row names must match Counts column names', { missing }),
    };
  }

  return { ok: true, counts: dropColumn(counts, GENE_NAME_COLUMN) };
};
