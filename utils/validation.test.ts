import { describe, expect, it } from 'vitest';
import { DelimitedTable } from '../types';
import { parseDelimited, toSampleMetadata } from './tabularReader';
import { dropColumn, validateInputs } from './validation';

const counts = parseDelimited('gene,S1,S2,S3\nG1,10,20,40\nG2,20,40,80\n', ',', 'counts.csv');
const metadataFor = (ids: string[]) =>
  toSampleMetadata(parseDelimited(`sample,condition\n${ids.map(id => `${id},ctrl`).join('\n')}\n`, ',', 'meta.csv'));

describe('validateInputs', () => {
  it('accepts metadata whose samples are a subset of the count columns', () => {
    expect(validateInputs(counts, metadataFor(['S1', 'S2', 'S3'])).ok).toBe(true);
    expect(validateInputs(counts, metadataFor(['S3', 'S1'])).ok).toBe(true);
  });

  it('lists exactly the samples missing from the counts', () => {
    const result = validateInputs(counts, metadataFor(['S1', 'S4', 'S2', 'S9']));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('SampleMismatch');
    expect(result.error.details.missing).toEqual(['S4', 'S9']);
  });

  it('drops a Gene Name column on success', () => {
    const withNames = parseDelimited('id,Gene Name,S1,S2,S3\nG1,TP53,1,2,3\nG2,BRCA1,4,5,6\n', ',', 'counts.csv');
    const result = validateInputs(withNames, metadataFor(['S1', 'S2', 'S3']));
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.counts.rowIds).toHaveLength(2);
    expect(result.counts.columnIds).toEqual(['S1', 'S2', 'S3']);
    expect(result.counts.cells).toEqual([['1', '2', '3'], ['4', '5', '6']]);
  });

  it('does not modify its inputs', () => {
    const table: DelimitedTable = { rowIds: ['G1'], columnIds: ['Gene Name', 'S1'], cells: [['X', '1']] };
    validateInputs(table, metadataFor(['S1']));
    expect(table.columnIds).toEqual(['Gene Name', 'S1']);
  });
});

describe('dropColumn', () => {
  it('returns the same table when the column is absent', () => {
    expect(dropColumn(counts, 'Gene Name')).toBe(counts);
  });
});
