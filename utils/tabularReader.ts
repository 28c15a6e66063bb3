import Papa from 'papaparse';
import { CountsMatrix, DelimitedTable, SampleMetadata, UploadedFile } from '../types';
import { MAX_UPLOAD_BYTES } from '../constants';
import { AnalysisError } from './errors';

export const fileExtension = (name: string): string => {
  const dot = name.lastIndexOf('.');
  return dot >= 0 ? name.slice(dot + 1).toLowerCase() : '';
};

const delimiterFor = (extension: string): string | null => {
  switch (extension) {
    case 'csv':
      return ',';
    case 'tsv':
    case 'txt':
      return '\t';
    default:
      return null;
  }
};

export const findDuplicates = (ids: string[]): string[] => {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  ids.forEach(id => {
    if (seen.has(id)) dupes.add(id);
    seen.add(id);
  });
  return [...dupes];
};

/**
 * Parses delimited text into a table keyed by its first column.
 *
 * Accepts both a full header and an R-style header that leaves out the
 * row-name column (one cell shorter than the data rows).
 */
export const parseDelimited = (text: string, delimiter: string, source: string): DelimitedTable => {
  const parsed = Papa.parse<string[]>(text, { delimiter, skipEmptyLines: 'greedy' });

  const quoteError = parsed.errors.find(e => e.type === 'Quotes');
  if (quoteError) {
    throw new AnalysisError('MalformedTable', `${source}: ${quoteError.message} (row ${(quoteError.row ?? 0) + 1})`, {
      line: (quoteError.row ?? 0) + 1,
    });
  }

  const rows = parsed.data;
  if (rows.length < 2) {
    throw new AnalysisError('IOError', `${source} contains no data rows`);
  }

  const header = rows[0].map(h => h.trim());
  const width = rows[1].length;
  let columnIds: string[];
  if (width === header.length) {
    columnIds = header.slice(1);
  } else if (width === header.length + 1) {
    columnIds = header;
  } else {
    throw new AnalysisError('MalformedTable', `${source}: line 2 has ${width} fields but the header has ${header.length}`, {
      line: 2,
    });
  }

  const rowIds: string[] = [];
  const cells: string[][] = [];
  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    if (row.length !== width) {
      throw new AnalysisError('MalformedTable', `${source}: line ${i + 1} has ${row.length} fields, expected ${width}`, {
        line: i + 1,
      });
    }
    rowIds.push(row[0].trim());
    cells.push(row.slice(1).map(c => c.trim()));
  }

  const duplicateRows = findDuplicates(rowIds);
  if (duplicateRows.length > 0) {
    throw new AnalysisError('MalformedTable', `${source}: duplicate row identifiers are not allowed`, {
      duplicates: duplicateRows,
    });
  }
  const duplicateColumns = findDuplicates(columnIds);
  if (duplicateColumns.length > 0) {
    throw new AnalysisError('MalformedTable', `${source}: duplicate column identifiers are not allowed`, {
      duplicates: duplicateColumns,
    });
  }

  return { rowIds, columnIds, cells };
};

export const readTable = async (file: UploadedFile, maxBytes: number = MAX_UPLOAD_BYTES): Promise<DelimitedTable> => {
  const extension = fileExtension(file.name);
  const delimiter = delimiterFor(extension);
  if (!delimiter) {
    throw new AnalysisError('UnsupportedFormat', `Unsupported file type: ${extension || file.name}`);
  }
  if (file.size > maxBytes) {
    throw new AnalysisError('FileTooLarge', `${file.name} exceeds the maximum upload size of ${maxBytes} bytes`);
  }

  let text: string;
  try {
    text = await file.text();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AnalysisError('IOError', `Could not read ${file.name}: ${reason}`);
  }
  return parseDelimited(text, delimiter, file.name);
};

// Blank and non-numeric cells become NaN; the engine rejects them.
const parseCount = (cell: string): number => (cell === '' ? NaN : Number(cell));

export const toCountsMatrix = (table: DelimitedTable): CountsMatrix => ({
  geneIds: table.rowIds,
  sampleIds: table.columnIds,
  values: table.cells.map(row => row.map(parseCount)),
});

export const toSampleMetadata = (table: DelimitedTable): SampleMetadata => ({
  sampleIds: table.rowIds,
  columns: table.columnIds,
  rows: table.cells.map(row => Object.fromEntries(table.columnIds.map((col, j) => [col, row[j]]))),
});
