import { describe, expect, it } from 'vitest';
import { CountsMatrix, ResultRow, ResultTable, SampleMetadata } from '../types';
import type { ExpressionEngine } from '../services/expressionEngine';
import { createDataSet, createNegativeBinomialEngine } from '../services/negativeBinomialEngine';
import {
  publishDispersion,
  publishHeatmap,
  publishMa,
  publishPca,
  publishResultTable,
  publishSampleDistances,
  publishVolcano,
  volcanoCategory,
} from './views';

const engine = createNegativeBinomialEngine();

const row = (gene: string, log2FoldChange: number | null, pvalue: number | null): ResultRow => ({
  gene,
  baseMean: 100,
  log2FoldChange,
  lfcSE: null,
  dispersion: null,
  stat: null,
  pvalue,
  padj: pvalue,
});

const table = (rows: ResultRow[]): ResultTable => ({
  contrast: { factor: 'condition', numerator: 'b', reference: 'a' },
  rows,
});

const metadata: SampleMetadata = {
  sampleIds: ['S1', 'S2', 'S3', 'S4'],
  columns: ['condition'],
  rows: [{ condition: 'a' }, { condition: 'a' }, { condition: 'b' }, { condition: 'b' }],
};

// Sixty genes whose counts rise with their index
const counts: CountsMatrix = {
  geneIds: Array.from({ length: 60 }, (_, i) => `G${i}`),
  sampleIds: ['S1', 'S2', 'S3', 'S4'],
  values: Array.from({ length: 60 }, (_, i) => [10 + i, 14 + i, 30 + 3 * i, 26 + 2 * i]),
};

const fitModel = () => engine.fit(createDataSet(counts, metadata, 'condition'));

describe('no-data', () => {
  it('every publisher reports no-data before an analysis', () => {
    expect(publishResultTable(undefined)).toEqual({ status: 'no-data' });
    expect(publishVolcano(undefined)).toEqual({ status: 'no-data' });
    expect(publishHeatmap(engine, undefined)).toEqual({ status: 'no-data' });
    expect(publishPca(engine, undefined)).toEqual({ status: 'no-data' });
    expect(publishSampleDistances(engine, undefined)).toEqual({ status: 'no-data' });
    expect(publishMa(engine, undefined)).toEqual({ status: 'no-data' });
    expect(publishDispersion(engine, undefined)).toEqual({ status: 'no-data' });
  });
});

describe('publishVolcano', () => {
  it('categorises on strict cutoffs', () => {
    expect(volcanoCategory(1, 0.01)).toBe('PVALUE');
    expect(volcanoCategory(-1.5, 0.05)).toBe('LOG2FC');
    expect(volcanoCategory(-1.5, 0.049)).toBe('BOTH');
    expect(volcanoCategory(0, 0.9)).toBe('NS');
  });

  it('plots tested genes and labels the strongest hits', () => {
    const view = publishVolcano(table([
      row('A', 2, 0.01),
      row('B', 2, 0.2),
      row('C', 0.5, 0.001),
      row('D', -0.2, 0.5),
      row('E', null, null),
      row('F', -3, 0),
    ]));
    if (view.status !== 'ready') throw new Error('expected a ready view');

    expect(view.data.points.map(p => [p.gene, p.category])).toEqual([
      ['A', 'BOTH'],
      ['B', 'LOG2FC'],
      ['C', 'PVALUE'],
      ['D', 'NS'],
      ['F', 'BOTH'],
    ]);
    const f = view.data.points[4];
    expect(f.y).toBeCloseTo(3, 10);
    expect(view.data.labels).toEqual(['F', 'A']);
    expect(view.data.pCutoff).toBe(0.05);
    expect(view.data.fcCutoff).toBe(1);
  });

  it('caps the number of labels', () => {
    const rows = Array.from({ length: 40 }, (_, i) => row(`H${i}`, 4, 1e-3 / (i + 1)));
    const view = publishVolcano(table(rows));
    if (view.status !== 'ready') throw new Error('expected a ready view');
    expect(view.data.labels).toHaveLength(30);
    expect(view.data.labels[0]).toBe('H39');
  });

  it('handles transcript-level tables', () => {
    const rows = Array.from({ length: 200000 }, (_, i) => row(`T${i}`, 0.1, 0.5));
    rows.push(row('Z', -3, 0));
    const view = publishVolcano(table(rows));
    if (view.status !== 'ready') throw new Error('expected a ready view');

    expect(view.data.points).toHaveLength(200001);
    expect(view.data.points[200000].y).toBeCloseTo(-Math.log10(0.5), 10);
    expect(view.data.labels).toEqual(['Z']);
  });
});

describe('publishHeatmap', () => {
  it('keeps the fifty most expressed genes with centered rows', async () => {
    const view = publishHeatmap(engine, await fitModel());
    if (view.status !== 'ready') throw new Error('expected a ready view');

    expect(view.data.rowIds).toHaveLength(50);
    expect([...view.data.rowIds].sort()).toEqual(Array.from({ length: 50 }, (_, i) => `G${i + 10}`).sort());
    expect([...view.data.columnIds].sort()).toEqual(['S1', 'S2', 'S3', 'S4']);
    view.data.values.forEach(values => {
      expect(values).toHaveLength(4);
      expect(values.reduce((a, b) => a + b, 0)).toBeCloseTo(0, 8);
    });
  });
});

describe('sample-level views', () => {
  it('projects every sample with its condition', async () => {
    const view = publishPca(engine, await fitModel());
    if (view.status !== 'ready') throw new Error('expected a ready view');

    expect(view.data.points.map(p => [p.sample, p.condition])).toEqual([
      ['S1', 'a'],
      ['S2', 'a'],
      ['S3', 'b'],
      ['S4', 'b'],
    ]);
    expect(view.data.conditions).toEqual(['a', 'b']);
    expect(view.data.percentVar[0]).toBeGreaterThanOrEqual(view.data.percentVar[1]);
    expect(view.data.percentVar[0] + view.data.percentVar[1]).toBeLessThanOrEqual(101);
  });

  it('publishes a symmetric distance matrix', async () => {
    const view = publishSampleDistances(engine, await fitModel());
    if (view.status !== 'ready') throw new Error('expected a ready view');

    const { sampleIds, distances } = view.data;
    expect([...sampleIds].sort()).toEqual(['S1', 'S2', 'S3', 'S4']);
    distances.forEach((row, i) => {
      expect(row[i]).toBe(0);
      row.forEach((d, j) => expect(d).toBeCloseTo(distances[j][i], 12));
    });
    let largest = 0;
    distances.forEach(row => row.forEach(d => { largest = Math.max(largest, d); }));
    expect(view.data.max).toBe(largest);
  });

  it('reports the largest distance for large cohorts', async () => {
    const model = await fitModel();
    // One feature whose value is the sample index
    const wide: ExpressionEngine = {
      ...engine,
      varianceStabilize: () => ({
        rowIds: ['G0'],
        columnIds: Array.from({ length: 400 }, (_, j) => `S${j}`),
        values: [Array.from({ length: 400 }, (_, j) => j)],
      }),
    };
    const view = publishSampleDistances(wide, model);
    if (view.status !== 'ready') throw new Error('expected a ready view');

    expect(view.data.sampleIds).toHaveLength(400);
    expect(view.data.max).toBe(399);
  });
});

describe('gene-level diagnostics', () => {
  it('passes results and models through the engine', async () => {
    const model = await fitModel();
    const ma = publishMa(engine, engine.results(model));
    const dispersion = publishDispersion(engine, model);
    if (ma.status !== 'ready' || dispersion.status !== 'ready') throw new Error('expected ready views');

    expect(ma.data).toHaveLength(60);
    expect(dispersion.data.fitted).toBe(model.dispersionFitted);
    expect(dispersion.data.points).toHaveLength(60);
  });
});
