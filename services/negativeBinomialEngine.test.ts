import { describe, expect, it } from 'vitest';
import { CountsMatrix, SampleMetadata } from '../types';
import { isAbortError } from '../utils/errors';
import {
  createDataSet,
  createNegativeBinomialEngine,
  estimateSizeFactors,
  fitDispersionPrior,
  geneWiseDispersion,
  shrinkDispersion,
  waldTest,
} from './negativeBinomialEngine';

const metadata = (conditions: Record<string, string>): SampleMetadata => ({
  sampleIds: Object.keys(conditions),
  columns: ['condition'],
  rows: Object.values(conditions).map(condition => ({ condition })),
});

const counts: CountsMatrix = {
  geneIds: ['G1', 'G2', 'G3', 'G4'],
  sampleIds: ['S1', 'S2', 'S3'],
  values: [
    [10, 20, 40],
    [20, 40, 80],
    [0, 5, 5],
    [0, 0, 0],
  ],
};

const design = metadata({ S1: 'a', S2: 'a', S3: 'b' });

describe('createDataSet', () => {
  it('aligns count columns to the metadata order and drops extras', () => {
    const wide: CountsMatrix = { geneIds: ['G1'], sampleIds: ['S1', 'S2', 'S3', 'X'], values: [[1, 2, 3, 99]] };
    const ds = createDataSet(wide, metadata({ S3: 'b', S1: 'a', S2: 'a' }), 'condition');
    expect(ds.counts.sampleIds).toEqual(['S3', 'S1', 'S2']);
    expect(ds.counts.values).toEqual([[3, 1, 2]]);
    expect(ds.condition).toEqual(['b', 'a', 'a']);
    expect(ds.levels).toEqual(['a', 'b']);
  });

  it('requires the design factor column', () => {
    const noFactor: SampleMetadata = { sampleIds: ['S1', 'S2', 'S3'], columns: ['batch'], rows: [{ batch: '1' }, { batch: '1' }, { batch: '2' }] };
    expect(() => createDataSet(counts, noFactor, 'condition'))
      .toThrow("the design factor 'condition' is not a column of the sample metadata");
  });

  it('rejects counts that are not non-negative integers', () => {
    const withValues = (values: number[][]): CountsMatrix => ({ geneIds: ['G1'], sampleIds: ['S1', 'S2', 'S3'], values });
    expect(() => createDataSet(withValues([[1, NaN, 3]]), design, 'condition'))
      .toThrow("some values in assay are not numeric (gene 'G1')");
    expect(() => createDataSet(withValues([[1, -2, 3]]), design, 'condition'))
      .toThrow('some values in assay are negative');
    expect(() => createDataSet(withValues([[1, 2.5, 3]]), design, 'condition'))
      .toThrow('some values in assay are not integers');
  });

  it('needs two levels and residual degrees of freedom', () => {
    expect(() => createDataSet(counts, metadata({ S1: 'a', S2: 'a', S3: 'a' }), 'condition'))
      .toThrow("the design factor 'condition' has a single level; at least two are needed");
    expect(() => createDataSet(counts, metadata({ S1: 'a', S2: 'b' }), 'condition'))
      .toThrow('same number of samples and coefficients');
  });
});

describe('estimateSizeFactors', () => {
  it('uses the median of ratios to the geometric mean', () => {
    const sf = estimateSizeFactors([[10, 20, 40], [20, 40, 80], [0, 5, 5]]);
    expect(sf[0]).toBeCloseTo(0.5, 10);
    expect(sf[1]).toBeCloseTo(1, 10);
    expect(sf[2]).toBeCloseTo(2, 10);
  });

  it('fails when every gene has a zero', () => {
    expect(() => estimateSizeFactors([[0, 1], [1, 0]]))
      .toThrow('every gene contains at least one zero');
  });
});

describe('dispersion', () => {
  it('returns null for an all-zero gene', () => {
    expect(geneWiseDispersion([0, 0, 0], [[0, 1], [2]], 1)).toBeNull();
  });

  it('estimates from pooled within-group variance', () => {
    // v = 12.5, mu = 2.5, xim = 1
    expect(geneWiseDispersion([0, 5, 2.5], [[0, 1], [2]], 1)).toBeCloseTo(1.6, 10);
  });

  it('keeps outliers above the trend unshrunk', () => {
    const prior = { fitted: 0.1, priorVar: 0.25, samplingVar: 1, outlierCut: 1 };
    expect(shrinkDispersion(1, prior, 10)).toBe(1);
    expect(shrinkDispersion(null, prior, 10)).toBeNull();
  });

  it('falls back to the minimum when nothing is usable', () => {
    expect(fitDispersionPrior([null, 1e-8], 1).fitted).toBe(1e-8);
  });
});

describe('waldTest', () => {
  it('computes the Poisson-limit statistic', () => {
    const r = waldTest([10, 10, 40, 40], [1, 1, 1, 1], [2, 3], [0, 1], 0);
    expect(r.log2FoldChange).toBeCloseTo(2, 10);
    expect(r.lfcSE).toBeCloseTo(0.25 / Math.LN2, 10);
    expect(r.stat).toBeCloseTo(8 * Math.LN2, 10);
  });

  it('substitutes a pseudo-mean for an all-zero group', () => {
    const r = waldTest([0, 0, 5, 5], [1, 1, 1, 1], [2, 3], [0, 1], 0);
    expect(r.log2FoldChange).toBeCloseTo(Math.log2(20), 10);
  });
});

describe('createNegativeBinomialEngine', () => {
  const engine = createNegativeBinomialEngine();
  const dataSet = createDataSet(counts, design, 'condition');

  it('fits every gene and leaves all-zero genes untested', async () => {
    const model = await engine.fit(dataSet);
    expect(model.baseMean[0]).toBeCloseTo(20, 8);
    expect(model.baseMean[2]).toBeCloseTo(2.5, 8);
    expect(model.baseMean[3]).toBe(0);
    expect(model.dispersionGeneEst[0]).toBe(1e-8);
    expect(model.dispersionGeneEst[2]).toBeCloseTo(1.533333, 5);
    expect(model.dispersionFitted).toBeCloseTo(1.533333, 5);
    expect(model.dispersion[0]).toBeGreaterThan(1e-8);
    expect(model.dispersion[0]).toBeLessThan(model.dispersionFitted);
    expect(model.dispersionGeneEst[3]).toBeNull();
    expect(model.dispersion[3]).toBeNull();
    expect(model.log2FoldChange[3]).toBeNull();
    expect(model.pvalue[3]).toBeNull();
    expect(model.log2FoldChange[0]).toBeCloseTo(0, 8);
    expect(model.pvalue[0]).toBeCloseTo(1, 5);
  });

  it('labels the contrast with the last level over the first', async () => {
    const table = engine.results(await engine.fit(dataSet));
    expect(table.contrast).toEqual({ factor: 'condition', numerator: 'b', reference: 'a' });
    expect(table.rows.map(r => r.gene)).toEqual(['G1', 'G2', 'G3', 'G4']);
    expect(table.rows[3].padj).toBeNull();
  });

  it('gives the same answer twice', async () => {
    const first = engine.results(await engine.fit(dataSet));
    const second = engine.results(await engine.fit(dataSet));
    expect(second).toEqual(first);
  });

  it('stops before fitting when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const error = await engine.fit(dataSet, { signal: controller.signal }).catch((e: unknown) => e);
    expect(isAbortError(error)).toBe(true);
  });

  it('stops between batches', async () => {
    const controller = new AbortController();
    const pending = createNegativeBinomialEngine(1).fit(dataSet, { signal: controller.signal });
    controller.abort();
    const error = await pending.catch((e: unknown) => e);
    expect(isAbortError(error)).toBe(true);
  });

  it('caches the variance-stabilized matrix per model', async () => {
    const model = await engine.fit(dataSet);
    const vst = engine.varianceStabilize(model);
    expect(engine.varianceStabilize(model)).toBe(vst);
    expect(vst.columnIds).toEqual(['S1', 'S2', 'S3']);
    expect(vst.values[3][0]).toBeCloseTo(-Math.log2(4 * model.dispersionFitted), 10);
  });

  it('feeds the MA and dispersion plots from tested genes only', async () => {
    const model = await engine.fit(dataSet);
    const ma = engine.maPlot(engine.results(model));
    expect(ma.map(p => p.gene)).toEqual(['G1', 'G2', 'G3']);
    expect(ma.every(p => !p.significant)).toBe(true);

    const disp = engine.dispersionPlot(model);
    expect(disp.fitted).toBe(model.dispersionFitted);
    expect(disp.points.map(p => p.gene)).toEqual(['G1', 'G2', 'G3']);
  });
});
