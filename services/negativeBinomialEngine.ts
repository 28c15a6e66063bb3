import {
  AnalysisModel,
  CountsMatrix,
  DataSet,
  DispersionView,
  ExpressionMatrix,
  MAPoint,
  ResultTable,
  SampleMetadata,
} from '../types';
import { FIT_BATCH_SIZE, MA_ALPHA } from '../constants';
import { benjaminiHochberg, mad, mean, median, trigamma, twoSidedPValue } from '../utils/stats';
import { throwIfAborted } from '../utils/errors';
import { ExpressionEngine, FitOptions } from './expressionEngine';

const MIN_DISP = 1e-8;

const yieldToEventLoop = () => new Promise<void>(resolve => setTimeout(resolve, 0));

// --- Dataset construction ---

export const createDataSet = (counts: CountsMatrix, metadata: SampleMetadata, designFactor: string): DataSet => {
  if (!metadata.columns.includes(designFactor)) {
    throw new Error(`the design factor '${designFactor}' is not a column of the sample metadata`);
  }
  if (counts.geneIds.length === 0) {
    throw new Error('the counts matrix has no genes');
  }

  const columnIndex = new Map(counts.sampleIds.map((id, j) => [id, j]));
  const columns = metadata.sampleIds.map(id => {
    const j = columnIndex.get(id);
    if (j === undefined) throw new Error(`sample '${id}' in the metadata has no counts column`);
    return j;
  });
  const values = counts.values.map(row => columns.map(j => row[j]));

  values.forEach((row, i) => {
    if (row.some(v => Number.isNaN(v))) {
      throw new Error(`some values in assay are not numeric (gene '${counts.geneIds[i]}')`);
    }
  });
  if (values.some(row => row.some(v => v < 0))) {
    throw new Error('some values in assay are negative');
  }
  if (values.some(row => row.some(v => !Number.isInteger(v)))) {
    throw new Error('some values in assay are not integers');
  }

  const condition = metadata.rows.map(row => row[designFactor] ?? '');
  if (condition.some(c => c === '')) {
    throw new Error(`the design factor '${designFactor}' has missing values`);
  }
  const levels = [...new Set(condition)].sort();
  if (levels.length < 2) {
    throw new Error(`the design factor '${designFactor}' has a single level; at least two are needed`);
  }
  if (metadata.sampleIds.length <= levels.length) {
    throw new Error(
      'the design matrix has the same number of samples and coefficients to fit, so estimation of dispersion is not possible'
    );
  }

  return {
    counts: { geneIds: counts.geneIds, sampleIds: metadata.sampleIds, values },
    metadata,
    designFactor,
    condition,
    levels,
  };
};

// --- Normalization ---

/** Median-of-ratios size factors over genes with no zero count. */
export const estimateSizeFactors = (values: number[][]): number[] => {
  const nSamples = values[0]?.length ?? 0;
  const logRatios: number[][] = Array.from({ length: nSamples }, () => []);

  values.forEach(row => {
    if (row.some(v => v <= 0)) return;
    const logs = row.map(v => Math.log(v));
    const logGeoMean = mean(logs);
    logs.forEach((l, j) => logRatios[j].push(l - logGeoMean));
  });

  if (logRatios[0]?.length === 0) {
    throw new Error('every gene contains at least one zero, cannot compute log geometric means');
  }
  return logRatios.map(ratios => Math.exp(median(ratios)));
};

// --- Dispersion ---

/** Method-of-moments estimate using the pooled within-group variance. */
export const geneWiseDispersion = (normalized: number[], groups: number[][], xim: number): number | null => {
  const mu = mean(normalized);
  if (mu === 0) return null;

  const m = normalized.length;
  let ss = 0;
  groups.forEach(idx => {
    const gm = mean(idx.map(j => normalized[j]));
    idx.forEach(j => { ss += Math.pow(normalized[j] - gm, 2); });
  });
  const v = ss / (m - groups.length);
  const alpha = (v - xim * mu) / (mu * mu);
  return Math.min(Math.max(alpha, MIN_DISP), Math.max(10, m));
};

export interface DispersionPrior {
  fitted: number;
  priorVar: number;
  samplingVar: number;
  outlierCut: number; // on the log scale; Infinity when it cannot be estimated
}

/** "mean" fit: the trend is the average of the usable gene-wise estimates. */
export const fitDispersionPrior = (geneEst: (number | null)[], residualDf: number): DispersionPrior => {
  const usable = geneEst.filter((a): a is number => a !== null && a > 10 * MIN_DISP);
  const fitted = usable.length > 0 ? mean(usable) : MIN_DISP;
  const logResid = usable.map(a => Math.log(a) - Math.log(fitted));
  const varLogDisp = logResid.length > 1 ? Math.pow(mad(logResid), 2) : 0;
  const samplingVar = trigamma(residualDf / 2);
  return {
    fitted,
    samplingVar,
    priorVar: Math.max(varLogDisp - samplingVar, 0.25),
    outlierCut: varLogDisp > 0 ? 2 * Math.sqrt(varLogDisp) : Infinity,
  };
};

export const shrinkDispersion = (est: number | null, prior: DispersionPrior, maxDisp: number): number | null => {
  if (est === null) return null;
  const logEst = Math.log(est);
  const logFit = Math.log(prior.fitted);
  if (logEst - logFit > prior.outlierCut) return est;
  const w = 1 / prior.samplingVar;
  const w0 = 1 / prior.priorVar;
  const shrunk = Math.exp((logEst * w + logFit * w0) / (w + w0));
  return Math.min(Math.max(shrunk, MIN_DISP), maxDisp);
};

// --- Wald test ---

export interface WaldResult {
  log2FoldChange: number;
  lfcSE: number;
  stat: number;
  pvalue: number;
}

export const waldTest = (
  normalized: number[],
  sizeFactors: number[],
  numerator: number[],
  reference: number[],
  alpha: number
): WaldResult => {
  const groupMean = (idx: number[]) => {
    const m = mean(idx.map(j => normalized[j]));
    return m > 0 ? m : 0.5 / idx.reduce((acc, j) => acc + sizeFactors[j], 0);
  };
  const information = (idx: number[], mu: number) =>
    idx.reduce((acc, j) => acc + (sizeFactors[j] * mu) / (1 + alpha * sizeFactors[j] * mu), 0);

  const muNum = groupMean(numerator);
  const muRef = groupMean(reference);
  const log2FoldChange = Math.log2(muNum / muRef);
  const lfcSE = Math.sqrt(1 / information(numerator, muNum) + 1 / information(reference, muRef)) / Math.LN2;
  const stat = log2FoldChange / lfcSE;
  return { log2FoldChange, lfcSE, stat, pvalue: twoSidedPValue(stat) };
};

// --- Engine ---

const groupIndices = (dataSet: DataSet): number[][] =>
  dataSet.levels.map(level =>
    dataSet.condition.map((c, j) => (c === level ? j : -1)).filter(j => j >= 0)
  );

export const createNegativeBinomialEngine = (batchSize: number = FIT_BATCH_SIZE): ExpressionEngine => {
  const vstCache = new WeakMap<AnalysisModel, ExpressionMatrix>();

  const forEachBatch = async (n: number, signal: AbortSignal | undefined, fn: (i: number) => void) => {
    for (let start = 0; start < n; start += batchSize) {
      throwIfAborted(signal);
      const end = Math.min(n, start + batchSize);
      for (let i = start; i < end; i++) fn(i);
      await yieldToEventLoop();
    }
    throwIfAborted(signal);
  };

  const fit = async (dataSet: DataSet, options: FitOptions = {}): Promise<AnalysisModel> => {
    const { signal } = options;
    throwIfAborted(signal);

    const { values } = dataSet.counts;
    const nGenes = values.length;
    const m = dataSet.counts.sampleIds.length;
    const groups = groupIndices(dataSet);
    const residualDf = m - groups.length;

    const sizeFactors = estimateSizeFactors(values);
    const xim = mean(sizeFactors.map(s => 1 / s));
    const normalized = values.map(row => row.map((k, j) => k / sizeFactors[j]));
    const baseMean = normalized.map(row => mean(row));

    const dispersionGeneEst: (number | null)[] = Array<number | null>(nGenes).fill(null);
    await forEachBatch(nGenes, signal, i => {
      dispersionGeneEst[i] = geneWiseDispersion(normalized[i], groups, xim);
    });

    const prior = fitDispersionPrior(dispersionGeneEst, residualDf);
    const maxDisp = Math.max(10, m);
    const dispersion = dispersionGeneEst.map(est => shrinkDispersion(est, prior, maxDisp));

    const reference = groups[0];
    const numerator = groups[groups.length - 1];
    const log2FoldChange: (number | null)[] = Array<number | null>(nGenes).fill(null);
    const lfcSE: (number | null)[] = Array<number | null>(nGenes).fill(null);
    const stat: (number | null)[] = Array<number | null>(nGenes).fill(null);
    const pvalue: (number | null)[] = Array<number | null>(nGenes).fill(null);

    await forEachBatch(nGenes, signal, i => {
      const alpha = dispersion[i];
      if (baseMean[i] === 0 || alpha === null) return;
      const wald = waldTest(normalized[i], sizeFactors, numerator, reference, alpha);
      log2FoldChange[i] = wald.log2FoldChange;
      lfcSE[i] = wald.lfcSE;
      stat[i] = wald.stat;
      pvalue[i] = wald.pvalue;
    });

    return {
      dataSet,
      sizeFactors,
      normalized,
      baseMean,
      dispersionGeneEst,
      dispersionFitted: prior.fitted,
      dispersion,
      log2FoldChange,
      lfcSE,
      stat,
      pvalue,
    };
  };

  const results = (model: AnalysisModel): ResultTable => {
    const { dataSet } = model;
    const padj = benjaminiHochberg(model.pvalue);
    return {
      contrast: {
        factor: dataSet.designFactor,
        numerator: dataSet.levels[dataSet.levels.length - 1],
        reference: dataSet.levels[0],
      },
      rows: dataSet.counts.geneIds.map((gene, i) => ({
        gene,
        baseMean: model.baseMean[i],
        log2FoldChange: model.log2FoldChange[i],
        lfcSE: model.lfcSE[i],
        dispersion: model.dispersion[i],
        stat: model.stat[i],
        pvalue: model.pvalue[i],
        padj: padj[i],
      })),
    };
  };

  // Closed form for a constant dispersion trend, log2 scale
  const varianceStabilize = (model: AnalysisModel): ExpressionMatrix => {
    const cached = vstCache.get(model);
    if (cached) return cached;
    const alpha = model.dispersionFitted;
    const offset = Math.log(alpha) + Math.log(4);
    const vst: ExpressionMatrix = {
      rowIds: model.dataSet.counts.geneIds,
      columnIds: model.dataSet.counts.sampleIds,
      values: model.normalized.map(row =>
        row.map(q => (2 * Math.asinh(Math.sqrt(alpha * q)) - offset) / Math.LN2)
      ),
    };
    vstCache.set(model, vst);
    return vst;
  };

  const maPlot = (table: ResultTable): MAPoint[] =>
    table.rows.flatMap(row =>
      row.baseMean > 0 && row.log2FoldChange !== null
        ? [{
            gene: row.gene,
            baseMean: row.baseMean,
            log2FoldChange: row.log2FoldChange,
            significant: row.padj !== null && row.padj < MA_ALPHA,
          }]
        : []
    );

  const dispersionPlot = (model: AnalysisModel): DispersionView => ({
    fitted: model.dispersionFitted,
    points: model.dataSet.counts.geneIds.flatMap((gene, i) => {
      const geneEstimate = model.dispersionGeneEst[i];
      const final = model.dispersion[i];
      if (model.baseMean[i] === 0 || geneEstimate === null || final === null) return [];
      return [{ gene, baseMean: model.baseMean[i], geneEstimate, fitted: model.dispersionFitted, final }];
    }),
  });

  return { createDataSet, fit, results, varianceStabilize, maPlot, dispersionPlot };
};
