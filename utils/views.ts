import {
  AnalysisModel,
  DispersionView,
  HeatmapView,
  MAPoint,
  PCAView,
  ResultRow,
  ResultTable,
  SampleDistanceView,
  ViewResult,
  VolcanoCategory,
  VolcanoView,
} from '../types';
import { HEATMAP_TOP_GENES, PCA_TOP_GENES, VOLCANO_CONFIG } from '../constants';
import type { ExpressionEngine } from '../services/expressionEngine';
import { calculatePCA, distanceMatrix, hierarchicalOrder, mean, scaleRows, transpose } from './stats';

// Each publisher takes only the session field it reads. Missing input is
// the "not analyzed yet" state, never an error.

const NO_DATA = { status: 'no-data' } as const;

const ready = <T>(data: T): ViewResult<T> => ({ status: 'ready', data });

export const publishResultTable = (results?: ResultTable): ViewResult<ResultRow[]> =>
  results ? ready(results.rows) : NO_DATA;

export const volcanoCategory = (lfc: number, pvalue: number): VolcanoCategory => {
  const passFc = Math.abs(lfc) > VOLCANO_CONFIG.fcCutoff;
  const passP = pvalue < VOLCANO_CONFIG.pCutoff;
  if (passFc && passP) return 'BOTH';
  if (passFc) return 'LOG2FC';
  if (passP) return 'PVALUE';
  return 'NS';
};

export const publishVolcano = (results?: ResultTable): ViewResult<VolcanoView> => {
  if (!results) return NO_DATA;

  const tested = results.rows.flatMap(row =>
    row.log2FoldChange !== null && row.pvalue !== null
      ? [{ gene: row.gene, lfc: row.log2FoldChange, pvalue: row.pvalue }]
      : []
  );
  const finite = tested.filter(t => t.pvalue > 0).map(t => -Math.log10(t.pvalue));
  // p-values that underflow to 0 are drawn at the top of the finite range
  const ceiling = finite.length > 0 ? finite.reduce((m, v) => Math.max(m, v), -Infinity) : 300;

  const points = tested.map(t => ({
    gene: t.gene,
    x: t.lfc,
    y: t.pvalue > 0 ? -Math.log10(t.pvalue) : ceiling,
    category: volcanoCategory(t.lfc, t.pvalue),
  }));

  return ready({
    points,
    labels: points
      .filter(p => p.category === 'BOTH')
      .sort((a, b) => b.y - a.y)
      .slice(0, VOLCANO_CONFIG.maxLabels)
      .map(p => p.gene),
    pCutoff: VOLCANO_CONFIG.pCutoff,
    fcCutoff: VOLCANO_CONFIG.fcCutoff,
  });
};

export const publishHeatmap = (engine: ExpressionEngine, model?: AnalysisModel): ViewResult<HeatmapView> => {
  if (!model) return NO_DATA;

  const vst = engine.varianceStabilize(model);
  const means = vst.values.map(row => mean(row));
  const top = means
    .map((m, i) => ({ m, i }))
    .sort((a, b) => b.m - a.m || a.i - b.i)
    .slice(0, HEATMAP_TOP_GENES)
    .map(({ i }) => i);

  const rows = top.map(i => vst.values[i]);
  const rowOrder = hierarchicalOrder(distanceMatrix(rows));
  const colOrder = hierarchicalOrder(distanceMatrix(transpose(rows)));
  const scaled = scaleRows(rows);

  return ready({
    rowIds: rowOrder.map(r => vst.rowIds[top[r]]),
    columnIds: colOrder.map(c => vst.columnIds[c]),
    values: rowOrder.map(r => colOrder.map(c => scaled[r][c])),
  });
};

export const publishPca = (engine: ExpressionEngine, model?: AnalysisModel): ViewResult<PCAView> => {
  if (!model) return NO_DATA;

  const vst = engine.varianceStabilize(model);
  const { scores, percentVar } = calculatePCA(vst.values, PCA_TOP_GENES);
  const { condition } = model.dataSet;

  return ready({
    points: vst.columnIds.map((sample, j) => ({
      sample,
      pc1: scores[j][0],
      pc2: scores[j][1],
      condition: condition[j],
    })),
    percentVar: [Math.round(100 * percentVar[0]), Math.round(100 * percentVar[1])],
    conditions: model.dataSet.levels,
  });
};

export const publishSampleDistances = (engine: ExpressionEngine, model?: AnalysisModel): ViewResult<SampleDistanceView> => {
  if (!model) return NO_DATA;

  const vst = engine.varianceStabilize(model);
  const dist = distanceMatrix(transpose(vst.values));
  const order = hierarchicalOrder(dist);

  return ready({
    sampleIds: order.map(j => vst.columnIds[j]),
    distances: order.map(i => order.map(j => dist[i][j])),
    max: dist.reduce((m, row) => row.reduce((acc, d) => Math.max(acc, d), m), 0),
  });
};

export const publishMa = (engine: ExpressionEngine, results?: ResultTable): ViewResult<MAPoint[]> =>
  results ? ready(engine.maPlot(results)) : NO_DATA;

export const publishDispersion = (engine: ExpressionEngine, model?: AnalysisModel): ViewResult<DispersionView> =>
  model ? ready(engine.dispersionPlot(model)) : NO_DATA;
