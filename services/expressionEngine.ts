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

export interface FitOptions {
  signal?: AbortSignal;
}

/**
 * The statistical collaborator behind the dashboard. Implementations throw a
 * plain `Error` on bad input; the orchestrator reports the message as-is.
 */
export interface ExpressionEngine {
  createDataSet(counts: CountsMatrix, metadata: SampleMetadata, designFactor: string): DataSet;
  fit(dataSet: DataSet, options?: FitOptions): Promise<AnalysisModel>;
  results(model: AnalysisModel): ResultTable;
  varianceStabilize(model: AnalysisModel): ExpressionMatrix;
  maPlot(results: ResultTable): MAPoint[];
  dispersionPlot(model: AnalysisModel): DispersionView;
}
