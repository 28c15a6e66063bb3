import React, { useCallback, useMemo } from 'react';
import { AnalysisModel, ResultTable, ViewResult } from '../types';
import type { ExpressionEngine } from '../services/expressionEngine';
import {
  publishDispersion,
  publishHeatmap,
  publishMa,
  publishPca,
  publishSampleDistances,
  publishVolcano,
} from '../utils/views';
import VolcanoPlot from './VolcanoPlot';
import HeatmapPlot from './HeatmapPlot';
import PCAPlot from './PCAPlot';
import SampleDistancePlot from './SampleDistancePlot';
import MAPlot from './MAPlot';
import DispersionPlot from './DispersionPlot';
import PlotErrorBoundary from './PlotErrorBoundary';

interface PlotsGridProps {
  engine: ExpressionEngine;
  model?: AnalysisModel;
  results?: ResultTable;
}

interface ProjectedProps<T> {
  project: () => ViewResult<T>;
  render: (view: ViewResult<T>) => React.ReactNode;
}

// Projects inside the error boundary, so a throwing publisher is contained.
function Projected<T>({ project, render }: ProjectedProps<T>) {
  const view = useMemo(project, [project]);
  return <>{render(view)}</>;
}

// Each projection depends on one field, so it is recomputed only when that
// field is swapped by a commit.
const PlotsGrid: React.FC<PlotsGridProps> = ({ engine, model, results }) => {
  const volcano = useCallback(() => publishVolcano(results), [results]);
  const heatmap = useCallback(() => publishHeatmap(engine, model), [engine, model]);
  const pca = useCallback(() => publishPca(engine, model), [engine, model]);
  const distances = useCallback(() => publishSampleDistances(engine, model), [engine, model]);
  const ma = useCallback(() => publishMa(engine, results), [engine, results]);
  const dispersion = useCallback(() => publishDispersion(engine, model), [engine, model]);

  return (
    <div className="space-y-6 pb-12">
      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        <PlotErrorBoundary title="Volcano Plot" resetKey={volcano}>
          <Projected project={volcano} render={view => <VolcanoPlot view={view} />} />
        </PlotErrorBoundary>
        <PlotErrorBoundary title="Heatmap of Top Expressed Genes" resetKey={heatmap}>
          <Projected project={heatmap} render={view => <HeatmapPlot view={view} />} />
        </PlotErrorBoundary>
      </div>
      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        <PlotErrorBoundary title="PCA Plot" resetKey={pca}>
          <Projected project={pca} render={view => <PCAPlot view={view} />} />
        </PlotErrorBoundary>
        <PlotErrorBoundary title="Sample Distance Heatmap" resetKey={distances}>
          <Projected project={distances} render={view => <SampleDistancePlot view={view} />} />
        </PlotErrorBoundary>
      </div>
      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        <PlotErrorBoundary title="MA Plot" resetKey={ma}>
          <Projected project={ma} render={view => <MAPlot view={view} />} />
        </PlotErrorBoundary>
        <PlotErrorBoundary title="Dispersion Estimates" resetKey={dispersion}>
          <Projected project={dispersion} render={view => <DispersionPlot view={view} />} />
        </PlotErrorBoundary>
      </div>
    </div>
  );
};

export default PlotsGrid;
