import React from 'react';
import { SampleDistanceView, ViewResult } from '../types';
import { distanceColor } from '../utils/colors';
import HeatmapGrid from './HeatmapGrid';
import NoDataPlaceholder from './NoDataPlaceholder';

interface SampleDistancePlotProps {
  view: ViewResult<SampleDistanceView>;
}

const SampleDistancePlot: React.FC<SampleDistancePlotProps> = ({ view }) => {
  if (view.status === 'no-data') {
    return <NoDataPlaceholder title="Sample Distance Heatmap" />;
  }

  const { sampleIds, distances, max } = view.data;

  return (
    <div className="w-full h-[420px] bg-white rounded-xl shadow-sm border border-slate-200 p-4 flex flex-col">
      <h3 className="text-lg font-semibold text-slate-800 mb-2">Sample Distance Heatmap</h3>
      <p className="text-xs text-slate-500 mb-3">Euclidean distance between samples on variance-stabilized counts.</p>
      <div className="flex-1 overflow-auto">
        <HeatmapGrid
          rowIds={sampleIds}
          columnIds={sampleIds}
          values={distances}
          colorFor={(d) => distanceColor(d, max)}
          formatValue={(d) => d.toFixed(2)}
          cellHeight={Math.max(12, Math.floor(280 / Math.max(sampleIds.length, 1)))}
        />
      </div>
    </div>
  );
};

export default SampleDistancePlot;
