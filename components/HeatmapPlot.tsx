import React from 'react';
import { HeatmapView, ViewResult } from '../types';
import { divergingColor } from '../utils/colors';
import HeatmapGrid from './HeatmapGrid';
import NoDataPlaceholder from './NoDataPlaceholder';

interface HeatmapPlotProps {
  view: ViewResult<HeatmapView>;
}

const HeatmapPlot: React.FC<HeatmapPlotProps> = ({ view }) => {
  if (view.status === 'no-data') {
    return <NoDataPlaceholder title="Heatmap of Top Expressed Genes" />;
  }

  const { rowIds, columnIds, values } = view.data;

  return (
    <div className="w-full h-[420px] bg-white rounded-xl shadow-sm border border-slate-200 p-4 flex flex-col">
      <div className="flex justify-between items-center mb-2">
        <h3 className="text-lg font-semibold text-slate-800">Heatmap of Top Expressed Genes</h3>
        <div className="flex items-center gap-1 text-xs text-slate-500">
          <span>-2</span>
          <div className="w-24 h-2 rounded" style={{ background: `linear-gradient(to right, ${divergingColor(-2)}, ${divergingColor(0)}, ${divergingColor(2)})` }} />
          <span>+2</span>
          <span className="ml-1">row z-score</span>
        </div>
      </div>
      <div className="flex-1 overflow-auto">
        <HeatmapGrid
          rowIds={rowIds}
          columnIds={columnIds}
          values={values}
          colorFor={(z) => divergingColor(z)}
          formatValue={(z) => z.toFixed(2)}
        />
      </div>
    </div>
  );
};

export default HeatmapPlot;
