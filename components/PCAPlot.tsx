import React from 'react';
import {
  ScatterChart, Scatter, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer, Legend, TooltipProps
} from 'recharts';
import { PCAPoint, PCAView, ViewResult } from '../types';
import { conditionColor } from '../utils/colors';
import NoDataPlaceholder from './NoDataPlaceholder';

interface PCAPlotProps {
  view: ViewResult<PCAView>;
}

const CustomTooltip = ({ active, payload }: TooltipProps<number, string>) => {
  if (active && payload && payload.length) {
    const d: PCAPoint = payload[0].payload;
    return (
      <div className="bg-white border border-slate-200 p-3 rounded shadow-lg text-sm z-50">
        <p className="font-bold text-slate-800">{d.sample}</p>
        <p className="text-xs text-slate-500">{d.condition}</p>
      </div>
    );
  }
  return null;
};

const PCAPlot: React.FC<PCAPlotProps> = ({ view }) => {
  if (view.status === 'no-data') {
    return <NoDataPlaceholder title="PCA Plot" />;
  }

  const { points, percentVar, conditions } = view.data;

  return (
    <div className="w-full h-[420px] bg-white rounded-xl shadow-sm border border-slate-200 p-4 flex flex-col">
      <h3 className="text-lg font-semibold text-slate-800 mb-2">PCA Plot</h3>
      <div className="flex-1 min-h-0">
        <ResponsiveContainer width="100%" height="100%">
          <ScatterChart margin={{ top: 20, right: 20, bottom: 20, left: 20 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
            <XAxis
              type="number"
              dataKey="pc1"
              name="PC1"
              label={{ value: `PC1: ${percentVar[0]}% variance`, position: 'bottom', offset: 0, fill: '#64748b' }}
              stroke="#94a3b8"
            />
            <YAxis
              type="number"
              dataKey="pc2"
              name="PC2"
              label={{ value: `PC2: ${percentVar[1]}% variance`, angle: -90, position: 'insideLeft', fill: '#64748b' }}
              stroke="#94a3b8"
            />
            <Tooltip content={<CustomTooltip />} cursor={{ strokeDasharray: '3 3' }} />
            {conditions.map((condition, i) => (
              <Scatter
                key={condition}
                name={condition}
                data={points.filter(p => p.condition === condition)}
                fill={conditionColor(i)}
              />
            ))}
            <Legend verticalAlign="top" height={24} />
          </ScatterChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
};

export default PCAPlot;
