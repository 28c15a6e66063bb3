import React from 'react';
import {
  ScatterChart,
  Scatter,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  ReferenceLine,
  Legend,
  TooltipProps
} from 'recharts';
import { MAPoint, ViewResult } from '../types';
import { MA_ALPHA } from '../constants';
import NoDataPlaceholder from './NoDataPlaceholder';

interface MAPlotProps {
  view: ViewResult<MAPoint[]>;
}

const CustomTooltip = ({ active, payload }: TooltipProps<number, string>) => {
  if (active && payload && payload.length) {
    const d: MAPoint = payload[0].payload;
    return (
      <div className="bg-white border border-slate-200 p-3 rounded shadow-lg text-sm z-50">
        <p className="font-bold text-slate-800">{d.gene}</p>
        <p className="text-slate-600">Log2 FC: <span className="font-mono text-slate-800">{d.log2FoldChange.toFixed(2)}</span></p>
        <p className="text-slate-600">Mean of normalized counts: <span className="font-mono text-slate-800">{d.baseMean.toFixed(1)}</span></p>
      </div>
    );
  }
  return null;
};

const MAPlot: React.FC<MAPlotProps> = ({ view }) => {
  if (view.status === 'no-data') {
    return <NoDataPlaceholder title="MA Plot" />;
  }

  const significant = view.data.filter(d => d.significant);
  const other = view.data.filter(d => !d.significant);

  return (
    <div className="w-full h-[420px] bg-white rounded-xl shadow-sm border border-slate-200 p-4 flex flex-col">
      <h3 className="text-lg font-semibold text-slate-800 mb-2">MA Plot</h3>
      <div className="flex-1 min-h-0">
        <ResponsiveContainer width="100%" height="100%">
          <ScatterChart margin={{ top: 20, right: 20, bottom: 20, left: 20 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
            <XAxis
              type="number"
              dataKey="baseMean"
              name="Mean of normalized counts"
              scale="log"
              domain={['auto', 'auto']}
              allowDataOverflow
              label={{ value: 'Mean of normalized counts', position: 'bottom', offset: 0, fill: '#64748b' }}
              stroke="#94a3b8"
              tick={{ fill: '#64748b' }}
            />
            <YAxis
              type="number"
              dataKey="log2FoldChange"
              name="Log2 Fold Change"
              label={{ value: 'Log2 Fold Change', angle: -90, position: 'insideLeft', fill: '#64748b' }}
              stroke="#94a3b8"
              tick={{ fill: '#64748b' }}
            />
            <Tooltip content={<CustomTooltip />} cursor={{ strokeDasharray: '3 3' }} />
            <ReferenceLine y={0} stroke="#cbd5e1" strokeWidth={2} />
            <Scatter name="Not significant" data={other} fill="#94a3b8" fillOpacity={0.4} />
            <Scatter name={`padj < ${MA_ALPHA}`} data={significant} fill="#3b82f6" fillOpacity={0.8} />
            <Legend verticalAlign="top" height={24} />
          </ScatterChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
};

export default MAPlot;
