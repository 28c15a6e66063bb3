import React, { useMemo } from 'react';
import {
  ScatterChart,
  Scatter,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  ReferenceLine,
  LabelList,
  Legend,
  TooltipProps
} from 'recharts';
import { ViewResult, VolcanoCategory, VolcanoPoint, VolcanoView } from '../types';
import { VOLCANO_COLORS, VOLCANO_LABELS } from '../utils/colors';
import NoDataPlaceholder from './NoDataPlaceholder';

interface VolcanoPlotProps {
  view: ViewResult<VolcanoView>;
}

const CATEGORIES: VolcanoCategory[] = ['NS', 'LOG2FC', 'PVALUE', 'BOTH'];

const CustomTooltip = ({ active, payload }: TooltipProps<number, string>) => {
  if (active && payload && payload.length) {
    const d: VolcanoPoint = payload[0].payload;
    return (
      <div className="bg-white border border-slate-200 p-3 rounded shadow-lg text-sm z-50">
        <p className="font-bold text-slate-800">{d.gene}</p>
        <p className="text-slate-600">Log2 FC: <span className="font-mono text-slate-800">{d.x.toFixed(2)}</span></p>
        <p className="text-slate-600">-Log10 P: <span className="font-mono text-slate-800">{d.y.toFixed(2)}</span></p>
        <p className="text-xs font-semibold mt-1" style={{ color: VOLCANO_COLORS[d.category] }}>
          {VOLCANO_LABELS[d.category]}
        </p>
      </div>
    );
  }
  return null;
};

const VolcanoPlot: React.FC<VolcanoPlotProps> = ({ view }) => {
  const series = useMemo(() => {
    if (view.status === 'no-data') return null;
    return CATEGORIES.map(category => ({
      category,
      points: view.data.points.filter(p => p.category === category),
    }));
  }, [view]);

  if (view.status === 'no-data' || !series) {
    return <NoDataPlaceholder title="Volcano Plot" />;
  }

  const { pCutoff, fcCutoff, labels } = view.data;
  const labelSet = new Set(labels);

  return (
    <div className="w-full h-[420px] bg-white rounded-xl shadow-sm border border-slate-200 p-4 flex flex-col">
      <h3 className="text-lg font-semibold text-slate-800 mb-2">Volcano Plot</h3>
      <div className="flex-1 min-h-0">
        <ResponsiveContainer width="100%" height="100%">
          <ScatterChart margin={{ top: 20, right: 20, bottom: 20, left: 20 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
            <XAxis
              type="number"
              dataKey="x"
              name="Log2 Fold Change"
              label={{ value: 'Log2 Fold Change', position: 'bottom', offset: 0, fill: '#64748b' }}
              stroke="#94a3b8"
              tick={{ fill: '#64748b' }}
            />
            <YAxis
              type="number"
              dataKey="y"
              name="-Log10 P-value"
              label={{ value: '-Log10 P-value', angle: -90, position: 'insideLeft', fill: '#64748b' }}
              stroke="#94a3b8"
              tick={{ fill: '#64748b' }}
            />
            <Tooltip content={<CustomTooltip />} cursor={{ strokeDasharray: '3 3' }} />

            <ReferenceLine x={fcCutoff} stroke="#94a3b8" strokeDasharray="3 3" />
            <ReferenceLine x={-fcCutoff} stroke="#94a3b8" strokeDasharray="3 3" />
            <ReferenceLine y={-Math.log10(pCutoff)} stroke="#94a3b8" strokeDasharray="3 3" />

            {series.map(({ category, points }) => (
              <Scatter
                key={category}
                name={VOLCANO_LABELS[category]}
                data={points}
                fill={VOLCANO_COLORS[category]}
                fillOpacity={category === 'NS' ? 0.3 : 0.8}
              >
                {category === 'BOTH' && (
                  <LabelList
                    dataKey="gene"
                    position="top"
                    style={{ fontSize: 10, fill: '#334155' }}
                    formatter={(label: unknown) => (typeof label === 'string' && labelSet.has(label) ? label : '')}
                  />
                )}
              </Scatter>
            ))}
            <Legend verticalAlign="top" height={24} />
          </ScatterChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
};

export default VolcanoPlot;
