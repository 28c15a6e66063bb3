import React, { useMemo } from 'react';
import {
  ScatterChart, Scatter, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer, ReferenceLine, Legend
} from 'recharts';
import { DispersionView, ViewResult } from '../types';
import NoDataPlaceholder from './NoDataPlaceholder';

interface DispersionPlotProps {
  view: ViewResult<DispersionView>;
}

const DispersionPlot: React.FC<DispersionPlotProps> = ({ view }) => {
  const series = useMemo(() => {
    if (view.status === 'no-data') return null;
    return {
      geneEstimates: view.data.points.map(p => ({ gene: p.gene, x: p.baseMean, y: p.geneEstimate })),
      finals: view.data.points.map(p => ({ gene: p.gene, x: p.baseMean, y: p.final })),
    };
  }, [view]);

  if (view.status === 'no-data' || !series) {
    return <NoDataPlaceholder title="Dispersion Estimates" />;
  }

  return (
    <div className="w-full h-[420px] bg-white rounded-xl shadow-sm border border-slate-200 p-4 flex flex-col">
      <h3 className="text-lg font-semibold text-slate-800 mb-2">Dispersion Estimates</h3>
      <div className="flex-1 min-h-0">
        <ResponsiveContainer width="100%" height="100%">
          <ScatterChart margin={{ top: 20, right: 20, bottom: 20, left: 20 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
            <XAxis
              type="number"
              dataKey="x"
              name="Mean of normalized counts"
              scale="log"
              domain={['auto', 'auto']}
              allowDataOverflow
              label={{ value: 'Mean of normalized counts', position: 'bottom', offset: 0, fill: '#64748b' }}
              stroke="#94a3b8"
            />
            <YAxis
              type="number"
              dataKey="y"
              name="Dispersion"
              scale="log"
              domain={['auto', 'auto']}
              allowDataOverflow
              label={{ value: 'Dispersion', angle: -90, position: 'insideLeft', fill: '#64748b' }}
              stroke="#94a3b8"
            />
            <Tooltip cursor={{ strokeDasharray: '3 3' }} />
            <ReferenceLine y={view.data.fitted} stroke="#ef4444" strokeWidth={2} label={{ value: 'fitted', fill: '#ef4444', position: 'right' }} />
            <Scatter name="gene-est" data={series.geneEstimates} fill="#0f172a" fillOpacity={0.5} />
            <Scatter name="final" data={series.finals} fill="#3b82f6" fillOpacity={0.6} />
            <Legend verticalAlign="top" height={24} />
          </ScatterChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
};

export default DispersionPlot;
