import React from 'react';
import { Loader2, X } from 'lucide-react';
import { ProgressEvent } from '../types';

interface ProgressPanelProps {
  progress: ProgressEvent;
  onCancel: () => void;
}

const ProgressPanel: React.FC<ProgressPanelProps> = ({ progress, onCancel }) => (
  <div className="fixed bottom-6 right-6 z-40 w-80 bg-white rounded-xl shadow-lg border border-slate-200 p-4">
    <div className="flex justify-between items-center mb-2">
      <h4 className="text-sm font-semibold text-slate-800 flex items-center gap-2">
        <Loader2 size={16} className="animate-spin text-indigo-600" /> Running RNA-seq Analysis
      </h4>
      <button onClick={onCancel} className="text-xs text-slate-500 hover:text-red-600 flex items-center gap-1">
        <X size={14} /> Cancel
      </button>
    </div>
    <div className="w-full bg-slate-100 rounded-full h-1.5 overflow-hidden">
      <div
        className="h-full rounded-full bg-indigo-600 transition-all duration-500"
        style={{ width: `${Math.round(progress.value * 100)}%` }}
      />
    </div>
    <p className="mt-2 text-xs text-slate-500">{progress.detail}</p>
  </div>
);

export default ProgressPanel;
