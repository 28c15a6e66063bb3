import React from 'react';
import { Database } from 'lucide-react';

interface NoDataPlaceholderProps {
  title: string;
  message?: string;
}

const NoDataPlaceholder: React.FC<NoDataPlaceholderProps> = ({
  title,
  message = 'No data yet. Upload counts and metadata, then run the analysis.',
}) => (
  <div className="w-full h-[420px] bg-white rounded-xl shadow-sm border border-slate-200 p-4 flex flex-col">
    <h3 className="text-lg font-semibold text-slate-800 mb-2">{title}</h3>
    <div className="flex-1 flex flex-col items-center justify-center text-slate-400 text-sm gap-2">
      <Database size={32} />
      <p>{message}</p>
    </div>
  </div>
);

export default NoDataPlaceholder;
