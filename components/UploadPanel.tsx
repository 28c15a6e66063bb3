import React from 'react';
import { FileText, Loader2, Play, UploadCloud } from 'lucide-react';
import { ACCEPTED_EXTENSIONS } from '../constants';
import { prettyBytes } from '../utils/format';

interface UploadPanelProps {
  countsFile: File | null;
  metadataFile: File | null;
  onCountsChange: (file: File | null) => void;
  onMetadataChange: (file: File | null) => void;
  onRun: () => void;
  isRunning: boolean;
  maxUploadBytes: number;
}

interface FileFieldProps {
  id: string;
  label: string;
  file: File | null;
  onChange: (file: File | null) => void;
  disabled: boolean;
  maxUploadBytes: number;
}

const FileField: React.FC<FileFieldProps> = ({ id, label, file, onChange, disabled, maxUploadBytes }) => (
  <div className="flex-1 p-4 rounded-xl border border-dashed border-slate-300 bg-slate-50">
    <label htmlFor={id} className="block text-sm font-semibold text-slate-700 mb-2">{label}</label>
    <input
      id={id}
      type="file"
      accept={ACCEPTED_EXTENSIONS.join(',')}
      disabled={disabled}
      onChange={(e) => onChange(e.target.files?.[0] ?? null)}
      className="block w-full text-sm text-slate-600 file:mr-4 file:py-2 file:px-4 file:rounded-lg file:border-0 file:bg-indigo-50 file:text-indigo-700 hover:file:bg-indigo-100"
    />
    {file && (
      <div className="mt-3 flex items-center gap-2 text-xs text-slate-500">
        <FileText size={14} />
        <span className="truncate">{file.name}</span>
        <span className={file.size > maxUploadBytes ? 'text-red-600 font-semibold' : ''}>
          ({prettyBytes(file.size)}{file.size > maxUploadBytes ? `, over the ${prettyBytes(maxUploadBytes)} limit` : ''})
        </span>
      </div>
    )}
  </div>
);

const UploadPanel: React.FC<UploadPanelProps> = ({
  countsFile,
  metadataFile,
  onCountsChange,
  onMetadataChange,
  onRun,
  isRunning,
  maxUploadBytes,
}) => {
  const canRun = countsFile !== null && metadataFile !== null && !isRunning;

  return (
    <div className="flex flex-col items-center p-8 bg-white rounded-2xl shadow-sm border border-slate-200">
      <div className="w-20 h-20 bg-indigo-50 rounded-full flex items-center justify-center mb-6">
        <UploadCloud size={40} className="text-indigo-600" />
      </div>
      <h2 className="text-2xl font-bold text-slate-800 mb-2">Upload RNA-seq Data</h2>
      <p className="text-slate-500 text-center max-w-xl mb-8">
        Counts: genes in rows, samples in columns, first column holds the gene identifiers.
        Metadata: one row per sample with a <span className="font-mono">condition</span> column.
        Accepted formats: {ACCEPTED_EXTENSIONS.join(', ')}.
      </p>

      <div className="flex flex-col md:flex-row gap-4 w-full max-w-3xl mb-8">
        <FileField
          id="counts-file"
          label="Upload Counts Data (.csv, .tsv, .txt)"
          file={countsFile}
          onChange={onCountsChange}
          disabled={isRunning}
          maxUploadBytes={maxUploadBytes}
        />
        <FileField
          id="metadata-file"
          label="Upload Metadata (.csv, .tsv, .txt)"
          file={metadataFile}
          onChange={onMetadataChange}
          disabled={isRunning}
          maxUploadBytes={maxUploadBytes}
        />
      </div>

      <button
        onClick={onRun}
        disabled={!canRun}
        className={`px-6 py-3 font-medium rounded-lg transition-colors flex items-center gap-2 ${
          canRun
            ? 'bg-indigo-600 text-white hover:bg-indigo-700 shadow-lg shadow-indigo-200'
            : 'bg-slate-100 text-slate-400 cursor-not-allowed'
        }`}
      >
        {isRunning ? <Loader2 size={18} className="animate-spin" /> : <Play size={18} />}
        Run Analysis
      </button>
    </div>
  );
};

export default UploadPanel;
