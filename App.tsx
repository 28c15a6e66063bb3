import React, { useCallback, useEffect, useRef, useState, useSyncExternalStore } from 'react';
import { BarChart, Dna, Image, Table, UploadCloud } from 'lucide-react';

import { AppView, Notification, ProgressEvent } from './types';
import { MAX_UPLOAD_BYTES } from './constants';
import UploadPanel from './components/UploadPanel';
import DataTable from './components/DataTable';
import PlotsGrid from './components/PlotsGrid';
import ProgressPanel from './components/ProgressPanel';
import Notifications from './components/Notifications';
import { createNegativeBinomialEngine } from './services/negativeBinomialEngine';
import { AnalysisSessionStore } from './services/analysisSession';
import { AnalysisOrchestrator } from './services/analysisOrchestrator';
import { publishResultTable } from './utils/views';

const NOTIFICATION_MS = 5000;

const NAV_ITEMS: { view: AppView; label: string; icon: React.ReactNode }[] = [
  { view: AppView.UPLOAD, label: 'Data Upload', icon: <UploadCloud size={14} /> },
  { view: AppView.DE, label: 'Differential Expression', icon: <Table size={14} /> },
  { view: AppView.PLOTS, label: 'Plots', icon: <Image size={14} /> },
];

const createSession = () => {
  const engine = createNegativeBinomialEngine();
  const session = new AnalysisSessionStore();
  const orchestrator = new AnalysisOrchestrator(engine, session, MAX_UPLOAD_BYTES);
  return { engine, session, orchestrator };
};

const App: React.FC = () => {
  const [{ engine, session, orchestrator }] = useState(createSession);
  const state = useSyncExternalStore(session.subscribe, session.getSnapshot);

  const [view, setView] = useState<AppView>(AppView.UPLOAD);
  const [countsFile, setCountsFile] = useState<File | null>(null);
  const [metadataFile, setMetadataFile] = useState<File | null>(null);
  const [progress, setProgress] = useState<ProgressEvent | null>(null);
  const [notifications, setNotifications] = useState<Notification[]>([]);
  const abortRef = useRef<AbortController | null>(null);
  const nextId = useRef(1);
  const timers = useRef(new Set<ReturnType<typeof setTimeout>>());

  useEffect(() => {
    const pending = timers.current;
    return () => {
      pending.forEach(clearTimeout);
      abortRef.current?.abort();
    };
  }, []);

  const dismiss = useCallback((id: number) => {
    setNotifications(prev => prev.filter(n => n.id !== id));
  }, []);

  const notify = useCallback((type: Notification['type'], text: string, details?: string[]) => {
    const id = nextId.current++;
    setNotifications(prev => [...prev, { id, type, text, details }]);
    const timer = setTimeout(() => {
      timers.current.delete(timer);
      dismiss(id);
    }, NOTIFICATION_MS);
    timers.current.add(timer);
  }, [dismiss]);

  const handleRunAnalysis = async () => {
    if (!countsFile || !metadataFile || orchestrator.isRunning) return;

    const controller = new AbortController();
    abortRef.current = controller;
    setProgress({ value: 0, detail: 'Starting...' });

    const outcome = await orchestrator.run(
      { countsFile, metadataFile },
      { signal: controller.signal, onProgress: setProgress }
    );

    abortRef.current = null;
    setProgress(null);

    if (outcome.ok) {
      notify('message', 'Analysis complete!');
      setView(AppView.DE);
    } else if (outcome.error.kind === 'Cancelled') {
      notify('message', 'Analysis cancelled; previous results are unchanged.');
    } else if (outcome.error.kind === 'SampleMismatch') {
      notify('error', outcome.error.message, outcome.error.details.missing);
    } else {
      notify('error', outcome.error.message);
    }
  };

  const isRunning = progress !== null;

  return (
    <div className="min-h-screen flex flex-col">
      {/* Header */}
      <header className="bg-white border-b border-slate-200 sticky top-0 z-30">
        <div className="max-w-7xl mx-auto px-6 h-16 flex items-center justify-between">
          <div className="flex items-center gap-3">
            <div className="w-8 h-8 bg-gradient-to-br from-indigo-500 to-purple-600 rounded-lg flex items-center justify-center text-white shadow-md">
              <Dna size={18} />
            </div>
            <span className="text-xl font-bold bg-clip-text text-transparent bg-gradient-to-r from-indigo-700 to-purple-600">
              RNA-seq Analysis Dashboard
            </span>
          </div>

          <nav className="flex gap-1 bg-slate-100 p-1 rounded-lg">
            {NAV_ITEMS.map(item => (
              <button
                key={item.view}
                onClick={() => setView(item.view)}
                className={`px-4 py-1.5 text-xs font-medium rounded-md transition-all flex items-center gap-1 ${
                  view === item.view
                    ? 'bg-white text-indigo-700 shadow-sm'
                    : 'text-slate-500 hover:text-slate-700'
                }`}
              >
                {item.icon} {item.label}
              </button>
            ))}
          </nav>

          <div className="text-xs text-slate-500 hidden md:flex items-center gap-1">
            <BarChart size={14} />
            {state.results ? `${state.results.rows.length} Genes Analyzed` : 'No Data'}
          </div>
        </div>
      </header>

      {/* Main Content */}
      <main className="flex-1 bg-slate-50 p-6 overflow-auto">
        <div className="max-w-7xl mx-auto h-full">
          {view === AppView.UPLOAD && (
            <UploadPanel
              countsFile={countsFile}
              metadataFile={metadataFile}
              onCountsChange={setCountsFile}
              onMetadataChange={setMetadataFile}
              onRun={() => { void handleRunAnalysis(); }}
              isRunning={isRunning}
              maxUploadBytes={MAX_UPLOAD_BYTES}
            />
          )}
          {view === AppView.DE && (
            <DataTable
              key={state.generation}
              view={publishResultTable(state.results)}
              contrast={state.results?.contrast}
            />
          )}
          {view === AppView.PLOTS && (
            <PlotsGrid engine={engine} model={state.model} results={state.results} />
          )}
        </div>
      </main>

      {progress && <ProgressPanel progress={progress} onCancel={() => abortRef.current?.abort()} />}
      <Notifications items={notifications} onDismiss={dismiss} />
    </div>
  );
};

export default App;
