import { ProgressEvent, ResultTable, RunOutcome, UploadedFile } from '../types';
import { DESIGN_FACTOR, MAX_UPLOAD_BYTES, PROGRESS_STEPS } from '../constants';
import { readTable, toCountsMatrix, toSampleMetadata } from '../utils/tabularReader';
import { validateInputs } from '../utils/validation';
import { AnalysisError, throwIfAborted, toAnalysisError } from '../utils/errors';
import { ExpressionEngine } from './expressionEngine';
import { AnalysisSessionStore } from './analysisSession';

export interface RunRequest {
  countsFile: UploadedFile;
  metadataFile: UploadedFile;
}

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
}

/**
 * Drives read -> validate -> dataset -> fit -> results and commits the outcome
 * to the session in one step. Runs never overlap and never reject: every
 * failure comes back as `{ ok: false }` with the session left untouched.
 */
export class AnalysisOrchestrator {
  private running = false;

  constructor(
    private readonly engine: ExpressionEngine,
    private readonly session: AnalysisSessionStore,
    private readonly maxUploadBytes: number = MAX_UPLOAD_BYTES
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  async run(request: RunRequest, options: RunOptions = {}): Promise<RunOutcome> {
    if (this.running) {
      return { ok: false, error: new AnalysisError('RunInProgress', 'An analysis is already running') };
    }

    this.running = true;
    try {
      const results = await this.execute(request, options);
      return { ok: true, results };
    } catch (error) {
      const failure = toAnalysisError(error, 'EngineError');
      if (failure.kind === 'Cancelled') {
        console.info('[analysis] Run cancelled, keeping previous results');
      } else {
        console.error(`[analysis] ${failure.kind}: ${failure.message}`);
      }
      return { ok: false, error: failure };
    } finally {
      this.running = false;
    }
  }

  private async execute({ countsFile, metadataFile }: RunRequest, { signal, onProgress }: RunOptions): Promise<ResultTable> {
    const report = (step: ProgressEvent) => {
      throwIfAborted(signal);
      console.info(`[analysis] ${Math.round(step.value * 100)}% ${step.detail}`);
      onProgress?.({ value: step.value, detail: step.detail });
    };

    report(PROGRESS_STEPS.read);
    const countsTable = await readTable(countsFile, this.maxUploadBytes);
    const metadataTable = await readTable(metadataFile, this.maxUploadBytes);

    report(PROGRESS_STEPS.validate);
    const metadata = toSampleMetadata(metadataTable);
    const validation = validateInputs(countsTable, metadata);
    if (!validation.ok) throw validation.error;
    const counts = toCountsMatrix(validation.counts);

    report(PROGRESS_STEPS.dataset);
    const dataSet = this.engine.createDataSet(counts, metadata, DESIGN_FACTOR);

    report(PROGRESS_STEPS.fit);
    const model = await this.engine.fit(dataSet, { signal });

    report(PROGRESS_STEPS.finalize);
    const results = this.engine.results(model);

    throwIfAborted(signal);
    this.session.commit({ counts, metadata, model, results });
    console.info(`[analysis] Analysis complete: ${results.rows.length} genes`);
    return results;
  }
}
