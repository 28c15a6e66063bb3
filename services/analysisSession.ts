import { AnalysisSessionState, AnalysisModel, CountsMatrix, ResultTable, SampleMetadata } from '../types';

export interface SessionCommit {
  counts: CountsMatrix;
  metadata: SampleMetadata;
  model: AnalysisModel;
  results: ResultTable;
}

/** Read side handed to the views. */
export interface AnalysisSessionReader {
  getSnapshot: () => AnalysisSessionState;
  subscribe: (listener: () => void) => () => void;
}

const EMPTY_STATE: AnalysisSessionState = Object.freeze({ generation: 0 });

/**
 * Holds the committed analysis for one browser session. The four fields only
 * ever change together, through `commit`.
 */
export class AnalysisSessionStore implements AnalysisSessionReader {
  private state: AnalysisSessionState = EMPTY_STATE;
  private readonly listeners = new Set<() => void>();

  getSnapshot = (): AnalysisSessionState => this.state;

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  commit(next: SessionCommit): AnalysisSessionState {
    this.state = Object.freeze({
      generation: this.state.generation + 1,
      counts: next.counts,
      metadata: next.metadata,
      model: next.model,
      results: next.results,
    });
    this.listeners.forEach(listener => listener());
    return this.state;
  }
}
