import type { AnalysisErrorKind } from '../types';

export interface AnalysisErrorDetails {
  missing?: string[];
  duplicates?: string[];
  line?: number;
}

export class AnalysisError extends Error {
  readonly kind: AnalysisErrorKind;
  readonly details: AnalysisErrorDetails;

  constructor(kind: AnalysisErrorKind, message: string, details: AnalysisErrorDetails = {}) {
    super(message);
    this.name = 'AnalysisError';
    this.kind = kind;
    this.details = details;
  }
}

export const isAbortError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';

export const throwIfAborted = (signal?: AbortSignal) => {
  if (signal?.aborted) throw new DOMException('Analysis cancelled', 'AbortError');
};

export const toAnalysisError = (error: unknown, fallback: AnalysisErrorKind): AnalysisError => {
  if (error instanceof AnalysisError) return error;
  if (isAbortError(error)) return new AnalysisError('Cancelled', 'Analysis cancelled');
  const message = error instanceof Error ? error.message : String(error);
  return new AnalysisError(fallback, message);
};
