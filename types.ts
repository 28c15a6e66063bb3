import type { AnalysisError } from './utils/errors';

// --- Inputs ---

/** The parts of a browser `File` the reader relies on. */
export interface UploadedFile {
  name: string;
  size: number;
  text(): Promise<string>;
}

export interface DelimitedTable {
  rowIds: string[];
  columnIds: string[];
  cells: string[][]; // row-major, raw text
}

export interface CountsMatrix {
  geneIds: string[];
  sampleIds: string[];
  values: number[][]; // genes x samples
}

export interface SampleMetadata {
  sampleIds: string[];
  columns: string[];
  rows: Record<string, string>[];
}

// --- Engine ---

export interface ExpressionMatrix {
  rowIds: string[];
  columnIds: string[];
  values: number[][];
}

/** Counts aligned to the metadata, ready for fitting. */
export interface DataSet {
  counts: CountsMatrix;
  metadata: SampleMetadata;
  designFactor: string;
  condition: string[]; // per sample, same order as counts.sampleIds
  levels: string[]; // sorted, first is the reference
}

export interface AnalysisModel {
  dataSet: DataSet;
  sizeFactors: number[];
  normalized: number[][];
  baseMean: number[];
  dispersionGeneEst: (number | null)[];
  dispersionFitted: number;
  dispersion: (number | null)[];
  log2FoldChange: (number | null)[];
  lfcSE: (number | null)[];
  stat: (number | null)[];
  pvalue: (number | null)[];
}

export interface ResultRow {
  gene: string;
  baseMean: number;
  log2FoldChange: number | null;
  lfcSE: number | null;
  dispersion: number | null;
  stat: number | null;
  pvalue: number | null;
  padj: number | null;
}

export interface ResultTable {
  contrast: { factor: string; numerator: string; reference: string };
  rows: ResultRow[];
}

// --- Session ---

export interface AnalysisSessionState {
  generation: number;
  counts?: CountsMatrix;
  metadata?: SampleMetadata;
  model?: AnalysisModel;
  results?: ResultTable;
}

export interface ProgressEvent {
  value: number; // 0..1
  detail: string;
}

export type AnalysisErrorKind =
  | 'UnsupportedFormat'
  | 'IOError'
  | 'FileTooLarge'
  | 'MalformedTable'
  | 'SampleMismatch'
  | 'EngineError'
  | 'Cancelled'
  | 'RunInProgress';

export type RunOutcome =
  | { ok: true; results: ResultTable }
  | { ok: false; error: AnalysisError };

// --- Views ---

export type ViewResult<T> = { status: 'no-data' } | { status: 'ready'; data: T };

export type VolcanoCategory = 'NS' | 'LOG2FC' | 'PVALUE' | 'BOTH';

export interface VolcanoPoint {
  gene: string;
  x: number; // log2 fold change
  y: number; // -log10 p-value
  category: VolcanoCategory;
}

export interface VolcanoView {
  points: VolcanoPoint[];
  labels: string[];
  pCutoff: number;
  fcCutoff: number;
}

export interface HeatmapView {
  rowIds: string[];
  columnIds: string[];
  values: number[][]; // row-scaled
}

export interface PCAPoint {
  sample: string;
  pc1: number;
  pc2: number;
  condition: string;
}

export interface PCAView {
  points: PCAPoint[];
  percentVar: [number, number];
  conditions: string[];
}

export interface SampleDistanceView {
  sampleIds: string[];
  distances: number[][];
  max: number; // largest distance, for the color scale
}

export interface MAPoint {
  gene: string;
  baseMean: number;
  log2FoldChange: number;
  significant: boolean;
}

export interface DispersionPoint {
  gene: string;
  baseMean: number;
  geneEstimate: number;
  fitted: number;
  final: number;
}

export interface DispersionView {
  points: DispersionPoint[];
  fitted: number;
}

export enum AppView {
  UPLOAD = 'UPLOAD',
  DE = 'DE',
  PLOTS = 'PLOTS'
}

export interface Notification {
  id: number;
  type: 'message' | 'error';
  text: string;
  details?: string[];
}
