export const DEFAULT_MAX_UPLOAD_BYTES = 1024 * 1024 * 1024; // 1 GiB

export const parseUploadLimit = (raw: string | undefined): number => {
  if (!raw) return DEFAULT_MAX_UPLOAD_BYTES;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : DEFAULT_MAX_UPLOAD_BYTES;
};

export const MAX_UPLOAD_BYTES = parseUploadLimit(process.env.MAX_UPLOAD_BYTES);

export const ACCEPTED_EXTENSIONS = ['.csv', '.tsv', '.txt'];

export const DESIGN_FACTOR = 'condition';

// Stray annotation column some count exports carry next to the samples
export const GENE_NAME_COLUMN = 'Gene Name';

export const VOLCANO_CONFIG = {
  pCutoff: 0.05,
  fcCutoff: 1,
  maxLabels: 30,
};

export const MA_ALPHA = 0.1;

export const HEATMAP_TOP_GENES = 50;

export const PCA_TOP_GENES = 500;

export const PAGE_SIZES = [10, 25, 50, 100];

export const FIT_BATCH_SIZE = 500;

export const PROGRESS_STEPS = {
  read: { value: 0.2, detail: 'Reading input files...' },
  validate: { value: 0.4, detail: 'Validating data...' },
  dataset: { value: 0.6, detail: 'Creating dataset...' },
  fit: { value: 0.8, detail: 'Running differential expression...' },
  finalize: { value: 1, detail: 'Finalizing results...' },
};
