// --- Basic Math Helpers ---

export const mean = (arr: number[]) => arr.reduce((a, b) => a + b, 0) / arr.length;

export const variance = (arr: number[], m?: number) => {
  if (arr.length < 2) return 0;
  const mu = m ?? mean(arr);
  return arr.reduce((a, b) => a + Math.pow(b - mu, 2), 0) / (arr.length - 1);
};

export const stdDev = (arr: number[], m?: number) => Math.sqrt(variance(arr, m));

export const median = (arr: number[]) => {
  if (arr.length === 0) return NaN;
  const sorted = [...arr].sort((a, b) => a - b);
  const half = Math.floor(sorted.length / 2);
  if (sorted.length % 2) return sorted[half];
  return (sorted[half - 1] + sorted[half]) / 2;
};

// Median absolute deviation, scaled to be consistent with the SD of a normal
export const mad = (arr: number[]) => {
  const m = median(arr);
  return 1.4826 * median(arr.map(v => Math.abs(v - m)));
};

export const transpose = (matrix: number[][]): number[][] => {
  if (matrix.length === 0) return [];
  return matrix[0].map((_, j) => matrix.map(row => row[j]));
};

// --- Distributions ---

/** Complementary error function, fractional error below 1.2e-7. */
export const erfc = (x: number) => {
  const z = Math.abs(x);
  const t = 1 / (1 + 0.5 * z);
  const r = t * Math.exp(
    -z * z - 1.26551223 +
    t * (1.00002368 + t * (0.37409196 + t * (0.09678418 + t * (-0.18628806 +
    t * (0.27886807 + t * (-1.13520398 + t * (1.48851587 + t * (-0.82215223 + t * 0.17087277))))))))
  );
  return x >= 0 ? r : 2 - r;
};

/** Two-sided normal p-value for a Wald statistic. */
export const twoSidedPValue = (z: number) => Math.min(1, erfc(Math.abs(z) / Math.SQRT2));

export const trigamma = (x: number) => {
  let sum = 0;
  let y = x;
  while (y < 6) {
    sum += 1 / (y * y);
    y += 1;
  }
  const y2 = 1 / (y * y);
  // Asymptotic series
  return sum + 1 / y + y2 / 2 + (y2 / y) * (1 / 6 - y2 * (1 / 30 - y2 * (1 / 42 - y2 / 30)));
};

/** Benjamini-Hochberg adjustment; null entries are skipped and stay null. */
export const benjaminiHochberg = (pvalues: (number | null)[]): (number | null)[] => {
  const indexed: { p: number; i: number }[] = [];
  pvalues.forEach((p, i) => {
    if (p !== null) indexed.push({ p, i });
  });
  const n = indexed.length;
  const adjusted: (number | null)[] = pvalues.map(() => null);
  indexed.sort((a, b) => b.p - a.p || b.i - a.i);

  let running = 1;
  indexed.forEach(({ p, i }, k) => {
    const rank = n - k;
    running = Math.min(running, (p * n) / rank);
    adjusted[i] = running;
  });
  return adjusted;
};

// --- Linear Algebra ---

export interface EigenDecomposition {
  values: number[];
  vectors: number[][]; // vectors[k] is the eigenvector for values[k]
}

const dot = (x: number[], y: number[]) => {
  let sum = 0;
  for (let i = 0; i < x.length; i++) sum += x[i] * y[i];
  return sum;
};

/**
 * Leading `k` eigenpairs of a symmetric positive semi-definite matrix by power
 * iteration. Each vector is kept orthogonal to the ones found before it, so
 * eigenvalues come out in decreasing order.
 */
export const topEigenpairs = (
  matrix: number[][],
  k: number,
  maxIterations = 500,
  tolerance = 1e-12
): EigenDecomposition => {
  const n = matrix.length;
  const values: number[] = [];
  const vectors: number[][] = [];

  const multiply = (v: number[]) => matrix.map(row => dot(row, v));
  const orthonormalize = (v: number[]): number[] | null => {
    const w = [...v];
    vectors.forEach(u => {
      const d = dot(w, u);
      for (let i = 0; i < n; i++) w[i] -= d * u[i];
    });
    const norm = Math.sqrt(dot(w, w));
    return norm > 1e-150 ? w.map(x => x / norm) : null;
  };

  for (let c = 0; c < Math.min(k, n); c++) {
    const start = orthonormalize(Array.from({ length: n }, (_, i) => i + 1));
    if (!start) break;
    let v = start;
    for (let iter = 0; iter < maxIterations; iter++) {
      const next = orthonormalize(multiply(v));
      // v lies in the null space of what is left
      if (!next) break;
      let delta = 0;
      for (let i = 0; i < n; i++) delta += (next[i] - v[i]) * (next[i] - v[i]);
      v = next;
      if (Math.sqrt(delta) < tolerance) break;
    }
    values.push(Math.max(dot(v, multiply(v)), 0));
    vectors.push(v);
  }
  return { values, vectors };
};

// --- Distances & Clustering ---

export const euclidean = (x: number[], y: number[]) => {
  let sum = 0;
  for (let i = 0; i < x.length; i++) sum += Math.pow(x[i] - y[i], 2);
  return Math.sqrt(sum);
};

export const distanceMatrix = (vectors: number[][]): number[][] =>
  vectors.map(x => vectors.map(y => euclidean(x, y)));

/**
 * Complete-linkage agglomerative clustering; returns the leaf order of the
 * resulting tree. Ties merge the first pair in scan order.
 */
export const hierarchicalOrder = (dist: number[][]): number[] => {
  let clusters = dist.map((_, i) => [i]);

  const linkage = (a: number[], b: number[]) => {
    let max = 0;
    a.forEach(i => b.forEach(j => { max = Math.max(max, dist[i][j]); }));
    return max;
  };

  while (clusters.length > 1) {
    let best = { i: 0, j: 1, d: Infinity };
    for (let i = 0; i < clusters.length; i++) {
      for (let j = i + 1; j < clusters.length; j++) {
        const d = linkage(clusters[i], clusters[j]);
        if (d < best.d) best = { i, j, d };
      }
    }
    const merged = [...clusters[best.i], ...clusters[best.j]];
    clusters = clusters
      .map((c, k) => (k === best.i ? merged : c))
      .filter((_, k) => k !== best.j);
  }
  return clusters[0] ?? [];
};

// --- Matrix transforms ---

/** Centers and scales each row to unit SD; constant rows become zeros. */
export const scaleRows = (matrix: number[][]): number[][] =>
  matrix.map(row => {
    const m = mean(row);
    const s = stdDev(row, m);
    return row.map(v => (s > 0 ? (v - m) / s : 0));
  });

export interface PCAResult {
  scores: number[][]; // samples x components
  percentVar: number[];
}

/**
 * PCA of the samples (columns) of a features x samples matrix, restricted to
 * the `ntop` most variable features. Features are centered, not scaled.
 */
export const calculatePCA = (matrix: number[][], ntop: number, components = 2): PCAResult => {
  const nSamples = matrix[0]?.length ?? 0;
  if (nSamples === 0) return { scores: [], percentVar: [] };

  const variances = matrix.map(row => variance(row));
  const selected = variances
    .map((v, i) => ({ v, i }))
    .sort((a, b) => b.v - a.v || a.i - b.i)
    .slice(0, Math.min(ntop, matrix.length))
    .map(({ i }) => matrix[i]);

  const centered = selected.map(row => {
    const m = mean(row);
    return row.map(v => v - m);
  });

  // Gram matrix of samples: X X^T
  const gram: number[][] = Array.from({ length: nSamples }, () => Array(nSamples).fill(0));
  for (let i = 0; i < nSamples; i++) {
    for (let j = i; j < nSamples; j++) {
      let sum = 0;
      for (let k = 0; k < centered.length; k++) sum += centered[k][i] * centered[k][j];
      gram[i][j] = sum;
      gram[j][i] = sum;
    }
  }

  const { values: lambdas, vectors } = topEigenpairs(gram, components);
  // Sum of all eigenvalues
  const total = gram.reduce((acc, row, i) => acc + row[i], 0);

  const scores: number[][] = Array.from({ length: nSamples }, () => []);
  const percentVar: number[] = [];
  for (let k = 0; k < components; k++) {
    const vec = vectors[k] ?? Array(nSamples).fill(0);
    const lambda = lambdas[k] ?? 0;
    // Sign is arbitrary; make the largest loading positive
    const pivot = vec.reduce((best, x) => (Math.abs(x) > Math.abs(best) ? x : best), 0);
    const sign = pivot < 0 ? -1 : 1;
    const scale = Math.sqrt(lambda);
    vec.forEach((x, i) => scores[i].push(sign * x * scale));
    percentVar.push(total > 0 ? lambda / total : 0);
  }
  return { scores, percentVar };
};
