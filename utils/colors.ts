import { VolcanoCategory } from '../types';

export const CONDITION_COLORS = [
  '#ef4444', '#3b82f6', '#10b981', '#f59e0b',
  '#8b5cf6', '#ec4899', '#14b8a6', '#64748b',
];

export const VOLCANO_COLORS: Record<VolcanoCategory, string> = {
  NS: '#94a3b8', // Slate-400
  LOG2FC: '#10b981', // Emerald-500
  PVALUE: '#3b82f6', // Blue-500
  BOTH: '#ef4444', // Red-500
};

export const VOLCANO_LABELS: Record<VolcanoCategory, string> = {
  NS: 'NS',
  LOG2FC: 'Log2 FC',
  PVALUE: 'p-value',
  BOTH: 'p-value and log2 FC',
};

export function conditionColor(index: number): string {
  return CONDITION_COLORS[index % CONDITION_COLORS.length];
}

const mix = (from: number[], to: number[], t: number) =>
  `rgb(${from.map((c, i) => Math.round(c + (to[i] - c) * t)).join(',')})`;

const BLUE = [59, 130, 246];
const WHITE = [255, 255, 255];
const RED = [239, 68, 68];
const NAVY = [30, 58, 138];

/** Blue-white-red for row z-scores, saturating at +/- limit. */
export function divergingColor(z: number, limit = 2): string {
  const t = Math.max(-1, Math.min(1, z / limit));
  return t < 0 ? mix(WHITE, BLUE, -t) : mix(WHITE, RED, t);
}

/** Dark for close samples, white for the most distant pair. */
export function distanceColor(d: number, max: number): string {
  const t = max > 0 ? Math.min(d / max, 1) : 0;
  return mix(NAVY, WHITE, t);
}
