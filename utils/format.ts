export function fmtStat(v: number | null): string {
  if (v === null || Number.isNaN(v)) return 'NA';
  if (v === 0) return '0';
  if (Math.abs(v) < 1e-3 || Math.abs(v) >= 1e6) return v.toExponential(2);
  return v.toFixed(3);
}

export function fmtPval(p: number | null): string {
  if (p === null) return 'NA';
  if (p < 1e-300) return '< 1e-300';
  if (p < 0.001) return p.toExponential(2);
  return p.toFixed(4);
}

export function prettyBytes(n: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let v = n;
  let i = 0;
  while (v >= 1024 && i < units.length - 1) {
    v /= 1024;
    i += 1;
  }
  return `${v.toFixed(i === 0 ? 0 : 1)} ${units[i]}`;
}
