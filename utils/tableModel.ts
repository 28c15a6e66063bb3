import { ResultRow } from '../types';

export type SortKey = keyof ResultRow;
export type SortDirection = 'asc' | 'desc';

export interface SortState {
  key: SortKey;
  direction: SortDirection;
}

export const filterRows = (rows: ResultRow[], query: string): ResultRow[] => {
  const q = query.trim().toLowerCase();
  if (!q) return rows;
  return rows.filter(r => r.gene.toLowerCase().includes(q));
};

/** Stable sort; NA values always go last whatever the direction. */
export const sortRows = (rows: ResultRow[], sort: SortState | null): ResultRow[] => {
  if (!sort) return rows;
  const factor = sort.direction === 'asc' ? 1 : -1;
  return [...rows].sort((a, b) => {
    const x = a[sort.key];
    const y = b[sort.key];
    if (x === null && y === null) return 0;
    if (x === null) return 1;
    if (y === null) return -1;
    if (typeof x === 'string' && typeof y === 'string') return factor * x.localeCompare(y);
    return factor * (Number(x) - Number(y));
  });
};

export interface Page<T> {
  items: T[];
  page: number;
  pageCount: number;
  total: number;
}

export const paginate = <T>(rows: T[], page: number, pageSize: number): Page<T> => {
  const pageCount = Math.max(1, Math.ceil(rows.length / pageSize));
  const current = Math.min(Math.max(page, 0), pageCount - 1);
  return {
    items: rows.slice(current * pageSize, (current + 1) * pageSize),
    page: current,
    pageCount,
    total: rows.length,
  };
};

export const nextSort = (current: SortState | null, key: SortKey): SortState => {
  if (current && current.key === key) {
    return { key, direction: current.direction === 'asc' ? 'desc' : 'asc' };
  }
  return { key, direction: 'asc' };
};
