import React, { useMemo, useState } from 'react';
import { ArrowDown, ArrowUp, ArrowUpDown, ChevronLeft, ChevronRight, Search } from 'lucide-react';
import { ResultRow, ResultTable, ViewResult } from '../types';
import { PAGE_SIZES } from '../constants';
import { fmtPval, fmtStat } from '../utils/format';
import { SortKey, SortState, filterRows, nextSort, paginate, sortRows } from '../utils/tableModel';
import NoDataPlaceholder from './NoDataPlaceholder';

interface DataTableProps {
  view: ViewResult<ResultRow[]>;
  contrast?: ResultTable['contrast'];
}

const COLUMNS: { key: SortKey; label: string; format: (row: ResultRow) => string }[] = [
  { key: 'gene', label: 'Gene', format: r => r.gene },
  { key: 'baseMean', label: 'Base Mean', format: r => fmtStat(r.baseMean) },
  { key: 'log2FoldChange', label: 'Log2 FC', format: r => fmtStat(r.log2FoldChange) },
  { key: 'lfcSE', label: 'lfcSE', format: r => fmtStat(r.lfcSE) },
  { key: 'dispersion', label: 'Dispersion', format: r => fmtStat(r.dispersion) },
  { key: 'stat', label: 'Stat', format: r => fmtStat(r.stat) },
  { key: 'pvalue', label: 'p-value', format: r => fmtPval(r.pvalue) },
  { key: 'padj', label: 'padj', format: r => fmtPval(r.padj) },
];

const SortIcon: React.FC<{ column: SortKey; sort: SortState | null }> = ({ column, sort }) => {
  if (!sort || sort.key !== column) return <ArrowUpDown size={12} className="text-slate-300" />;
  return sort.direction === 'asc' ? <ArrowUp size={12} /> : <ArrowDown size={12} />;
};

const DataTable: React.FC<DataTableProps> = ({ view, contrast }) => {
  const [filter, setFilter] = useState('');
  const [sort, setSort] = useState<SortState | null>(null);
  const [page, setPage] = useState(0);
  const [pageSize, setPageSize] = useState(PAGE_SIZES[0]);

  const rows = view.status === 'ready' ? view.data : [];
  const visible = useMemo(() => sortRows(filterRows(rows, filter), sort), [rows, filter, sort]);
  const current = paginate(visible, page, pageSize);

  if (view.status === 'no-data') {
    return <NoDataPlaceholder title="Differential Expression" />;
  }

  return (
    <div className="bg-white rounded-xl shadow-sm border border-slate-200 overflow-hidden flex flex-col">
      <div className="p-4 border-b border-slate-200 flex justify-between items-center bg-slate-50">
        <div>
          <h3 className="text-lg font-semibold text-slate-800">Differential Expression Results</h3>
          {contrast && (
            <p className="text-xs text-slate-500">
              {contrast.factor}: {contrast.numerator} vs {contrast.reference}
            </p>
          )}
        </div>
        <div className="flex items-center gap-3">
          <label className="text-xs text-slate-500 flex items-center gap-1">
            Show
            <select
              className="border border-slate-300 rounded-md px-2 py-1 text-sm"
              value={pageSize}
              onChange={(e) => { setPageSize(Number(e.target.value)); setPage(0); }}
            >
              {PAGE_SIZES.map(size => <option key={size} value={size}>{size}</option>)}
            </select>
            entries
          </label>
          <div className="relative">
            <Search className="absolute left-3 top-1/2 transform -translate-y-1/2 text-slate-400" size={16} />
            <input
              type="text"
              placeholder="Search gene..."
              className="pl-9 pr-4 py-2 border border-slate-300 rounded-lg text-sm focus:outline-none focus:ring-2 focus:ring-indigo-500"
              value={filter}
              onChange={(e) => { setFilter(e.target.value); setPage(0); }}
            />
          </div>
        </div>
      </div>
      <div className="overflow-auto">
        <table className="w-full text-sm text-left">
          <thead className="text-xs text-slate-500 uppercase bg-slate-50 sticky top-0 z-10">
            <tr>
              {COLUMNS.map(col => (
                <th key={col.key} className="px-4 py-3">
                  <button
                    className="flex items-center gap-1 uppercase hover:text-slate-800"
                    onClick={() => { setSort(nextSort(sort, col.key)); setPage(0); }}
                  >
                    {col.label} <SortIcon column={col.key} sort={sort} />
                  </button>
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {current.items.map((row) => (
              <tr key={row.gene} className="bg-white border-b hover:bg-slate-50 transition-colors">
                {COLUMNS.map(col => (
                  <td
                    key={col.key}
                    className={col.key === 'gene' ? 'px-4 py-3 font-medium text-slate-900' : 'px-4 py-3 font-mono text-slate-600'}
                  >
                    {col.format(row)}
                  </td>
                ))}
              </tr>
            ))}
            {current.items.length === 0 && (
              <tr>
                <td colSpan={COLUMNS.length} className="text-center py-8 text-slate-400">
                  No genes found matching "{filter}"
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </div>
      <div className="p-3 border-t border-slate-200 flex justify-between items-center text-xs text-slate-500">
        <span>
          {current.total === 0
            ? 'Showing 0 entries'
            : `Showing ${current.page * pageSize + 1} to ${current.page * pageSize + current.items.length} of ${current.total} entries`}
        </span>
        <div className="flex items-center gap-2">
          <button
            className="p-1 rounded border border-slate-200 disabled:opacity-40"
            onClick={() => setPage(current.page - 1)}
            disabled={current.page === 0}
            aria-label="Previous page"
          >
            <ChevronLeft size={14} />
          </button>
          <span>Page {current.page + 1} of {current.pageCount}</span>
          <button
            className="p-1 rounded border border-slate-200 disabled:opacity-40"
            onClick={() => setPage(current.page + 1)}
            disabled={current.page >= current.pageCount - 1}
            aria-label="Next page"
          >
            <ChevronRight size={14} />
          </button>
        </div>
      </div>
    </div>
  );
};

export default DataTable;
