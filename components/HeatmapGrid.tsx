import React from 'react';

interface HeatmapGridProps {
  rowIds: string[];
  columnIds: string[];
  values: number[][];
  colorFor: (value: number) => string;
  formatValue: (value: number) => string;
  cellHeight?: number;
}

/** Clustered grid of colored cells; row and column order come in pre-sorted. */
const HeatmapGrid: React.FC<HeatmapGridProps> = ({ rowIds, columnIds, values, colorFor, formatValue, cellHeight = 6 }) => (
  <div
    className="grid gap-px text-[9px] text-slate-500"
    style={{ gridTemplateColumns: `auto repeat(${columnIds.length}, minmax(0, 1fr))` }}
  >
    <div />
    {columnIds.map(col => (
      <div key={col} className="truncate text-center font-semibold text-slate-600" title={col}>{col}</div>
    ))}
    {rowIds.map((row, i) => (
      <React.Fragment key={row}>
        <div className="truncate pr-1 text-right" style={{ lineHeight: `${cellHeight}px` }} title={row}>{row}</div>
        {values[i].map((v, j) => (
          <div
            key={columnIds[j]}
            style={{ backgroundColor: colorFor(v), height: cellHeight }}
            title={`${row} / ${columnIds[j]}: ${formatValue(v)}`}
          />
        ))}
      </React.Fragment>
    ))}
  </div>
);

export default HeatmapGrid;
