import React from 'react';
import { afterEach, describe, expect, it } from 'vitest';
import { cleanup, fireEvent, render, screen, within } from '@testing-library/react';
import { ResultRow } from '../types';
import DataTable from './DataTable';

const rows: ResultRow[] = Array.from({ length: 12 }, (_, i) => ({
  gene: `G${i + 1}`,
  baseMean: 100 + i,
  log2FoldChange: 5 - i,
  lfcSE: 0.5,
  dispersion: 0.1,
  stat: (5 - i) / 0.5,
  pvalue: 0.01,
  padj: 0.02,
}));

const firstGene = () => {
  const [, firstRow] = screen.getAllByRole('row');
  return within(firstRow).getAllByRole('cell')[0].textContent;
};

describe('DataTable', () => {
  afterEach(() => cleanup());

  it('shows a placeholder before an analysis', () => {
    render(<DataTable view={{ status: 'no-data' }} />);
    expect(screen.getByText('Differential Expression')).toBeTruthy();
    expect(screen.getByText('No data yet. Upload counts and metadata, then run the analysis.')).toBeTruthy();
  });

  it('pages through the results', () => {
    render(
      <DataTable
        view={{ status: 'ready', data: rows }}
        contrast={{ factor: 'condition', numerator: 'b', reference: 'a' }}
      />
    );
    expect(screen.getByText('condition: b vs a')).toBeTruthy();
    expect(screen.getByText('Showing 1 to 10 of 12 entries')).toBeTruthy();
    expect(screen.getAllByRole('row')).toHaveLength(11);

    fireEvent.click(screen.getByRole('button', { name: 'Next page' }));
    expect(screen.getByText('Showing 11 to 12 of 12 entries')).toBeTruthy();
    expect(firstGene()).toBe('G11');
  });

  it('sorts by a column', () => {
    render(<DataTable view={{ status: 'ready', data: rows }} />);
    expect(firstGene()).toBe('G1');

    fireEvent.click(screen.getByRole('button', { name: 'Log2 FC' }));
    expect(firstGene()).toBe('G12');

    fireEvent.click(screen.getByRole('button', { name: 'Log2 FC' }));
    expect(firstGene()).toBe('G1');
  });

  it('keeps header icons mounted across re-renders', () => {
    render(<DataTable view={{ status: 'ready', data: rows }} />);
    const icon = screen.getByRole('button', { name: 'Gene' }).querySelector('svg');
    expect(icon).not.toBeNull();

    fireEvent.change(screen.getByPlaceholderText('Search gene...'), { target: { value: 'G' } });
    expect(screen.getByRole('button', { name: 'Gene' }).querySelector('svg')).toBe(icon);
  });

  it('filters by gene name', () => {
    render(<DataTable view={{ status: 'ready', data: rows }} />);
    fireEvent.change(screen.getByPlaceholderText('Search gene...'), { target: { value: 'g1' } });
    expect(screen.getByText('Showing 1 to 4 of 4 entries')).toBeTruthy();

    fireEvent.change(screen.getByPlaceholderText('Search gene...'), { target: { value: 'XYZ' } });
    expect(screen.getByText('Showing 0 entries')).toBeTruthy();
    expect(screen.getByText('No genes found matching "XYZ"')).toBeTruthy();
  });
});
