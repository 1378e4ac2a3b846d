import { buildRawTable, cleanHeader } from './raw-table';

describe('cleanHeader', () => {
  it('lower-cases, joins words with underscores and drops dots', () => {
    expect(cleanHeader('  Total Price ')).toBe('total_price');
    expect(cleanHeader('Qty.')).toBe('qty');
    expect(cleanHeader('R.C.V.')).toBe('rcv');
  });
});

describe('buildRawTable', () => {
  it('concatenates grids under the union of their columns', () => {
    const table = buildRawTable([
      [
        ['Description', 'Total'],
        ['Roof shingle replacement', '$500.00'],
      ],
      [
        ['Description', 'Qty', 'Total'],
        ['Paint walls', '2', '$80'],
      ],
    ]);

    expect(table.columns).toEqual(['description', 'total', 'qty']);
    expect(table.rows).toEqual([
      { description: 'Roof shingle replacement', total: '$500.00' },
      { description: 'Paint walls', qty: '2', total: '$80' },
    ]);
  });

  it('skips header-only grids', () => {
    const table = buildRawTable([[['Code', 'Note']], [['Description', 'Total'], ['Misc labor', '$100']]]);

    expect(table.columns).toEqual(['description', 'total']);
    expect(table.rows).toHaveLength(1);
  });

  it('returns an empty table when nothing was extracted', () => {
    expect(buildRawTable([])).toEqual({ columns: [], rows: [] });
  });

  it('names blank headers by position and suffixes repeated ones', () => {
    const table = buildRawTable([
      [
        ['', 'Total', 'Total'],
        ['1', '10', '12'],
      ],
    ]);

    expect(table.columns).toEqual(['column_1', 'total', 'total_2']);
    expect(table.rows[0]).toEqual({ column_1: '1', total: '10', total_2: '12' });
  });

  it('leaves cells missing from short rows out of the row', () => {
    const table = buildRawTable([
      [
        ['Description', 'Total'],
        ['Dumpster'],
      ],
    ]);

    expect(table.rows).toEqual([{ description: 'Dumpster' }]);
  });
});
