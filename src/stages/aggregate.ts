import { STATE_COLUMN, TOTAL_COLUMN } from '../data/variables';
import type { ShapedTable, TableSummary, UnderFiveTable } from '../types';

export function aggregateUnderFive(shaped: ShapedTable): UnderFiveTable {
  const keep = shaped.geographyColumns.filter(name => name !== STATE_COLUMN);

  const rows = shaped.rows.map(row => {
    const geography: Record<string, string> = {};
    for (const name of keep) geography[name] = row.geography[name];
    return { geography, pop_under5: row.pop_under5_male + row.pop_under5_female };
  });

  return { columns: [...keep, TOTAL_COLUMN], rows };
}

// Sanity figures logged before the file is written
export function summarizeTable(table: UnderFiveTable): TableSummary {
  return {
    rowCount: table.rows.length,
    columns: table.columns,
    totalUnderFive: table.rows.reduce((sum, row) => sum + row.pop_under5, 0)
  };
}
