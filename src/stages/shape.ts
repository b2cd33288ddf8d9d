import { CENSUS_SCHEMA, VARIABLES } from '../data/variables';
import { SchemaMismatchError, ValueParseError } from '../errors';
import type { MeasureColumn, RawCensusTable, ShapedRow, ShapedTable } from '../types';
import { parseInteger } from '../utils';

const MEASURE_SOURCES = new Set(CENSUS_SCHEMA.filter(col => col.type === 'integer').map(col => col.source));

// Row numbers in errors count the header as row 0, as in the raw response
export function shapeTable(raw: RawCensusTable): ShapedTable {
  const [header, ...dataRows] = raw;
  if (!header) throw new SchemaMismatchError('Census response is empty: no header row');

  const columnIndex = checkHeader(header);
  const geographyColumns = header.filter(name => !MEASURE_SOURCES.has(name));

  const rows = dataRows.map((row, i): ShapedRow => {
    const rowNumber = i + 1;
    if (row.length !== header.length) {
      throw new SchemaMismatchError(`Row ${rowNumber} has ${row.length} columns, header has ${header.length}`);
    }

    const geography: Record<string, string> = {};
    for (const name of geographyColumns) {
      geography[name] = row[cellIndex(columnIndex, name)];
    }

    const measures: Record<MeasureColumn, number> = { pop_under5_male: 0, pop_under5_female: 0 };
    for (const v of VARIABLES) {
      const value = row[cellIndex(columnIndex, v.code)];
      const num = parseInteger(value);
      if (num === null) throw new ValueParseError(rowNumber, v.code, value);
      measures[v.name] = num;
    }

    return { ...measures, geography };
  });

  return { geographyColumns, rows };
}

// Header names must be unique and carry every declared column
function checkHeader(header: readonly string[]): Map<string, number> {
  const problems: string[] = [];
  const index = new Map<string, number>();

  header.forEach((name, c) => {
    if (index.has(name)) problems.push(`duplicate column "${name}"`);
    else index.set(name, c);
  });
  for (const col of CENSUS_SCHEMA) {
    if (!index.has(col.source)) problems.push(`missing column "${col.source}" (${col.name})`);
  }

  if (problems.length > 0) {
    throw new SchemaMismatchError(`Census response header [${header.join(', ')}] does not match schema: ${problems.join('; ')}`);
  }
  return index;
}

export function cellIndex(columnIndex: ReadonlyMap<string, number>, name: string): number {
  const index = columnIndex.get(name);
  if (index === undefined) throw new SchemaMismatchError(`Column "${name}" is not in the response header`);
  return index;
}
