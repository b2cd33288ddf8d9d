import * as XLSX from 'xlsx';
import * as fs from 'fs-extra';
import * as path from 'path';
import { type OutputConfig, outputPath } from '../config';
import { TOTAL_COLUMN } from '../data/variables';
import { OutputDirectoryError } from '../errors';
import type { UnderFiveTable } from '../types';

// Header row, one record per district, no index column
export function toCsv(table: UnderFiveTable): string {
  const matrix: (string | number)[][] = [
    [...table.columns],
    ...table.rows.map(row => table.columns.map(col => (col === TOTAL_COLUMN ? row.pop_under5 : row.geography[col])))
  ];
  const sheet = XLSX.utils.aoa_to_sheet(matrix);
  return XLSX.utils.sheet_to_csv(sheet, { rawNumbers: true }) + '\n';
}

export async function writeCsv(table: UnderFiveTable, output: OutputConfig): Promise<string> {
  const dir = path.join(output.baseDir, output.dataDir);
  // The directory is never created here
  if (!(await fs.pathExists(dir))) throw new OutputDirectoryError(dir);

  const file = outputPath(output);
  await fs.writeFile(file, toCsv(table), 'utf8');
  return file;
}
