import type { MeasureColumn } from '../types';

// ACS 5-year detailed table B01001 (Sex by Age)
// https://api.census.gov/data/2019/acs/acs5/variables.html
export interface CensusVariable {
  code: string;
  name: MeasureColumn;
}

export const VARIABLES: readonly CensusVariable[] = [
  { code: 'B01001_003E', name: 'pop_under5_male' },   // Male: Under 5 years
  { code: 'B01001_027E', name: 'pop_under5_female' }  // Female: Under 5 years
];

export const STATE_COLUMN = 'state';
export const TOTAL_COLUMN = 'pop_under5';

export interface ColumnSpec {
  source: string;
  name: string;
  type: 'integer' | 'string';
}

// Columns the response must carry; anything else is a geography identifier
export const CENSUS_SCHEMA: readonly ColumnSpec[] = [
  ...VARIABLES.map((v): ColumnSpec => ({ source: v.code, name: v.name, type: 'integer' })),
  { source: STATE_COLUMN, name: STATE_COLUMN, type: 'string' }
];
