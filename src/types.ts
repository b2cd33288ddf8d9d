// Raw Census API payload: row 0 is the header, every cell is a string
export type RawCensusTable = string[][];

export type MeasureColumn = 'pop_under5_male' | 'pop_under5_female';

export type Geography = Readonly<Record<string, string>>;

export interface ShapedRow {
  pop_under5_male: number;   // B01001_003E
  pop_under5_female: number; // B01001_027E
  geography: Geography;      // state + district identifiers, as returned
}

export interface ShapedTable {
  geographyColumns: readonly string[];
  rows: ShapedRow[];
}

export interface UnderFiveRow {
  geography: Geography;
  pop_under5: number;
}

export interface UnderFiveTable {
  columns: readonly string[]; // retained geography columns, then pop_under5
  rows: UnderFiveRow[];
}

export interface TableSummary {
  rowCount: number;
  columns: readonly string[];
  totalUnderFive: number;
}

export type FetchResult =
  | { ok: true; table: RawCensusTable }
  | { ok: false; status: number; statusText: string; body: string };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
