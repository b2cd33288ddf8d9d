import type { PipelineConfig } from '../config';
import { VARIABLES } from '../data/variables';

export const CENSUS_API_BASE = 'https://api.census.gov/data';

// API guidance: https://www.census.gov/programs-surveys/acs/guidance/handbooks/api.html
export function buildQueryUrl(config: Pick<PipelineConfig, 'year' | 'dataset' | 'stateFips' | 'geography'>): string {
  const codes = VARIABLES.map(v => v.code).join(',');
  const forClause = `${encodeURIComponent(config.geography)}:*`;
  const inClause = `state:${encodeURIComponent(config.stateFips)}`;
  return `${CENSUS_API_BASE}/${config.year}/acs/${config.dataset}?get=${codes}&for=${forClause}&in=${inClause}`;
}
