import { main } from './main';

export { DEFAULT_CONFIG, resolveConfig, outputPath } from './config';
export type { PipelineConfig, OutputConfig, ConfigOverrides, DefaultConfig } from './config';
export { main } from './main';
export * from './errors';
export { runPipeline } from './pipeline';
export type { PipelineDeps, PipelineResult } from './pipeline';
export { buildQueryUrl } from './stages/query';
export { fetchCensusTable, decodeCensusTable } from './stages/fetch';
export { shapeTable } from './stages/shape';
export { aggregateUnderFive, summarizeTable } from './stages/aggregate';
export { toCsv, writeCsv } from './stages/write';
export type * from './types';

if (require.main === module) {
  void main();
}
