import type { PipelineConfig } from './config';
import { CensusApiError } from './errors';
import { consoleLogger, type Logger } from './logger';
import { aggregateUnderFive, summarizeTable } from './stages/aggregate';
import { fetchCensusTable } from './stages/fetch';
import { buildQueryUrl } from './stages/query';
import { shapeTable } from './stages/shape';
import { writeCsv } from './stages/write';
import type { FetchLike, TableSummary, UnderFiveTable } from './types';

export interface PipelineDeps {
  fetch?: FetchLike;
  logger?: Logger;
}

export interface PipelineResult {
  url: string;
  table: UnderFiveTable;
  summary: TableSummary;
  outputPath: string;
}

/**
 * Query → fetch → shape → aggregate → write, in that order.
 *
 * A non-200 response throws CensusApiError before anything reaches disk.
 */
export async function runPipeline(config: PipelineConfig, deps: PipelineDeps = {}): Promise<PipelineResult> {
  const logger = deps.logger ?? consoleLogger;

  const url = buildQueryUrl(config);
  logger.log(`\n🚜 Requesting ACS ${config.year} ${config.dataset} for state ${config.stateFips}`);
  logger.log(`   ${url}`);

  const result = await fetchCensusTable(url, deps.fetch);
  if (!result.ok) {
    throw new CensusApiError(result.status, result.statusText, url, result.body);
  }
  logger.log(`   Received ${result.table.length - 1} rows`);

  const table = aggregateUnderFive(shapeTable(result.table));

  const summary = summarizeTable(table);
  logger.log(`\n📊 ${summary.rowCount} rows × ${summary.columns.length} columns [${summary.columns.join(', ')}]`);
  logger.log(`   Total population under 5: ${summary.totalUnderFive}`);

  const outputPath = await writeCsv(table, config.output);
  logger.success(`Wrote ${summary.rowCount} records to ${outputPath}`);

  return { url, table, summary, outputPath };
}
