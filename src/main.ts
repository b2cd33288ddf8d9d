import { type ConfigOverrides, resolveConfig } from './config';
import { consoleLogger } from './logger';
import { type PipelineDeps, runPipeline } from './pipeline';

// Any failure is logged and leaves exit code 1; success leaves it untouched
export async function main(deps: PipelineDeps = {}, overrides: ConfigOverrides = {}): Promise<void> {
  const logger = deps.logger ?? consoleLogger;
  try {
    await runPipeline(resolveConfig(overrides), { ...deps, logger });
  } catch (err) {
    logger.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exitCode = 1;
  }
}
