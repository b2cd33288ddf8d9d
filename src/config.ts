import * as path from 'path';

export interface OutputConfig {
  baseDir: string;
  dataDir: string;
  fileName: string;
}

export interface PipelineConfig {
  year: number;
  dataset: string;
  stateFips: string;
  geography: string;
  output: OutputConfig;
}

// baseDir is the working directory at the time the config is resolved
export interface DefaultConfig extends Omit<PipelineConfig, 'output'> {
  output: Omit<OutputConfig, 'baseDir'>;
}

// --- Defaults: ACS 2019 5-year, DC (FIPS 11) upper-chamber districts ---
export const DEFAULT_CONFIG: Readonly<DefaultConfig> = {
  year: 2019,
  dataset: 'acs5',
  stateFips: '11',
  geography: 'state legislative district (upper chamber)',
  output: {
    dataDir: 'data',
    fileName: 'acs_ward_under5_pop.csv'
  }
};

export interface ConfigOverrides extends Partial<Omit<PipelineConfig, 'output'>> {
  output?: Partial<OutputConfig>;
}

// An override left undefined keeps the default
export function resolveConfig(overrides: ConfigOverrides = {}): PipelineConfig {
  const output = overrides.output ?? {};
  return {
    year: overrides.year ?? DEFAULT_CONFIG.year,
    dataset: overrides.dataset ?? DEFAULT_CONFIG.dataset,
    stateFips: overrides.stateFips ?? DEFAULT_CONFIG.stateFips,
    geography: overrides.geography ?? DEFAULT_CONFIG.geography,
    output: {
      baseDir: output.baseDir ?? process.cwd(),
      dataDir: output.dataDir ?? DEFAULT_CONFIG.output.dataDir,
      fileName: output.fileName ?? DEFAULT_CONFIG.output.fileName
    }
  };
}

export function outputPath(output: OutputConfig): string {
  return path.join(output.baseDir, output.dataDir, output.fileName);
}
