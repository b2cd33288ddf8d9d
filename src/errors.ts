export type PipelineStage = 'fetch' | 'shape' | 'write';

export class PipelineError extends Error {
  constructor(readonly stage: PipelineStage, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/**
 * Census API answered with anything other than 200.
 */
export class CensusApiError extends PipelineError {
  readonly code = 'CENSUS_API_ERROR';

  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly url: string,
    body: string
  ) {
    super('fetch', `Census API returned ${status} ${statusText} for ${url}` + excerptOf(body));
    this.name = 'CensusApiError';
  }
}

function excerptOf(body: string): string {
  const text = body.trim().slice(0, 200);
  return text ? `\n${text}` : '';
}

export class ResponseFormatError extends PipelineError {
  readonly code = 'RESPONSE_FORMAT_ERROR';

  constructor(message: string, options?: ErrorOptions) {
    super('fetch', message, options);
    this.name = 'ResponseFormatError';
  }
}

export class SchemaMismatchError extends PipelineError {
  readonly code = 'SCHEMA_MISMATCH';

  constructor(message: string) {
    super('shape', message);
    this.name = 'SchemaMismatchError';
  }
}

export class ValueParseError extends PipelineError {
  readonly code = 'VALUE_PARSE_ERROR';

  constructor(
    readonly row: number,
    readonly column: string,
    readonly value: string
  ) {
    super('shape', `Row ${row}: column "${column}" is not an integer: "${value}"`);
    this.name = 'ValueParseError';
  }
}

export class OutputDirectoryError extends PipelineError {
  readonly code = 'OUTPUT_DIRECTORY_MISSING';

  constructor(readonly directory: string) {
    super('write', `Output directory does not exist: ${directory}`);
    this.name = 'OutputDirectoryError';
  }
}
