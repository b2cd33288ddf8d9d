import { z } from 'zod';
import { ResponseFormatError } from '../errors';
import type { FetchLike, FetchResult, RawCensusTable } from '../types';

// Header row plus data rows, every cell a string
export const RawCensusTableSchema = z.array(z.array(z.string())).min(1);

export async function fetchCensusTable(url: string, fetchImpl: FetchLike = fetch): Promise<FetchResult> {
  const response = await fetchImpl(url, {
    method: 'GET',
    headers: { 'Content-Type': 'application/json' }
  });

  if (response.status !== 200) {
    const body = await response.text();
    return { ok: false, status: response.status, statusText: response.statusText, body };
  }

  const bytes = new Uint8Array(await response.arrayBuffer());
  return { ok: true, table: decodeCensusTable(bytes) };
}

export function decodeCensusTable(bytes: Uint8Array): RawCensusTable {
  const text = new TextDecoder('utf-8').decode(bytes);

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ResponseFormatError(`Census API response is not valid JSON: ${text.slice(0, 100)}`, { cause: err });
  }

  const parsed = RawCensusTableSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at [${issue.path.join('][')}]` : '';
    throw new ResponseFormatError(`Census API response is not a table of strings${where}: ${issue?.message ?? 'invalid'}`, {
      cause: parsed.error
    });
  }
  return parsed.data;
}
