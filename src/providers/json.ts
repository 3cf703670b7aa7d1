import { readFile } from 'node:fs/promises';
import { cleanDomain } from '../domain.js';
import { ProviderError, errorMessage } from '../errors.js';
import type { ExpectedRecordProvider } from '../provider.js';
import { FlatRowsSchema, recordsForDomain, type FlatRow } from './rows.js';

/** Parse a JSON array of flat expected-record rows */
export function parseExpectedJson(text: string): FlatRow[] {
  const data: unknown = JSON.parse(text);
  return FlatRowsSchema.parse(data);
}

/** Expected records read from a JSON file; the file is read once */
export function jsonProvider(path: string): ExpectedRecordProvider {
  let rowsPromise: Promise<FlatRow[]> | undefined;

  return {
    name: `json:${path}`,
    async getExpectedRecords(input: string) {
      const domain = cleanDomain(input);
      rowsPromise ??= readFile(path, 'utf8').then(parseExpectedJson);
      let rows: FlatRow[];
      try {
        rows = await rowsPromise;
      } catch (err) {
        rowsPromise = undefined;
        throw new ProviderError(domain, `Cannot read JSON ${path}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      return recordsForDomain(rows, domain, `JSON ${path}`);
    },
  };
}
