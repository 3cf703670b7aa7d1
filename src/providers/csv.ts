import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { cleanDomain } from '../domain.js';
import { ProviderError, errorMessage } from '../errors.js';
import type { ExpectedRecordProvider } from '../provider.js';
import { FlatRowsSchema, recordsForDomain, type FlatRow } from './rows.js';

export interface CsvProviderOptions {
  /** Field delimiter; defaults to `,` */
  delimiter?: string;
}

/**
 * Parse CSV text into flat rows keyed by header name.
 *
 * Expected columns: `Domain, Label, RecordType, ExpectedValue,
 * SupportedService, IsOptional, TTL`, optionally `Priority, Weight, Port`.
 */
export function parseExpectedCsv(text: string, options: CsvProviderOptions = {}): FlatRow[] {
  const rows: unknown = parse(text, {
    columns: true,
    bom: true,
    trim: true,
    skip_empty_lines: true,
    delimiter: options.delimiter ?? ',',
  });
  return FlatRowsSchema.parse(rows);
}

/** Expected records read from a CSV file; the file is read once */
export function csvProvider(path: string, options: CsvProviderOptions = {}): ExpectedRecordProvider {
  let rowsPromise: Promise<FlatRow[]> | undefined;

  async function loadRows(): Promise<FlatRow[]> {
    const text = await readFile(path, 'utf8');
    return parseExpectedCsv(text, options);
  }

  return {
    name: `csv:${path}`,
    async getExpectedRecords(input: string) {
      const domain = cleanDomain(input);
      rowsPromise ??= loadRows();
      let rows: FlatRow[];
      try {
        rows = await rowsPromise;
      } catch (err) {
        rowsPromise = undefined;
        throw new ProviderError(domain, `Cannot read CSV ${path}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      return recordsForDomain(rows, domain, `CSV ${path}`);
    },
  };
}
