import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { cleanDomain } from '../domain.js';
import { ProviderError, errorMessage } from '../errors.js';
import type { ExpectedRecordProvider } from '../provider.js';
import type { ComparisonResult } from '../types.js';
import { recordsForDomain } from './rows.js';

export const BaselineRowSchema = z.object({
  Domain: z.string().min(1),
  RecordType: z.string().min(1),
  Label: z.string(),
  ExpectedValue: z.string(),
  SupportedService: z.string(),
  IsOptional: z.boolean(),
  TTL: z.number().int().nonnegative(),
  Fqdn: z.string().optional(),
  Status: z.enum(['Match', 'Mismatch', 'Missing', 'Error']).optional(),
  ActualValue: z.string().optional(),
  FormatNote: z.string().optional(),
});

export type BaselineRow = z.infer<typeof BaselineRowSchema>;

const BaselineSchema = z.array(BaselineRowSchema);

/** One snapshot row per comparison; the expected side is what gets replayed */
export function toBaselineRow(result: ComparisonResult): BaselineRow {
  const row: BaselineRow = {
    Domain: result.domain,
    RecordType: result.recordType,
    Label: result.label,
    ExpectedValue: result.expectedValue,
    SupportedService: result.supportedService,
    IsOptional: result.isOptional,
    TTL: result.ttl,
    Fqdn: result.fqdn,
    Status: result.status,
  };
  if (result.actualValue !== undefined) row.ActualValue = result.actualValue;
  if (result.formatNote !== undefined) row.FormatNote = result.formatNote;
  return row;
}

/** Write a baseline snapshot of a comparison run */
export async function saveBaseline(
  path: string,
  comparisons: readonly ComparisonResult[]
): Promise<BaselineRow[]> {
  const rows = comparisons.map(toBaselineRow);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(rows, null, 2)}\n`, 'utf8');
  return rows;
}

export function parseBaseline(text: string): BaselineRow[] {
  return BaselineSchema.parse(JSON.parse(text));
}

export async function readBaseline(path: string): Promise<BaselineRow[]> {
  return parseBaseline(await readFile(path, 'utf8'));
}

/**
 * Replay a baseline snapshot as the expected record set, so a later run
 * reports drift from the captured state.
 */
export function baselineProvider(source: string | readonly BaselineRow[]): ExpectedRecordProvider {
  let rowsPromise: Promise<readonly BaselineRow[]> | undefined =
    typeof source === 'string' ? undefined : Promise.resolve(source);
  const name = typeof source === 'string' ? `baseline:${source}` : 'baseline';

  return {
    name,
    async getExpectedRecords(input: string) {
      const domain = cleanDomain(input);
      if (typeof source === 'string') {
        rowsPromise ??= readBaseline(source);
      }
      let rows: readonly BaselineRow[] = [];
      try {
        rows = (await rowsPromise) ?? [];
      } catch (err) {
        rowsPromise = undefined;
        throw new ProviderError(domain, `Cannot read baseline ${name}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      return recordsForDomain(rows, domain, name);
    },
  };
}
