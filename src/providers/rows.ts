import { z } from 'zod';
import { cleanDomain, toLabel } from '../domain.js';
import { ProviderError, RecordFormatError, errorMessage } from '../errors.js';
import { buildExpectedRecord, parseRecordType } from '../records.js';
import type { ExpectedRecord } from '../types.js';

/**
 * Column names accepted in flat rows, matched case-insensitively.
 * CSV exports, hand-written JSON and baseline snapshots all use these.
 */
const FIELD_ALIASES = {
  domain: ['domain', 'domainname'],
  label: ['label', 'name', 'host'],
  recordType: ['recordtype', 'type'],
  expectedValue: ['expectedvalue', 'value', 'data'],
  supportedService: ['supportedservice', 'service'],
  isOptional: ['isoptional', 'optional'],
  ttl: ['ttl'],
  preference: ['preference'],
  priority: ['priority'],
  weight: ['weight'],
  port: ['port'],
} as const;

type FieldName = keyof typeof FIELD_ALIASES;

const blank = (value: unknown): unknown =>
  value === '' || value === null ? undefined : value;

const optionalInt = z.preprocess(blank, z.coerce.number().int().nonnegative().optional());

const booleanish = z.preprocess(
  blank,
  z
    .union([z.boolean(), z.string(), z.number()])
    .transform((v) =>
      typeof v === 'string' ? /^(true|yes|y|1)$/i.test(v.trim()) : Boolean(v)
    )
    .default(false)
);

const NormalizedRowSchema = z.object({
  domain: z.preprocess(blank, z.string().min(1).optional()),
  label: z.preprocess(blank, z.coerce.string().default('@')),
  recordType: z.string().min(1),
  expectedValue: z.preprocess(blank, z.union([z.string(), z.number()]).transform(String)),
  supportedService: z.preprocess(blank, z.coerce.string().default('')),
  isOptional: booleanish,
  ttl: z.preprocess(blank, z.coerce.number().int().nonnegative().default(3600)),
  preference: optionalInt,
  priority: optionalInt,
  weight: optionalInt,
  port: optionalInt,
});

export type FlatRow = Record<string, unknown>;

export const FlatRowsSchema = z.array(z.record(z.string(), z.unknown()));

function pickFields(row: FlatRow): Partial<Record<FieldName, unknown>> {
  const byKey = new Map(
    Object.entries(row).map(([key, value]) => [key.trim().toLowerCase(), value])
  );
  const picked: Partial<Record<FieldName, unknown>> = {};
  for (const [field, aliases] of Object.entries(FIELD_ALIASES)) {
    const alias = aliases.find((a) => byKey.has(a));
    if (alias !== undefined && isFieldName(field)) {
      picked[field] = byKey.get(alias);
    }
  }
  return picked;
}

function isFieldName(key: string): key is FieldName {
  return key in FIELD_ALIASES;
}

/** Domain a row belongs to, or `undefined` when the row has none */
export function rowDomain(row: FlatRow): string | undefined {
  const value = pickFields(row).domain;
  return typeof value === 'string' && value.trim() ? cleanDomain(value) : undefined;
}

/**
 * Map one flat row into an `ExpectedRecord`. Rows without a domain column
 * take `fallbackDomain`.
 */
export function rowToExpectedRecord(row: FlatRow, fallbackDomain?: string): ExpectedRecord {
  const parsed = NormalizedRowSchema.safeParse(pickFields(row));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new RecordFormatError(`Invalid expected record row: ${issues.join('; ')}`);
  }
  const fields = parsed.data;
  const domain = fields.domain ? cleanDomain(fields.domain) : fallbackDomain;
  if (!domain) {
    throw new RecordFormatError('Expected record row has no domain');
  }

  return buildExpectedRecord(
    {
      domain,
      label: toLabel(fields.label, domain),
      isOptional: fields.isOptional,
      ttl: fields.ttl,
      supportedService: fields.supportedService,
    },
    parseRecordType(fields.recordType),
    fields.expectedValue,
    {
      preference: fields.preference,
      priority: fields.priority,
      weight: fields.weight,
      port: fields.port,
    }
  );
}

/**
 * Select and map the rows of one domain. Rows without a domain column are
 * taken as belonging to every domain asked for.
 */
export function recordsForDomain(
  rows: readonly FlatRow[],
  domain: string,
  source: string
): ExpectedRecord[] {
  const records: ExpectedRecord[] = [];
  rows.forEach((row, index) => {
    const owner = rowDomain(row);
    if (owner !== undefined && owner !== domain) return;
    try {
      records.push(rowToExpectedRecord(row, domain));
    } catch (err) {
      throw new ProviderError(
        domain,
        `${source} row ${index + 1}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  });
  if (records.length === 0) {
    throw new ProviderError(domain, `${source} has no rows for ${domain}`);
  }
  return records;
}
