import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { CheckSelection, ScoreProfile } from './types.js';

/** Categories scored when the caller does not say otherwise */
export const DEFAULT_CHECKS: CheckSelection = {
  mx: true,
  dkim: true,
  spf: true,
  dmarc: false,
  deprecated: true,
  srv: false,
};

export const CheckSelectionSchema = z
  .object({
    mx: z.boolean(),
    dkim: z.boolean(),
    spf: z.boolean(),
    dmarc: z.boolean(),
    deprecated: z.boolean(),
    srv: z.boolean(),
  })
  .partial()
  .strict();

export const BackendSchema = z.union([z.literal('standard'), z.literal('doh')]);

export const QueryOptionsSchema = z.object({
  backend: BackendSchema.default('standard'),
  server: z.string().ip().optional(),
  dohEndpoint: z.string().url().startsWith('https://').optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const AuditSettingsSchema = QueryOptionsSchema.extend({
  /** Expected records compared in parallel per domain */
  concurrency: z.number().int().min(1).max(64).default(5),
  /** Domains audited in parallel */
  domainConcurrency: z.number().int().min(1).max(16).default(2),
  profile: z.union([z.literal('health'), z.literal('readiness')]).default('health'),
  checks: CheckSelectionSchema.default({}),
  dkimSelectors: z.array(z.string().regex(/^[a-z0-9-]+$/i)).min(1).default(['selector1', 'selector2']),
});

export type AuditSettingsInput = z.input<typeof AuditSettingsSchema>;

export type AuditSettings = Omit<z.output<typeof AuditSettingsSchema>, 'checks'> & {
  checks: CheckSelection;
};

export const PropagationSettingsSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['MX', 'CNAME', 'TXT', 'SRV', 'A', 'AAAA']),
  expectedValue: z.string().min(1).optional(),
  intervalMs: z.number().int().positive().default(30_000),
  maxDurationMs: z.number().int().positive().optional(),
});

export type PropagationSettingsInput = z.input<typeof PropagationSettingsSchema>;
export type PropagationSettings = z.output<typeof PropagationSettingsSchema>;

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/** Fill `checks` from the defaults */
export function resolveChecks(partial: Partial<CheckSelection> = {}): CheckSelection {
  return { ...DEFAULT_CHECKS, ...partial };
}

/**
 * Categories whose checks run and whose findings are reported. The
 * readiness tier depends on SPF and DMARC, so that profile always
 * evaluates them; the score still counts only the selected categories.
 */
export function reportedChecks(checks: CheckSelection, profile: ScoreProfile): CheckSelection {
  return profile === 'readiness' ? { ...checks, spf: true, dmarc: true } : checks;
}

/**
 * Validate audit settings. Invalid input is a configuration fault and
 * throws `ConfigError` before anything is queried.
 */
export function parseAuditSettings(input: AuditSettingsInput = {}): AuditSettings {
  const parsed = AuditSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid audit settings', issuesOf(parsed.error));
  }
  return { ...parsed.data, checks: resolveChecks(parsed.data.checks) };
}

export function parsePropagationSettings(
  input: PropagationSettingsInput
): PropagationSettings {
  const parsed = PropagationSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid propagation settings', issuesOf(parsed.error));
  }
  return parsed.data;
}

export const SourceConfigSchema = z
  .object({
    graph: z.object({
      accessToken: z.string().min(1),
      baseUrl: z.string().url().optional(),
    }),
    csvPath: z.string().min(1),
    jsonPath: z.string().min(1),
    baselinePath: z.string().min(1),
  })
  .partial()
  .strict();

export type SourceConfig = z.infer<typeof SourceConfigSchema>;

/**
 * Validate an expected-record source selection: exactly one source.
 */
export function parseSourceConfig(input: SourceConfig): SourceConfig {
  const parsed = SourceConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid expected-record source', issuesOf(parsed.error));
  }
  const chosen = Object.entries(parsed.data)
    .filter(([, value]) => value !== undefined)
    .map(([key]) => key);
  if (chosen.length !== 1) {
    throw new ConfigError(
      chosen.length === 0
        ? 'No expected-record source given; set one of graph, csvPath, jsonPath, baselinePath'
        : `Expected-record sources are mutually exclusive, got ${chosen.join(', ')}`
    );
  }
  return parsed.data;
}
