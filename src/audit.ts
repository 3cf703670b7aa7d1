import { coverageKey, runAuthChecks } from './auth-checks.js';
import { compareRecord, summarizeComparisons } from './compare.js';
import {
  parseAuditSettings,
  reportedChecks,
  type AuditSettings,
  type AuditSettingsInput,
} from './config.js';
import { cleanDomain, toFqdn } from './domain.js';
import { ConfigError, errorMessage } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { mapWithConcurrency } from './pool.js';
import type { ExpectedRecordProvider } from './provider.js';
import { createQuery, lookup, type DnsQuery } from './resolver.js';
import { scoreDomain } from './score.js';
import type {
  AuxCheck,
  ComparisonResult,
  ComparisonStatus,
  ComplianceAssessment,
  ExpectedRecord,
} from './types.js';

export interface AuditOptions extends AuditSettingsInput {
  /** Replaces the backend built from `backend`/`server`/`dohEndpoint` */
  query?: DnsQuery;
  logger?: Logger;
}

/** Everything computed for one domain */
export interface DomainAudit {
  domain: string;
  comparisons: ComparisonResult[];
  authChecks: AuxCheck[];
  assessment: ComplianceAssessment;
  summary: Record<ComparisonStatus, number>;
}

export interface SkippedDomain {
  domain: string;
  reason: string;
}

export interface BatchAudit {
  /** Input order, audited domains only */
  results: DomainAudit[];
  /** Domains whose provider produced no records */
  skipped: SkippedDomain[];
}

/**
 * Compare expected records against live DNS, at most `concurrency`
 * lookups at a time. Results follow the order of `records`.
 */
export async function compareRecords(
  records: readonly ExpectedRecord[],
  query: DnsQuery,
  concurrency = 5
): Promise<ComparisonResult[]> {
  return mapWithConcurrency(records, concurrency, async (record) => {
    const outcome = await lookup(query, toFqdn(record.label, record.domain), record.recordType);
    return compareRecord(record, outcome);
  });
}

async function auditWithSettings(
  domain: string,
  records: readonly ExpectedRecord[],
  settings: AuditSettings,
  query: DnsQuery,
  log: Logger
): Promise<DomainAudit> {
  log.debug('Auditing domain', { domain, records: records.length });

  const comparisons = await compareRecords(records, query, settings.concurrency);
  const covered = new Set(
    records.map((r) => coverageKey(r.recordType, toFqdn(r.label, r.domain)))
  );
  const authChecks = await runAuthChecks(domain, query, {
    checks: reportedChecks(settings.checks, settings.profile),
    dkimSelectors: settings.dkimSelectors,
    covered,
  });
  const assessment = scoreDomain(domain, comparisons, authChecks, {
    profile: settings.profile,
    checks: settings.checks,
  });

  log.info('Domain audited', {
    domain,
    score: assessment.score,
    tier: assessment.tier,
  });

  return {
    domain,
    comparisons,
    authChecks,
    assessment,
    summary: summarizeComparisons(comparisons),
  };
}

/** Audit one domain against records the caller already has */
export async function auditDomain(
  domain: string,
  records: readonly ExpectedRecord[],
  options: AuditOptions = {}
): Promise<DomainAudit> {
  const settings = parseAuditSettings(options);
  const query = options.query ?? createQuery(settings);
  const log = (options.logger ?? rootLogger).child('audit');
  return auditWithSettings(cleanDomain(domain), records, settings, query, log);
}

/**
 * Audit several domains with records from one provider.
 *
 * Settings are validated first; a `ConfigError` is thrown before any
 * domain is touched. A provider failure for one domain is logged and the
 * domain is listed in `skipped`; every other fault is reported in the
 * results.
 */
export async function auditDomains(
  domains: readonly string[],
  provider: ExpectedRecordProvider,
  options: AuditOptions = {}
): Promise<BatchAudit> {
  const settings = parseAuditSettings(options);
  const cleaned = domains.map(cleanDomain).filter((d) => d.length > 0);
  if (cleaned.length === 0) {
    throw new ConfigError('No domains to audit');
  }

  const query = options.query ?? createQuery(settings);
  const log = (options.logger ?? rootLogger).child('audit');

  const outcomes = await mapWithConcurrency(
    cleaned,
    settings.domainConcurrency,
    async (domain): Promise<DomainAudit | SkippedDomain> => {
      let records: ExpectedRecord[];
      try {
        records = await provider.getExpectedRecords(domain);
      } catch (err) {
        const reason = errorMessage(err);
        log.warn('Skipping domain: provider failed', { domain, provider: provider.name }, err instanceof Error ? err : undefined);
        return { domain, reason };
      }
      if (records.length === 0) {
        const reason = `${provider.name} returned no expected records`;
        log.warn('Skipping domain: no expected records', { domain, provider: provider.name });
        return { domain, reason };
      }
      return auditWithSettings(domain, records, settings, query, log);
    }
  );

  const results: DomainAudit[] = [];
  const skipped: SkippedDomain[] = [];
  for (const outcome of outcomes) {
    if ('assessment' in outcome) {
      results.push(outcome);
    } else {
      skipped.push(outcome);
    }
  }
  return { results, skipped };
}
