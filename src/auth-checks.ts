import { resolveChecks } from './config.js';
import {
  DEPRECATED_RECORDS,
  LEGACY_ALIAS_LABELS,
  M365_DKIM_SELECTORS,
  M365_SPF_INCLUDE,
  M365_SRV_RECORDS,
  SPF_LOOKUP_LIMIT,
} from './constants.js';
import { hostEquals, normalizeHost, toFqdn } from './domain.js';
import { DnsQueryError } from './errors.js';
import { classifyFormat, isM365DkimTarget, isM365MxHost } from './format-rules.js';
import { isDmarcRecord, parseDmarc } from './parse-dmarc.js';
import { isSpfRecord, parseSpf } from './parse-spf.js';
import { renderAnswer, renderMx, renderSrv, renderTxt } from './records.js';
import { lookup, type DnsQuery } from './resolver.js';
import type {
  ActualAnswer,
  AuxCheck,
  CheckCategory,
  CheckSelection,
  DnsRecordType,
  Finding,
} from './types.js';

export interface AuthCheckOptions {
  checks?: Partial<CheckSelection>;
  dkimSelectors?: readonly string[];
  /**
   * `coverageKey` values of names the expected-record comparison already
   * evaluates; MX, DKIM, SRV and alias checks skip those names.
   */
  covered?: ReadonlySet<string>;
}

export function coverageKey(type: DnsRecordType, fqdn: string): string {
  return `${type} ${normalizeHost(fqdn)}`;
}

function faultCheck(category: CheckCategory, name: string, err: DnsQueryError): AuxCheck {
  return { category, name, status: `ERROR - ${err.message}`, passed: false, findings: [] };
}

function missingCheck(
  category: CheckCategory,
  name: string,
  finding: Finding,
  severity: 'CRITICAL' | 'WARNING' = 'CRITICAL'
): AuxCheck {
  return { category, name, status: `${severity} - Missing`, passed: false, findings: [finding] };
}

function txtValues(answers: readonly ActualAnswer[]): string[] {
  return answers.flatMap((a) => (a.recordType === 'TXT' ? [renderTxt(a.value)] : []));
}

/** Apex MX must exist and its preferred host must be a Microsoft 365 endpoint */
export async function checkMx(domain: string, query: DnsQuery): Promise<AuxCheck> {
  const outcome = await lookup(query, domain, 'MX');
  if (outcome instanceof DnsQueryError) return faultCheck('mx', domain, outcome);

  const mx = (outcome ?? [])
    .flatMap((a) => (a.recordType === 'MX' ? [a] : []))
    .sort((a, b) => a.value.preference - b.value.preference);
  const best = mx[0];
  if (!best) {
    return missingCheck('mx', domain, { code: 'MX_MISSING', subject: domain });
  }

  const value = renderMx(best.value);
  if (!isM365MxHost(best.value.exchange)) {
    return {
      category: 'mx',
      name: domain,
      status: 'CRITICAL - Not Microsoft 365',
      passed: false,
      value,
      findings: [{ code: 'MX_MISMATCH', subject: domain, note: normalizeHost(best.value.exchange) }],
    };
  }

  const rule = classifyFormat({ label: '@', answer: best });
  if (rule?.finding) {
    return {
      category: 'mx',
      name: domain,
      status: 'WARNING - Legacy format',
      passed: true,
      value,
      findings: [{ code: rule.finding, subject: domain }],
    };
  }
  return { category: 'mx', name: domain, status: 'OK', passed: true, value, findings: [] };
}

/** One check per selector: `<selector>._domainkey` must CNAME to Microsoft 365 */
export async function checkDkim(
  domain: string,
  query: DnsQuery,
  selectors: readonly string[] = M365_DKIM_SELECTORS
): Promise<AuxCheck[]> {
  return Promise.all(
    selectors.map(async (selector): Promise<AuxCheck> => {
      const label = `${selector}._domainkey`;
      const name = toFqdn(label, domain);
      const outcome = await lookup(query, name, 'CNAME');
      if (outcome instanceof DnsQueryError) return faultCheck('dkim', name, outcome);

      const answer = outcome?.find((a) => a.recordType === 'CNAME');
      if (!answer || answer.recordType !== 'CNAME') {
        return missingCheck('dkim', name, { code: 'DKIM_MISSING', subject: name });
      }

      const value = renderAnswer(answer);
      if (!isM365DkimTarget(answer.value.target)) {
        return {
          category: 'dkim',
          name,
          status: 'CRITICAL - Not Microsoft 365',
          passed: false,
          value,
          findings: [{ code: 'DKIM_MISMATCH', subject: name, note: value }],
        };
      }

      const rule = classifyFormat({ label, answer });
      if (rule?.finding) {
        return {
          category: 'dkim',
          name,
          status: 'WARNING - Legacy format',
          passed: true,
          value,
          findings: [{ code: rule.finding, subject: name }],
        };
      }
      return { category: 'dkim', name, status: 'OK', passed: true, value, findings: [] };
    })
  );
}

/**
 * Apex SPF: exactly one record, including Microsoft 365.
 *
 * The lookup count is approximated by counting literal `include:`
 * mechanisms in the top-level record; nested includes are not resolved,
 * so a record can pass here and still exceed the limit.
 */
export async function checkSpf(domain: string, query: DnsQuery): Promise<AuxCheck> {
  const outcome = await lookup(query, domain, 'TXT');
  if (outcome instanceof DnsQueryError) return faultCheck('spf', domain, outcome);

  const records = txtValues(outcome ?? []).filter(isSpfRecord);
  const [raw] = records;
  if (raw === undefined) {
    return missingCheck('spf', domain, { code: 'SPF_MISSING', subject: domain });
  }
  if (records.length > 1) {
    return {
      category: 'spf',
      name: domain,
      status: 'CRITICAL - Multiple records',
      passed: false,
      value: records.join(' | '),
      findings: [{ code: 'SPF_MULTIPLE', subject: domain, note: String(records.length) }],
    };
  }

  const spf = parseSpf(raw);
  const findings: Finding[] = [];
  const reasons: string[] = [];
  const includesM365 = spf?.includes.some((i) => hostEquals(i, M365_SPF_INCLUDE)) ?? false;

  if (!includesM365) {
    findings.push({ code: 'SPF_NO_M365_INCLUDE', subject: domain });
  }
  if (spf && spf.includeCount > SPF_LOOKUP_LIMIT) {
    findings.push({ code: 'SPF_LOOKUP_LIMIT', subject: domain, note: String(spf.includeCount) });
    reasons.push('Too many includes');
  }
  if (spf?.all && spf.all !== '-') {
    findings.push({ code: 'SPF_WEAK_ALL', subject: domain, note: `${spf.all}all` });
    reasons.push('Weak all mechanism');
  }

  const [reason] = reasons;
  const status = !includesM365
    ? 'CRITICAL - Missing Microsoft 365 include'
    : reason
      ? `WARNING - ${reason}`
      : 'OK';
  return { category: 'spf', name: domain, status, passed: includesM365, value: raw, findings };
}

/** `_dmarc` must publish a policy other than `p=none` */
export async function checkDmarc(domain: string, query: DnsQuery): Promise<AuxCheck> {
  const name = toFqdn('_dmarc', domain);
  const outcome = await lookup(query, name, 'TXT');
  if (outcome instanceof DnsQueryError) return faultCheck('dmarc', name, outcome);

  const raw = txtValues(outcome ?? []).find(isDmarcRecord);
  if (raw === undefined) {
    return missingCheck('dmarc', name, { code: 'DMARC_MISSING', subject: name });
  }

  const dmarc = parseDmarc(raw);
  if (!dmarc) {
    return {
      category: 'dmarc',
      name,
      status: 'CRITICAL - Invalid',
      passed: false,
      value: raw,
      findings: [{ code: 'DMARC_INVALID', subject: name }],
    };
  }

  const findings: Finding[] = [];
  const reasons: string[] = [];
  if (dmarc.p === 'none') {
    findings.push({ code: 'DMARC_POLICY_NONE', subject: name });
    reasons.push('Policy none');
  }
  if (!dmarc.rua || dmarc.rua.length === 0) {
    findings.push({ code: 'DMARC_NO_RUA', subject: name });
    reasons.push('No aggregate reports');
  }
  if (dmarc.pct !== undefined && dmarc.pct < 100) {
    findings.push({ code: 'DMARC_PARTIAL_PCT', subject: name, note: String(dmarc.pct) });
    reasons.push('Partial enforcement');
  }

  const [reason] = reasons;
  return {
    category: 'dmarc',
    name,
    status: reason ? `WARNING - ${reason}` : 'OK',
    passed: dmarc.p !== 'none',
    value: raw,
    findings,
  };
}

/**
 * Deprecated records fail the category whatever they point at. Legacy
 * Skype for Business aliases are reported but do not fail it.
 */
export async function checkDeprecated(
  domain: string,
  query: DnsQuery,
  covered: ReadonlySet<string> = new Set()
): Promise<AuxCheck[]> {
  const deprecated = DEPRECATED_RECORDS.map(async (record): Promise<AuxCheck> => {
    const name = toFqdn(record.label, domain);
    const outcome = await lookup(query, name, record.recordType);
    if (outcome instanceof DnsQueryError) return faultCheck('deprecated', name, outcome);
    const first = outcome?.[0];
    if (!first) {
      return { category: 'deprecated', name, status: 'OK', passed: true, findings: [] };
    }
    return {
      category: 'deprecated',
      name,
      status: 'CRITICAL - Found',
      passed: false,
      value: renderAnswer(first),
      findings: [{ code: 'DEPRECATED_RECORD', subject: name, note: record.reason }],
    };
  });

  const aliases = LEGACY_ALIAS_LABELS.filter(
    (label) => !covered.has(coverageKey('CNAME', toFqdn(label, domain)))
  ).map(async (label): Promise<AuxCheck> => {
    const name = toFqdn(label, domain);
    const outcome = await lookup(query, name, 'CNAME');
    if (outcome instanceof DnsQueryError) return faultCheck('deprecated', name, outcome);
    const first = outcome?.[0];
    if (!first) {
      return { category: 'deprecated', name, status: 'OK', passed: true, findings: [] };
    }
    return {
      category: 'deprecated',
      name,
      status: 'WARNING - Legacy alias',
      passed: true,
      value: renderAnswer(first),
      findings: [{ code: 'LEGACY_ALIAS', subject: name }],
    };
  });

  return Promise.all([...deprecated, ...aliases]);
}

/** Skype for Business / Teams federation SRV records */
export async function checkSrv(
  domain: string,
  query: DnsQuery,
  covered: ReadonlySet<string> = new Set()
): Promise<AuxCheck[]> {
  const pending = M365_SRV_RECORDS.filter(
    (record) => !covered.has(coverageKey('SRV', toFqdn(record.label, domain)))
  ).map(async (record): Promise<AuxCheck> => {
    const name = toFqdn(record.label, domain);
    const outcome = await lookup(query, name, 'SRV');
    if (outcome instanceof DnsQueryError) return faultCheck('srv', name, outcome);

    const srv = (outcome ?? []).flatMap((a) => (a.recordType === 'SRV' ? [a] : []));
    const first = srv[0];
    if (!first) {
      return missingCheck('srv', name, { code: 'SRV_MISSING', subject: name }, 'WARNING');
    }
    const hit = srv.find(
      (a) => a.value.port === record.port && hostEquals(a.value.target, record.target)
    );
    if (!hit) {
      return {
        category: 'srv',
        name,
        status: 'WARNING - Mismatch',
        passed: false,
        value: renderSrv(first.value),
        findings: [{ code: 'SRV_MISMATCH', subject: name }],
      };
    }
    return { category: 'srv', name, status: 'OK', passed: true, value: renderSrv(hit.value), findings: [] };
  });
  return Promise.all(pending);
}

/**
 * Run the auxiliary checks for the requested categories, in the fixed
 * order mx, dkim, spf, dmarc, deprecated, srv.
 */
export async function runAuthChecks(
  domain: string,
  query: DnsQuery,
  options: AuthCheckOptions = {}
): Promise<AuxCheck[]> {
  const checks = resolveChecks(options.checks);
  const covered = options.covered ?? new Set<string>();
  const selectors = (options.dkimSelectors ?? M365_DKIM_SELECTORS).filter(
    (s) => !covered.has(coverageKey('CNAME', toFqdn(`${s}._domainkey`, domain)))
  );

  const groups = await Promise.all([
    checks.mx && !covered.has(coverageKey('MX', domain))
      ? checkMx(domain, query).then((c) => [c])
      : [],
    checks.dkim ? checkDkim(domain, query, selectors) : [],
    checks.spf ? checkSpf(domain, query).then((c) => [c]) : [],
    checks.dmarc ? checkDmarc(domain, query).then((c) => [c]) : [],
    checks.deprecated ? checkDeprecated(domain, query, covered) : [],
    checks.srv ? checkSrv(domain, query, covered) : [],
  ]);
  return groups.flat();
}
