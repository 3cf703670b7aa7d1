import {
  LEGACY_ALIAS_LABELS,
  LEGACY_MX_SUFFIX,
  MODERN_DKIM_SUFFIX,
  MODERN_MX_SUFFIX,
} from './constants.js';
import { normalizeHost } from './domain.js';
import type { ActualAnswer, DnsRecordType, FindingCode } from './types.js';

/** What a format rule sees: the record's label and one actual answer */
export interface FormatSubject {
  /** Label relative to the domain ("@" for the apex) */
  label: string;
  answer: ActualAnswer;
}

export interface FormatRule {
  recordType: DnsRecordType;
  /** Becomes `ComparisonResult.formatNote` */
  formatLabel: string;
  matches: (subject: FormatSubject) => boolean;
  /** Finding raised when this rule classifies a live record */
  finding?: FindingCode;
  /** Appended to `ComparisonResult.details` */
  advisory?: (subject: FormatSubject) => string;
}

const DKIM_LABEL = /^selector\d+\._domainkey$/i;

/** selector1-contoso-com._domainkey.contoso.onmicrosoft.com */
const LEGACY_DKIM_TARGET = /\._domainkey\.[a-z0-9-]+\.onmicrosoft\.com$/;

export function isDkimLabel(label: string): boolean {
  return DKIM_LABEL.test(normalizeHost(label));
}

function hostOf(answer: ActualAnswer): string | undefined {
  switch (answer.recordType) {
    case 'MX':
      return normalizeHost(answer.value.exchange);
    case 'CNAME':
      return normalizeHost(answer.value.target);
    case 'SRV':
      return normalizeHost(answer.value.target);
    default:
      return undefined;
  }
}

function hostEndsWith(subject: FormatSubject, suffix: string): boolean {
  return hostOf(subject.answer)?.endsWith(suffix) ?? false;
}

/**
 * Ordered classification table. Rules are tried top-down and the first
 * rule whose record type and predicate match wins.
 */
export const FORMAT_RULES: readonly FormatRule[] = [
  {
    recordType: 'MX',
    formatLabel: 'legacy MX format',
    matches: (s) => hostEndsWith(s, LEGACY_MX_SUFFIX),
    finding: 'MX_LEGACY',
  },
  {
    recordType: 'MX',
    formatLabel: 'modern MX format',
    matches: (s) => hostEndsWith(s, MODERN_MX_SUFFIX),
  },
  {
    recordType: 'CNAME',
    formatLabel: 'legacy DKIM format',
    matches: (s) =>
      isDkimLabel(s.label) && LEGACY_DKIM_TARGET.test(hostOf(s.answer) ?? ''),
    finding: 'DKIM_LEGACY',
    advisory: () =>
      'DKIM CNAME points to the legacy onmicrosoft.com target; rotate to the dkim.mail.microsoft target',
  },
  {
    recordType: 'CNAME',
    formatLabel: 'modern DKIM format',
    matches: (s) => isDkimLabel(s.label) && hostEndsWith(s, MODERN_DKIM_SUFFIX),
  },
  {
    recordType: 'CNAME',
    formatLabel: 'legacy Skype for Business alias',
    matches: (s) =>
      LEGACY_ALIAS_LABELS.some((alias) => alias === normalizeHost(s.label)),
    finding: 'LEGACY_ALIAS',
    advisory: (s) =>
      `${s.label} is a Skype for Business Online alias; Teams-only tenants can remove it`,
  },
];

/** First rule matching the subject, if any */
export function classifyFormat(
  subject: FormatSubject,
  rules: readonly FormatRule[] = FORMAT_RULES
): FormatRule | undefined {
  return rules.find(
    (rule) => rule.recordType === subject.answer.recordType && rule.matches(subject)
  );
}

/** Look a rule up by the note it writes */
export function ruleForNote(
  formatNote: string,
  rules: readonly FormatRule[] = FORMAT_RULES
): FormatRule | undefined {
  return rules.find((rule) => rule.formatLabel === formatNote);
}

/** Does the host belong to a Microsoft 365 mail endpoint (either format)? */
export function isM365MxHost(host: string): boolean {
  const h = normalizeHost(host);
  return h.endsWith(LEGACY_MX_SUFFIX) || h.endsWith(MODERN_MX_SUFFIX);
}

/** Does the host belong to a Microsoft 365 DKIM target (either format)? */
export function isM365DkimTarget(host: string): boolean {
  const h = normalizeHost(host);
  return LEGACY_DKIM_TARGET.test(h) || h.endsWith(MODERN_DKIM_SUFFIX);
}
