import { M365_SPF_INCLUDE, SPF_LOOKUP_LIMIT } from './constants.js';
import type { CheckCategory, Finding, FindingCode } from './types.js';

export type FindingBucket = 'critical' | 'recommendation';

export interface FindingRule {
  bucket: FindingBucket;
  /** Findings of categories the caller did not request are dropped; `null` is always kept */
  category: CheckCategory | null;
  message: (finding: Finding) => string;
}

/**
 * Where each finding lands and how it reads.
 *
 * Missing or mandatory conditions are critical actions; format and posture
 * improvements are recommendations.
 */
export const FINDINGS: Record<FindingCode, FindingRule> = {
  MX_MISSING: {
    bucket: 'critical',
    category: 'mx',
    message: (f) => `Add an MX record for ${f.subject} pointing to Microsoft 365`,
  },
  MX_MISMATCH: {
    bucket: 'critical',
    category: 'mx',
    message: (f) => `Point the MX record for ${f.subject} to Microsoft 365${f.note ? ` (currently ${f.note})` : ''}`,
  },
  MX_LEGACY: {
    bucket: 'recommendation',
    category: 'mx',
    message: (f) =>
      `Migrate the MX record for ${f.subject} from mail.protection.outlook.com to the mx.microsoft format`,
  },
  DKIM_MISSING: {
    bucket: 'critical',
    category: 'dkim',
    message: (f) => `Publish the DKIM CNAME record ${f.subject}`,
  },
  DKIM_MISMATCH: {
    bucket: 'critical',
    category: 'dkim',
    message: (f) => `Point the DKIM CNAME record ${f.subject} to Microsoft 365${f.note ? ` (currently ${f.note})` : ''}`,
  },
  DKIM_LEGACY: {
    bucket: 'recommendation',
    category: 'dkim',
    message: (f) =>
      `Migrate the DKIM CNAME record ${f.subject} to the dkim.mail.microsoft format`,
  },
  SPF_MISSING: {
    bucket: 'critical',
    category: 'spf',
    message: (f) => `Publish an SPF record for ${f.subject} that includes ${M365_SPF_INCLUDE}`,
  },
  SPF_MULTIPLE: {
    bucket: 'critical',
    category: 'spf',
    message: (f) => `Merge the ${f.note ?? 'multiple'} SPF records for ${f.subject} into one`,
  },
  SPF_NO_M365_INCLUDE: {
    bucket: 'critical',
    category: 'spf',
    message: (f) => `Add include:${M365_SPF_INCLUDE} to the SPF record for ${f.subject}`,
  },
  SPF_LOOKUP_LIMIT: {
    bucket: 'recommendation',
    category: 'spf',
    message: (f) =>
      `Reduce the include: mechanisms in the SPF record for ${f.subject} (${f.note ?? 'too many'} found, limit ${SPF_LOOKUP_LIMIT} lookups)`,
  },
  SPF_WEAK_ALL: {
    bucket: 'recommendation',
    category: 'spf',
    message: (f) => `Change ${f.note ?? 'the all mechanism'} to -all in the SPF record for ${f.subject}`,
  },
  DMARC_MISSING: {
    bucket: 'critical',
    category: 'dmarc',
    message: (f) => `Publish a DMARC record at ${f.subject}`,
  },
  DMARC_INVALID: {
    bucket: 'critical',
    category: 'dmarc',
    message: (f) => `Fix the invalid DMARC record at ${f.subject}`,
  },
  DMARC_POLICY_NONE: {
    bucket: 'recommendation',
    category: 'dmarc',
    message: (f) => `Tighten the DMARC policy at ${f.subject} from p=none to quarantine or reject`,
  },
  DMARC_NO_RUA: {
    bucket: 'recommendation',
    category: 'dmarc',
    message: (f) => `Add a rua= aggregate report address to the DMARC record at ${f.subject}`,
  },
  DMARC_PARTIAL_PCT: {
    bucket: 'recommendation',
    category: 'dmarc',
    message: (f) => `Raise pct=${f.note ?? ''} to 100 in the DMARC record at ${f.subject}`,
  },
  DEPRECATED_RECORD: {
    bucket: 'critical',
    category: 'deprecated',
    message: (f) => `Remove the deprecated record ${f.subject}${f.note ? ` (${f.note})` : ''}`,
  },
  LEGACY_ALIAS: {
    bucket: 'recommendation',
    category: null,
    message: (f) =>
      `Review the legacy Skype for Business record ${f.subject}; Teams-only tenants no longer need it`,
  },
  SRV_MISSING: {
    bucket: 'recommendation',
    category: 'srv',
    message: (f) => `Add the SRV record ${f.subject}`,
  },
  SRV_MISMATCH: {
    bucket: 'recommendation',
    category: 'srv',
    message: (f) => `Update the SRV record ${f.subject} to the Microsoft 365 target and port`,
  },
};

export function renderFinding(finding: Finding): string {
  return FINDINGS[finding.code].message(finding);
}
