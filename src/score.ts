import { reportedChecks, resolveChecks } from './config.js';
import { FINDINGS, renderFinding } from './findings.js';
import { isDkimLabel, ruleForNote } from './format-rules.js';
import type {
  AuxCheck,
  CategoryScore,
  CheckCategory,
  CheckSelection,
  ComparisonResult,
  ComplianceAssessment,
  Finding,
  FindingCode,
  HealthTier,
  ReadinessTier,
  ScoreProfile,
} from './types.js';
import { CHECK_CATEGORIES } from './types.js';

export interface ScoreOptions {
  profile?: ScoreProfile;
  checks?: Partial<CheckSelection>;
}

/** Which category a comparison row is evidence for, if any */
export function categoryOfComparison(result: ComparisonResult): CheckCategory | null {
  switch (result.recordType) {
    case 'MX':
      return 'mx';
    case 'SRV':
      return 'srv';
    case 'CNAME':
      return isDkimLabel(result.label) ? 'dkim' : null;
    default:
      return null;
  }
}

const MISSING_CODES: Partial<Record<CheckCategory, FindingCode>> = {
  mx: 'MX_MISSING',
  dkim: 'DKIM_MISSING',
  srv: 'SRV_MISSING',
};

const MISMATCH_CODES: Partial<Record<CheckCategory, FindingCode>> = {
  mx: 'MX_MISMATCH',
  dkim: 'DKIM_MISMATCH',
  srv: 'SRV_MISMATCH',
};

/** Findings implied by one comparison row, in detection order */
export function comparisonFindings(result: ComparisonResult): Finding[] {
  const findings: Finding[] = [];
  const category = categoryOfComparison(result);

  if (category) {
    const missing = MISSING_CODES[category];
    const mismatch = MISMATCH_CODES[category];
    if (result.status === 'Missing' && !result.isOptional && missing) {
      findings.push({ code: missing, subject: result.fqdn });
    }
    if (result.status === 'Mismatch' && mismatch) {
      findings.push({ code: mismatch, subject: result.fqdn, note: result.actualValue });
    }
  }

  const formatFinding = result.formatNote ? ruleForNote(result.formatNote)?.finding : undefined;
  if (formatFinding) {
    findings.push({ code: formatFinding, subject: result.fqdn });
  }
  return findings;
}

export function healthTier(score: number): HealthTier {
  if (score >= 90) return 'Healthy';
  if (score >= 70) return 'Warning';
  return 'Critical';
}

/**
 * Readiness priority comes from blocking conditions, not the number:
 * deprecated records or SPF and DMARC both missing are Critical, legacy
 * MX/DKIM formats and other critical actions are High, legacy Skype for
 * Business aliases alone are Medium.
 */
export function readinessTier(
  codes: ReadonlySet<FindingCode>,
  criticalActionCount: number
): ReadinessTier {
  if (
    codes.has('DEPRECATED_RECORD') ||
    (codes.has('SPF_MISSING') && codes.has('DMARC_MISSING'))
  ) {
    return 'Critical';
  }
  if (codes.has('MX_LEGACY') || codes.has('DKIM_LEGACY') || criticalActionCount > 0) {
    return 'High';
  }
  if (codes.has('LEGACY_ALIAS')) {
    return 'Medium';
  }
  return 'Low';
}

/**
 * Aggregate one domain's comparisons and auxiliary checks into a score,
 * a tier and the ordered action lists.
 *
 * Each requested category is worth one point. A domain with no applicable
 * categories scores 100.
 */
export function scoreDomain(
  domain: string,
  comparisons: readonly ComparisonResult[],
  auxChecks: readonly AuxCheck[],
  options: ScoreOptions = {}
): ComplianceAssessment {
  const checks = resolveChecks(options.checks);
  const profile = options.profile ?? 'health';
  const reported = reportedChecks(checks, profile);

  const categories: CategoryScore[] = CHECK_CATEGORIES.map((category) => {
    if (!checks[category]) {
      return { category, applicable: false, passed: false };
    }
    const evidence = [
      ...comparisons
        .filter((c) => categoryOfComparison(c) === category)
        .filter((c) => !(c.isOptional && c.status === 'Missing'))
        .map((c) => c.status === 'Match'),
      ...auxChecks.filter((a) => a.category === category).map((a) => a.passed),
    ];
    const passed =
      evidence.length > 0 ? evidence.every(Boolean) : category === 'deprecated';
    return { category, applicable: true, passed };
  });

  const applicable = categories.filter((c) => c.applicable);
  const passedCount = applicable.filter((c) => c.passed).length;
  const score =
    applicable.length === 0 ? 100 : Math.round((100 * passedCount) / applicable.length);

  const findings = [
    ...comparisons.flatMap(comparisonFindings),
    ...auxChecks.flatMap((a) => a.findings),
  ].filter((f) => {
    const category = FINDINGS[f.code].category;
    return category === null || reported[category];
  });

  const criticalActions: string[] = [];
  const recommendations: string[] = [];
  for (const finding of findings) {
    const bucket = FINDINGS[finding.code].bucket === 'critical' ? criticalActions : recommendations;
    bucket.push(renderFinding(finding));
  }

  const base = { domain, score, categories, criticalActions, recommendations };
  const assessment: ComplianceAssessment =
    profile === 'readiness'
      ? {
          ...base,
          profile,
          tier: readinessTier(new Set(findings.map((f) => f.code)), criticalActions.length),
        }
      : { ...base, profile, tier: healthTier(score) };

  Object.freeze(criticalActions);
  Object.freeze(recommendations);
  Object.freeze(categories);
  return Object.freeze(assessment);
}
