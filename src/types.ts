/** DNS record types this library understands */
export type DnsRecordType = 'MX' | 'CNAME' | 'TXT' | 'SRV' | 'A' | 'AAAA';

export const DNS_RECORD_TYPES: readonly DnsRecordType[] = [
  'MX',
  'CNAME',
  'TXT',
  'SRV',
  'A',
  'AAAA',
];

export interface MxValue {
  preference: number;
  exchange: string;
}

export interface CnameValue {
  target: string;
}

export interface TxtValue {
  /** Segments joined into one string */
  text: string;
  /** Raw character-string segments, when the answer came from DNS */
  segments?: string[];
}

export interface SrvValue {
  priority: number;
  weight: number;
  port: number;
  target: string;
}

export interface AddressValue {
  address: string;
}

/** Payload shape for each record type */
export interface RecordValueMap {
  MX: MxValue;
  CNAME: CnameValue;
  TXT: TxtValue;
  SRV: SrvValue;
  A: AddressValue;
  AAAA: AddressValue;
}

export type TypedValue = RecordValueMap[DnsRecordType];

interface ExpectedRecordBase {
  /** Registrable domain, e.g. contoso.com */
  domain: string;
  /** "@" for the apex, otherwise a prefix relative to `domain` */
  label: string;
  isOptional: boolean;
  ttl: number;
  /** Free-form service label, e.g. "Email" or "Teams" */
  supportedService: string;
}

/** One row of what should exist in DNS */
export type ExpectedRecord = {
  [K in DnsRecordType]: ExpectedRecordBase & {
    recordType: K;
    expectedValue: RecordValueMap[K];
  };
}[DnsRecordType];

/** One answer returned by a resolver */
export type ActualAnswer = {
  [K in DnsRecordType]: {
    name: string;
    recordType: K;
    /** Only reported when the backend exposes it */
    ttl?: number;
    value: RecordValueMap[K];
  };
}[DnsRecordType];

export type ComparisonStatus = 'Match' | 'Mismatch' | 'Missing' | 'Error';

/** Outcome of evaluating one expected record against live DNS */
export interface ComparisonResult {
  domain: string;
  label: string;
  fqdn: string;
  recordType: DnsRecordType;
  status: ComparisonStatus;
  expectedValue: string;
  /** Unset only when `status` is `Error` */
  actualValue?: string;
  formatNote?: string;
  details?: string;
  isOptional: boolean;
  ttl: number;
  supportedService: string;
}

/** Categories that each contribute one point to a compliance score */
export type CheckCategory = 'mx' | 'dkim' | 'spf' | 'dmarc' | 'deprecated' | 'srv';

export const CHECK_CATEGORIES: readonly CheckCategory[] = [
  'mx',
  'dkim',
  'spf',
  'dmarc',
  'deprecated',
  'srv',
];

export type CheckSelection = Record<CheckCategory, boolean>;

export type FindingCode =
  | 'MX_MISSING'
  | 'MX_MISMATCH'
  | 'MX_LEGACY'
  | 'DKIM_MISSING'
  | 'DKIM_MISMATCH'
  | 'DKIM_LEGACY'
  | 'SPF_MISSING'
  | 'SPF_MULTIPLE'
  | 'SPF_NO_M365_INCLUDE'
  | 'SPF_LOOKUP_LIMIT'
  | 'SPF_WEAK_ALL'
  | 'DMARC_MISSING'
  | 'DMARC_INVALID'
  | 'DMARC_POLICY_NONE'
  | 'DMARC_NO_RUA'
  | 'DMARC_PARTIAL_PCT'
  | 'DEPRECATED_RECORD'
  | 'LEGACY_ALIAS'
  | 'SRV_MISSING'
  | 'SRV_MISMATCH';

/** A condition detected while checking a domain */
export interface Finding {
  code: FindingCode;
  /** The fully qualified name the finding is about */
  subject: string;
  /** Extra context rendered into the message, e.g. the SPF all qualifier */
  note?: string;
}

/** Result of an auxiliary check performed outside the expected record set */
export interface AuxCheck {
  category: CheckCategory;
  /** The name that was queried */
  name: string;
  /** `OK`, `WARNING - ...`, `CRITICAL - ...` or `ERROR - ...` */
  status: string;
  passed: boolean;
  /** What was found, when anything was */
  value?: string;
  findings: Finding[];
}

export type ScoreProfile = 'health' | 'readiness';

export type HealthTier = 'Healthy' | 'Warning' | 'Critical';

export type ReadinessTier = 'Low' | 'Medium' | 'High' | 'Critical';

export interface CategoryScore {
  category: CheckCategory;
  applicable: boolean;
  passed: boolean;
}

interface AssessmentBase {
  domain: string;
  /** 0..100 */
  score: number;
  categories: CategoryScore[];
  /** Detection order, never deduplicated */
  criticalActions: string[];
  recommendations: string[];
}

/** Per-domain aggregate of comparisons and auxiliary checks */
export type ComplianceAssessment =
  | (AssessmentBase & { profile: 'health'; tier: HealthTier })
  | (AssessmentBase & { profile: 'readiness'; tier: ReadinessTier });
