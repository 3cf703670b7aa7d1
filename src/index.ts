export { auditDomain, auditDomains, compareRecords } from './audit.js';
export type { AuditOptions, BatchAudit, DomainAudit, SkippedDomain } from './audit.js';
export {
  checkDeprecated,
  checkDkim,
  checkDmarc,
  checkMx,
  checkSpf,
  checkSrv,
  runAuthChecks,
} from './auth-checks.js';
export type { AuthCheckOptions } from './auth-checks.js';
export { compareRecord, summarizeComparisons } from './compare.js';
export {
  DEFAULT_CHECKS,
  parseAuditSettings,
  parsePropagationSettings,
  parseSourceConfig,
} from './config.js';
export type {
  AuditSettings,
  AuditSettingsInput,
  PropagationSettings,
  PropagationSettingsInput,
  SourceConfig,
} from './config.js';
export {
  DEPRECATED_RECORDS,
  DOH_ENDPOINT,
  LEGACY_ALIAS_LABELS,
  M365_DKIM_SELECTORS,
  M365_SPF_INCLUDE,
  M365_SPF_RECORD,
  M365_SRV_RECORDS,
  SPF_LOOKUP_LIMIT,
} from './constants.js';
export { cleanDomain, toFqdn, toLabel } from './domain.js';
export {
  ConfigError,
  DnsQueryError,
  M365DnsError,
  ProviderError,
  RecordFormatError,
} from './errors.js';
export type { M365DnsErrorCode } from './errors.js';
export { FINDINGS, renderFinding } from './findings.js';
export type { FindingBucket, FindingRule } from './findings.js';
export { FORMAT_RULES, classifyFormat } from './format-rules.js';
export type { FormatRule, FormatSubject } from './format-rules.js';
export { LogLevel, Logger, logger } from './logger.js';
export { parseDmarc } from './parse-dmarc.js';
export type { DmarcPolicy, DmarcRecord } from './parse-dmarc.js';
export { parseSpf } from './parse-spf.js';
export type { SpfMechanism, SpfQualifier, SpfRecord } from './parse-spf.js';
export {
  DEFAULT_RESOLVERS,
  PropagationMonitor,
  monitorPropagation,
} from './propagation.js';
export type {
  ChangeEvent,
  PropagationOptions,
  PropagationReport,
  PropagationState,
  PropagationStatus,
  PropagationTick,
  ResolverObservation,
  ResolverTarget,
} from './propagation.js';
export type { ExpectedRecordProvider } from './provider.js';
export { baselineProvider, readBaseline, saveBaseline } from './providers/baseline.js';
export type { BaselineRow } from './providers/baseline.js';
export { csvProvider, parseExpectedCsv } from './providers/csv.js';
export { graphProvider, listGraphDomains } from './providers/graph.js';
export type { GraphDomain, GraphSession } from './providers/graph.js';
export { jsonProvider, parseExpectedJson } from './providers/json.js';
export { buildExpectedRecord, renderAnswer, renderExpected } from './records.js';
export { createQuery, queryDns } from './resolver.js';
export type { DnsQuery, QueryOptions, ResolverBackend } from './resolver.js';
export { healthTier, readinessTier, scoreDomain } from './score.js';
export { createProvider } from './source.js';
export type {
  ActualAnswer,
  AuxCheck,
  CheckCategory,
  CheckSelection,
  ComparisonResult,
  ComparisonStatus,
  ComplianceAssessment,
  DnsRecordType,
  ExpectedRecord,
  Finding,
  FindingCode,
  HealthTier,
  ReadinessTier,
  ScoreProfile,
} from './types.js';
