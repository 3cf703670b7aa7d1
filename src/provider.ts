import type { ExpectedRecord } from './types.js';

/**
 * Source of the records a domain should publish.
 *
 * Adapters (Microsoft Graph, CSV, JSON, baseline snapshot) map their own
 * field layout into `ExpectedRecord`; nothing downstream knows which one
 * was used. Throw `ProviderError` when no records can be produced.
 */
export interface ExpectedRecordProvider {
  /** Short source name used in logs */
  readonly name: string;
  getExpectedRecords(domain: string): Promise<ExpectedRecord[]>;
}
