import { NOT_FOUND } from './constants.js';
import { hostEquals, toFqdn } from './domain.js';
import { DnsQueryError } from './errors.js';
import { classifyFormat } from './format-rules.js';
import type { LookupOutcome } from './resolver.js';
import {
  renderAddress,
  renderCname,
  renderExpected,
  renderMx,
  renderSrv,
  renderTxt,
} from './records.js';
import type {
  ActualAnswer,
  ComparisonResult,
  ComparisonStatus,
  DnsRecordType,
  ExpectedRecord,
} from './types.js';

type AnswerOf<K extends DnsRecordType> = Extract<ActualAnswer, { recordType: K }>;

function answersOf<K extends DnsRecordType>(
  answers: readonly ActualAnswer[],
  type: K
): AnswerOf<K>[] {
  return answers.filter((a): a is AnswerOf<K> => a.recordType === type);
}

interface Verdict {
  matched: boolean;
  actualValue: string;
  /** The answer format rules are applied to */
  classified?: ActualAnswer;
}

function verdictMx(expected: AnswerOf<'MX'>['value'], answers: AnswerOf<'MX'>[]): Verdict | null {
  // Stable sort keeps the first-seen answer among equal preferences
  const best = [...answers].sort((a, b) => a.value.preference - b.value.preference)[0];
  if (!best) return null;
  return {
    matched: hostEquals(best.value.exchange, expected.exchange),
    actualValue: renderMx(best.value),
    classified: best,
  };
}

function verdictCname(expected: AnswerOf<'CNAME'>['value'], answers: AnswerOf<'CNAME'>[]): Verdict | null {
  const first = answers[0];
  if (!first) return null;
  return {
    matched: hostEquals(first.value.target, expected.target),
    actualValue: renderCname(first.value),
    classified: first,
  };
}

function verdictTxt(expected: { text: string }, answers: AnswerOf<'TXT'>[]): Verdict | null {
  if (answers.length === 0) return null;
  const texts = answers.map((a) => renderTxt(a.value));
  const hit = texts.find((t) => t === expected.text);
  return {
    matched: hit !== undefined,
    actualValue: hit ?? texts.join(' | '),
  };
}

function verdictSrv(expected: AnswerOf<'SRV'>['value'], answers: AnswerOf<'SRV'>[]): Verdict | null {
  const first = answers[0];
  if (!first) return null;
  const hit = answers.find(
    (a) => a.value.port === expected.port && hostEquals(a.value.target, expected.target)
  );
  const shown = hit ?? first;
  return { matched: hit !== undefined, actualValue: renderSrv(shown.value), classified: shown };
}

function verdictAddress(expected: { address: string }, answers: AnswerOf<'A' | 'AAAA'>[]): Verdict | null {
  if (answers.length === 0) return null;
  const addresses = answers.map((a) => renderAddress(a.value));
  const hit = addresses.find((a) => a.toLowerCase() === expected.address.toLowerCase());
  return { matched: hit !== undefined, actualValue: hit ?? addresses.join(', ') };
}

function verdictFor(expected: ExpectedRecord, answers: readonly ActualAnswer[]): Verdict | null {
  switch (expected.recordType) {
    case 'MX':
      return verdictMx(expected.expectedValue, answersOf(answers, 'MX'));
    case 'CNAME':
      return verdictCname(expected.expectedValue, answersOf(answers, 'CNAME'));
    case 'TXT':
      return verdictTxt(expected.expectedValue, answersOf(answers, 'TXT'));
    case 'SRV':
      return verdictSrv(expected.expectedValue, answersOf(answers, 'SRV'));
    case 'A':
      return verdictAddress(expected.expectedValue, answersOf(answers, 'A'));
    case 'AAAA':
      return verdictAddress(expected.expectedValue, answersOf(answers, 'AAAA'));
  }
}

/**
 * Compare one expected record with what DNS returned for it.
 *
 * The comparison depends only on the canonical record; it does not know
 * which provider produced it. The returned row is frozen.
 */
export function compareRecord(
  expected: ExpectedRecord,
  actual: LookupOutcome
): ComparisonResult {
  const base = {
    domain: expected.domain,
    label: expected.label,
    fqdn: toFqdn(expected.label, expected.domain),
    recordType: expected.recordType,
    expectedValue: renderExpected(expected),
    isOptional: expected.isOptional,
    ttl: expected.ttl,
    supportedService: expected.supportedService,
  };

  if (actual instanceof DnsQueryError) {
    const failed: ComparisonResult = { ...base, status: 'Error', details: actual.message };
    return Object.freeze(failed);
  }

  const verdict = actual ? verdictFor(expected, actual) : null;
  if (!verdict) {
    const missing: ComparisonResult = { ...base, status: 'Missing', actualValue: NOT_FOUND };
    if (expected.isOptional) {
      missing.details = 'optional record is not published';
    }
    return Object.freeze(missing);
  }

  const status: ComparisonStatus = verdict.matched ? 'Match' : 'Mismatch';
  const result: ComparisonResult = { ...base, status, actualValue: verdict.actualValue };
  const notes: string[] = [];

  if (!verdict.matched) {
    notes.push(`expected ${base.expectedValue}, found ${verdict.actualValue}`);
  }

  if (verdict.classified) {
    const subject = { label: expected.label, answer: verdict.classified };
    const rule = classifyFormat(subject);
    if (rule) {
      result.formatNote = rule.formatLabel;
      if (rule.advisory) {
        notes.push(rule.advisory(subject));
      }
    }
  }

  if (notes.length > 0) {
    result.details = notes.join('; ');
  }
  return Object.freeze(result);
}

/** Counts per status, in status order */
export function summarizeComparisons(
  results: readonly ComparisonResult[]
): Record<ComparisonStatus, number> {
  const summary: Record<ComparisonStatus, number> = {
    Match: 0,
    Mismatch: 0,
    Missing: 0,
    Error: 0,
  };
  for (const r of results) {
    summary[r.status]++;
  }
  return summary;
}
