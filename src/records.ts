import { stripTrailingDot } from './domain.js';
import { RecordFormatError } from './errors.js';
import type {
  ActualAnswer,
  AddressValue,
  CnameValue,
  DnsRecordType,
  ExpectedRecord,
  MxValue,
  SrvValue,
  TxtValue,
} from './types.js';
import { DNS_RECORD_TYPES } from './types.js';

export function renderMx(value: MxValue): string {
  return `${value.preference} ${stripTrailingDot(value.exchange)}`;
}

export function renderCname(value: CnameValue): string {
  return stripTrailingDot(value.target);
}

export function renderTxt(value: TxtValue): string {
  return value.segments ? value.segments.join('') : value.text;
}

export function renderSrv(value: SrvValue): string {
  return `${value.priority} ${value.weight} ${value.port} ${stripTrailingDot(value.target)}`;
}

export function renderAddress(value: AddressValue): string {
  return value.address;
}

/** Text form of an expected record's value; `parseValue` reads it back */
export function renderExpected(record: ExpectedRecord): string {
  switch (record.recordType) {
    case 'MX':
      return renderMx(record.expectedValue);
    case 'CNAME':
      return renderCname(record.expectedValue);
    case 'TXT':
      return renderTxt(record.expectedValue);
    case 'SRV':
      return renderSrv(record.expectedValue);
    case 'A':
    case 'AAAA':
      return renderAddress(record.expectedValue);
  }
}

export function renderAnswer(answer: ActualAnswer): string {
  switch (answer.recordType) {
    case 'MX':
      return renderMx(answer.value);
    case 'CNAME':
      return renderCname(answer.value);
    case 'TXT':
      return renderTxt(answer.value);
    case 'SRV':
      return renderSrv(answer.value);
    case 'A':
    case 'AAAA':
      return renderAddress(answer.value);
  }
}

export function isDnsRecordType(value: string): value is DnsRecordType {
  return DNS_RECORD_TYPES.some((t) => t === value);
}

/** Accepts `MX`, `mx`, and Graph-style `Mx` */
export function parseRecordType(value: string): DnsRecordType {
  const upper = value.trim().toUpperCase();
  if (!isDnsRecordType(upper)) {
    throw new RecordFormatError(`Unsupported record type "${value}"`);
  }
  return upper;
}

/** Numeric fields that may arrive in their own columns rather than in the value */
export interface ValueExtras {
  preference?: number;
  priority?: number;
  weight?: number;
  port?: number;
}

function toInt(raw: string | undefined, field: string, text: string): number {
  const num = Number(raw);
  if (raw === undefined || raw === '' || !Number.isInteger(num) || num < 0) {
    throw new RecordFormatError(`Invalid ${field} in "${text}"`);
  }
  return num;
}

function parseMx(text: string, extras: ValueExtras): MxValue {
  const parts = text.trim().split(/\s+/);
  if (parts.length === 2) {
    return {
      preference: toInt(parts[0], 'MX preference', text),
      exchange: stripTrailingDot(parts[1] ?? ''),
    };
  }
  if (parts.length === 1 && parts[0]) {
    return {
      preference: extras.preference ?? extras.priority ?? 0,
      exchange: stripTrailingDot(parts[0]),
    };
  }
  throw new RecordFormatError(`Invalid MX value "${text}"`);
}

function parseSrv(text: string, extras: ValueExtras): SrvValue {
  const parts = text.trim().split(/\s+/);
  if (parts.length === 4) {
    return {
      priority: toInt(parts[0], 'SRV priority', text),
      weight: toInt(parts[1], 'SRV weight', text),
      port: toInt(parts[2], 'SRV port', text),
      target: stripTrailingDot(parts[3] ?? ''),
    };
  }
  if (parts.length === 1 && parts[0] && extras.port !== undefined) {
    return {
      priority: extras.priority ?? 0,
      weight: extras.weight ?? 0,
      port: extras.port,
      target: stripTrailingDot(parts[0]),
    };
  }
  throw new RecordFormatError(`Invalid SRV value "${text}"`);
}

function requireHost(text: string, type: DnsRecordType): string {
  const host = stripTrailingDot(text.trim());
  if (!host) {
    throw new RecordFormatError(`Empty ${type} value`);
  }
  return host;
}

type RecordBase = Omit<ExpectedRecord, 'recordType' | 'expectedValue'>;

/**
 * Build an `ExpectedRecord` from the text form of its value.
 *
 * This is the one place every offline adapter (CSV, JSON, baseline) turns
 * rows into the canonical model.
 */
export function buildExpectedRecord(
  base: RecordBase,
  recordType: DnsRecordType,
  text: string,
  extras: ValueExtras = {}
): ExpectedRecord {
  switch (recordType) {
    case 'MX':
      return { ...base, recordType, expectedValue: parseMx(text, extras) };
    case 'CNAME':
      return {
        ...base,
        recordType,
        expectedValue: { target: requireHost(text, recordType) },
      };
    case 'TXT':
      return { ...base, recordType, expectedValue: { text } };
    case 'SRV':
      return { ...base, recordType, expectedValue: parseSrv(text, extras) };
    case 'A':
    case 'AAAA':
      return {
        ...base,
        recordType,
        expectedValue: { address: requireHost(text, recordType) },
      };
  }
}
