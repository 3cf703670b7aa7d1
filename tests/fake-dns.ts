import type { DnsQuery } from '../src/resolver.js';
import type { ActualAnswer, DnsRecordType } from '../src/types.js';

/** Answers keyed by `"<TYPE> <name>"`; an Error entry makes the query throw */
export type FakeZone = Record<string, ActualAnswer[] | Error>;

export function fakeQuery(zone: FakeZone): DnsQuery {
  return async (name: string, type: DnsRecordType) => {
    const hit = zone[`${type} ${name.toLowerCase()}`];
    if (hit instanceof Error) throw hit;
    return hit ?? null;
  };
}

export function mx(name: string, preference: number, exchange: string): ActualAnswer {
  return { name, recordType: 'MX', value: { preference, exchange } };
}

export function cname(name: string, target: string): ActualAnswer {
  return { name, recordType: 'CNAME', value: { target } };
}

export function txt(name: string, text: string): ActualAnswer {
  return { name, recordType: 'TXT', value: { text, segments: [text] } };
}

export function srv(name: string, port: number, target: string): ActualAnswer {
  return { name, recordType: 'SRV', value: { priority: 100, weight: 1, port, target } };
}

export const MODERN_MX = 'contoso-com.l-v1.mx.microsoft';
export const LEGACY_MX = 'contoso-com.mail.protection.outlook.com';
export const DKIM1 = 'selector1-contoso-com._domainkey.contoso.n-v1.dkim.mail.microsoft';
export const DKIM2 = 'selector2-contoso-com._domainkey.contoso.n-v1.dkim.mail.microsoft';
export const SPF = 'v=spf1 include:spf.protection.outlook.com -all';

/** contoso.com with modern MX, both DKIM selectors and SPF, but no DMARC */
export function contosoZone(): FakeZone {
  return {
    'MX contoso.com': [mx('contoso.com', 0, MODERN_MX)],
    'CNAME selector1._domainkey.contoso.com': [cname('selector1._domainkey.contoso.com', DKIM1)],
    'CNAME selector2._domainkey.contoso.com': [cname('selector2._domainkey.contoso.com', DKIM2)],
    'TXT contoso.com': [txt('contoso.com', SPF)],
  };
}
