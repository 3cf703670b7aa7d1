import { describe, it, expect } from 'vitest';
import { compareRecord, summarizeComparisons } from '../src/compare.js';
import { DnsQueryError } from '../src/errors.js';
import { buildExpectedRecord } from '../src/records.js';
import type { ActualAnswer, DnsRecordType, ExpectedRecord } from '../src/types.js';

const LEGACY_MX = 'contoso-com.mail.protection.outlook.com';

function expected(
  recordType: DnsRecordType,
  value: string,
  label = '@',
  isOptional = false
): ExpectedRecord {
  return buildExpectedRecord(
    { domain: 'contoso.com', label, isOptional, ttl: 3600, supportedService: 'Email' },
    recordType,
    value
  );
}

function mx(preference: number, exchange: string): ActualAnswer {
  return { name: 'contoso.com', recordType: 'MX', value: { preference, exchange } };
}

function txt(...segments: string[]): ActualAnswer {
  return { name: 'contoso.com', recordType: 'TXT', value: { text: segments.join(''), segments } };
}

function cname(target: string): ActualAnswer {
  return { name: 'x.contoso.com', recordType: 'CNAME', value: { target } };
}

function srv(port: number, target: string): ActualAnswer {
  return { name: '_sip._tls.contoso.com', recordType: 'SRV', value: { priority: 100, weight: 1, port, target } };
}

describe('compareRecord', () => {
  it('matches a legacy MX record and notes its format', () => {
    const result = compareRecord(expected('MX', `0 ${LEGACY_MX}`), [mx(0, LEGACY_MX)]);

    expect(result).toEqual({
      domain: 'contoso.com',
      label: '@',
      fqdn: 'contoso.com',
      recordType: 'MX',
      expectedValue: `0 ${LEGACY_MX}`,
      isOptional: false,
      ttl: 3600,
      supportedService: 'Email',
      status: 'Match',
      actualValue: `0 ${LEGACY_MX}`,
      formatNote: 'legacy MX format',
    });
  });

  it('compares the lowest-preference MX whatever the answer order', () => {
    const record = expected('MX', `0 ${LEGACY_MX}`);
    const answers = [mx(20, 'backup.example.net'), mx(10, `${LEGACY_MX.toUpperCase()}.`)];

    const a = compareRecord(record, answers);
    const b = compareRecord(record, [...answers].reverse());

    expect(a.status).toBe('Match');
    expect(a.actualValue).toBe(`10 ${LEGACY_MX.toUpperCase()}`);
    expect(b).toEqual(a);
  });

  it('reports an MX mismatch with both values', () => {
    const result = compareRecord(expected('MX', `0 ${LEGACY_MX}`), [mx(1, 'aspmx.l.example.net')]);

    expect(result.status).toBe('Mismatch');
    expect(result.actualValue).toBe('1 aspmx.l.example.net');
    expect(result.formatNote).toBeUndefined();
    expect(result.details).toBe(`expected 0 ${LEGACY_MX}, found 1 aspmx.l.example.net`);
  });

  it('notes the modern MX format on a mismatch', () => {
    const result = compareRecord(expected('MX', `0 ${LEGACY_MX}`), [
      mx(0, 'contoso-com.l-v1.mx.microsoft'),
    ]);

    expect(result.status).toBe('Mismatch');
    expect(result.formatNote).toBe('modern MX format');
  });

  it('matches TXT when any answer equals the expected text', () => {
    const spf = 'v=spf1 include:spf.protection.outlook.com -all';
    const result = compareRecord(expected('TXT', spf), [
      txt('google-site-verification=placeholder'),
      txt('v=spf1 include:spf.protection', '.outlook.com -all'),
    ]);

    expect(result.status).toBe('Match');
    expect(result.actualValue).toBe(spf);
  });

  it('lists every TXT answer on a mismatch', () => {
    const result = compareRecord(expected('TXT', 'MS=ms12345678'), [txt('a'), txt('b')]);

    expect(result.status).toBe('Mismatch');
    expect(result.actualValue).toBe('a | b');
    expect(result.details).toBe('expected MS=ms12345678, found a | b');
  });

  it('compares CNAME targets case-insensitively', () => {
    const result = compareRecord(expected('CNAME', 'autodiscover.outlook.com', 'autodiscover'), [
      cname('Autodiscover.Outlook.com.'),
    ]);

    expect(result.status).toBe('Match');
    expect(result.fqdn).toBe('autodiscover.contoso.com');
  });

  it('explains a DKIM record still on the legacy target', () => {
    const modern = 'selector1-contoso-com._domainkey.contoso.n-v1.dkim.mail.microsoft';
    const legacy = 'selector1-contoso-com._domainkey.contoso.onmicrosoft.com';

    const result = compareRecord(expected('CNAME', modern, 'selector1._domainkey'), [cname(legacy)]);

    expect(result.status).toBe('Mismatch');
    expect(result.formatNote).toBe('legacy DKIM format');
    expect(result.details).toBe(
      `expected ${modern}, found ${legacy}; DKIM CNAME points to the legacy onmicrosoft.com target; rotate to the dkim.mail.microsoft target`
    );
  });

  it('adds the alias advisory to a matching Skype for Business record', () => {
    const result = compareRecord(expected('CNAME', 'sipdir.online.lync.com', 'sip'), [
      cname('sipdir.online.lync.com'),
    ]);

    expect(result.status).toBe('Match');
    expect(result.formatNote).toBe('legacy Skype for Business alias');
    expect(result.details).toBe(
      'sip is a Skype for Business Online alias; Teams-only tenants can remove it'
    );
  });

  it('matches SRV on port and target', () => {
    const record = expected('SRV', '100 1 443 sipdir.online.lync.com', '_sip._tls');

    const hit = compareRecord(record, [srv(5061, 'other.example.net'), srv(443, 'sipdir.online.lync.com')]);
    const miss = compareRecord(record, [srv(5061, 'sipdir.online.lync.com')]);

    expect(hit.status).toBe('Match');
    expect(hit.actualValue).toBe('100 1 443 sipdir.online.lync.com');
    expect(miss.status).toBe('Mismatch');
    expect(miss.actualValue).toBe('100 1 5061 sipdir.online.lync.com');
  });

  it('matches A records on any address', () => {
    const result = compareRecord(expected('A', '192.0.2.20', 'www'), [
      { name: 'www.contoso.com', recordType: 'A', value: { address: '192.0.2.10' } },
      { name: 'www.contoso.com', recordType: 'A', value: { address: '192.0.2.20' } },
    ]);
    expect(result.status).toBe('Match');
  });

  it('marks absent records Missing', () => {
    const result = compareRecord(expected('MX', `0 ${LEGACY_MX}`), null);

    expect(result.status).toBe('Missing');
    expect(result.actualValue).toBe('(not found)');
    expect(result.details).toBeUndefined();
  });

  it('notes optional records that are not published', () => {
    const result = compareRecord(expected('CNAME', 'webdir.online.lync.com', 'lyncdiscover', true), null);

    expect(result.status).toBe('Missing');
    expect(result.details).toBe('optional record is not published');
  });

  it('treats answers of another type as Missing', () => {
    const result = compareRecord(expected('MX', `0 ${LEGACY_MX}`), [cname('elsewhere.example.net')]);
    expect(result.status).toBe('Missing');
  });

  it('reports query faults as Error without an actual value', () => {
    const fault = new DnsQueryError('contoso.com', 'MX', 'EBADRESP');

    const result = compareRecord(expected('MX', `0 ${LEGACY_MX}`), fault);

    expect(result.status).toBe('Error');
    expect(result.actualValue).toBeUndefined();
    expect(result.details).toBe('MX contoso.com: EBADRESP');
  });

  it('returns frozen rows and is repeatable', () => {
    const record = expected('MX', `0 ${LEGACY_MX}`);
    const first = compareRecord(record, [mx(0, LEGACY_MX)]);

    expect(Object.isFrozen(first)).toBe(true);
    expect(compareRecord(record, [mx(0, LEGACY_MX)])).toEqual(first);
  });
});

describe('summarizeComparisons', () => {
  it('counts rows per status', () => {
    const record = expected('MX', `0 ${LEGACY_MX}`);
    const rows = [
      compareRecord(record, [mx(0, LEGACY_MX)]),
      compareRecord(record, null),
      compareRecord(record, null),
      compareRecord(record, new DnsQueryError('contoso.com', 'MX', 'EBADRESP')),
    ];

    expect(summarizeComparisons(rows)).toEqual({ Match: 1, Mismatch: 0, Missing: 2, Error: 1 });
  });
});
