import { describe, it, expect } from 'vitest';
import { isSpfRecord, parseSpf } from '../src/parse-spf.js';

describe('isSpfRecord', () => {
  it('matches the version tag', () => {
    expect(isSpfRecord('v=spf1 -all')).toBe(true);
    expect(isSpfRecord('  V=SPF1 include:spf.protection.outlook.com -all')).toBe(true);
    expect(isSpfRecord('v=spf1')).toBe(true);
  });

  it('rejects other TXT records', () => {
    expect(isSpfRecord('v=DMARC1; p=none')).toBe(false);
    expect(isSpfRecord('v=spf10 -all')).toBe(false);
    expect(isSpfRecord('MS=ms12345678')).toBe(false);
  });
});

describe('parseSpf', () => {
  it('parses the Microsoft 365 record', () => {
    expect(parseSpf('v=spf1 include:spf.protection.outlook.com -all')).toEqual({
      mechanisms: [
        { qualifier: '+', name: 'include', value: 'spf.protection.outlook.com' },
        { qualifier: '-', name: 'all' },
      ],
      includes: ['spf.protection.outlook.com'],
      all: '-',
      includeCount: 1,
    });
  });

  it('returns null for non-SPF text', () => {
    expect(parseSpf('google-site-verification=abc')).toBeNull();
  });

  it('reads qualifiers on every mechanism', () => {
    const spf = parseSpf('v=spf1 a mx ~include:mail.example.net ?all');
    expect(spf?.mechanisms.map((m) => `${m.qualifier}${m.name}`)).toEqual([
      '+a',
      '+mx',
      '~include',
      '?all',
    ]);
    expect(spf?.all).toBe('?');
  });

  it('splits ip4 and ip6 values', () => {
    const spf = parseSpf('v=spf1 ip4:192.0.2.0/24 ip6:2001:db8::/32 -all');
    expect(spf?.mechanisms[0]).toEqual({ qualifier: '+', name: 'ip4', value: '192.0.2.0/24' });
    expect(spf?.mechanisms[1]).toEqual({ qualifier: '+', name: 'ip6', value: '2001:db8::/32' });
  });

  it('lower-cases include domains', () => {
    expect(parseSpf('v=spf1 include:SPF.Protection.Outlook.com -all')?.includes).toEqual([
      'spf.protection.outlook.com',
    ]);
  });

  it('reads redirect and ignores other modifiers', () => {
    const spf = parseSpf('v=spf1 redirect=_spf.contoso.com exp=explain.contoso.com');
    expect(spf?.redirect).toBe('_spf.contoso.com');
    expect(spf?.mechanisms).toEqual([]);
    expect(spf?.all).toBeUndefined();
  });

  it('counts literal include mechanisms only', () => {
    const includes = Array.from({ length: 11 }, (_, i) => `include:s${i}.example.net`);
    const spf = parseSpf(`v=spf1 ${includes.join(' ')} a mx -all`);
    expect(spf?.includeCount).toBe(11);
  });

  it('does not count a and mx lookups', () => {
    expect(parseSpf('v=spf1 a mx exists:%{i}.example.net -all')?.includeCount).toBe(0);
  });
});
