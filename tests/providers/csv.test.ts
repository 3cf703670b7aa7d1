import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ProviderError } from '../../src/errors.js';
import { csvProvider, parseExpectedCsv } from '../../src/providers/csv.js';

const CSV = [
  'Domain,Label,RecordType,ExpectedValue,SupportedService,IsOptional,TTL,Priority,Weight,Port',
  'contoso.com,@,MX,contoso-com.mail.protection.outlook.com,Email,False,3600,0,,',
  'contoso.com,autodiscover,CNAME,autodiscover.outlook.com,Email,false,3600,,,',
  'contoso.com,_sip._tls,SRV,sipdir.online.lync.com,OfficeCommunicationsOnline,True,3600,100,1,443',
  'fabrikam.com,@,TXT,v=spf1 include:spf.protection.outlook.com -all,Email,,,,,',
].join('\n');

describe('parseExpectedCsv', () => {
  it('keys rows by header', () => {
    const rows = parseExpectedCsv(CSV);
    expect(rows).toHaveLength(4);
    expect(rows[1]).toEqual({
      Domain: 'contoso.com',
      Label: 'autodiscover',
      RecordType: 'CNAME',
      ExpectedValue: 'autodiscover.outlook.com',
      SupportedService: 'Email',
      IsOptional: 'false',
      TTL: '3600',
      Priority: '',
      Weight: '',
      Port: '',
    });
  });

  it('accepts another delimiter and a byte order mark', () => {
    const rows = parseExpectedCsv('\uFEFFDomain;Type;Value\ncontoso.com;TXT;MS=ms12345678\n', {
      delimiter: ';',
    });
    expect(rows).toEqual([{ Domain: 'contoso.com', Type: 'TXT', Value: 'MS=ms12345678' }]);
  });
});

describe('csvProvider', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'm365-csv-'));
    path = join(dir, 'expected.csv');
    await writeFile(path, CSV, 'utf8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('maps the rows of one domain', async () => {
    const records = await csvProvider(path).getExpectedRecords('Contoso.com');

    expect(records).toEqual([
      {
        domain: 'contoso.com',
        label: '@',
        isOptional: false,
        ttl: 3600,
        supportedService: 'Email',
        recordType: 'MX',
        expectedValue: { preference: 0, exchange: 'contoso-com.mail.protection.outlook.com' },
      },
      {
        domain: 'contoso.com',
        label: 'autodiscover',
        isOptional: false,
        ttl: 3600,
        supportedService: 'Email',
        recordType: 'CNAME',
        expectedValue: { target: 'autodiscover.outlook.com' },
      },
      {
        domain: 'contoso.com',
        label: '_sip._tls',
        isOptional: true,
        ttl: 3600,
        supportedService: 'OfficeCommunicationsOnline',
        recordType: 'SRV',
        expectedValue: { priority: 100, weight: 1, port: 443, target: 'sipdir.online.lync.com' },
      },
    ]);
  });

  it('fills defaults for blank cells', async () => {
    const [record] = await csvProvider(path).getExpectedRecords('fabrikam.com');
    expect(record).toMatchObject({ isOptional: false, ttl: 3600, recordType: 'TXT' });
  });

  it('fails for a domain without rows', async () => {
    await expect(csvProvider(path).getExpectedRecords('nowhere.com')).rejects.toThrow(
      `CSV ${path} has no rows for nowhere.com`
    );
  });

  it('names the row that cannot be mapped', async () => {
    await writeFile(path, 'Domain,RecordType,ExpectedValue\ncontoso.com,NS,ns1.example.net\n', 'utf8');

    const err = await csvProvider(path)
      .getExpectedRecords('contoso.com')
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({
      domain: 'contoso.com',
      message: `CSV ${path} row 1: Unsupported record type "NS"`,
    });
  });

  it('wraps read failures', async () => {
    const missing = join(dir, 'missing.csv');
    await expect(csvProvider(missing).getExpectedRecords('contoso.com')).rejects.toThrow(
      new RegExp(`^Cannot read CSV ${missing}: ENOENT`)
    );
  });
});
