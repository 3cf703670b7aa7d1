import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ProviderError } from '../../src/errors.js';
import { jsonProvider, parseExpectedJson } from '../../src/providers/json.js';

describe('parseExpectedJson', () => {
  it('accepts an array of objects', () => {
    expect(parseExpectedJson('[{"type":"A","value":"192.0.2.1"}]')).toEqual([
      { type: 'A', value: '192.0.2.1' },
    ]);
  });

  it('rejects anything else', () => {
    expect(() => parseExpectedJson('{"type":"A"}')).toThrow();
    expect(() => parseExpectedJson('[1, 2]')).toThrow();
  });
});

describe('jsonProvider', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'm365-json-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function write(name: string, content: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content, 'utf8');
    return path;
  }

  it('applies rows without a domain to every domain', async () => {
    const path = await write(
      'records.json',
      JSON.stringify([
        { label: '@', type: 'mx', value: 'mail.example.net', preference: 10, ttl: 300 },
        { name: 'msoid', type: 'CNAME', value: 'clientconfig.microsoftonline-p.net', optional: 'yes' },
      ])
    );
    const provider = jsonProvider(path);

    const contoso = await provider.getExpectedRecords('contoso.com');
    const fabrikam = await provider.getExpectedRecords('fabrikam.com');

    expect(contoso).toEqual([
      {
        domain: 'contoso.com',
        label: '@',
        isOptional: false,
        ttl: 300,
        supportedService: '',
        recordType: 'MX',
        expectedValue: { preference: 10, exchange: 'mail.example.net' },
      },
      {
        domain: 'contoso.com',
        label: 'msoid',
        isOptional: true,
        ttl: 3600,
        supportedService: '',
        recordType: 'CNAME',
        expectedValue: { target: 'clientconfig.microsoftonline-p.net' },
      },
    ]);
    expect(fabrikam.map((r) => r.domain)).toEqual(['fabrikam.com', 'fabrikam.com']);
  });

  it('turns fully qualified names into labels', async () => {
    const path = await write(
      'records.json',
      JSON.stringify([{ domain: 'contoso.com', name: 'autodiscover.contoso.com.', type: 'CNAME', value: 'autodiscover.outlook.com' }])
    );

    const [record] = await jsonProvider(path).getExpectedRecords('contoso.com');

    expect(record?.label).toBe('autodiscover');
  });

  it('reports a row with a missing value', async () => {
    const path = await write('records.json', JSON.stringify([{ type: 'TXT' }]));

    const err = await jsonProvider(path)
      .getExpectedRecords('contoso.com')
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err instanceof Error && err.message).toMatch(
      new RegExp(`^JSON ${path} row 1: Invalid expected record row: expectedValue: `)
    );
  });

  it('wraps unparseable files', async () => {
    const path = await write('broken.json', '{ not json');
    await expect(jsonProvider(path).getExpectedRecords('contoso.com')).rejects.toThrow(
      new RegExp(`^Cannot read JSON ${path}: `)
    );
  });
});
