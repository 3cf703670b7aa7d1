import { describe, it, expect } from 'vitest';
import {
  FORMAT_RULES,
  classifyFormat,
  isDkimLabel,
  isM365DkimTarget,
  isM365MxHost,
  ruleForNote,
} from '../src/format-rules.js';
import type { ActualAnswer } from '../src/types.js';

function mx(exchange: string): ActualAnswer {
  return { name: 'contoso.com', recordType: 'MX', value: { preference: 0, exchange } };
}

function cname(target: string): ActualAnswer {
  return { name: 'x.contoso.com', recordType: 'CNAME', value: { target } };
}

describe('classifyFormat', () => {
  it('classifies the legacy MX host', () => {
    const rule = classifyFormat({
      label: '@',
      answer: mx('contoso-com.mail.protection.outlook.com'),
    });
    expect(rule?.formatLabel).toBe('legacy MX format');
    expect(rule?.finding).toBe('MX_LEGACY');
  });

  it('classifies the modern MX host', () => {
    const rule = classifyFormat({ label: '@', answer: mx('contoso-com.l-v1.mx.microsoft.') });
    expect(rule?.formatLabel).toBe('modern MX format');
    expect(rule?.finding).toBeUndefined();
  });

  it('leaves third-party MX hosts unclassified', () => {
    expect(classifyFormat({ label: '@', answer: mx('mx1.example.net') })).toBeUndefined();
  });

  it('classifies legacy and modern DKIM targets on selector labels', () => {
    expect(
      classifyFormat({
        label: 'selector1._domainkey',
        answer: cname('selector1-contoso-com._domainkey.contoso.onmicrosoft.com'),
      })?.formatLabel
    ).toBe('legacy DKIM format');
    expect(
      classifyFormat({
        label: 'selector2._domainkey',
        answer: cname('selector2-contoso-com._domainkey.contoso.n-v1.dkim.mail.microsoft'),
      })?.formatLabel
    ).toBe('modern DKIM format');
  });

  it('ignores DKIM-looking targets on other labels', () => {
    expect(
      classifyFormat({
        label: 'autodiscover',
        answer: cname('selector1-contoso-com._domainkey.contoso.onmicrosoft.com'),
      })
    ).toBeUndefined();
  });

  it('flags Skype for Business aliases with an advisory', () => {
    const subject = { label: 'lyncdiscover', answer: cname('webdir.online.lync.com') };
    const rule = classifyFormat(subject);
    expect(rule?.finding).toBe('LEGACY_ALIAS');
    expect(rule?.advisory?.(subject)).toBe(
      'lyncdiscover is a Skype for Business Online alias; Teams-only tenants can remove it'
    );
  });

  it('only applies rules of the answer type', () => {
    const txt: ActualAnswer = {
      name: 'contoso.com',
      recordType: 'TXT',
      value: { text: 'contoso-com.mail.protection.outlook.com' },
    };
    expect(classifyFormat({ label: '@', answer: txt })).toBeUndefined();
  });

  it('takes the first matching rule', () => {
    const rules = [
      { recordType: 'MX' as const, formatLabel: 'first', matches: () => true },
      { recordType: 'MX' as const, formatLabel: 'second', matches: () => true },
    ];
    expect(classifyFormat({ label: '@', answer: mx('a.example.net') }, rules)?.formatLabel).toBe(
      'first'
    );
  });
});

describe('ruleForNote', () => {
  it('finds every rule by its label', () => {
    for (const rule of FORMAT_RULES) {
      expect(ruleForNote(rule.formatLabel)).toBe(rule);
    }
    expect(ruleForNote('unknown')).toBeUndefined();
  });
});

describe('host helpers', () => {
  it('recognises Microsoft 365 MX hosts in either format', () => {
    expect(isM365MxHost('Contoso-com.mail.protection.outlook.com.')).toBe(true);
    expect(isM365MxHost('contoso-com.l-v1.mx.microsoft')).toBe(true);
    expect(isM365MxHost('aspmx.l.example.net')).toBe(false);
  });

  it('recognises Microsoft 365 DKIM targets in either format', () => {
    expect(isM365DkimTarget('selector1-contoso-com._domainkey.contoso.onmicrosoft.com')).toBe(true);
    expect(isM365DkimTarget('selector1-contoso-com._domainkey.contoso.n-v1.dkim.mail.microsoft')).toBe(true);
    expect(isM365DkimTarget('s1.domainkey.example.net')).toBe(false);
  });

  it('matches selector labels only', () => {
    expect(isDkimLabel('selector1._domainkey')).toBe(true);
    expect(isDkimLabel('Selector2._DomainKey')).toBe(true);
    expect(isDkimLabel('google._domainkey')).toBe(false);
  });
});
