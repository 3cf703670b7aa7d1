export type SpfQualifier = '+' | '-' | '~' | '?';

export interface SpfMechanism {
  qualifier: SpfQualifier;
  /** Lower-cased mechanism name, e.g. `include`, `ip4`, `all` */
  name: string;
  /** Text after `:` or `/`, if any */
  value?: string;
}

export interface SpfRecord {
  mechanisms: SpfMechanism[];
  /** Domains named by `include:` mechanisms */
  includes: string[];
  /** Qualifier of the `all` mechanism, when present */
  all?: SpfQualifier;
  redirect?: string;
  /**
   * Approximate DNS lookup count: the number of literal `include:`
   * mechanisms in this record. Nested includes and `a`/`mx`/`exists`
   * lookups are not followed, so this undercounts.
   */
  includeCount: number;
}

const QUALIFIERS: readonly SpfQualifier[] = ['+', '-', '~', '?'];

export function isSpfRecord(raw: string): boolean {
  return /^v=spf1(\s|$)/i.test(raw.trim());
}

/** Parse an SPF TXT record; `null` if it is not one */
export function parseSpf(raw: string): SpfRecord | null {
  if (!isSpfRecord(raw)) {
    return null;
  }

  const record: SpfRecord = { mechanisms: [], includes: [], includeCount: 0 };
  const terms = raw.trim().split(/\s+/).slice(1);

  for (const term of terms) {
    if (term.toLowerCase().startsWith('redirect=')) {
      record.redirect = term.slice('redirect='.length);
      continue;
    }
    if (term.includes('=')) continue; // other modifiers (exp=)

    const first = term.charAt(0);
    const qualifier = QUALIFIERS.find((q) => q === first);
    const body = qualifier ? term.slice(1) : term;
    const sep = body.search(/[:/]/);
    const name = (sep === -1 ? body : body.slice(0, sep)).toLowerCase();
    const mechanism: SpfMechanism = { qualifier: qualifier ?? '+', name };
    if (sep !== -1) {
      mechanism.value = body.slice(sep + 1);
    }
    record.mechanisms.push(mechanism);

    if (name === 'include' && mechanism.value) {
      record.includes.push(mechanism.value.toLowerCase());
    }
    if (name === 'all') {
      record.all = mechanism.qualifier;
    }
  }

  record.includeCount = (raw.toLowerCase().match(/include:/g) ?? []).length;
  return record;
}
