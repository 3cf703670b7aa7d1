export type DmarcPolicy = 'none' | 'quarantine' | 'reject';

/** Parsed DMARC record (RFC 7489 §6.3) */
export interface DmarcRecord {
  p: DmarcPolicy;
  sp?: DmarcPolicy;
  aspf?: 'r' | 's';
  adkim?: 'r' | 's';
  /** Aggregate report addresses, `mailto:` stripped */
  rua?: string[];
  /** Failure report addresses, `mailto:` stripped */
  ruf?: string[];
  pct?: number;
  /** Report interval in seconds */
  ri?: number;
  fo?: string;
}

const POLICIES: readonly DmarcPolicy[] = ['none', 'quarantine', 'reject'];

function asPolicy(value: string | undefined): DmarcPolicy | undefined {
  const lower = value?.toLowerCase();
  return POLICIES.find((p) => p === lower);
}

function asAlignment(value: string | undefined): 'r' | 's' | undefined {
  const lower = value?.toLowerCase();
  return lower === 'r' || lower === 's' ? lower : undefined;
}

function asInt(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const num = Number(value);
  return Number.isInteger(num) && num >= 0 ? num : undefined;
}

/** Is this TXT string a DMARC record at all (valid or not)? */
export function isDmarcRecord(raw: string): boolean {
  return /^v\s*=\s*dmarc1\s*(;|$)/i.test(raw.trim());
}

/** Split `k=v; k=v` into a lower-cased tag map; a repeated tag keeps its last value */
export function parseTagList(raw: string): Map<string, string> {
  const tags = new Map<string, string>();
  for (const part of raw.split(';')) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    const key = part.slice(0, eq).trim().toLowerCase();
    if (key) {
      tags.set(key, part.slice(eq + 1).trim());
    }
  }
  return tags;
}

/**
 * Parse a DMARC TXT record.
 * Returns `null` when the string is not a DMARC record or has no valid `p`.
 */
export function parseDmarc(raw: string): DmarcRecord | null {
  if (!isDmarcRecord(raw)) {
    return null;
  }

  const tags = parseTagList(raw);
  const p = asPolicy(tags.get('p'));
  if (!p) {
    return null;
  }

  const record: DmarcRecord = { p };

  const sp = asPolicy(tags.get('sp'));
  if (sp) record.sp = sp;

  const aspf = asAlignment(tags.get('aspf'));
  if (aspf) record.aspf = aspf;

  const adkim = asAlignment(tags.get('adkim'));
  if (adkim) record.adkim = adkim;

  const rua = parseMailtoList(tags.get('rua'));
  if (rua.length > 0) record.rua = rua;

  const ruf = parseMailtoList(tags.get('ruf'));
  if (ruf.length > 0) record.ruf = ruf;

  const pct = asInt(tags.get('pct'));
  if (pct !== undefined && pct <= 100) record.pct = pct;

  const ri = asInt(tags.get('ri'));
  if (ri !== undefined) record.ri = ri;

  const fo = tags.get('fo');
  if (fo) record.fo = fo;

  return record;
}

function parseMailtoList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((uri) => uri.trim())
    .filter((uri) => uri.toLowerCase().startsWith('mailto:'))
    .map((uri) => uri.slice('mailto:'.length));
}
