import dns from 'node:dns';
import type { Resolver } from 'node:dns/promises';
import { z } from 'zod';
import { DOH_ENDPOINT, DOH_TIMEOUT_MS } from './constants.js';
import { normalizeHost, stripTrailingDot } from './domain.js';
import { DnsQueryError, errorMessage } from './errors.js';
import type { ActualAnswer, DnsRecordType } from './types.js';

export type ResolverBackend = 'standard' | 'doh';

export interface QueryOptions {
  /** Defaults to `standard` (the host's resolver) */
  backend?: ResolverBackend;
  /** Pin the `standard` backend to one DNS server (IPv4/IPv6 address) */
  server?: string;
  /** Override the DoH endpoint; defaults to Cloudflare's JSON API */
  dohEndpoint?: string;
  /** Per-query timeout in milliseconds */
  timeoutMs?: number;
}

/** A bound query function; every checker takes one of these */
export type DnsQuery = (
  name: string,
  type: DnsRecordType
) => Promise<ActualAnswer[] | null>;

type SystemResolver = Pick<
  Resolver,
  'resolveMx' | 'resolveCname' | 'resolveTxt' | 'resolveSrv' | 'resolve4' | 'resolve6'
>;

/** What a lookup produced: answers, nothing, or a query fault */
export type LookupOutcome = readonly ActualAnswer[] | null | DnsQueryError;

/**
 * Run a query and capture a fault as a value instead of a rejection, so
 * one broken lookup never aborts its siblings.
 */
export async function lookup(
  query: DnsQuery,
  name: string,
  type: DnsRecordType
): Promise<LookupOutcome> {
  try {
    return await query(name, type);
  } catch (err) {
    return err instanceof DnsQueryError
      ? err
      : new DnsQueryError(name, type, errorMessage(err), { cause: err });
  }
}

/** Error codes that mean "no answer" rather than a broken query */
const ABSENT_CODES = new Set([
  'ENODATA',
  'ENOTFOUND',
  'ESERVFAIL',
  'EREFUSED',
  'ETIMEOUT',
  'ECONNREFUSED',
  'ECONNRESET',
  'ECANCELLED',
  'EOF',
  'EAI_AGAIN',
]);

/** Numeric RR types used by the DoH JSON API */
export const RR_TYPE_CODES: Record<DnsRecordType, number> = {
  A: 1,
  CNAME: 5,
  MX: 15,
  TXT: 16,
  AAAA: 28,
  SRV: 33,
};

const DohResponseSchema = z.object({
  Status: z.number().int(),
  Answer: z
    .array(
      z.object({
        name: z.string(),
        type: z.number().int(),
        TTL: z.number().int().nonnegative(),
        data: z.string(),
      })
    )
    .optional(),
});

export type DohResponse = z.infer<typeof DohResponseSchema>;

/**
 * Query one (name, type) pair and normalize the answers.
 *
 * Returns `null` when the name has no answer of that type (NXDOMAIN,
 * NODATA, timeouts, unreachable servers). Throws `DnsQueryError` only when
 * the query mechanism itself is at fault.
 */
export async function queryDns(
  name: string,
  type: DnsRecordType,
  options: QueryOptions = {}
): Promise<ActualAnswer[] | null> {
  return createQuery(options)(name, type);
}

/** Bind backend options into a reusable `DnsQuery` */
export function createQuery(options: QueryOptions = {}): DnsQuery {
  const backend = options.backend ?? 'standard';
  if (backend === 'doh') {
    const endpoint = options.dohEndpoint ?? DOH_ENDPOINT;
    const timeoutMs = options.timeoutMs ?? DOH_TIMEOUT_MS;
    return async (name, type) =>
      queryDoh(endpoint, timeoutMs, checkName(name, type), type);
  }

  let resolver: SystemResolver | undefined;
  return async (name, type) => {
    const host = checkName(name, type);
    resolver ??= systemResolver(host, type, options);
    return queryStandard(resolver, host, type);
  };
}

function checkName(name: string, type: DnsRecordType): string {
  const host = normalizeHost(name);
  if (!host || host.length > 253 || host.split('.').some((l) => l.length === 0 || l.length > 63)) {
    throw new DnsQueryError(name, type, 'malformed query name');
  }
  return host;
}

function systemResolver(
  name: string,
  type: DnsRecordType,
  options: QueryOptions
): SystemResolver {
  const { server, timeoutMs } = options;
  if (!server && timeoutMs === undefined) {
    return dns.promises;
  }
  try {
    const resolver = new dns.promises.Resolver(
      timeoutMs !== undefined ? { timeout: timeoutMs } : undefined
    );
    if (server) {
      resolver.setServers([server]);
    }
    return resolver;
  } catch (err) {
    throw new DnsQueryError(
      name,
      type,
      `invalid DNS server "${options.server}": ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

async function queryStandard(
  resolver: SystemResolver,
  name: string,
  type: DnsRecordType
): Promise<ActualAnswer[] | null> {
  let answers: ActualAnswer[];
  try {
    answers = await resolveStandard(resolver, name, type);
  } catch (err) {
    const code = errorCode(err);
    if (code && ABSENT_CODES.has(code)) {
      return null;
    }
    throw new DnsQueryError(name, type, code ?? errorMessage(err), { cause: err });
  }
  return answers.length > 0 ? answers : null;
}

async function resolveStandard(
  resolver: SystemResolver,
  name: string,
  type: DnsRecordType
): Promise<ActualAnswer[]> {
  switch (type) {
    case 'MX': {
      const records = await resolver.resolveMx(name);
      return records.map((r) => ({
        name,
        recordType: 'MX',
        value: { preference: r.priority, exchange: stripTrailingDot(r.exchange) },
      }));
    }
    case 'CNAME': {
      const records = await resolver.resolveCname(name);
      return records.map((target) => ({
        name,
        recordType: 'CNAME',
        value: { target: stripTrailingDot(target) },
      }));
    }
    case 'TXT': {
      const records = await resolver.resolveTxt(name);
      return records.map((segments) => ({
        name,
        recordType: 'TXT',
        value: { text: segments.join(''), segments },
      }));
    }
    case 'SRV': {
      const records = await resolver.resolveSrv(name);
      return records.map((r) => ({
        name,
        recordType: 'SRV',
        value: {
          priority: r.priority,
          weight: r.weight,
          port: r.port,
          target: stripTrailingDot(r.name),
        },
      }));
    }
    case 'A': {
      const records = await resolver.resolve4(name, { ttl: true });
      return records.map((r) => ({
        name,
        recordType: 'A',
        ttl: r.ttl,
        value: { address: r.address },
      }));
    }
    case 'AAAA': {
      const records = await resolver.resolve6(name, { ttl: true });
      return records.map((r) => ({
        name,
        recordType: 'AAAA',
        ttl: r.ttl,
        value: { address: r.address },
      }));
    }
  }
}

async function queryDoh(
  endpoint: string,
  timeoutMs: number,
  name: string,
  type: DnsRecordType
): Promise<ActualAnswer[] | null> {
  const url = `${endpoint}?name=${encodeURIComponent(name)}&type=${type}`;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetchDoh(url, controller.signal, name, type);
  } finally {
    clearTimeout(timer);
  }
}

/** The timeout in `signal` covers the whole exchange, body included */
async function fetchDoh(
  url: string,
  signal: AbortSignal,
  name: string,
  type: DnsRecordType
): Promise<ActualAnswer[] | null> {
  let res: Response;
  try {
    res = await fetch(url, {
      headers: { Accept: 'application/dns-json' },
      signal,
    });
  } catch {
    // Unreachable endpoint or timeout: same as no answer
    return null;
  }

  if (!res.ok) {
    throw new DnsQueryError(name, type, `DoH endpoint returned HTTP ${res.status}`);
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    if (signal.aborted) {
      return null;
    }
    throw new DnsQueryError(name, type, 'DoH response is not JSON', { cause: err });
  }

  const parsed = DohResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new DnsQueryError(name, type, 'malformed DoH response', {
      cause: parsed.error,
    });
  }

  return parseDohAnswers(name, type, parsed.data);
}

/** RCODEs that mean the request itself was wrong */
const FAULT_RCODES = new Set([1, 4]);

/**
 * Reshape a DoH JSON body into the same answers the system resolver gives.
 * Answers of other types (CNAME chain links) are dropped.
 */
export function parseDohAnswers(
  name: string,
  type: DnsRecordType,
  response: DohResponse
): ActualAnswer[] | null {
  if (FAULT_RCODES.has(response.Status)) {
    throw new DnsQueryError(name, type, `DoH resolver returned RCODE ${response.Status}`);
  }
  if (response.Status !== 0) {
    return null;
  }

  const code = RR_TYPE_CODES[type];
  const answers = (response.Answer ?? [])
    .filter((a) => a.type === code)
    .map((a) => dohAnswer(name, type, a.data, a.TTL));

  return answers.length > 0 ? answers : null;
}

function dohAnswer(
  name: string,
  type: DnsRecordType,
  data: string,
  ttl: number
): ActualAnswer {
  const fields = data.trim().split(/\s+/);
  const int = (raw: string | undefined): number => {
    const num = Number(raw);
    if (raw === undefined || !Number.isInteger(num)) {
      throw new DnsQueryError(name, type, `unparseable ${type} data "${data}"`);
    }
    return num;
  };
  const host = (raw: string | undefined): string => {
    if (!raw) {
      throw new DnsQueryError(name, type, `unparseable ${type} data "${data}"`);
    }
    return stripTrailingDot(raw);
  };

  switch (type) {
    case 'MX':
      return {
        name,
        recordType: 'MX',
        ttl,
        value: { preference: int(fields[0]), exchange: host(fields[1]) },
      };
    case 'CNAME':
      return { name, recordType: 'CNAME', ttl, value: { target: host(fields[0]) } };
    case 'TXT': {
      const segments = splitTxtData(data);
      return { name, recordType: 'TXT', ttl, value: { text: segments.join(''), segments } };
    }
    case 'SRV':
      return {
        name,
        recordType: 'SRV',
        ttl,
        value: {
          priority: int(fields[0]),
          weight: int(fields[1]),
          port: int(fields[2]),
          target: host(fields[3]),
        },
      };
    case 'A':
      return { name, recordType: 'A', ttl, value: { address: host(fields[0]) } };
    case 'AAAA':
      return { name, recordType: 'AAAA', ttl, value: { address: host(fields[0]) } };
  }
}

/**
 * Split presentation-format TXT data (`"part one" "part two"`) into its
 * character-strings. Unquoted data is a single segment.
 */
export function splitTxtData(data: string): string[] {
  const segments: string[] = [];
  const quoted = /"((?:[^"\\]|\\.)*)"/g;
  let match: RegExpExecArray | null;
  while ((match = quoted.exec(data)) !== null) {
    segments.push(unescapeTxt(match[1] ?? ''));
  }
  return segments.length > 0 ? segments : [data.trim()];
}

function unescapeTxt(value: string): string {
  return value.replace(/\\(\d{3}|.)/g, (_, esc: string) =>
    esc.length === 3 ? String.fromCharCode(Number(esc)) : esc
  );
}
