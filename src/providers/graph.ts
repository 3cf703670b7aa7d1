import { z } from 'zod';
import { cleanDomain, stripTrailingDot, toLabel } from '../domain.js';
import { ConfigError, ProviderError, errorMessage } from '../errors.js';
import type { ExpectedRecordProvider } from '../provider.js';
import type { ExpectedRecord } from '../types.js';

/**
 * Credentials for Microsoft Graph, passed explicitly to every call.
 * Acquiring the token (device code, client credentials) is up to the caller.
 */
export interface GraphSession {
  accessToken: string;
  /** Defaults to the v1.0 endpoint */
  baseUrl?: string;
}

export interface GraphDomain {
  id: string;
  isVerified: boolean;
  isDefault: boolean;
  supportedServices: string[];
}

const GRAPH_API = 'https://graph.microsoft.com/v1.0';

const GraphDomainSchema = z.object({
  id: z.string(),
  isVerified: z.boolean().default(false),
  isDefault: z.boolean().default(false),
  supportedServices: z.array(z.string()).default([]),
});

/** `domainDnsRecord` and its MX / CNAME / TXT / SRV subtypes, flattened */
const GraphDnsRecordSchema = z.object({
  id: z.string().optional(),
  isOptional: z.boolean().default(false),
  label: z.string(),
  recordType: z.string(),
  supportedService: z.string().default(''),
  ttl: z.number().int().nonnegative().default(3600),
  mailExchange: z.string().optional(),
  preference: z.number().int().optional(),
  canonicalName: z.string().optional(),
  text: z.string().optional(),
  nameTarget: z.string().optional(),
  port: z.number().int().optional(),
  priority: z.number().int().optional(),
  protocol: z.string().optional(),
  service: z.string().optional(),
  weight: z.number().int().optional(),
});

export type GraphDnsRecord = z.infer<typeof GraphDnsRecordSchema>;

function pageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    value: z.array(item),
    '@odata.nextLink': z.string().url().optional(),
  });
}

async function graphFetchAll<T extends z.ZodTypeAny>(
  session: GraphSession,
  path: string,
  item: T
): Promise<z.infer<T>[]> {
  const items: z.infer<T>[] = [];
  const schema = pageSchema(item);
  let url: string | undefined = `${session.baseUrl ?? GRAPH_API}${path}`;

  while (url) {
    const res = await fetch(url, {
      headers: {
        Authorization: `Bearer ${session.accessToken}`,
        Accept: 'application/json',
      },
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Graph API error ${res.status}: ${text}`);
    }

    const page = schema.parse(await res.json());
    items.push(...page.value);
    url = page['@odata.nextLink'];
  }

  return items;
}

function requireSession(session: GraphSession): void {
  if (!session.accessToken) {
    throw new ConfigError('Graph: accessToken is required');
  }
}

/**
 * List the tenant's domains with their verification state.
 */
export async function listGraphDomains(session: GraphSession): Promise<GraphDomain[]> {
  requireSession(session);
  return graphFetchAll(session, '/domains', GraphDomainSchema);
}

function field<T>(value: T | undefined, name: string, record: GraphDnsRecord): T {
  if (value === undefined) {
    throw new Error(`${record.recordType} record ${record.label} has no ${name}`);
  }
  return value;
}

/**
 * Map one Graph service configuration record to an `ExpectedRecord`.
 * Returns `null` for record types this library does not compare.
 *
 * Graph labels are fully qualified; SRV records carry the service and
 * protocol separately and use the domain as their label.
 */
export function graphRecordToExpected(
  domain: string,
  record: GraphDnsRecord
): ExpectedRecord | null {
  const base = {
    domain,
    label: toLabel(record.label, domain),
    isOptional: record.isOptional,
    ttl: record.ttl,
    supportedService: record.supportedService,
  };

  switch (record.recordType.toLowerCase()) {
    case 'mx':
      return {
        ...base,
        recordType: 'MX',
        expectedValue: {
          preference: record.preference ?? 0,
          exchange: stripTrailingDot(field(record.mailExchange, 'mailExchange', record)),
        },
      };
    case 'cname':
      return {
        ...base,
        recordType: 'CNAME',
        expectedValue: {
          target: stripTrailingDot(field(record.canonicalName, 'canonicalName', record)),
        },
      };
    case 'txt':
      return {
        ...base,
        recordType: 'TXT',
        expectedValue: { text: field(record.text, 'text', record) },
      };
    case 'srv': {
      const parts = [record.service, record.protocol].filter(
        (p): p is string => p !== undefined && p !== ''
      );
      if (base.label !== '@') parts.push(base.label);
      return {
        ...base,
        label: parts.length > 0 ? parts.join('.') : '@',
        recordType: 'SRV',
        expectedValue: {
          priority: record.priority ?? 0,
          weight: record.weight ?? 0,
          port: field(record.port, 'port', record),
          target: stripTrailingDot(field(record.nameTarget, 'nameTarget', record)),
        },
      };
    }
    default:
      return null;
  }
}

/**
 * Expected records from Microsoft Graph
 * (`GET /domains/{id}/serviceConfigurationRecords`).
 */
export function graphProvider(options: { session: GraphSession }): ExpectedRecordProvider {
  const { session } = options;
  requireSession(session);

  return {
    name: 'graph',
    async getExpectedRecords(input: string) {
      const domain = cleanDomain(input);
      let records: GraphDnsRecord[];
      try {
        records = await graphFetchAll(
          session,
          `/domains/${encodeURIComponent(domain)}/serviceConfigurationRecords`,
          GraphDnsRecordSchema
        );
      } catch (err) {
        throw new ProviderError(domain, `Graph: ${errorMessage(err)}`, { cause: err });
      }

      try {
        return records
          .map((r) => graphRecordToExpected(domain, r))
          .filter((r): r is ExpectedRecord => r !== null);
      } catch (err) {
        throw new ProviderError(domain, `Graph: ${errorMessage(err)}`, { cause: err });
      }
    },
  };
}
