/** Public DNS-over-HTTPS endpoint used by the `doh` backend */
export const DOH_ENDPOINT = 'https://cloudflare-dns.com/dns-query';

/** Abort DoH requests after this many milliseconds */
export const DOH_TIMEOUT_MS = 8000;

/** SPF include every Microsoft 365 sending domain needs */
export const M365_SPF_INCLUDE = 'spf.protection.outlook.com';

/** Recommended SPF record for a domain that only sends through Microsoft 365 */
export const M365_SPF_RECORD = `v=spf1 include:${M365_SPF_INCLUDE} -all`;

/** DKIM selectors Microsoft 365 publishes for every custom domain */
export const M365_DKIM_SELECTORS = ['selector1', 'selector2'] as const;

/** RFC 7208 limit on DNS-querying SPF mechanisms */
export const SPF_LOOKUP_LIMIT = 10;

/** Legacy Exchange Online Protection MX suffix (e.g. contoso-com.mail.protection.outlook.com) */
export const LEGACY_MX_SUFFIX = '.mail.protection.outlook.com';

/** DNSSEC-capable MX suffix (e.g. contoso-com.l-v1.mx.microsoft) */
export const MODERN_MX_SUFFIX = '.mx.microsoft';

/** Modern DKIM CNAME target suffix (e.g. selector1-contoso-com._domainkey.contoso.n-v1.dkim.mail.microsoft) */
export const MODERN_DKIM_SUFFIX = '.dkim.mail.microsoft';

/** Labels of Skype for Business Online aliases that Teams-only tenants no longer need */
export const LEGACY_ALIAS_LABELS = ['sip', 'lyncdiscover'] as const;

/** Records that must be removed when found */
export const DEPRECATED_RECORDS = [
  {
    label: 'msoid',
    recordType: 'CNAME',
    reason: 'it blocks modern authentication',
  },
] as const;

/** Skype for Business / Teams federation SRV records */
export const M365_SRV_RECORDS = [
  {
    label: '_sip._tls',
    priority: 100,
    weight: 1,
    port: 443,
    target: 'sipdir.online.lync.com',
  },
  {
    label: '_sipfederationtls._tcp',
    priority: 100,
    weight: 1,
    port: 5061,
    target: 'sipfed.online.lync.com',
  },
] as const;

/** Rendered `actualValue` for records that do not resolve */
export const NOT_FOUND = '(not found)';
