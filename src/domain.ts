/**
 * Clean a domain input: an email address, a URL or a bare domain.
 *
 * Examples:
 * - `admin@contoso.com` → `contoso.com`
 * - `https://contoso.com/path` → `contoso.com`
 * - `CONTOSO.COM.` → `contoso.com`
 *
 * Unlike a website lookup, `www.` is kept: a Microsoft 365 tenant may
 * verify any subdomain.
 */
export function cleanDomain(input: string): string {
  let domain = input.trim().toLowerCase();

  if (domain.includes('@')) {
    domain = domain.slice(domain.lastIndexOf('@') + 1);
  }

  if (domain.includes('://')) {
    try {
      domain = new URL(domain).hostname;
    } catch {
      domain = domain.split('://')[1]?.split('/')[0] ?? domain;
    }
  }

  domain = domain.split('/')[0] ?? domain;

  return stripTrailingDot(domain);
}

/** Remove the root dot(s) from a host name */
export function stripTrailingDot(host: string): string {
  return host.replace(/\.+$/, '');
}

/** Lowercase a host name and drop its root dot */
export function normalizeHost(host: string): string {
  return stripTrailingDot(host.trim().toLowerCase());
}

/** Case- and trailing-dot-insensitive host equality */
export function hostEquals(a: string, b: string): boolean {
  return normalizeHost(a) === normalizeHost(b);
}

/** Build the fully qualified name for a label ("@" is the apex) */
export function toFqdn(label: string, domain: string): string {
  const cleanLabel = stripTrailingDot(label.trim());
  return cleanLabel === '@' || cleanLabel === ''
    ? domain
    : `${cleanLabel}.${domain}`;
}

/**
 * Turn a fully qualified name back into a label relative to `domain`.
 * Names outside the domain are returned unchanged.
 */
export function toLabel(name: string, domain: string): string {
  const host = normalizeHost(name);
  const zone = normalizeHost(domain);
  if (host === zone) return '@';
  if (host.endsWith(`.${zone}`)) {
    return host.slice(0, -(zone.length + 1));
  }
  return host;
}
