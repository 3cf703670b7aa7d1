export type M365DnsErrorCode =
  | 'QUERY_FAULT'
  | 'PROVIDER_FAULT'
  | 'CONFIG_FAULT'
  | 'RECORD_FORMAT';

/** Base class for every error this library raises */
export class M365DnsError extends Error {
  readonly code: M365DnsErrorCode;

  constructor(code: M365DnsErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The query mechanism itself failed (bad name, malformed response,
 * unusable server). A name that simply does not resolve is not an error.
 */
export class DnsQueryError extends M365DnsError {
  readonly query: { name: string; type: string };

  constructor(
    name: string,
    type: string,
    message: string,
    options?: ErrorOptions
  ) {
    super('QUERY_FAULT', `${type} ${name}: ${message}`, options);
    this.query = { name, type };
  }
}

/** An expected-record provider could not produce records for a domain */
export class ProviderError extends M365DnsError {
  readonly domain: string;

  constructor(domain: string, message: string, options?: ErrorOptions) {
    super('PROVIDER_FAULT', message, options);
    this.domain = domain;
  }
}

/** Invalid caller configuration; fatal before any domain is processed */
export class ConfigError extends M365DnsError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      'CONFIG_FAULT',
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message
    );
    this.issues = issues;
  }
}

/** A record value could not be parsed from its text form */
export class RecordFormatError extends M365DnsError {
  constructor(message: string) {
    super('RECORD_FORMAT', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
