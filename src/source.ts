import { access } from 'node:fs/promises';
import { parseSourceConfig, type SourceConfig } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import type { ExpectedRecordProvider } from './provider.js';
import { baselineProvider, readBaseline } from './providers/baseline.js';
import { csvProvider } from './providers/csv.js';
import { graphProvider } from './providers/graph.js';
import { jsonProvider } from './providers/json.js';

async function requireReadable(path: string, what: string): Promise<void> {
  try {
    await access(path);
  } catch (err) {
    throw new ConfigError(`${what} ${path} is not readable: ${errorMessage(err)}`);
  }
}

/**
 * Build the expected-record provider for a source selection.
 *
 * Exactly one source may be given. File sources are checked up front, and
 * a baseline is parsed completely, so a bad path fails before any domain
 * is processed.
 */
export async function createProvider(source: SourceConfig): Promise<ExpectedRecordProvider> {
  const config = parseSourceConfig(source);

  if (config.graph) {
    return graphProvider({ session: config.graph });
  }
  if (config.csvPath) {
    await requireReadable(config.csvPath, 'CSV file');
    return csvProvider(config.csvPath);
  }
  if (config.jsonPath) {
    await requireReadable(config.jsonPath, 'JSON file');
    return jsonProvider(config.jsonPath);
  }
  if (config.baselinePath) {
    const path = config.baselinePath;
    try {
      return baselineProvider(await readBaseline(path));
    } catch (err) {
      throw new ConfigError(`Baseline ${path} cannot be loaded: ${errorMessage(err)}`);
    }
  }
  throw new ConfigError('No expected-record source given');
}
