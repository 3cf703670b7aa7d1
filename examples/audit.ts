/**
 * Live test: audit domains against the records Microsoft 365 expects.
 *
 * Usage:
 *   GRAPH_TOKEN=xxx npx tsx examples/audit.ts contoso.com fabrikam.com
 *   EXPECTED_CSV=records.csv npx tsx examples/audit.ts contoso.com
 *
 * Set PROFILE=readiness for the migration-readiness tiers and
 * BASELINE_OUT=path to save a snapshot of the comparisons.
 */

import {
  auditDomains,
  createProvider,
  saveBaseline,
  type SourceConfig,
} from '../src/index.js';
import { errorMessage } from '../src/errors.js';

const domains = process.argv.slice(2);
const token = process.env.GRAPH_TOKEN;
const csvPath = process.env.EXPECTED_CSV;
const profile = process.env.PROFILE === 'readiness' ? 'readiness' : 'health';

if (domains.length === 0) {
  console.error('Usage: GRAPH_TOKEN=xxx npx tsx examples/audit.ts <domain> [domain...]');
  process.exit(1);
}

function sourceFromEnv(): SourceConfig | undefined {
  if (csvPath) return { csvPath };
  if (token) return { graph: { accessToken: token } };
  return undefined;
}

async function main() {
  const source = sourceFromEnv();
  if (!source) {
    console.error('Set GRAPH_TOKEN (Microsoft Graph, Domain.Read.All) or EXPECTED_CSV.');
    process.exit(1);
  }

  const provider = await createProvider(source);
  console.log(`\nAuditing ${domains.length} domain(s) with ${provider.name}...`);

  const { results, skipped } = await auditDomains(domains, provider, {
    profile,
    checks: { dmarc: true },
  });

  for (const audit of results) {
    const { assessment } = audit;
    console.log(`\n${audit.domain}: ${assessment.score}% (${assessment.tier})`);
    for (const c of audit.comparisons) {
      const note = c.formatNote ? ` [${c.formatNote}]` : '';
      console.log(`  ${c.status.padEnd(8)} ${c.recordType.padEnd(5)} ${c.fqdn}${note}`);
    }
    for (const check of audit.authChecks) {
      console.log(`  ${check.category.padEnd(10)} ${check.name}: ${check.status}`);
    }
    for (const action of assessment.criticalActions) {
      console.log(`  ! ${action}`);
    }
    for (const rec of assessment.recommendations) {
      console.log(`  - ${rec}`);
    }
  }

  for (const s of skipped) {
    console.log(`\nSkipped ${s.domain}: ${s.reason}`);
  }

  const out = process.env.BASELINE_OUT;
  if (out) {
    const rows = await saveBaseline(out, results.flatMap((r) => r.comparisons));
    console.log(`\nSaved ${rows.length} baseline row(s) to ${out}`);
  }
}

main().catch((err: unknown) => {
  console.error('\nError:', errorMessage(err));
  process.exit(1);
});
