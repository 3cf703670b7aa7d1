/**
 * Live test: watch a DNS change propagate across public resolvers.
 *
 * Usage:
 *   npx tsx examples/watch.ts contoso.com MX contoso-com.l-v1.mx.microsoft
 *
 * Ctrl+C stops the watch; it also stops after 30 minutes.
 */

import { monitorPropagation, parsePropagationSettings } from '../src/index.js';
import { errorMessage } from '../src/errors.js';
import { parseRecordType } from '../src/records.js';

const [name, type, expectedValue] = process.argv.slice(2);

if (!name || !type) {
  console.error('Usage: npx tsx examples/watch.ts <name> <type> [expected value]');
  process.exit(1);
}

async function main(recordName: string, recordType: string) {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const settings = parsePropagationSettings({
    name: recordName,
    type: parseRecordType(recordType),
    expectedValue,
    intervalMs: 15_000,
    maxDurationMs: 30 * 60_000,
  });

  console.log(`\nWatching ${settings.type} ${settings.name}...`);
  const report = await monitorPropagation({
    ...settings,
    signal: controller.signal,
    onTick: (tick) => {
      const pct = tick.propagationPct === null ? '' : ` ${tick.propagationPct}%`;
      console.log(`\nCheck #${tick.checkCount}${pct}`);
      for (const o of tick.observations) {
        const mark = o.matches ? '+' : o.error ? '!' : ' ';
        console.log(`  ${mark} ${o.resolverId.padEnd(15)} ${o.error ?? o.value ?? '(no answer)'}`);
      }
    },
    onChange: (e) => {
      console.log(`  ~ ${e.resolverId}: ${e.previous} -> ${e.current}`);
    },
  });

  console.log(
    `\n${report.state} after ${report.checkCount} check(s), ${report.changeCount} change(s), ${Math.round(report.elapsedMs / 1000)}s.`
  );
}

main(name, type).catch((err: unknown) => {
  console.error('\nError:', errorMessage(err));
  process.exit(1);
});
