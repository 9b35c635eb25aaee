/**
 * scan-once.ts
 *
 * Run a single scan cycle with alerts forced off and print every symbol's
 * result. Uses the same .env as the poller.
 *
 * Usage:
 *   npx tsx scripts/scan-once.ts
 *   TRIGGER_FORMULA="Close > Open and Volume > Volume[-1]" npx tsx scripts/scan-once.ts
 */

import { createLogger } from '../src/utils';
import { createScannerApp } from '../src/app';
import { runScanCycle, printScanReport } from '../src/scanner';

const log = createLogger('scan-once');

async function main() {
  const { session, deps, trigger } = createScannerApp(undefined, { alertsEnabled: false });
  if (session.parseError) {
    log.error('Trigger does not parse', { trigger: trigger.name, error: session.parseError.message });
    process.exit(1);
  }

  const report = await runScanCycle(session, deps);
  printScanReport(report, true);
}

main().catch((err) => {
  log.error('Fatal error', err);
  process.exit(1);
});
