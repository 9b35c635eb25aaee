import { createScannerApp } from './app';
import { runScanCycle, printScanReport } from './scanner';
import { config, createLogger } from './utils';

const log = createLogger('main');

async function main() {
  log.info('Starting candle screener', {
    timeframe: config.scan.timeframe,
    intervalMs: config.scan.intervalMs,
    tickerSource: config.tickers.source,
    alertsEnabled: config.alerts.enabled,
    dedupPolicy: config.alerts.dedupPolicy,
  });

  const { session, deps, trigger } = createScannerApp();
  log.info('Scanner configured', {
    trigger: trigger.name,
    symbols: deps.symbols.length,
    channels: deps.coordinator ? deps.coordinator.channelNames : [],
  });

  if (deps.symbols.length === 0) {
    log.error('No tickers loaded; nothing to scan');
    process.exit(1);
  }

  // At most one cycle at a time: AlertState has no locking
  let inFlight = false;
  const tick = async () => {
    if (inFlight) {
      log.warn('Previous cycle still running, skipping tick');
      return;
    }
    inFlight = true;
    try {
      const report = await runScanCycle(session, deps);
      printScanReport(report);
    } catch (err) {
      log.error('Scan cycle failed', err);
    } finally {
      inFlight = false;
    }
  };

  session.start();
  await tick();
  const scanTimer = setInterval(() => {
    void tick();
  }, config.scan.intervalMs);

  const shutdown = () => {
    log.info('Shutting down...');
    clearInterval(scanTimer);
    session.stop();
    log.info('Goodbye', { cycles: session.cycles, notified: session.alertState.symbols() });
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  log.info('Screener is running. Press Ctrl+C to stop.');
}

main().catch((err) => {
  log.error('Fatal error', err);
  process.exit(1);
});
