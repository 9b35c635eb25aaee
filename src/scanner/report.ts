import { createLogger } from '../utils/logger';
import type { ScanReport } from './types';

const log = createLogger('report');

export function summarizeReport(report: ScanReport): string {
  return `${report.triggeredCount} of ${report.totalCount} symbols triggered`;
}

export function printScanReport(report: ScanReport, verbose = false) {
  const rows = verbose ? report.results : report.results.filter(r => r.triggered);

  log.info(summarizeReport(report), {
    formula: report.formula,
    durationMs: report.durationMs,
    skipped: report.skipped.length > 0 ? report.skipped : undefined,
    alerted: report.alerts ? report.alerts.symbols : 'disabled',
    results: rows.map(r => ({
      symbol: r.symbol,
      triggered: r.triggered,
      close: Number(r.lastClose.toFixed(2)),
      candle: new Date(r.candleTime).toISOString(),
    })),
  });
}
