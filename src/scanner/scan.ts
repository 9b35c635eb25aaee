import type { AlertCoordinator } from '../alerts/coordinator';
import { checkFormula, CompiledFormula } from '../formula';
import type { CandleWindow, FetchWindowsResult } from '../market/types';
import { createLogger } from '../utils/logger';
import type { ScannerSession } from './session';
import type { ScanReport, TriggerResult } from './types';

const log = createLogger('scan');

export interface ScanDeps {
  symbols: readonly string[];
  fetchWindows(symbols: readonly string[]): Promise<FetchWindowsResult>;
  /** Null when no alerting is wired up at all */
  coordinator: AlertCoordinator | null;
  minWindow: number;
  now?: () => number;
}

export function compareResults(a: TriggerResult, b: TriggerResult): number {
  if (a.triggered !== b.triggered) return a.triggered ? -1 : 1;
  return a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0;
}

/**
 * Evaluate one formula against every window. An unparseable formula (null)
 * yields all-false results rather than skipping the symbols.
 */
export function evaluateWindows(
  formula: CompiledFormula | null,
  windows: ReadonlyMap<string, CandleWindow>,
  minWindow: number,
): TriggerResult[] {
  const results: TriggerResult[] = [];
  for (const [symbol, window] of windows) {
    const last = window[window.length - 1];
    if (!last) continue;
    results.push({
      symbol,
      triggered: formula ? checkFormula(formula, window, { minWindow, symbol }) : false,
      lastClose: last.close,
      candleTime: last.timestamp,
    });
  }
  return results.sort(compareResults);
}

/**
 * One polling cycle: fetch, evaluate, alert (when enabled). Callers must not
 * overlap cycles on the same session.
 */
export async function runScanCycle(session: ScannerSession, deps: ScanDeps): Promise<ScanReport> {
  const now = deps.now ?? Date.now;
  const startedAt = now();

  const { windows, failed } = await deps.fetchWindows(deps.symbols);
  const results = evaluateWindows(session.formula, windows, deps.minWindow);
  const triggeredCount = results.filter(r => r.triggered).length;

  let alerts: ScanReport['alerts'] = null;
  if (session.alertsEnabled && deps.coordinator) {
    alerts = await deps.coordinator.processCycle(session, results);
  }

  const cycle = session.recordCycle();
  const report: ScanReport = {
    formula: session.formulaText,
    startedAt,
    durationMs: now() - startedAt,
    results,
    triggeredCount,
    totalCount: results.length,
    skipped: failed,
    alerts,
  };

  log.debug('Cycle complete', { cycle, triggered: triggeredCount, total: results.length, skipped: failed.length });
  return report;
}
