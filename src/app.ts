import { AlertCoordinator, createChannels, getDedupPolicy } from './alerts';
import type { ChannelDeps } from './alerts/channels';
import { fetchWindows } from './market';
import {
  ScannerSession, ScanDeps, ActiveTrigger,
  loadTickers, loadTriggerLibrary, resolveActiveTrigger,
} from './scanner';
import { config as defaultConfig, AppConfig } from './utils/config';

export interface ScannerApp {
  session: ScannerSession;
  deps: ScanDeps;
  trigger: ActiveTrigger;
}

export interface ScannerAppOverrides extends ChannelDeps {
  alertsEnabled?: boolean;
  symbols?: string[];
}

/** Wire config into a session and the collaborators one cycle needs. */
export function createScannerApp(cfg: AppConfig = defaultConfig, overrides: ScannerAppOverrides = {}): ScannerApp {
  const library = loadTriggerLibrary(cfg.triggers.file);
  const trigger = resolveActiveTrigger(library, { name: cfg.triggers.name, formula: cfg.triggers.formula });
  const symbols = overrides.symbols ?? loadTickers(cfg.tickers.source, cfg.tickers.file);

  const alertsEnabled = overrides.alertsEnabled ?? cfg.alerts.enabled;
  const session = new ScannerSession({ formulaText: trigger.formula, triggerName: trigger.name, alertsEnabled });

  const coordinator = alertsEnabled
    ? new AlertCoordinator({ channels: createChannels(cfg.alerts, overrides), policy: getDedupPolicy(cfg.alerts.dedupPolicy) })
    : null;

  const deps: ScanDeps = {
    symbols,
    coordinator,
    minWindow: cfg.scan.minWindow,
    fetchWindows: syms => fetchWindows(syms, {
      timeframe: cfg.scan.timeframe,
      windowLength: cfg.scan.windowLength,
      concurrency: cfg.scan.concurrency,
      fetchImpl: overrides.fetchImpl,
    }),
  };

  return { session, deps, trigger };
}
