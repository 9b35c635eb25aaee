export { ScannerSession } from './session';
export type { ScannerSessionOptions } from './session';
export { runScanCycle, evaluateWindows, compareResults } from './scan';
export type { ScanDeps } from './scan';
export { loadTickers, parseTickers, TICKER_DIR } from './tickers';
export { loadTriggerLibrary, parseTriggerLibrary, resolveActiveTrigger } from './triggers';
export type { TriggerLibrary, ActiveTrigger } from './triggers';
export { printScanReport, summarizeReport } from './report';
export type { TriggerResult, ScanReport } from './types';
