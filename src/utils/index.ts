export { config, clampMinWindow } from './config';
export type { AppConfig, AlertsConfig, Timeframe, TickerSource, DedupPolicyName } from './config';
export { createLogger, parseLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
