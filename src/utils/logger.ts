export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const upper = (raw ?? '').trim().toUpperCase();
  return isLogLevel(upper) ? upper : 'INFO';
}

// Read on first use: config.ts loads .env after importing this module
let minLevel: LogLevel | null = null;

function threshold(): LogLevel {
  if (minLevel === null) minLevel = parseLogLevel(process.env.LOG_LEVEL);
  return minLevel;
}

// JSON.stringify drops Error's own fields (message, name are non-enumerable)
function serializable(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }
  if (data && typeof data === 'object' && !Array.isArray(data)) {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
    }
    return out;
  }
  return data;
}

function log(level: LogLevel, module: string, msg: string, data?: unknown) {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[threshold()]) return;

  const entry = {
    time: new Date().toISOString(),
    level,
    module,
    msg,
    ...(data !== undefined && { data: serializable(data) }),
  };

  const line = JSON.stringify(entry);

  if (level === 'ERROR') {
    console.error(line);
  } else if (level === 'WARN') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(module: string) {
  return {
    debug: (msg: string, data?: unknown) => log('DEBUG', module, msg, data),
    info: (msg: string, data?: unknown) => log('INFO', module, msg, data),
    warn: (msg: string, data?: unknown) => log('WARN', module, msg, data),
    error: (msg: string, data?: unknown) => log('ERROR', module, msg, data),
  };
}
