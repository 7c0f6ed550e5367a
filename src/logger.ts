export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const order: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let level: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? 'info';

export function parseLevel(raw: string | undefined): LogLevel | undefined {
  const v = raw?.trim().toLowerCase();
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  return undefined;
}

export function setLogLevel(l: LogLevel) {
  level = l;
}

export function getLogLevel(): LogLevel {
  return level;
}

function enabled(l: LogLevel): boolean {
  return order[l] >= order[level];
}

export function debug(...args: unknown[]) {
  if (enabled('debug')) console.log('[zac] DEBUG', ...args);
}

export function log(...args: unknown[]) {
  if (enabled('info')) console.log('[zac]', ...args);
}

export function warn(...args: unknown[]) {
  if (enabled('warn')) console.warn('[zac] WARN', ...args);
}

export function error(...args: unknown[]) {
  console.error('[zac] ERROR', ...args);
}

// Render an unknown thrown value for log output
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
