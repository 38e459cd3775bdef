/**
 * Structured logging for the recommender.
 *
 * Everything goes to stderr; stdout is reserved for command output (result
 * lists, JSON, CSV exports).
 *
 * Level: RECOMMENDER_LOG_LEVEL, or setLogLevel() at runtime.
 * Format: `[HH:MM:SS] LEVEL [component] message (k=v ...)`, or one JSON
 * object per line when RECOMMENDER_LOG_JSON=true.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EmitLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  timestamp: string;
  level: EmitLevel;
  component?: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

/**
 * Narrow an arbitrary string (usually an env var) to a log level.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (value === undefined) return fallback;
  const lower = value.trim().toLowerCase();
  return isLogLevel(lower) ? lower : fallback;
}

const state = {
  level: parseLogLevel(process.env.RECOMMENDER_LOG_LEVEL),
  json: process.env.RECOMMENDER_LOG_JSON === 'true',
};

export function setLogLevel(level: LogLevel): void {
  state.level = level;
}

export function getLogLevel(): LogLevel {
  return state.level;
}

export function setJsonMode(enabled: boolean): void {
  state.json = enabled;
}

function renderMeta(meta: Record<string, unknown>): string {
  return Object.entries(meta)
    .map(([k, v]) => `${k}=${typeof v === 'object' ? JSON.stringify(v) : String(v)}`)
    .join(' ');
}

export function formatEntry(entry: LogEntry, asJson: boolean = state.json): string {
  if (asJson) {
    return JSON.stringify(entry);
  }

  const parts = [`[${entry.timestamp.slice(11, 19)}]`, entry.level.toUpperCase().padEnd(5)];
  if (entry.component) parts.push(`[${entry.component}]`);
  parts.push(entry.message);

  let line = parts.join(' ');
  if (entry.meta && Object.keys(entry.meta).length > 0) {
    line += ` (${renderMeta(entry.meta)})`;
  }
  return line;
}

function emit(level: EmitLevel, component: string, message: string, meta?: Record<string, unknown>): void {
  if (SEVERITY[level] < SEVERITY[state.level]) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    meta,
  };
  process.stderr.write(formatEntry(entry) + '\n');
}

/**
 * Logger whose entries are tagged with `component`.
 */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, meta) => emit('debug', component, msg, meta),
    info: (msg, meta) => emit('info', component, msg, meta),
    warn: (msg, meta) => emit('warn', component, msg, meta),
    error: (msg, meta) => emit('error', component, msg, meta),
  };
}
