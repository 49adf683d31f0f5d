type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogFormat = 'pretty' | 'json';

interface LogEntry {
  level: LogLevel;
  module: string;
  message: string;
  data: Record<string, unknown>;
  timestamp: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',  // cyan
  info: '\x1b[32m',   // green
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getMinLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function getFormat(): LogFormat {
  return process.env.LOG_FORMAT?.toLowerCase() === 'json' ? 'json' : 'pretty';
}

/**
 * Errors stringify to `{}`, so lift name and message into plain fields
 * before the entry is printed.
 */
export function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    const out: Record<string, unknown> = { name: value.name, message: value.message };
    if ('kind' in value && typeof value.kind === 'string') out.kind = value.kind;
    if ('status' in value && typeof value.status === 'number') out.status = value.status;
    return out;
  }
  return value;
}

function serializeData(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = serializeValue(value);
  }
  return out;
}

export function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level];
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const time = entry.timestamp.split('T')[1]?.replace('Z', '') ?? entry.timestamp;

  let line = `${DIM}${time}${RESET} ${color}${levelStr}${RESET} ${BOLD}[${entry.module}]${RESET} ${entry.message}`;

  if (Object.keys(entry.data).length > 0) {
    const dataStr = Object.entries(entry.data)
      .map(([k, v]) => {
        const val = typeof v === 'string' ? v : JSON.stringify(v);
        return `${DIM}${k}=${RESET}${val}`;
      })
      .join(' ');
    line += ` ${dataStr}`;
  }

  return line;
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    time: entry.timestamp,
    level: entry.level,
    module: entry.module,
    msg: entry.message,
    ...entry.data,
  });
}

export class Logger {
  private module: string;
  private parentData: Record<string, unknown>;

  constructor(module: string, parentData: Record<string, unknown> = {}) {
    this.module = module;
    this.parentData = parentData;
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[getMinLevel()]) {
      return;
    }

    const entry: LogEntry = {
      level,
      module: this.module,
      message,
      data: serializeData({ ...this.parentData, ...data }),
      timestamp: new Date().toISOString(),
    };

    const formatted = getFormat() === 'json' ? formatJson(entry) : formatPretty(entry);

    switch (level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'debug':
        console.debug(formatted);
        break;
      default:
        console.log(formatted);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  child(childModule: string, childData?: Record<string, unknown>): Logger {
    return new Logger(
      `${this.module}:${childModule}`,
      { ...this.parentData, ...childData }
    );
  }

  time(label: string): () => void {
    const start = performance.now();
    this.debug(`${label} started`);
    return () => {
      const duration = Math.round(performance.now() - start);
      this.debug(`${label} completed`, { durationMs: duration });
    };
  }
}

export function createLogger(module: string, data?: Record<string, unknown>): Logger {
  return new Logger(module, data);
}
