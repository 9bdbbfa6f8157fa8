export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function ts(): string {
  return new Date().toISOString();
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || '').toLowerCase();
  if (normalized === 'warning') return 'warn';
  const levels: LogLevel[] = ['debug', 'info', 'warn', 'error'];
  return levels.find((level) => level === normalized) ?? 'info';
}

let minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return '';
  const entries = Object.entries(fields).filter(([, v]) => v !== undefined);
  if (entries.length === 0) return '';
  return ` ${JSON.stringify(Object.fromEntries(entries))}`;
}

function write(level: LogLevel, scope: string, message: string, fields?: LogFields): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

  const line = `[${ts()}] ${level.toUpperCase()} [${scope}] ${message}${formatFields(fields)}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, fields) => write('debug', scope, message, fields),
    info: (message, fields) => write('info', scope, message, fields),
    warn: (message, fields) => write('warn', scope, message, fields),
    error: (message, fields) => write('error', scope, message, fields),
    child: (sub) => createLogger(`${scope}:${sub}`),
  };
}
