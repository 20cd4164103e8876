type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogData = Record<string, unknown>;

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in levels;
}

const envLevel = process.env.LOG_LEVEL;
const currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  child(bindings: LogData): Logger;
}

function write(level: LogLevel, message: string, data: LogData) {
  if (levels[level] < levels[currentLevel]) return;
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...data,
  };
  if (level === 'error') {
    console.error(JSON.stringify(entry));
  } else {
    console.log(JSON.stringify(entry));
  }
}

function createLogger(bindings: LogData): Logger {
  return {
    debug: (msg, data) => write('debug', msg, { ...bindings, ...data }),
    info: (msg, data) => write('info', msg, { ...bindings, ...data }),
    warn: (msg, data) => write('warn', msg, { ...bindings, ...data }),
    error: (msg, data) => write('error', msg, { ...bindings, ...data }),
    child: (extra) => createLogger({ ...bindings, ...extra }),
  };
}

export const logger: Logger = createLogger({});

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
