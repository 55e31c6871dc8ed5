export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

let defaultLevel: LogLevel | undefined;

/** 設定全域預設等級（CLI 於載入設定後呼叫） */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

function resolveDefaultLevel(): LogLevel {
  if (defaultLevel) return defaultLevel;
  const fromEnv = process.env.RAGLINE_LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

/** 結構化 JSON logger，一行一筆寫到 stderr */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel?: LogLevel,
  ) {}

  child(scope: string): Logger {
    return new Logger(`${this.context}:${scope}`, this.minLevel);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel ?? resolveDefaultLevel()];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
    };
    for (const [key, value] of Object.entries(data ?? {})) {
      entry[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
    }
    process.stderr.write(JSON.stringify(entry) + '\n');
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}
