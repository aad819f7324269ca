import { Logger, LogLevel } from '../types/index.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

const PREFIXES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🐛 [DEBUG]',
  [LogLevel.INFO]: 'ℹ️  [INFO] ',
  [LogLevel.WARN]: '⚠️  [WARN] ',
  [LogLevel.ERROR]: '❌ [ERROR]'
};

interface LogSink {
  write(chunk: string): unknown;
}

/**
 * Levelled diagnostics on stderr. Command output goes through the
 * OutputPort on stdout, so `pkgdeck list | …` stays clean at any level.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private level: LogLevel = LogLevel.INFO,
    private readonly sink: LogSink = process.stderr,
    private readonly clock: () => Date = () => new Date()
  ) {}

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, meta?: unknown): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log(LogLevel.ERROR, message, meta);
  }

  private log(level: LogLevel, message: string, meta: unknown): void {
    if (this.isEnabled(level)) {
      this.sink.write(`${this.format(level, message, meta)}\n`);
    }
  }

  private format(level: LogLevel, message: string, meta: unknown): string {
    const line = `${this.clock().toISOString()} ${PREFIXES[level]} ${message}`;
    if (meta === undefined) {
      return line;
    }
    if (typeof meta !== 'object' || meta === null) {
      return `${line} ${String(meta)}`;
    }
    return `${line}\n${JSON.stringify(meta, expandErrors, 2)}`;
  }
}

// JSON.stringify(new Error()) is {}
function expandErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const expanded: Record<string, unknown> = { name: value.name, message: value.message };
    if ('code' in value && typeof value.code === 'string') {
      expanded.code = value.code;
    }
    return expanded;
  }
  return value;
}

/**
 * Startup level: PKGDECK_VERBOSE=1 for debug, NODE_ENV=development for
 * info, errors only otherwise. `--verbose` raises it later via setLevel().
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.PKGDECK_VERBOSE === '1') {
    return LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

export const logger = new ConsoleLogger(resolveLogLevel());
