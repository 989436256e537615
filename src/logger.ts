export type LogLevel = 'error' | 'warn' | 'info' | 'trace';

/**
 * Sink for soft-failure diagnostics. Parse errors and unsupported dynamic
 * comparisons are reported here instead of being thrown.
 */
export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  trace(message: string, ...details: unknown[]): void;
}

export interface ConsoleLoggerConfig {
  /** Most verbose level that still gets written. Defaults to 'error'. */
  level?: LogLevel;
  prefix?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  trace: 3,
};

export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const rank = LEVEL_RANK[config.level ?? 'error'];
  const prefix = config.prefix ?? '[qualifiers]';

  return {
    error: (message, ...details) => {
      console.error(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (rank >= LEVEL_RANK.warn) console.warn(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (rank >= LEVEL_RANK.info) console.info(`${prefix} ${message}`, ...details);
    },
    trace: (message, ...details) => {
      if (rank >= LEVEL_RANK.trace) console.debug(`${prefix} ${message}`, ...details);
    },
  };
}

/**
 * Maps a QUALIFIERS_LOGLEVEL value to a level. Unknown or missing values
 * fall back to 'error'.
 */
export function logLevelFromEnv(value: string | undefined): LogLevel {
  const v = (value ?? '').trim().toLowerCase();
  if (v.startsWith('warn')) return 'warn';
  if (v.startsWith('info')) return 'info';
  if (v === 'trace') return 'trace';
  return 'error';
}

export const defaultLogger: Logger = createConsoleLogger({
  level: logLevelFromEnv(process.env['QUALIFIERS_LOGLEVEL']),
});

export interface Diagnostic {
  level: LogLevel;
  message: string;
  details: unknown[];
}

export interface DiagnosticsCollector extends Logger {
  readonly diagnostics: readonly Diagnostic[];
  /** Messages logged at 'error' level, in order. */
  errors(): string[];
}

/** A logger that keeps every message, for callers wanting parse diagnostics. */
export function createDiagnosticsCollector(): DiagnosticsCollector {
  const diagnostics: Diagnostic[] = [];
  const push = (level: LogLevel) => (message: string, ...details: unknown[]) => {
    diagnostics.push({ level, message, details });
  };
  return {
    diagnostics,
    error: push('error'),
    warn: push('warn'),
    info: push('info'),
    trace: push('trace'),
    errors: () => diagnostics.filter((d) => d.level === 'error').map((d) => d.message),
  };
}
