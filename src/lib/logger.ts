import type { LogLevelName } from '@/config';

type Severity = 'debug' | 'info' | 'warn' | 'error';

const RANK: Record<Severity, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const THRESHOLD: Record<LogLevelName, number> = {
  full: RANK.debug,
  critical: RANK.warn,
  silent: RANK.error,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string, level: LogLevelName = 'critical'): Logger {
  const threshold = THRESHOLD[level];
  const emit = (severity: Severity, message: string, details: unknown[]) => {
    if (RANK[severity] < threshold) return;
    console[severity](`[${scope}] ${message}`, ...details);
  };
  return {
    debug: (m, ...d) => emit('debug', m, d),
    info: (m, ...d) => emit('info', m, d),
    warn: (m, ...d) => emit('warn', m, d),
    error: (m, ...d) => emit('error', m, d),
  };
}
