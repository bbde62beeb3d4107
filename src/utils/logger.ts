export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

type Level = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<Level | 'silent', number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

function isLevelName(value: string): value is keyof typeof LEVEL_ORDER {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function currentLevel(): number {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevelName(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

// LOG_LEVEL is read per call so tests can silence output after import.
export function createLogger(scope: string): Logger {
  const emit = (level: Level, msg: string, ctx?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] > currentLevel()) return;
    const line = `[${scope}] ${msg}`;
    switch (level) {
      case 'error':
        console.error(line, ctx || '');
        break;
      case 'warn':
        console.warn(line, ctx || '');
        break;
      case 'info':
        console.info(line, ctx || '');
        break;
      case 'debug':
        console.debug(line, ctx || '');
        break;
    }
  };

  return {
    error: (msg, ctx) => emit('error', msg, ctx),
    warn: (msg, ctx) => emit('warn', msg, ctx),
    info: (msg, ctx) => emit('info', msg, ctx),
    debug: (msg, ctx) => emit('debug', msg, ctx),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
