const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;

/** Severity accepted by {@link createLogger}. */
export type Level = keyof typeof LEVELS;

/** Minimal structured logger used by the client. */
export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

/**
 * Creates a logger that writes one JSON line per entry to stderr,
 * skipping entries below `threshold`.
 */
export function createLogger(namespace: string, threshold: Level = 'warn'): Logger {
  const write = (level: Level, msg: string, data?: unknown) => {
    if (LEVELS[level] < LEVELS[threshold]) return;
    const entry: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      ns: namespace,
      msg,
    };
    if (data !== undefined) entry.data = data;
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  };

  return {
    debug: (msg, data) => write('debug', msg, data),
    info: (msg, data) => write('info', msg, data),
    warn: (msg, data) => write('warn', msg, data),
    error: (msg, data) => write('error', msg, data),
  };
}
