export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const ORDER: Record<Exclude<LogLevel, 'silent'>, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
  /** Same level and sink, messages tagged `[parent:scope]`. */
  child(scope: string): Logger;
}

export type LogSink = (line: string) => void;

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

/**
 * Leveled logger writing one line per message to stderr (or `sink`), so that
 * report output on stdout stays machine-readable.
 */
export function createLogger(level: LogLevel = 'info', scope?: string, sink: LogSink = (l) => console.error(l)): Logger {
  const child = (name: string) => createLogger(level, scope ? `${scope}:${name}` : name, sink);

  if (level === 'silent') {
    const noop = () => {};
    return { error: noop, warn: noop, info: noop, debug: noop, child };
  }

  const threshold = ORDER[level];
  const tag = scope ? ` [${scope}]` : '';

  const emit = (lvl: Exclude<LogLevel, 'silent'>) => (msg: string, meta?: unknown) => {
    if (ORDER[lvl] > threshold) return;
    sink(`${new Date().toISOString()} ${lvl.toUpperCase()}${tag} ${msg}${fmtMeta(meta)}`);
  };

  return {
    error: emit('error'),
    warn: emit('warn'),
    info: emit('info'),
    debug: emit('debug'),
    child,
  };
}
