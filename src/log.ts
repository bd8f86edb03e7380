import { appendFileSync } from 'node:fs';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const satisfies readonly LogLevel[];

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
}

export interface LoggerOptions {
  /** Also append every emitted line to this file. */
  file?: string;
  /** Console replacement, for tests. */
  sink?: Pick<Console, 'log' | 'warn' | 'error'>;
}

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  if (meta instanceof Error) return ` ${meta.name}: ${meta.message}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};

export function createLogger(level: LogLevel = 'info', opts: LoggerOptions = {}): Logger {
  if (level === 'silent') return silentLogger;

  const threshold = ORDER[level];
  const sink = opts.sink ?? console;
  const can = (lvl: Exclude<LogLevel, 'silent'>) => ORDER[lvl] <= threshold;

  const emit = (lvl: Exclude<LogLevel, 'silent'>, msg: string, meta: unknown) => {
    if (!can(lvl)) return;
    const line = `${new Date().toISOString()} ${lvl.toUpperCase()} ${msg}${fmtMeta(meta)}`;
    if (lvl === 'error') sink.error(line);
    else if (lvl === 'warn') sink.warn(line);
    else sink.log(line);

    if (opts.file) {
      try {
        appendFileSync(opts.file, line + '\n', 'utf8');
      } catch (err) {
        // The console line already went out; report the file failure there.
        sink.error(`log file write failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  };

  return {
    error: (msg, meta) => emit('error', msg, meta),
    warn: (msg, meta) => emit('warn', msg, meta),
    info: (msg, meta) => emit('info', msg, meta),
    debug: (msg, meta) => emit('debug', msg, meta),
  };
}
