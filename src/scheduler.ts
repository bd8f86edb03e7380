import { silentLogger, type Logger } from './log.js';
import { nullNotifier, type Notifier } from './notify.js';

export interface SchedulerOptions<T> {
  runPass: () => Promise<T>;
  /** Pause between the end of one pass and the start of the next. */
  intervalMs: number;
  /** Run a single pass; its errors propagate. */
  once?: boolean;
  /** Checked before each pass and during the pause; a pass in progress always finishes. */
  signal?: AbortSignal;
  logger?: Logger;
  notifier?: Notifier;
  onPass?: (result: T, runCount: number) => void;
}

/** Resolves after `ms`, or early (without throwing) when `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Run passes one after another until the signal aborts. Returns how many
 * passes ran.
 */
export async function runScheduler<T>(opts: SchedulerOptions<T>): Promise<number> {
  const logger = opts.logger ?? silentLogger;
  const notifier = opts.notifier ?? nullNotifier;

  let runCount = 0;
  while (!opts.signal?.aborted) {
    runCount++;
    try {
      const result = await opts.runPass();
      opts.onPass?.(result, runCount);
    } catch (e) {
      if (opts.once) throw e;
      const msg = e instanceof Error ? e.message : String(e);
      logger.error(`pass ${runCount} failed: ${msg}`);
      notifier.notify('TickTick duplicator', `Automation error: ${msg}`);
    }

    if (opts.once) break;

    logger.info(`sleeping ${Math.round(opts.intervalMs / 1000)}s until next pass`);
    await sleep(opts.intervalMs, opts.signal);
  }

  return runCount;
}
