import { isCompleted, parseTimestamp, type Task } from '../model.js';
import { silentLogger, type Logger } from '../log.js';
import { RemoteServiceError, type TaskService } from '../providers/provider.js';
import type { DuplicatorState, JsonStore } from '../store/jsonStore.js';
import { withLock } from '../store/lock.js';
import { describeFilters, matchesFilters, type TaskFilters } from './filter.js';
import { toDuplicatePayload } from './transform.js';

/**
 * - `completed`: read the completed-tasks listing directly.
 * - `pending-diff`: remember the pending tasks of every project and treat the
 *   ones that vanish between passes as completion candidates.
 */
export type DuplicatorMode = 'completed' | 'pending-diff';

export const DUPLICATOR_MODES = ['completed', 'pending-diff'] as const satisfies readonly DuplicatorMode[];

export interface DuplicatorOptions {
  /** Default: completed. */
  mode?: DuplicatorMode;
  filters?: TaskFilters;
  /** Completed mode: only consider tasks completed in the last N hours. 0 or unset disables. */
  windowHours?: number;
  /** Plan duplicates without creating them or writing state. */
  dryRun?: boolean;
  /** Hold the pid lock beside the state file during a pass. Default: true. */
  lock?: boolean;
  logger?: Logger;
  now?: () => Date;
}

export interface PassStats {
  checked: number;
  matched: number;
  duplicated: number;
  errors: number;
}

export type FailureStage = 'fetch' | 'refetch' | 'create' | 'persist';

export interface PassFailure {
  stage: FailureStage;
  taskId?: string;
  error: string;
}

export interface PassReport {
  mode: DuplicatorMode;
  dryRun: boolean;
  startedAt: string;
  durationMs: number;
  stats: PassStats;
  created: Array<{ sourceId: string; newId: string; title: string }>;
  /** Dry run only: matches that would have been duplicated. */
  planned: Array<{ sourceId: string; title: string }>;
  failures: PassFailure[];
  /** False when the pass aborted, was a dry run, or the state write failed. */
  persisted: boolean;
}

export class PassInProgressError extends Error {
  constructor() {
    super('A duplication pass is already running');
    this.name = 'PassInProgressError';
  }
}

const HOUR_MS = 60 * 60 * 1000;

function message(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Keep tasks completed at or after `fromMs`. Tasks with no completion time
 * are dropped; so are unparseable ones, with a warning.
 */
export function completedSince(tasks: Task[], fromMs: number, logger: Logger = silentLogger): Task[] {
  return tasks.filter((t) => {
    if (!t.completedTime) return false;
    const at = parseTimestamp(t.completedTime);
    if (at === undefined) {
      logger.warn(`task ${t.id}: unparseable completedTime "${t.completedTime}"`);
      return false;
    }
    return at >= fromMs;
  });
}

interface Universe {
  candidates: Task[];
  /** pending-diff: the snapshot to persist once the pass is over. */
  nextPending?: Map<string, Task>;
}

/**
 * One reconciliation pass: load state, fetch the candidates, duplicate the
 * matching ones, then write state once.
 *
 * Passes never overlap: a second `runPass` while one is in flight rejects
 * with {@link PassInProgressError}, and the state-file lock keeps a second
 * process out.
 */
export class Duplicator {
  private running = false;
  private readonly logger: Logger;

  constructor(
    private readonly service: TaskService,
    private readonly store: JsonStore,
    private readonly opts: DuplicatorOptions = {},
  ) {
    this.logger = opts.logger ?? silentLogger;
  }

  get mode(): DuplicatorMode {
    return this.opts.mode ?? 'completed';
  }

  async runPass(): Promise<PassReport> {
    if (this.running) throw new PassInProgressError();
    this.running = true;
    try {
      if (this.opts.lock === false) return await this.pass();
      return await withLock(this.store.lockPath(), () => this.pass());
    } finally {
      this.running = false;
    }
  }

  private async completedUniverse(now: Date): Promise<Universe> {
    const completed = (await this.service.listCompletedTasks()).filter(isCompleted);
    const windowHours = this.opts.windowHours ?? 0;
    if (windowHours <= 0) {
      this.logger.info(`found ${completed.length} completed tasks`);
      return { candidates: completed };
    }

    const from = now.getTime() - windowHours * HOUR_MS;
    const recent = completedSince(completed, from, this.logger);
    this.logger.info(
      `found ${recent.length} tasks completed since ${new Date(from).toISOString()} (${completed.length} completed in total)`,
    );
    return { candidates: recent };
  }

  private async pendingDiffUniverse(state: DuplicatorState, report: PassReport): Promise<Universe> {
    const current = new Map<string, Task>();
    for (const project of await this.service.listProjects()) {
      for (const task of await this.service.getProjectTasks(project.id)) {
        if (!isCompleted(task)) current.set(task.id, task);
      }
    }
    this.logger.info(`found ${current.size} pending tasks (${state.pending.size} in previous snapshot)`);

    const nextPending = new Map(current);
    const candidates: Task[] = [];

    for (const [id, previous] of state.pending) {
      if (current.has(id) || this.store.isProcessed(state, id)) continue;

      let latest: Task;
      try {
        latest = await this.service.getTask(previous.projectId, id);
      } catch (e) {
        if (!(e instanceof RemoteServiceError)) throw e;
        if (e.status === 404) {
          this.logger.debug(`task ${id} was deleted; dropping it from the snapshot`);
          continue;
        }
        report.stats.errors++;
        report.failures.push({ stage: 'refetch', taskId: id, error: e.message });
        this.logger.error(`failed to re-fetch vanished task ${id}; will retry next pass`, e.message);
        nextPending.set(id, previous);
        continue;
      }

      if (isCompleted(latest)) {
        candidates.push(latest);
      } else {
        this.logger.debug(`task ${id} left the pending lists without being completed`);
      }
    }

    return { candidates, nextPending };
  }

  private async pass(): Promise<PassReport> {
    const started = Date.now();
    const now = this.opts.now?.() ?? new Date();
    const dryRun = !!this.opts.dryRun;
    const filters = this.opts.filters ?? {};

    const report: PassReport = {
      mode: this.mode,
      dryRun,
      startedAt: now.toISOString(),
      durationMs: 0,
      stats: { checked: 0, matched: 0, duplicated: 0, errors: 0 },
      created: [],
      planned: [],
      failures: [],
      persisted: false,
    };
    const finish = () => {
      report.durationMs = Date.now() - started;
      const s = report.stats;
      this.logger.info(
        `pass completed - checked: ${s.checked}, matched: ${s.matched}, duplicated: ${s.duplicated}, errors: ${s.errors}`,
      );
      return report;
    };

    const state = await this.store.load();
    this.logger.info(`pass start (mode=${this.mode}, dryRun=${dryRun}, filters=${describeFilters(filters)})`, {
      processed: state.processed.size,
    });

    let universe: Universe;
    try {
      universe =
        this.mode === 'completed' ? await this.completedUniverse(now) : await this.pendingDiffUniverse(state, report);
    } catch (e) {
      if (!(e instanceof RemoteServiceError)) throw e;
      report.stats.errors++;
      report.failures.push({ stage: 'fetch', error: e.message });
      this.logger.error('failed to fetch tasks; state left unchanged', e.message);
      return finish();
    }

    for (const task of universe.candidates) {
      report.stats.checked++;

      if (this.store.isProcessed(state, task.id)) {
        this.logger.debug(`skip ${task.id}: already processed`);
        continue;
      }

      if (!matchesFilters(task, filters)) {
        // Consumed for good: a later rename or retag is not re-evaluated.
        this.store.markProcessed(state, task.id);
        this.logger.debug(`skip ${task.id}: "${task.title}" does not match filters`);
        continue;
      }

      report.stats.matched++;
      const payload = toDuplicatePayload(task);

      if (dryRun) {
        report.planned.push({ sourceId: task.id, title: task.title });
        this.logger.info(`[dry-run] would duplicate "${task.title}" (${task.id})`);
        continue;
      }

      try {
        const created = await this.service.createTask(payload);
        this.store.markProcessed(state, task.id);
        report.stats.duplicated++;
        report.created.push({ sourceId: task.id, newId: created.id, title: task.title });
        this.logger.info(`duplicated "${task.title}" (${task.id}) as ${created.id}`);
      } catch (e) {
        if (!(e instanceof RemoteServiceError)) throw e;
        report.stats.errors++;
        report.failures.push({ stage: 'create', taskId: task.id, error: e.message });
        this.logger.error(`failed to duplicate ${task.id}; will retry next pass`, e.message);
        // Completed tasks never reappear in the pending lists, so keep the
        // snapshot entry or the retry would never find it.
        universe.nextPending?.set(task.id, task);
      }
    }

    if (dryRun) return finish();

    if (universe.nextPending) state.pending = universe.nextPending;
    try {
      await this.store.save(state);
      report.persisted = true;
    } catch (e) {
      report.failures.push({ stage: 'persist', error: message(e) });
      this.logger.error(`failed to save state to ${this.store.statePath()}`, message(e));
    }

    return finish();
  }
}
