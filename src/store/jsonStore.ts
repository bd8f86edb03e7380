import { mkdir, readFile, writeFile, rename, copyFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { TaskSchema, type Task } from '../model.js';
import { silentLogger, type Logger } from '../log.js';

export interface DuplicatorState {
  /** State schema version. */
  version: 1;
  /** Task ids already accounted for. Append-only: ids are never removed. */
  processed: Set<string>;
  /** Last-known pending tasks, keyed by id (pending-diff mode only). */
  pending: Map<string, Task>;
  lastUpdated?: string;
}

/** On-disk shape (snake_case keys). */
export interface StateFile {
  version: 1;
  processed_tasks: string[];
  pending_tasks?: Record<string, Task>;
  last_updated: string;
}

const StateFileSchema = z.object({
  version: z.number().int().optional(),
  processed_tasks: z.array(z.string()),
  pending_tasks: z.record(z.string(), z.unknown()).optional(),
  last_updated: z.string().optional(),
});

// Older pending-diff files were a bare `{ <id>: <task> }` map.
const LegacySnapshotSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

export function emptyState(): DuplicatorState {
  return { version: 1, processed: new Set(), pending: new Map() };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export const DEFAULT_STATE_FILE = path.join('.ticktick-duplicator', 'state.json');

export class JsonStore {
  private readonly file: string;

  constructor(
    file: string = path.join(process.cwd(), DEFAULT_STATE_FILE),
    private readonly logger: Logger = silentLogger,
  ) {
    this.file = path.resolve(file);
  }

  statePath() {
    return this.file;
  }

  lockPath() {
    return this.file + '.lock';
  }

  private snapshotFrom(raw: Record<string, unknown>): Map<string, Task> {
    const out = new Map<string, Task>();
    for (const [id, value] of Object.entries(raw)) {
      const parsed = TaskSchema.safeParse(value);
      if (parsed.success && parsed.data.id === id) {
        out.set(id, parsed.data);
      } else {
        this.logger.warn(`state: dropping unreadable snapshot entry ${id}`);
      }
    }
    return out;
  }

  /** Best-effort migration to the latest state schema. */
  private migrate(input: unknown): DuplicatorState {
    const current = StateFileSchema.safeParse(input);
    if (current.success) {
      return {
        version: 1,
        processed: new Set(current.data.processed_tasks),
        pending: this.snapshotFrom(current.data.pending_tasks ?? {}),
        lastUpdated: current.data.last_updated,
      };
    }

    const legacy = LegacySnapshotSchema.safeParse(input);
    if (legacy.success) {
      return { ...emptyState(), pending: this.snapshotFrom(legacy.data) };
    }

    throw new Error('unrecognized state file layout');
  }

  /**
   * Load state. A missing file is an empty state; an unreadable or corrupt
   * one is logged and also treated as empty.
   */
  async load(): Promise<DuplicatorState> {
    let raw: string;
    try {
      raw = await readFile(this.file, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.debug(`state: no state file at ${this.file}, starting empty`);
      } else {
        this.logger.warn(`state: failed to read ${this.file}, starting empty`, err);
      }
      return emptyState();
    }

    try {
      return this.migrate(JSON.parse(raw));
    } catch (err) {
      this.logger.warn(`state: failed to parse ${this.file}, starting empty`, err);
      return emptyState();
    }
  }

  private async backupStateFile(): Promise<void> {
    try {
      await stat(this.file);
    } catch {
      return;
    }
    await copyFile(this.file, this.file + '.bak');
  }

  toFile(state: DuplicatorState, now = new Date()): StateFile {
    const out: StateFile = {
      version: 1,
      processed_tasks: [...state.processed].sort(),
      last_updated: now.toISOString(),
    };
    if (state.pending.size) out.pending_tasks = Object.fromEntries(state.pending);
    return out;
  }

  /** Whole-file overwrite via a temp file and rename; the previous file is kept as `.bak`. */
  async save(state: DuplicatorState): Promise<void> {
    await mkdir(path.dirname(this.file), { recursive: true });
    await this.backupStateFile();
    const file = this.toFile(state);
    const tmp = this.file + '.tmp';
    await writeFile(tmp, JSON.stringify(file, null, 2) + '\n', 'utf8');
    await rename(tmp, this.file);
    state.lastUpdated = file.last_updated;
  }

  isProcessed(state: DuplicatorState, id: string): boolean {
    return state.processed.has(id);
  }

  markProcessed(state: DuplicatorState, id: string): void {
    state.processed.add(id);
  }
}
