import path from 'node:path';
import os from 'node:os';
import { mkdtemp } from 'node:fs/promises';
import { TaskStatus, type Task } from '../src/model.js';
import { JsonStore } from '../src/store/jsonStore.js';
import type { Logger } from '../src/log.js';

export function makeTask(overrides: Partial<Task> & Pick<Task, 'id'>): Task {
  return {
    projectId: 'p1',
    title: 'Task',
    status: TaskStatus.Normal,
    tags: [],
    ...overrides,
  };
}

export async function tempStore(logger?: Logger) {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'ticktick-duplicator-'));
  const file = path.join(dir, 'state.json');
  return { dir, file, store: new JsonStore(file, logger) };
}

/** Logger that records lines instead of printing them. */
export function recordingLogger() {
  const lines: Array<{ level: string; msg: string }> = [];
  const logger: Logger = {
    error: (msg) => lines.push({ level: 'error', msg }),
    warn: (msg) => lines.push({ level: 'warn', msg }),
    info: (msg) => lines.push({ level: 'info', msg }),
    debug: (msg) => lines.push({ level: 'debug', msg }),
  };
  return { logger, lines };
}
