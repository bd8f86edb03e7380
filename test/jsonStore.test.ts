import { describe, expect, it } from 'vitest';
import path from 'node:path';
import { readFile, writeFile, mkdir, stat } from 'node:fs/promises';
import { JsonStore, emptyState } from '../src/store/jsonStore.js';
import { TaskStatus } from '../src/model.js';
import { makeTask, recordingLogger, tempStore } from './helpers.js';

describe('JsonStore', () => {
  it('starts empty when the file is missing, without warning', async () => {
    const { logger, lines } = recordingLogger();
    const { store } = await tempStore(logger);

    const s = await store.load();
    expect(s.processed.size).toBe(0);
    expect(s.pending.size).toBe(0);
    expect(lines.filter((l) => l.level === 'warn')).toHaveLength(0);
  });

  it('saves and re-loads processed ids and the pending snapshot', async () => {
    const { store, file } = await tempStore();

    const s1 = await store.load();
    store.markProcessed(s1, 'b');
    store.markProcessed(s1, 'a');
    s1.pending.set('p1', makeTask({ id: 'p1', title: 'Zap: water plants' }));
    await store.save(s1);

    const onDisk = JSON.parse(await readFile(file, 'utf8'));
    expect(onDisk.version).toBe(1);
    expect(onDisk.processed_tasks).toEqual(['a', 'b']);
    expect(onDisk.pending_tasks.p1.title).toBe('Zap: water plants');
    expect(typeof onDisk.last_updated).toBe('string');
    expect(s1.lastUpdated).toBe(onDisk.last_updated);

    const s2 = await store.load();
    expect([...s2.processed].sort()).toEqual(['a', 'b']);
    expect(store.isProcessed(s2, 'a')).toBe(true);
    expect(s2.pending.get('p1')?.title).toBe('Zap: water plants');
  });

  it('omits pending_tasks when the snapshot is empty', async () => {
    const { store, file } = await tempStore();
    const s = emptyState();
    s.processed.add('t1');
    await store.save(s);

    const onDisk = JSON.parse(await readFile(file, 'utf8'));
    expect(Object.keys(onDisk).sort()).toEqual(['last_updated', 'processed_tasks', 'version']);
  });

  it('falls back to empty state with a warning on a corrupt file', async () => {
    const { logger, lines } = recordingLogger();
    const { store, file } = await tempStore(logger);
    await writeFile(file, '{ not json', 'utf8');

    const s = await store.load();
    expect(s.processed.size).toBe(0);
    expect(lines.some((l) => l.level === 'warn' && l.msg.startsWith('state: failed to parse'))).toBe(true);
  });

  it('treats an unexpected layout as corrupt', async () => {
    const { logger, lines } = recordingLogger();
    const { store, file } = await tempStore(logger);
    await writeFile(file, JSON.stringify({ processed_tasks: 'nope' }), 'utf8');

    const s = await store.load();
    expect(s.processed.size).toBe(0);
    expect(lines.filter((l) => l.level === 'warn')).toHaveLength(1);
  });

  it('reads a state file without a version field', async () => {
    const { store, file } = await tempStore();
    await writeFile(
      file,
      JSON.stringify({ processed_tasks: ['t1', 't2'], last_updated: '2025-01-01T00:00:00+00:00' }),
      'utf8',
    );

    const s = await store.load();
    expect([...s.processed]).toEqual(['t1', 't2']);
    expect(s.lastUpdated).toBe('2025-01-01T00:00:00+00:00');
  });

  it('migrates a bare id-to-task snapshot map', async () => {
    const { store, file } = await tempStore();
    await writeFile(
      file,
      JSON.stringify({
        t1: { id: 't1', projectId: 'p', title: 'Zap: a', status: 0, sortOrder: 5 },
        t2: { id: 'other', projectId: 'p', title: 'mismatched key' },
      }),
      'utf8',
    );

    const s = await store.load();
    expect(s.processed.size).toBe(0);
    expect([...s.pending.keys()]).toEqual(['t1']);
    expect(s.pending.get('t1')).toEqual({ id: 't1', projectId: 'p', title: 'Zap: a', status: TaskStatus.Normal, tags: [] });
  });

  it('keeps the previous file as .bak and leaves no temp file behind', async () => {
    const { store, file } = await tempStore();
    const s = emptyState();
    s.processed.add('first');
    await store.save(s);
    s.processed.add('second');
    await store.save(s);

    const bak = JSON.parse(await readFile(file + '.bak', 'utf8'));
    expect(bak.processed_tasks).toEqual(['first']);
    await expect(stat(file + '.tmp')).rejects.toThrow();
  });

  it('creates missing parent directories on save', async () => {
    const { dir } = await tempStore();
    const nested = path.join(dir, 'a', 'b', 'state.json');
    const store = new JsonStore(nested);
    await store.save(emptyState());
    await expect(stat(nested)).resolves.toBeTruthy();
    expect(store.lockPath()).toBe(nested + '.lock');
  });

  it('rejects save when the target path is a directory', async () => {
    const { dir } = await tempStore();
    const target = path.join(dir, 'taken');
    await mkdir(target);
    await expect(new JsonStore(target).save(emptyState())).rejects.toThrow();
  });
});
