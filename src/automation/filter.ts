import type { Task } from '../model.js';

export interface TaskFilters {
  /** Case-insensitive substring of the title. */
  name?: string;
  /** The task needs at least one of these tags. */
  tags?: readonly string[];
}

/**
 * True when the task passes every configured filter. An absent or empty
 * filter passes everything.
 */
export function matchesFilters(task: Pick<Task, 'title' | 'tags'>, filters: TaskFilters = {}): boolean {
  const name = filters.name?.trim();
  if (name && !task.title.toLowerCase().includes(name.toLowerCase())) return false;

  const required = filters.tags ?? [];
  if (required.length && !required.some((tag) => task.tags.includes(tag))) return false;

  return true;
}

export function describeFilters(filters: TaskFilters): string {
  const parts: string[] = [];
  if (filters.name?.trim()) parts.push(`name~"${filters.name.trim()}"`);
  if (filters.tags?.length) parts.push(`any tag of [${filters.tags.join(', ')}]`);
  return parts.length ? parts.join(' and ') : '(none: every task matches)';
}
