import type { NewTaskPayload, Task } from '../model.js';

/**
 * Build the creation payload for a fresh copy of a completed task.
 *
 * Title, project, content, description, priority, tags and a non-empty
 * checklist carry over unchanged. Due date, start date, completion time and
 * the all-day/time-zone flags are dropped, so the copy lands back in the
 * list with no deadline.
 */
export function toDuplicatePayload(task: Task): NewTaskPayload {
  const payload: NewTaskPayload = {
    title: task.title,
    projectId: task.projectId,
    content: task.content ?? '',
    desc: task.desc ?? '',
    priority: task.priority ?? 0,
    tags: [...task.tags],
  };
  if (task.items?.length) payload.items = task.items.map((item) => ({ ...item }));
  return payload;
}
