import { z } from 'zod';

/** TickTick task status values. Anything other than `Completed` counts as pending. */
export const TaskStatus = {
  Normal: 0,
  Completed: 2,
} as const;

// The API sends explicit nulls for unset fields.
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((v): z.output<T> | undefined => v ?? undefined);

/** Checklist entries are carried over verbatim, so their shape is left opaque. */
export const ChecklistItemSchema = z.record(z.string(), z.unknown());

export const TaskSchema = z.object({
  /** Opaque, unique per account. */
  id: z.string().min(1),
  projectId: z.string(),
  title: optional(z.string()).transform((v) => v ?? ''),
  status: optional(z.number().int()).transform((v) => v ?? TaskStatus.Normal),
  tags: optional(z.array(z.string())).transform((v) => v ?? []),
  content: optional(z.string()),
  desc: optional(z.string()),
  priority: optional(z.number().int()),
  items: optional(z.array(ChecklistItemSchema)),
  dueDate: optional(z.string()),
  startDate: optional(z.string()),
  completedTime: optional(z.string()),
  isAllDay: optional(z.boolean()),
  timeZone: optional(z.string()),
});

export const ProjectSchema = z.object({
  id: z.string().min(1),
  name: optional(z.string()),
  closed: optional(z.boolean()),
  kind: optional(z.string()),
});

export type ChecklistItem = z.infer<typeof ChecklistItemSchema>;
export type Task = z.infer<typeof TaskSchema>;
export type Project = z.infer<typeof ProjectSchema>;

/**
 * Body for `POST /task`. Scheduling fields are absent from the type so a
 * duplicate can never carry a due date, start date or completion time.
 */
export interface NewTaskPayload {
  title: string;
  projectId: string;
  content: string;
  desc: string;
  priority: number;
  tags: string[];
  items?: ChecklistItem[];
}

export function isCompleted(task: Pick<Task, 'status'>): boolean {
  return task.status === TaskStatus.Completed;
}

/**
 * Parse a TickTick timestamp to epoch ms. TickTick writes offsets without a
 * colon (`2025-01-01T08:00:00.000+0000`), which Date.parse does not accept
 * everywhere.
 */
export function parseTimestamp(value: string): number | undefined {
  const normalized = value.trim().replace(/([+-]\d{2})(\d{2})$/, '$1:$2');
  const ms = Date.parse(normalized);
  return Number.isFinite(ms) ? ms : undefined;
}
