import { TaskStatus, type NewTaskPayload, type Project, type Task } from '../model.js';
import { RemoteServiceError, type TaskService } from './provider.js';

export type TaskOperation = keyof TaskService;

/**
 * In-memory task service for local dev/tests.
 *
 * - Projects are given up front or derived from the tasks' project ids.
 * - Created tasks get sequential ids (`mock-1`, `mock-2`, ...).
 * - `failNext` makes the next N calls of one operation throw RemoteServiceError.
 */
export class MockTaskService implements TaskService {
  private tasks = new Map<string, Task>();
  private projects: Project[];
  private failures = new Map<TaskOperation, number>();
  private seq = 0;

  /** Every payload passed to createTask, including ones that failed. */
  readonly createCalls: NewTaskPayload[] = [];
  readonly calls: TaskOperation[] = [];

  constructor(opts?: { tasks?: Task[]; projects?: Project[] }) {
    for (const t of opts?.tasks ?? []) this.tasks.set(t.id, t);
    this.projects = opts?.projects ?? [];
  }

  failNext(op: TaskOperation, times = 1): this {
    this.failures.set(op, (this.failures.get(op) ?? 0) + times);
    return this;
  }

  failAlways(op: TaskOperation): this {
    this.failures.set(op, Number.POSITIVE_INFINITY);
    return this;
  }

  private enter(op: TaskOperation) {
    this.calls.push(op);
    const left = this.failures.get(op) ?? 0;
    if (left <= 0) return;
    this.failures.set(op, left - 1);
    throw new RemoteServiceError(`${op} failed: HTTP 500 (mock)`, 500, 'mock failure');
  }

  upsert(task: Task): void {
    this.tasks.set(task.id, task);
  }

  /** Mark a task completed, the way checking it off in the app would. */
  complete(id: string, completedTime = new Date().toISOString()): void {
    const task = this.tasks.get(id);
    if (!task) throw new Error(`Unknown mock task: ${id}`);
    this.tasks.set(id, { ...task, status: TaskStatus.Completed, completedTime });
  }

  remove(id: string): void {
    this.tasks.delete(id);
  }

  all(): Task[] {
    return [...this.tasks.values()];
  }

  async listProjects(): Promise<Project[]> {
    this.enter('listProjects');
    if (this.projects.length) return [...this.projects];
    const ids = [...new Set(this.all().map((t) => t.projectId))];
    return ids.map((id) => ({ id }));
  }

  async getProjectTasks(projectId: string): Promise<Task[]> {
    this.enter('getProjectTasks');
    return this.all().filter((t) => t.projectId === projectId && t.status !== TaskStatus.Completed);
  }

  async getTask(projectId: string, taskId: string): Promise<Task> {
    this.enter('getTask');
    const task = this.tasks.get(taskId);
    if (!task || task.projectId !== projectId) {
      throw new RemoteServiceError(`get task ${taskId} failed: HTTP 404 (mock)`, 404, 'not found');
    }
    return task;
  }

  async createTask(payload: NewTaskPayload): Promise<Task> {
    this.createCalls.push(payload);
    this.enter('createTask');
    const task: Task = { ...payload, id: `mock-${++this.seq}`, status: TaskStatus.Normal };
    this.tasks.set(task.id, task);
    return task;
  }

  async listCompletedTasks(): Promise<Task[]> {
    this.enter('listCompletedTasks');
    return this.all().filter((t) => t.status === TaskStatus.Completed);
  }
}
