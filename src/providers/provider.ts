import type { NewTaskPayload, Project, Task } from '../model.js';

/**
 * The only error a {@link TaskService} raises. Transport failures, HTTP
 * errors and malformed responses all surface as this type; `status` and
 * `responseText` are set when an HTTP response was received.
 */
export class RemoteServiceError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly responseText?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RemoteServiceError';
  }
}

export interface TaskService {
  listProjects(): Promise<Project[]>;

  /** Pending tasks of one project, as embedded in the project detail payload. */
  getProjectTasks(projectId: string): Promise<Task[]>;

  getTask(projectId: string, taskId: string): Promise<Task>;

  /** Create a task. The returned task carries the newly assigned id. */
  createTask(payload: NewTaskPayload): Promise<Task>;

  /** Completed tasks across all projects, in service order. */
  listCompletedTasks(): Promise<Task[]>;
}
