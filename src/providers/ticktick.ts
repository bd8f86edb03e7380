import { z } from 'zod';
import { HttpError, RequestThrottle, requestJson, type FetchLike, type JsonRequestOptions } from '../http.js';
import { silentLogger, type Logger } from '../log.js';
import { ProjectSchema, TaskSchema, TaskStatus, type NewTaskPayload, type Project, type Task } from '../model.js';
import { RemoteServiceError, type TaskService } from './provider.js';

export const TICKTICK_API_BASE = 'https://api.ticktick.com/open/v1';
export const TICKTICK_AUTHORIZE_URL = 'https://ticktick.com/oauth/authorize';
export const TICKTICK_TOKEN_URL = 'https://ticktick.com/oauth/token';
export const TICKTICK_SCOPES = ['tasks:read', 'tasks:write'];

export interface TickTickServiceOptions {
  /** OAuth bearer token. Calls fail with RemoteServiceError when absent. */
  accessToken?: string;
  baseUrl?: string;
  /** Request-per-second cap shared by every call of this client. */
  rps?: number;
  /** Per-attempt timeout in ms. */
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
  logger?: Logger;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
}

const ProjectDataSchema = z.object({
  tasks: z.array(z.unknown()).nullish(),
});

const CreatedTaskSchema = z.object({ id: z.string().min(1) });

/** Id reported for a created task whose response carried none. */
export const UNKNOWN_TASK_ID = '(unknown)';

function errorText(err: unknown): string {
  if (err instanceof HttpError) {
    return err.responseText ? `${err.message}: ${err.responseText}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

function toRemoteError(err: unknown, what: string): RemoteServiceError {
  if (err instanceof RemoteServiceError) return err;
  const status = err instanceof HttpError ? err.status : undefined;
  const body = err instanceof HttpError ? err.responseText : undefined;
  return new RemoteServiceError(`${what} failed: ${errorText(err)}`, status, body, { cause: err });
}

/**
 * TickTick Open API client.
 *
 * Responses are validated with zod here, so the rest of the program only
 * ever sees {@link Task} and {@link Project} records. In list responses a
 * malformed record is skipped with a warning; a malformed single-task
 * response is an error.
 */
export class TickTickService implements TaskService {
  private readonly fetcher: FetchLike;
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly throttle?: RequestThrottle;

  constructor(private readonly opts: TickTickServiceOptions = {}) {
    this.fetcher = opts.fetcher ?? fetch;
    this.baseUrl = (opts.baseUrl ?? TICKTICK_API_BASE).replace(/\/+$/, '');
    this.logger = opts.logger ?? silentLogger;
    this.throttle = opts.rps ? new RequestThrottle(opts.rps) : undefined;
  }

  private async api(path: string, what: string, init: JsonRequestOptions = {}): Promise<unknown> {
    if (!this.opts.accessToken) {
      throw new RemoteServiceError(`${what} failed: not authenticated (no access token)`);
    }
    try {
      return await requestJson(
        `${this.baseUrl}${path}`,
        {
          retries: this.opts.retries,
          backoffMs: this.opts.backoffMs,
          timeoutMs: this.opts.timeoutMs,
          throttle: this.throttle,
          ...init,
          headers: { authorization: `Bearer ${this.opts.accessToken}`, ...(init.headers ?? {}) },
        },
        this.fetcher,
      );
    } catch (err) {
      throw toRemoteError(err, what);
    }
  }

  private parseList<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T[] {
    if (!Array.isArray(raw)) {
      throw new RemoteServiceError(`${what} failed: expected an array, got ${raw === null ? 'null' : typeof raw}`);
    }
    const out: T[] = [];
    for (const entry of raw) {
      const parsed = schema.safeParse(entry);
      if (parsed.success) {
        out.push(parsed.data);
        continue;
      }
      this.logger.warn(`${what}: skipping malformed record`, {
        record: summarize(entry),
        issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
      });
    }
    return out;
  }

  private parseOne<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new RemoteServiceError(`${what} failed: malformed response (${issues.join('; ')})`);
    }
    return parsed.data;
  }

  async listProjects(): Promise<Project[]> {
    const raw = await this.api('/project', 'list projects');
    return this.parseList(ProjectSchema, raw, 'list projects');
  }

  async getProjectTasks(projectId: string): Promise<Task[]> {
    const what = `get project ${projectId}`;
    const raw = await this.api(`/project/${encodeURIComponent(projectId)}/data`, what);
    const data = this.parseOne(ProjectDataSchema, raw, what);
    return this.parseList(TaskSchema, data.tasks ?? [], what);
  }

  async getTask(projectId: string, taskId: string): Promise<Task> {
    const what = `get task ${taskId}`;
    const raw = await this.api(
      `/project/${encodeURIComponent(projectId)}/task/${encodeURIComponent(taskId)}`,
      what,
    );
    return this.parseOne(TaskSchema, raw, what);
  }

  /**
   * Create a task. Never retried: a POST that reached the server may have
   * created the task already. A 2xx whose body is not a full task still
   * counts as created; the returned record is rebuilt from the payload.
   */
  async createTask(payload: NewTaskPayload): Promise<Task> {
    const raw = await this.api('/task', 'create task', { method: 'POST', body: payload, retries: 0 });
    const parsed = TaskSchema.safeParse(raw);
    if (parsed.success) return parsed.data;

    const created = CreatedTaskSchema.safeParse(raw);
    this.logger.warn('create task: unexpected response body, task assumed created', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    });
    return {
      ...payload,
      tags: [...payload.tags],
      id: created.success ? created.data.id : UNKNOWN_TASK_ID,
      status: TaskStatus.Normal,
    };
  }

  async listCompletedTasks(): Promise<Task[]> {
    const raw = await this.api('/task/completed', 'list completed tasks');
    return this.parseList(TaskSchema, raw, 'list completed tasks');
  }
}

function summarize(entry: unknown): unknown {
  if (entry && typeof entry === 'object') {
    return {
      id: 'id' in entry ? entry.id : undefined,
      title: 'title' in entry ? entry.title : undefined,
    };
  }
  return entry;
}

export interface OAuthAppCredentials {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
  scope: z.string().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

/** Consent URL for the authorization-code flow. */
export function authorizeUrl(clientId: string, redirectUri: string, state?: string): string {
  const u = new URL(TICKTICK_AUTHORIZE_URL);
  u.searchParams.set('client_id', clientId);
  u.searchParams.set('scope', TICKTICK_SCOPES.join(' '));
  u.searchParams.set('redirect_uri', redirectUri);
  u.searchParams.set('response_type', 'code');
  if (state) u.searchParams.set('state', state);
  return u.toString();
}

export async function exchangeAuthorizationCode(
  creds: OAuthAppCredentials,
  code: string,
  fetcher: FetchLike = fetch,
): Promise<TokenResponse> {
  const body = new URLSearchParams({
    client_id: creds.clientId,
    client_secret: creds.clientSecret,
    code,
    grant_type: 'authorization_code',
    scope: TICKTICK_SCOPES.join(' '),
    redirect_uri: creds.redirectUri,
  });

  let res: Response;
  try {
    res = await fetcher(TICKTICK_TOKEN_URL, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded', accept: 'application/json' },
      body,
    });
  } catch (err) {
    throw toRemoteError(err, 'token exchange');
  }

  if (!res.ok) {
    const txt = await res.text().catch(() => '');
    throw new RemoteServiceError(`token exchange failed: HTTP ${res.status} ${txt}`.trim(), res.status, txt);
  }

  const parsed = TokenResponseSchema.safeParse(await res.json().catch(() => undefined));
  if (!parsed.success) {
    throw new RemoteServiceError('token exchange failed: response has no access_token', res.status);
  }
  return parsed.data;
}
