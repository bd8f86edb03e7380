import { describe, expect, it } from 'vitest';
import {
  TickTickService,
  UNKNOWN_TASK_ID,
  authorizeUrl,
  exchangeAuthorizationCode,
} from '../src/providers/ticktick.js';
import { RemoteServiceError } from '../src/providers/provider.js';
import { TaskStatus } from '../src/model.js';
import { recordingLogger } from './helpers.js';

function jsonResponse(obj: unknown, status = 200) {
  return new Response(JSON.stringify(obj), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

const BASE = 'https://api.ticktick.com/open/v1';

interface Seen {
  url: string;
  method: string;
  auth: string | null;
  body?: string;
}

function recordingFetcher(handler: (url: string, method: string) => Response) {
  const seen: Seen[] = [];
  const fetcher: typeof fetch = async (input, init) => {
    const url = String(input);
    const method = init?.method ?? 'GET';
    const headers = new Headers(init?.headers);
    seen.push({
      url,
      method,
      auth: headers.get('authorization'),
      body: typeof init?.body === 'string' ? init.body : undefined,
    });
    return handler(url, method);
  };
  return { fetcher, seen };
}

describe('TickTickService', () => {
  it('lists projects with the bearer token', async () => {
    const { fetcher, seen } = recordingFetcher(() =>
      jsonResponse([
        { id: 'p1', name: 'Inbox', closed: null },
        { id: 'p2', name: 'Errands', closed: true, kind: 'TASK' },
      ]),
    );
    const svc = new TickTickService({ accessToken: 'test-token', fetcher });

    const projects = await svc.listProjects();
    expect(projects).toEqual([
      { id: 'p1', name: 'Inbox' },
      { id: 'p2', name: 'Errands', closed: true, kind: 'TASK' },
    ]);
    expect(seen).toEqual([{ url: `${BASE}/project`, method: 'GET', auth: 'Bearer test-token', body: undefined }]);
  });

  it('reads the tasks embedded in project data and normalizes nulls', async () => {
    const { fetcher, seen } = recordingFetcher(() =>
      jsonResponse({
        project: { id: 'p 1' },
        tasks: [
          {
            id: 't1',
            projectId: 'p 1',
            title: 'Zap: buy milk',
            status: 0,
            tags: null,
            dueDate: '2025-01-01T00:00:00.000+0000',
            priority: 1,
            sortOrder: -1099511627776,
          },
        ],
        columns: [],
      }),
    );
    const svc = new TickTickService({ accessToken: 'test-token', fetcher });

    const tasks = await svc.getProjectTasks('p 1');
    expect(seen[0]?.url).toBe(`${BASE}/project/p%201/data`);
    expect(tasks).toEqual([
      {
        id: 't1',
        projectId: 'p 1',
        title: 'Zap: buy milk',
        status: TaskStatus.Normal,
        tags: [],
        dueDate: '2025-01-01T00:00:00.000+0000',
        priority: 1,
      },
    ]);
  });

  it('treats a project without a tasks field as empty', async () => {
    const { fetcher } = recordingFetcher(() => jsonResponse({ project: { id: 'p1' } }));
    const svc = new TickTickService({ accessToken: 'test-token', fetcher });
    await expect(svc.getProjectTasks('p1')).resolves.toEqual([]);
  });

  it('skips malformed records in a listing with a warning', async () => {
    const { logger, lines } = recordingLogger();
    const { fetcher } = recordingFetcher(() =>
      jsonResponse([
        { id: 'c1', projectId: 'p1', title: 'done', status: 2, completedTime: '2025-01-02T00:00:00.000+0000' },
        { projectId: 'p1', title: 'no id', status: 2 },
      ]),
    );
    const svc = new TickTickService({ accessToken: 'test-token', fetcher, logger });

    const tasks = await svc.listCompletedTasks();
    expect(tasks.map((t) => t.id)).toEqual(['c1']);
    expect(lines).toEqual([{ level: 'warn', msg: 'list completed tasks: skipping malformed record' }]);
  });

  it('fetches a single task by project and id', async () => {
    const { fetcher, seen } = recordingFetcher(() =>
      jsonResponse({ id: 't1', projectId: 'p1', title: 'x', status: 2, items: [{ id: 'i1', title: 'step' }] }),
    );
    const svc = new TickTickService({ accessToken: 'test-token', fetcher });

    const task = await svc.getTask('p1', 't1');
    expect(seen[0]?.url).toBe(`${BASE}/project/p1/task/t1`);
    expect(task.status).toBe(TaskStatus.Completed);
    expect(task.items).toEqual([{ id: 'i1', title: 'step' }]);
  });

  it('posts the payload when creating a task', async () => {
    const { fetcher, seen } = recordingFetcher(() =>
      jsonResponse({ id: 'new1', projectId: 'p1', title: 'Zap: buy milk', status: 0, tags: ['errand'] }),
    );
    const svc = new TickTickService({ accessToken: 'test-token', fetcher });
    const payload = { title: 'Zap: buy milk', projectId: 'p1', content: '', desc: '', priority: 0, tags: ['errand'] };

    const created = await svc.createTask(payload);
    expect(created.id).toBe('new1');
    expect(seen[0]).toMatchObject({ url: `${BASE}/task`, method: 'POST' });
    expect(JSON.parse(seen[0]?.body ?? '')).toEqual(payload);
  });

  it('treats a 2xx create response without a full task as created', async () => {
    const { fetcher } = recordingFetcher(() => jsonResponse({ ok: true }));
    const { logger, lines } = recordingLogger();
    const svc = new TickTickService({ accessToken: 'test-token', fetcher, logger });

    const created = await svc.createTask({
      title: 'Zap: buy milk',
      projectId: 'p1',
      content: '',
      desc: '',
      priority: 0,
      tags: ['errand'],
    });

    expect(created).toEqual({
      title: 'Zap: buy milk',
      projectId: 'p1',
      content: '',
      desc: '',
      priority: 0,
      tags: ['errand'],
      id: UNKNOWN_TASK_ID,
      status: TaskStatus.Normal,
    });
    expect(lines).toEqual([{ level: 'warn', msg: 'create task: unexpected response body, task assumed created' }]);
  });

  it('does not retry a failed create', async () => {
    const { fetcher, seen } = recordingFetcher(() => new Response('busy', { status: 503 }));
    const svc = new TickTickService({ accessToken: 'test-token', fetcher, backoffMs: 0 });

    const err = await svc
      .createTask({ title: 'x', projectId: 'p1', content: '', desc: '', priority: 0, tags: [] })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteServiceError);
    expect(err).toMatchObject({ status: 503 });
    expect(seen).toHaveLength(1);
  });

  it('surfaces HTTP failures as RemoteServiceError with status and body', async () => {
    const { fetcher } = recordingFetcher(() => new Response('token expired', { status: 401 }));
    const svc = new TickTickService({ accessToken: 'test-token', fetcher });

    const err = await svc.listProjects().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteServiceError);
    expect(err).toMatchObject({
      status: 401,
      responseText: 'token expired',
      message: `list projects failed: HTTP 401 for ${BASE}/project: token expired`,
    });
  });

  it('retries transient failures before giving up', async () => {
    let calls = 0;
    const { fetcher } = recordingFetcher(() => {
      calls++;
      return calls < 3 ? new Response('busy', { status: 503 }) : jsonResponse([]);
    });
    const svc = new TickTickService({ accessToken: 'test-token', fetcher, backoffMs: 0 });

    await expect(svc.listCompletedTasks()).resolves.toEqual([]);
    expect(calls).toBe(3);
  });

  it('rejects a non-array listing', async () => {
    const { fetcher } = recordingFetcher(() => jsonResponse({ error: 'nope' }));
    const svc = new TickTickService({ accessToken: 'test-token', fetcher });
    await expect(svc.listProjects()).rejects.toThrow('list projects failed: expected an array, got object');
  });

  it('rejects a malformed single task', async () => {
    const { fetcher } = recordingFetcher(() => jsonResponse({ title: 'no ids' }));
    const svc = new TickTickService({ accessToken: 'test-token', fetcher });
    await expect(svc.getTask('p1', 't1')).rejects.toBeInstanceOf(RemoteServiceError);
  });

  it('fails without calling the network when no token is configured', async () => {
    const { fetcher, seen } = recordingFetcher(() => jsonResponse([]));
    const svc = new TickTickService({ fetcher });

    await expect(svc.listProjects()).rejects.toThrow('list projects failed: not authenticated (no access token)');
    expect(seen).toHaveLength(0);
  });

  it('honours a custom base url', async () => {
    const { fetcher, seen } = recordingFetcher(() => jsonResponse([]));
    const svc = new TickTickService({ accessToken: 'test-token', fetcher, baseUrl: 'http://localhost:9999/open/v1/' });
    await svc.listProjects();
    expect(seen[0]?.url).toBe('http://localhost:9999/open/v1/project');
  });
});

describe('OAuth helpers', () => {
  it('builds the consent url', () => {
    const u = new URL(authorizeUrl('client-1', 'http://localhost:53682/callback', 'st'));
    expect(u.origin + u.pathname).toBe('https://ticktick.com/oauth/authorize');
    expect(u.searchParams.get('client_id')).toBe('client-1');
    expect(u.searchParams.get('scope')).toBe('tasks:read tasks:write');
    expect(u.searchParams.get('redirect_uri')).toBe('http://localhost:53682/callback');
    expect(u.searchParams.get('response_type')).toBe('code');
    expect(u.searchParams.get('state')).toBe('st');
  });

  it('exchanges an authorization code for an access token', async () => {
    let form: URLSearchParams | undefined;
    const fetcher: typeof fetch = async (_url, init) => {
      form = init?.body instanceof URLSearchParams ? init.body : undefined;
      return jsonResponse({ access_token: 'test-access', token_type: 'bearer', expires_in: 15551999 });
    };

    const token = await exchangeAuthorizationCode(
      { clientId: 'client-1', clientSecret: 'test-secret', redirectUri: 'http://localhost/cb' },
      'the-code',
      fetcher,
    );
    expect(token.access_token).toBe('test-access');
    expect(form?.get('grant_type')).toBe('authorization_code');
    expect(form?.get('code')).toBe('the-code');
    expect(form?.get('client_secret')).toBe('test-secret');
  });

  it('reports a failed exchange', async () => {
    const fetcher: typeof fetch = async () => new Response('invalid_grant', { status: 400 });
    await expect(
      exchangeAuthorizationCode({ clientId: 'c', clientSecret: 's', redirectUri: 'http://localhost/cb' }, 'bad', fetcher),
    ).rejects.toThrow('token exchange failed: HTTP 400 invalid_grant');
  });
});
