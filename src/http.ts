export type FetchLike = typeof fetch;

export interface JsonRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  /** Retries for transient errors (default: 3). */
  retries?: number;
  /** Base delay for exponential backoff in ms (default: 200). */
  backoffMs?: number;
  /** Shared request spacing for every call made through one client. */
  throttle?: RequestThrottle;
  /** Abort a single attempt after this many ms. No timeout when unset. */
  timeoutMs?: number;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string,
    public readonly responseText?: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

function withQuery(url: string, query?: JsonRequestOptions['query']) {
  if (!query) return url;
  const u = new URL(url);
  for (const [k, v] of Object.entries(query)) {
    if (v === undefined) continue;
    u.searchParams.set(k, String(v));
  }
  return u.toString();
}

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

/**
 * Best-effort requests-per-second cap. One instance per client, so two
 * clients never share spacing state.
 */
export class RequestThrottle {
  private lastRequestAt = 0;

  constructor(private readonly rps: number) {}

  async wait(): Promise<void> {
    if (this.rps <= 0) return;
    const minGap = 1000 / this.rps;
    const wait = this.lastRequestAt + minGap - Date.now();
    if (wait > 0) await sleep(wait);
    this.lastRequestAt = Date.now();
  }
}

function parseRetryAfterMs(v: string | null): number | undefined {
  if (!v) return undefined;
  const sec = Number(v);
  if (Number.isFinite(sec) && sec >= 0) return sec * 1000;
  const at = Date.parse(v);
  if (Number.isFinite(at)) return Math.max(0, at - Date.now());
  return undefined;
}

function isTransientStatus(status: number) {
  return status === 429 || status >= 500;
}

/**
 * Fetch JSON, retrying 429/5xx and network failures with exponential backoff.
 * Non-transient HTTP failures throw {@link HttpError} immediately. The parsed
 * body is returned as `unknown`; callers validate it.
 */
export async function requestJson(
  url: string,
  opts: JsonRequestOptions = {},
  fetcher: FetchLike = fetch,
): Promise<unknown> {
  const finalUrl = withQuery(url, opts.query);
  const retries = opts.retries ?? 3;
  const backoffMs = opts.backoffMs ?? 200;
  const hasBody = opts.body !== undefined;

  let attempt = 0;
  while (true) {
    attempt++;
    try {
      await opts.throttle?.wait();

      const res = await fetcher(finalUrl, {
        method: opts.method ?? 'GET',
        headers: {
          accept: 'application/json',
          ...(hasBody ? { 'content-type': 'application/json' } : {}),
          ...(opts.headers ?? {}),
        },
        body: hasBody ? JSON.stringify(opts.body) : undefined,
        signal: opts.timeoutMs ? AbortSignal.timeout(opts.timeoutMs) : undefined,
      });

      if (!res.ok) {
        const txt = await res.text().catch(() => undefined);
        const retryAfterMs = parseRetryAfterMs(res.headers.get('retry-after'));
        const err = new HttpError(`HTTP ${res.status} for ${finalUrl}`, res.status, finalUrl, txt, retryAfterMs);
        if (attempt <= retries && isTransientStatus(res.status)) {
          await sleep(retryAfterMs ?? backoffMs * 2 ** (attempt - 1));
          continue;
        }
        throw err;
      }

      if (res.status === 204) return undefined;

      const text = await res.text();
      if (!text) return undefined;
      return JSON.parse(text);
    } catch (e) {
      // A non-transient HTTP status is final; everything else (network,
      // timeout, malformed body) gets the same backoff as a 5xx.
      if (e instanceof HttpError) throw e;
      if (attempt <= retries) {
        await sleep(backoffMs * 2 ** (attempt - 1));
        continue;
      }
      throw e;
    }
  }
}
