import { z } from 'zod';
import { DUPLICATOR_MODES, type DuplicatorMode } from './automation/duplicator.js';
import type { TaskFilters } from './automation/filter.js';
import { LOG_LEVELS, type LogLevel } from './log.js';
import { DEFAULT_STATE_FILE } from './store/jsonStore.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// `KEY=` in a .env file means "unset", not "empty value".
const unset = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), schema.optional());

const str = z.string().min(1);

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'])
  .transform((v) => ['true', '1', 'yes', 'on'].includes(v));

export const EnvSchema = z.object({
  // TickTick credentials
  TICKTICK_ACCESS_TOKEN: unset(str),
  TICKTICK_CLIENT_ID: unset(str),
  TICKTICK_CLIENT_SECRET: unset(str),
  TICKTICK_REDIRECT_URI: unset(z.string().url()),

  // filters
  TASK_NAME_FILTER: unset(z.string()),
  TASK_FILTER_TAGS: unset(z.string()),

  // behavior
  POLLING_INTERVAL: unset(z.coerce.number().int().positive()),
  DUPLICATOR_MODE: unset(z.enum(DUPLICATOR_MODES)),
  DUPLICATOR_WINDOW_HOURS: unset(z.coerce.number().nonnegative()),
  DUPLICATOR_STATE_FILE: unset(str),
  DUPLICATOR_LOG_LEVEL: unset(z.enum(LOG_LEVELS)),
  DUPLICATOR_LOG_FILE: unset(str),
  DUPLICATOR_NOTIFY: unset(flag),
  DUPLICATOR_HTTP_RPS: unset(z.coerce.number().positive()),
  DUPLICATOR_HTTP_TIMEOUT_MS: unset(z.coerce.number().int().positive()),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export const DEFAULT_POLLING_INTERVAL_SECONDS = 300;
export const DEFAULT_WINDOW_HOURS = 24;
export const DEFAULT_REDIRECT_URI = 'http://localhost:53682/callback';

export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration:\n- ${problems.join('\n- ')}`);
  }
  return parsed.data;
}

export function parseTags(raw?: string): string[] {
  return (raw ?? '')
    .split(',')
    .map((t) => t.trim())
    .filter(Boolean);
}

export function filtersFromEnv(env: EnvConfig): TaskFilters {
  const name = env.TASK_NAME_FILTER?.trim();
  return { name: name || undefined, tags: parseTags(env.TASK_FILTER_TAGS) };
}

export interface RunOverrides {
  intervalSeconds?: number;
  mode?: DuplicatorMode;
  windowHours?: number;
  stateFile?: string;
  verbose?: boolean;
}

export interface RunSettings {
  accessToken: string;
  filters: TaskFilters;
  intervalSeconds: number;
  mode: DuplicatorMode;
  windowHours: number;
  stateFile: string;
  logLevel: LogLevel;
  logFile?: string;
  notify: boolean;
  rps?: number;
  timeoutMs?: number;
}

/** Merge env config with CLI overrides. Throws ConfigError when the access token is missing. */
export function resolveRunSettings(env: EnvConfig, overrides: RunOverrides = {}): RunSettings {
  if (!env.TICKTICK_ACCESS_TOKEN) {
    throw new ConfigError(
      'TICKTICK_ACCESS_TOKEN is required. Set it in .env or the environment (run `ticktick-duplicator auth` to obtain one).',
    );
  }

  const mode = overrides.mode ?? env.DUPLICATOR_MODE ?? 'completed';
  return {
    accessToken: env.TICKTICK_ACCESS_TOKEN,
    filters: filtersFromEnv(env),
    intervalSeconds: overrides.intervalSeconds ?? env.POLLING_INTERVAL ?? DEFAULT_POLLING_INTERVAL_SECONDS,
    mode,
    windowHours: mode === 'completed' ? (overrides.windowHours ?? env.DUPLICATOR_WINDOW_HOURS ?? DEFAULT_WINDOW_HOURS) : 0,
    stateFile: overrides.stateFile ?? env.DUPLICATOR_STATE_FILE ?? DEFAULT_STATE_FILE,
    logLevel: overrides.verbose ? 'debug' : (env.DUPLICATOR_LOG_LEVEL ?? 'info'),
    logFile: env.DUPLICATOR_LOG_FILE,
    notify: env.DUPLICATOR_NOTIFY ?? false,
    rps: env.DUPLICATOR_HTTP_RPS,
    timeoutMs: env.DUPLICATOR_HTTP_TIMEOUT_MS,
  };
}

export function doctorReport(env = readEnv()) {
  const missing: string[] = [];
  const notes: string[] = [];

  if (!env.TICKTICK_ACCESS_TOKEN) missing.push('TICKTICK_ACCESS_TOKEN');
  if (!env.TICKTICK_CLIENT_ID) notes.push('TICKTICK_CLIENT_ID is only needed for `auth`.');
  if (!env.TICKTICK_CLIENT_SECRET) notes.push('TICKTICK_CLIENT_SECRET is only needed for `auth`.');

  const filters = filtersFromEnv(env);
  if (!filters.name && !filters.tags?.length) {
    notes.push('No TASK_NAME_FILTER or TASK_FILTER_TAGS set: every completed task will be duplicated.');
  }

  const mode = env.DUPLICATOR_MODE ?? 'completed';
  if (mode === 'pending-diff' && env.DUPLICATOR_WINDOW_HOURS !== undefined) {
    notes.push('DUPLICATOR_WINDOW_HOURS is ignored in pending-diff mode.');
  }

  return {
    mode,
    filters,
    stateFile: env.DUPLICATOR_STATE_FILE ?? DEFAULT_STATE_FILE,
    pollingIntervalSeconds: env.POLLING_INTERVAL ?? DEFAULT_POLLING_INTERVAL_SECONDS,
    missing,
    notes,
  };
}
