import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';

/** Parse one `.env` line into a key/value pair, or undefined for blanks and comments. */
export function parseEnvLine(line: string): [string, string] | undefined {
  let trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) return undefined;
  if (trimmed.startsWith('export ')) trimmed = trimmed.slice('export '.length).trimStart();

  const eq = trimmed.indexOf('=');
  if (eq <= 0) return undefined;
  const key = trimmed.slice(0, eq).trim();
  let value = trimmed.slice(eq + 1).trim();

  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
    value = value.slice(1, -1);
    if (quote === '"') value = value.replace(/\\n/g, '\n');
  } else {
    // Unquoted values may carry a trailing ` # comment`.
    const hash = value.search(/\s#/);
    if (hash !== -1) value = value.slice(0, hash).trimEnd();
  }

  return [key, value];
}

/**
 * Load `.env`-style files into `env` without overriding keys that are
 * already set. Earlier files win over later ones.
 */
export function loadEnvFiles(
  filenames: string[] = ['.env', '.env.local'],
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): { loaded: string[] } {
  const loaded: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    for (const line of readFileSync(filePath, 'utf8').split(/\r?\n/)) {
      const entry = parseEnvLine(line);
      if (!entry) continue;
      const [key, value] = entry;
      if (env[key] === undefined) env[key] = value;
    }

    loaded.push(name);
  }

  return { loaded };
}
