import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';

/**
 * Parse one dotenv line into a key/value pair.
 *
 * Accepts `KEY=VALUE`, `export KEY=VALUE`, quoted values and trailing
 * ` # comments` on unquoted values.
 */
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
    const hash = value.indexOf(' #');
    if (hash !== -1) value = value.slice(0, hash).trimEnd();
  }

  return [key, value];
}

/**
 * Load `.env` style files into `env`. Earlier files win over later ones and
 * variables already present in the environment are never overridden.
 */
export function loadEnvFiles(
  filenames: string[] = ['.env.local', '.env'],
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): { loaded: string[]; keys: string[] } {
  const loaded: string[] = [];
  const keys: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    for (const line of readFileSync(filePath, 'utf8').split(/\r?\n/)) {
      const pair = parseEnvLine(line);
      if (!pair) continue;
      const [key, value] = pair;
      if (env[key] !== undefined) continue;
      env[key] = value;
      keys.push(key);
    }

    loaded.push(name);
  }

  return { loaded, keys };
}
