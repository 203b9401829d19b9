import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { ConfigurationError } from '../core/errors.js';

export type Environment = Record<string, string | undefined>;

/** Parse dotenv-style `KEY=value` lines; comments, blanks and `export ` prefixes are allowed */
export function parseEnv(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;
    const assignment = line.startsWith('export ') ? line.slice('export '.length).trim() : line;
    const eq = assignment.indexOf('=');
    if (eq <= 0) continue;
    const key = assignment.slice(0, eq).trim();
    let value = assignment.slice(eq + 1).trim();
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    value = value.replace(/\\n/g, '\n').replace(/\\r/g, '\r').replace(/\\t/g, '\t');
    result[key] = value;
  }
  return result;
}

export function loadEnvFile(path: string, cwd = process.cwd()): Record<string, string> {
  const abs = isAbsolute(path) ? path : resolve(cwd, path);
  if (!existsSync(abs)) {
    throw new ConfigurationError(`Env file not found: ${abs}`);
  }
  return parseEnv(readFileSync(abs, 'utf-8'));
}

/** Copy `vars` into `target`; variables already set win unless `override` */
export function applyEnv(vars: Record<string, string>, target: Environment, override: boolean): void {
  for (const [key, value] of Object.entries(vars)) {
    if (override || target[key] === undefined) {
      target[key] = value;
    }
  }
}
