import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { RouterOptions } from '../core/router.js';
import { applyEnv, loadEnvFile } from './env-file.js';
import type { Environment } from './env-file.js';

export interface CliArgs {
  configPath: string | null;
  indexPath: string | null;
  envFiles: string[];
  envOverride: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { configPath: null, indexPath: null, envFiles: [], envOverride: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--config' && i + 1 < argv.length) {
      result.configPath = argv[++i];
    } else if (arg === '--index' && i + 1 < argv.length) {
      result.indexPath = argv[++i];
    } else if (arg === '--env-file' && i + 1 < argv.length) {
      result.envFiles.push(argv[++i]);
    } else if (arg === '--env-override') {
      result.envOverride = true;
    }
  }

  return result;
}

/**
 * Load env files into `env` before the router reads its runtime parameters.
 * Without `--env-file`, `<cwd>/.env` is loaded when it exists.
 * Returns the files that were applied.
 */
export function loadEnvironment(
  args: CliArgs,
  env: Environment = process.env,
  cwd = process.cwd()
): string[] {
  const defaultFile = resolve(cwd, '.env');
  const files = args.envFiles.length > 0
    ? args.envFiles.map(file => resolve(cwd, file))
    : existsSync(defaultFile) ? [defaultFile] : [];

  for (const file of files) {
    applyEnv(loadEnvFile(file, cwd), env, args.envOverride);
  }
  return files;
}

/** Router options for the server process; unset flags fall back to the defaults */
export function toRouterOptions(args: CliArgs, env: Environment = process.env): RouterOptions {
  return {
    env,
    ...(args.configPath ? { config: args.configPath } : {}),
    ...(args.indexPath ? { indexPath: args.indexPath } : {}),
  };
}
