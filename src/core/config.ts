/**
 * Server configuration and runtime parameters.
 *
 * The server map uses the common MCP host layout:
 *
 *   { "mcpServers": { "<name>": { "command": "...", "args": [...] } } }
 *
 * - stdio servers: `command` + optional `args`, `env`, `cwd`
 * - streamable HTTP servers: `url` (+ `headers`), `type` omitted or "http"
 * - SSE servers: `url` (+ `headers`) with `type: "sse"`
 *
 * A config path that does not exist yields an empty server map. Anything that
 * does exist must parse completely; one bad entry rejects the whole document.
 * Runtime parameters (embedding endpoint, credential, tool index) come from the
 * environment and have no such leniency.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { EmbeddingSettings, Server, TransportKind } from './types.js';

export const DEFAULT_EMBEDDING_BASE_URL = 'https://dashscope.aliyuncs.com/compatible-mode/v1';
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-v4';

export const StdioServerConfigSchema = z.object({
  type: z.literal('stdio').optional(),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).optional(),
  cwd: z.string().optional(),
}).strict();

export const HttpServerConfigSchema = z.object({
  type: z.literal('http').optional(),
  url: z.string().url(),
  headers: z.record(z.string()).optional(),
}).strict();

export const SseServerConfigSchema = z.object({
  type: z.literal('sse'),
  url: z.string().url(),
  headers: z.record(z.string()).optional(),
}).strict();

export const ServerConfigSchema = z.union([
  StdioServerConfigSchema,
  HttpServerConfigSchema,
  SseServerConfigSchema,
]);

/** Other top-level keys (host settings, comments) are ignored */
export const RouterConfigSchema = z.object({
  mcpServers: z.record(ServerConfigSchema).default({}),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type RouterConfig = z.infer<typeof RouterConfigSchema>;
/** Shape accepted from callers before defaults are applied */
export type RouterConfigInput = z.input<typeof RouterConfigSchema>;

export function defaultConfigPath(): string {
  return resolve(process.cwd(), 'config', 'servers.json');
}

export function defaultIndexPath(): string {
  return resolve(process.cwd(), 'config', 'tool-index.json');
}

function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Read a config document from disk; `null` when the file does not exist */
function readConfigFile(path: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') return null;
    throw new ConfigurationError(`Failed to read config file ${path}`, { cause: err });
  }

  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON in config file ${path}`, { cause: err });
  }
}

export function parseRouterConfig(input: unknown): RouterConfig {
  const parsed = RouterConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid server configuration: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Load from an in-memory document or a JSON file path */
export function loadRouterConfig(source: RouterConfigInput | string = defaultConfigPath()): RouterConfig {
  if (typeof source !== 'string') return parseRouterConfig(source);

  const document = readConfigFile(source);
  if (document === null) {
    console.warn(`[mcp-tool-router] Config file not found at ${source}. Starting with empty server list.`);
    return { mcpServers: {} };
  }
  return parseRouterConfig(document);
}

/** Registry of servers keyed by name, in config order */
export function buildRegistry(config: RouterConfig): ReadonlyMap<string, Server> {
  const registry = new Map<string, Server>();
  for (const [name, serverConfig] of Object.entries(config.mcpServers)) {
    registry.set(name, Object.freeze({ name, config: Object.freeze(serverConfig) }));
  }
  return registry;
}

export function transportOf(config: ServerConfig): TransportKind {
  if ('command' in config) return 'stdio';
  return config.type === 'sse' ? 'sse' : 'http';
}

const RuntimeEnvSchema = z.object({
  EMBEDDING_BASE_URL: z.string().url().default(DEFAULT_EMBEDDING_BASE_URL),
  EMBEDDING_API_KEY: z.string({ required_error: 'environment variable not set' }),
  EMBEDDING_MODEL: z.string().default(DEFAULT_EMBEDDING_MODEL),
  TOOL_INDEX_PATH: z.string().optional(),
});

/** Older variable names, read when the current name is unset */
export const LEGACY_ENV_NAMES: Readonly<Record<string, string>> = Object.freeze({
  EMBEDDING_BASE_URL: 'DASHSCOPE_BASE_URL',
  EMBEDDING_API_KEY: 'DASHSCOPE_API_KEY',
  TOOL_INDEX_PATH: 'MCP_DATA_PATH',
});

export interface RuntimeSettings {
  embedding: EmbeddingSettings;
  indexPath: string;
}

/**
 * Resolve the mandatory runtime parameters. Empty variables count as unset.
 * `indexPath` overrides TOOL_INDEX_PATH (and MCP_DATA_PATH) when given.
 */
export function resolveRuntimeSettings(
  env: Record<string, string | undefined>,
  indexPath?: string
): RuntimeSettings {
  const present: Record<string, string> = {};
  for (const key of Object.keys(RuntimeEnvSchema.shape)) {
    const legacy = LEGACY_ENV_NAMES[key];
    const value = env[key]?.trim() || (legacy ? env[legacy]?.trim() : undefined);
    if (value) present[key] = value;
  }

  const parsed = RuntimeEnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid runtime parameters: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }

  const resolvedIndexPath = indexPath ?? parsed.data.TOOL_INDEX_PATH ?? defaultIndexPath();
  if (!existsSync(resolvedIndexPath)) {
    throw new ConfigurationError(`Tool index not found at: ${resolvedIndexPath}`);
  }

  return {
    embedding: {
      baseUrl: parsed.data.EMBEDDING_BASE_URL,
      apiKey: parsed.data.EMBEDDING_API_KEY,
      model: parsed.data.EMBEDDING_MODEL,
    },
    indexPath: resolvedIndexPath,
  };
}
