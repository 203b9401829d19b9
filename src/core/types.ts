import type { ServerConfig } from './config.js';

/** A configured backend; identity is `name` */
export interface Server {
  readonly name: string;
  readonly config: ServerConfig;
}

export type TransportKind = 'stdio' | 'http' | 'sse';

/** An established (or establishable) session to one server */
export interface Connection {
  connect(): Promise<void>;
  callTool(toolName: string, params: Record<string, unknown>): Promise<unknown>;
  close(): Promise<void>;
}

export type ConnectionFactory = (server: Server) => Connection;

/**
 * Per-server lifecycle as seen from outside the router.
 * `failed` only records that the last attempt failed; the next call still retries.
 */
export type ServerState = 'absent' | 'connecting' | 'established' | 'failed';

export interface ServerInfo {
  name: string;
  transport: TransportKind;
  state: ServerState;
}

/** One ranked (server, tool) pair */
export interface ToolCandidate {
  server: string;
  tool: string;
  score: number;
  description: string;
  parameters: Record<string, unknown>;
}

export interface MatchResult {
  query: string;
  candidates: ToolCandidate[];
}

export interface MatcherSettings {
  embeddingDimensions: number;
  topServers: number;
  topTools: number;
}

export interface Matcher {
  configure(settings: MatcherSettings): void;
  loadIndex(path: string): void;
  match(query: string): Promise<MatchResult>;
}

/** Connection details for the embedding endpoint the matcher queries */
export interface EmbeddingSettings {
  baseUrl: string;
  apiKey: string;
  model: string;
}

export type MatcherFactory = (embedding: EmbeddingSettings) => Matcher;

export interface Embedder {
  embed(text: string, dimensions: number): Promise<number[]>;
}
