import {
  buildRegistry,
  loadRouterConfig,
  resolveRuntimeSettings,
  transportOf,
} from './config.js';
import type { RouterConfigInput } from './config.js';
import { McpConnection } from './connection.js';
import { OpenAIEmbedder } from './embeddings.js';
import {
  CallError,
  CloseError,
  ConfigurationError,
  ConnectError,
  UnknownServerError,
} from './errors.js';
import type { CloseFailure } from './errors.js';
import { ToolMatcher } from './matcher.js';
import type {
  Connection,
  ConnectionFactory,
  MatchResult,
  Matcher,
  MatcherFactory,
  MatcherSettings,
  Server,
  ServerInfo,
  ServerState,
} from './types.js';

/** Fixed matcher parameters; the tool index is built for this embedding size */
export const MATCHER_SETTINGS: Readonly<MatcherSettings> = Object.freeze({
  embeddingDimensions: 1024,
  topServers: 5,
  topTools: 3,
});

export interface RouterOptions {
  /** In-memory config document, or a path to one (missing file = no servers) */
  config?: RouterConfigInput | string;
  /** Source of EMBEDDING_* and TOOL_INDEX_PATH; defaults to process.env */
  env?: Record<string, string | undefined>;
  /** Overrides TOOL_INDEX_PATH */
  indexPath?: string;
  createMatcher?: MatcherFactory;
  createConnection?: ConnectionFactory;
}

type PoolEntry =
  | { state: 'connecting'; pending: Promise<Connection> }
  | { state: 'established'; connection: Connection };

const defaultMatcherFactory: MatcherFactory = (embedding) => new ToolMatcher(new OpenAIEmbedder(embedding));
const defaultConnectionFactory: ConnectionFactory = (server) => new McpConnection(server);

/**
 * Routes queries to tools and owns one lazily opened connection per server.
 *
 * Connections open on the first call that targets a server and are reused
 * until shutdown. Concurrent first calls share a single connect attempt.
 * After shutdown the router can be used again; the next call reconnects.
 */
export class Router {
  private readonly servers: ReadonlyMap<string, Server>;
  private readonly pool = new Map<string, PoolEntry>();
  private readonly failures = new Map<string, unknown>();
  private readonly matcher: Matcher;
  private readonly createConnection: ConnectionFactory;

  constructor(options: RouterOptions = {}) {
    this.servers = buildRegistry(loadRouterConfig(options.config));
    this.createConnection = options.createConnection ?? defaultConnectionFactory;

    const runtime = resolveRuntimeSettings(options.env ?? process.env, options.indexPath);
    this.matcher = (options.createMatcher ?? defaultMatcherFactory)(runtime.embedding);
    this.matcher.configure(MATCHER_SETTINGS);
    try {
      this.matcher.loadIndex(runtime.indexPath);
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      throw new ConfigurationError(`Failed to load tool index at ${runtime.indexPath}`, { cause: err });
    }
  }

  /** Construct a router, run `fn` with it, and always shut it down afterwards */
  static async open<T>(options: RouterOptions, fn: (router: Router) => Promise<T>): Promise<T> {
    return new Router(options).scope(fn);
  }

  /** Rank tools for a free-text query. Every call asks the matcher again. */
  async route(query: string): Promise<MatchResult> {
    return this.matcher.match(query);
  }

  /** Call a tool, connecting to its server first if this is the first call */
  async callTool(
    serverName: string,
    toolName: string,
    params: Record<string, unknown> = {}
  ): Promise<unknown> {
    const connection = await this.acquire(serverName);
    try {
      return await connection.callTool(toolName, params);
    } catch (err) {
      if (err instanceof CallError) throw err;
      throw new CallError(serverName, toolName, err);
    }
  }

  /**
   * Close every connection, including ones still connecting.
   * All closes run concurrently; failures are collected into one CloseError
   * once every attempt has settled.
   */
  async shutdown(): Promise<void> {
    const entries = [...this.pool];
    this.pool.clear();
    this.failures.clear();
    if (entries.length === 0) return;

    const outcomes = await Promise.allSettled(
      entries.map(async ([, entry]) => {
        const connection = await this.settle(entry);
        if (!connection) return false;
        await connection.close();
        return true;
      })
    );

    const failures: CloseFailure[] = [];
    const closed: string[] = [];
    outcomes.forEach((outcome, i) => {
      const serverName = entries[i][0];
      if (outcome.status === 'rejected') {
        console.warn(`[mcp-tool-router] Failed to close connection to "${serverName}":`, outcome.reason);
        failures.push({ serverName, error: outcome.reason });
      } else if (outcome.value) {
        closed.push(serverName);
      }
    });

    if (failures.length > 0) {
      throw new CloseError(failures, closed);
    }
  }

  /**
   * Run `fn` with this router and shut down on every exit path.
   * When both `fn` and shutdown fail, the error from `fn` wins.
   */
  async scope<T>(fn: (router: this) => Promise<T>): Promise<T> {
    let result: T;
    try {
      result = await fn(this);
    } catch (err) {
      await this.shutdown().catch((closeErr: unknown) => {
        console.error('[mcp-tool-router] shutdown after failed scope also failed:', closeErr);
      });
      throw err;
    }
    await this.shutdown();
    return result;
  }

  getServerNames(): string[] {
    return [...this.servers.keys()];
  }

  getServerState(serverName: string): ServerState {
    const entry = this.pool.get(serverName);
    if (entry) return entry.state;
    return this.failures.has(serverName) ? 'failed' : 'absent';
  }

  getServerInfo(): ServerInfo[] {
    return [...this.servers.values()].map(server => ({
      name: server.name,
      transport: transportOf(server.config),
      state: this.getServerState(server.name),
    }));
  }

  /** Resolve the pooled connection for a server, starting a connect if there is none */
  private acquire(serverName: string): Promise<Connection> {
    const entry = this.pool.get(serverName);
    if (entry?.state === 'established') return Promise.resolve(entry.connection);
    if (entry?.state === 'connecting') return entry.pending;

    const server = this.servers.get(serverName);
    if (!server) return Promise.reject(new UnknownServerError(serverName));

    // The entry must be in the pool before the first await so that
    // concurrent callers find it and join the same attempt.
    const pending = this.connect(server);
    const connecting: PoolEntry = { state: 'connecting', pending };
    this.pool.set(serverName, connecting);

    void pending.then(
      (connection) => {
        // A shutdown in the meantime owns this connection now
        if (this.pool.get(serverName) !== connecting) return;
        this.pool.set(serverName, { state: 'established', connection });
        this.failures.delete(serverName);
      },
      (err: unknown) => {
        if (this.pool.get(serverName) !== connecting) return;
        this.pool.delete(serverName);
        this.failures.set(serverName, err);
      }
    );

    return pending;
  }

  private async connect(server: Server): Promise<Connection> {
    try {
      const connection = this.createConnection(server);
      await connection.connect();
      return connection;
    } catch (err) {
      if (err instanceof ConnectError) throw err;
      throw new ConnectError(server.name, err);
    }
  }

  /** The connection behind a pool entry, or null if its connect attempt failed */
  private async settle(entry: PoolEntry): Promise<Connection | null> {
    if (entry.state === 'established') return entry.connection;
    try {
      return await entry.pending;
    } catch {
      // The failed connect was already reported to the caller that started it
      return null;
    }
  }
}
