import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { ServerConfig } from './config.js';
import type { Connection, Server } from './types.js';

export interface ClientInfo {
  name: string;
  version: string;
}

const DEFAULT_CLIENT_INFO: ClientInfo = { name: 'mcp-tool-router', version: '0.1.0' };

/** Build the SDK transport for a server entry. Nothing is started until the client connects. */
export function createTransport(config: ServerConfig): Transport {
  if ('command' in config) {
    return new StdioClientTransport({
      command: config.command,
      args: config.args,
      // The SDK replaces the child environment wholesale when `env` is given
      env: config.env ? { ...getDefaultEnvironment(), ...config.env } : undefined,
      cwd: config.cwd,
    });
  }

  const requestInit = config.headers ? { headers: config.headers } : undefined;
  if (config.type === 'sse') {
    return new SSEClientTransport(new URL(config.url), { requestInit });
  }
  return new StreamableHTTPClientTransport(new URL(config.url), { requestInit });
}

/** One MCP client session to one server */
export class McpConnection implements Connection {
  private client: Client | null = null;
  private connecting = false;

  constructor(
    private readonly server: Server,
    private readonly clientInfo: ClientInfo = DEFAULT_CLIENT_INFO
  ) {}

  get serverName(): string {
    return this.server.name;
  }

  get isConnected(): boolean {
    return this.client !== null;
  }

  async connect(): Promise<void> {
    if (this.client || this.connecting) {
      throw new Error(`Connection to "${this.server.name}" was already opened`);
    }
    this.connecting = true;

    const client = new Client(this.clientInfo, { capabilities: {} });
    const transport = createTransport(this.server.config);
    try {
      await client.connect(transport);
    } catch (err) {
      await transport.close().catch((closeErr: unknown) => {
        console.warn(`[mcp-tool-router] Failed to release transport for "${this.server.name}":`, closeErr);
      });
      throw err;
    } finally {
      this.connecting = false;
    }

    this.client = client;
  }

  async callTool(toolName: string, params: Record<string, unknown>): Promise<unknown> {
    if (!this.client) {
      throw new Error(`Connection to "${this.server.name}" is not open`);
    }
    return this.client.callTool({ name: toolName, arguments: params });
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    await client.close();
  }
}
