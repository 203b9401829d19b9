import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { GatewayError } from './errors.js';
import type { Router } from './router.js';

export const ROUTE_TOOLS = 'route_tools';
export const EXECUTE_TOOL = 'execute_tool';
export const LIST_SERVERS = 'list_servers';

/** The part of the router the gateway drives */
export type GatewayRouter = Pick<Router, 'route' | 'callTool' | 'getServerInfo'>;

function asRecord(value: unknown): Record<string, unknown> | null {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : null;
}

/** Some hosts send nested arguments as a JSON string */
function parseJsonString(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

const RouteArgsSchema = z.object({
  query: z.string().min(1, 'query must not be empty'),
});

const ExecuteArgsSchema = z.object({
  server_name: z.string().min(1),
  tool_name: z.string().min(1),
  params: z.preprocess(parseJsonString, z.record(z.unknown())).optional(),
});

function parseArgs<T extends z.ZodTypeAny>(tool: string, schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new GatewayError(`Invalid arguments for ${tool}: ${detail}`, { cause: parsed.error });
  }
  return parsed.data;
}

function textResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value ?? null) }] };
}

/** Exposes the router to an MCP host as three tools */
export class ToolGateway {
  constructor(private router: GatewayRouter) {}

  getToolList(): Tool[] {
    return [
      {
        name: ROUTE_TOOLS,
        description: 'Find the tools best suited to a task across all configured MCP servers. Describe what you need in plain language; returns ranked candidates with their server, tool name, relevance score and parameter schema. Pass the chosen server and tool to execute_tool.',
        inputSchema: {
          type: 'object',
          properties: {
            query: { type: 'string', description: 'What you need to accomplish, e.g. "list open issues in a repository".' },
          },
          required: ['query'],
        },
      },
      {
        name: EXECUTE_TOOL,
        description: 'Run a tool on one of the configured MCP servers. Use the server and tool names returned by route_tools.',
        inputSchema: {
          type: 'object',
          properties: {
            server_name: { type: 'string', description: 'Server that provides the tool.' },
            tool_name: { type: 'string', description: 'Tool to run on that server.' },
            params: { type: 'object', description: 'Arguments for the tool, matching its parameter schema.' },
          },
          required: ['server_name', 'tool_name'],
        },
      },
      {
        name: LIST_SERVERS,
        description: 'List the configured MCP servers with their transport and connection state.',
        inputSchema: { type: 'object', properties: {} },
      },
    ];
  }

  async callTool(name: string, args: Record<string, unknown> | undefined): Promise<CallToolResult> {
    switch (name) {
      case ROUTE_TOOLS: {
        const { query } = parseArgs(name, RouteArgsSchema, args);
        return textResult(await this.router.route(query));
      }
      case EXECUTE_TOOL: {
        const { server_name, tool_name, params } = parseArgs(name, ExecuteArgsSchema, args);
        const result = await this.router.callTool(server_name, tool_name, params ?? {});
        return this.toCallToolResult(result);
      }
      case LIST_SERVERS: {
        const servers = this.router.getServerInfo();
        return textResult({ servers, total: servers.length });
      }
      default:
        throw new GatewayError(`Unknown tool: ${name}`);
    }
  }

  /** Downstream MCP results pass through; anything else is wrapped as JSON text */
  private toCallToolResult(result: unknown): CallToolResult {
    const record = asRecord(result);
    if (record && Array.isArray(record.content)) {
      const parsed = CallToolResultSchema.safeParse(record);
      if (parsed.success) return parsed.data;
    }
    return textResult(result);
  }
}
