import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ToolGateway, ROUTE_TOOLS, EXECUTE_TOOL, LIST_SERVERS } from '../src/core/gateway.js';
import type { GatewayRouter } from '../src/core/gateway.js';
import { CallError, GatewayError } from '../src/core/errors.js';
import type { MatchResult, ServerInfo } from '../src/core/types.js';

const matchResult: MatchResult = {
  query: 'list open issues',
  candidates: [
    {
      server: 'github',
      tool: 'list_issues',
      score: 0.9,
      description: 'List issues in a repository',
      parameters: { type: 'object' },
    },
  ],
};

const serverInfo: ServerInfo[] = [
  { name: 'github', transport: 'stdio', state: 'established' },
  { name: 'docs', transport: 'http', state: 'absent' },
];

function createRouter() {
  return {
    route: vi.fn(async (_query: string) => matchResult),
    callTool: vi.fn(async (_server: string, _tool: string, _params?: Record<string, unknown>): Promise<unknown> => ({
      content: [{ type: 'text', text: 'ok' }],
    })),
    getServerInfo: vi.fn(() => serverInfo),
  } satisfies GatewayRouter;
}

describe('ToolGateway', () => {
  let router: ReturnType<typeof createRouter>;
  let gateway: ToolGateway;

  beforeEach(() => {
    router = createRouter();
    gateway = new ToolGateway(router);
  });

  it('exposes route, execute and list tools', () => {
    const tools = gateway.getToolList();

    expect(tools.map(t => t.name)).toEqual([ROUTE_TOOLS, EXECUTE_TOOL, LIST_SERVERS]);
    expect(tools[0].inputSchema.required).toEqual(['query']);
    expect(tools[1].inputSchema.required).toEqual(['server_name', 'tool_name']);
  });

  describe('route_tools', () => {
    it('returns the match result as JSON text', async () => {
      const result = await gateway.callTool(ROUTE_TOOLS, { query: 'list open issues' });

      expect(router.route).toHaveBeenCalledWith('list open issues');
      expect(result.content).toEqual([{ type: 'text', text: JSON.stringify(matchResult) }]);
    });

    it('rejects a missing query', async () => {
      await expect(gateway.callTool(ROUTE_TOOLS, {}))
        .rejects.toThrow('Invalid arguments for route_tools: query: Required');
      await expect(gateway.callTool(ROUTE_TOOLS, undefined)).rejects.toThrow(GatewayError);
      expect(router.route).not.toHaveBeenCalled();
    });

    it('rejects an empty query', async () => {
      await expect(gateway.callTool(ROUTE_TOOLS, { query: '' }))
        .rejects.toThrow('Invalid arguments for route_tools: query: query must not be empty');
    });
  });

  describe('execute_tool', () => {
    it('passes a downstream MCP result through', async () => {
      const result = await gateway.callTool(EXECUTE_TOOL, {
        server_name: 'github',
        tool_name: 'list_issues',
        params: { repo: 'acme/widgets' },
      });

      expect(router.callTool).toHaveBeenCalledWith('github', 'list_issues', { repo: 'acme/widgets' });
      expect(result).toEqual({ content: [{ type: 'text', text: 'ok' }] });
    });

    it('defaults params to an empty object', async () => {
      await gateway.callTool(EXECUTE_TOOL, { server_name: 'github', tool_name: 'list_issues' });
      expect(router.callTool).toHaveBeenCalledWith('github', 'list_issues', {});
    });

    it('accepts params sent as a JSON string', async () => {
      await gateway.callTool(EXECUTE_TOOL, {
        server_name: 'github',
        tool_name: 'list_issues',
        params: '{"repo":"acme/widgets","state":"open"}',
      });
      expect(router.callTool).toHaveBeenCalledWith('github', 'list_issues', { repo: 'acme/widgets', state: 'open' });
    });

    it('rejects params that are not an object', async () => {
      await expect(gateway.callTool(EXECUTE_TOOL, {
        server_name: 'github',
        tool_name: 'list_issues',
        params: 'repo=acme/widgets',
      })).rejects.toThrow(/^Invalid arguments for execute_tool: params: /);
      expect(router.callTool).not.toHaveBeenCalled();
    });

    it('rejects a missing server name', async () => {
      await expect(gateway.callTool(EXECUTE_TOOL, { tool_name: 'list_issues' }))
        .rejects.toThrow('Invalid arguments for execute_tool: server_name: Required');
    });

    it('wraps a plain result as JSON text', async () => {
      router.callTool.mockResolvedValueOnce({ issues: [1, 2] });

      const result = await gateway.callTool(EXECUTE_TOOL, { server_name: 'github', tool_name: 'list_issues' });

      expect(result).toEqual({ content: [{ type: 'text', text: '{"issues":[1,2]}' }] });
    });

    it('wraps an undefined result as null', async () => {
      router.callTool.mockResolvedValueOnce(undefined);

      const result = await gateway.callTool(EXECUTE_TOOL, { server_name: 'github', tool_name: 'list_issues' });

      expect(result).toEqual({ content: [{ type: 'text', text: 'null' }] });
    });

    it('wraps a result whose content is not valid MCP content', async () => {
      router.callTool.mockResolvedValueOnce({ content: ['raw'] });

      const result = await gateway.callTool(EXECUTE_TOOL, { server_name: 'github', tool_name: 'list_issues' });

      expect(result).toEqual({ content: [{ type: 'text', text: '{"content":["raw"]}' }] });
    });

    it('propagates router failures', async () => {
      const failure = new CallError('github', 'list_issues', new Error('rate limited'));
      router.callTool.mockRejectedValueOnce(failure);

      await expect(gateway.callTool(EXECUTE_TOOL, { server_name: 'github', tool_name: 'list_issues' }))
        .rejects.toBe(failure);
    });
  });

  describe('list_servers', () => {
    it('reports every configured server', async () => {
      const result = await gateway.callTool(LIST_SERVERS, {});

      expect(result.content).toEqual([
        { type: 'text', text: JSON.stringify({ servers: serverInfo, total: 2 }) },
      ]);
    });
  });

  it('rejects unknown tools', async () => {
    await expect(gateway.callTool('find_tools', {})).rejects.toThrow('Unknown tool: find_tools');
  });
});
