#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ListToolsRequestSchema, CallToolRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { ToolGateway } from '../core/gateway.js';
import { Router } from '../core/router.js';
import { loadEnvironment, parseArgs, toRouterOptions } from './cli.js';

const args = parseArgs(process.argv.slice(2));

function createRouter(): Router {
  try {
    for (const file of loadEnvironment(args)) {
      process.stderr.write(`[mcp-tool-router] Loaded environment from ${file}\n`);
    }
    return new Router(toRouterOptions(args));
  } catch (err) {
    process.stderr.write(`[mcp-tool-router] Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  }
}

const router = createRouter();

const gateway = new ToolGateway(router);

const server = new Server(
  { name: 'mcp-tool-router', version: '0.1.0' },
  { capabilities: { tools: {} } }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: gateway.getToolList() };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: params } = request.params;
  try {
    return await gateway.callTool(name, params);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return {
      content: [{ type: 'text', text: `Error: ${msg}` }],
      isError: true,
    };
  }
});

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  const names = router.getServerNames();
  process.stderr.write(`[mcp-tool-router] Router server started (stdio), ${names.length} server(s) configured\n`);
}

async function shutdown() {
  process.stderr.write('[mcp-tool-router] Shutting down...\n');
  let exitCode = 0;
  try {
    await router.shutdown();
  } catch (err) {
    process.stderr.write(`[mcp-tool-router] ${err instanceof Error ? err.message : String(err)}\n`);
    exitCode = 1;
  }
  await server.close();
  process.exit(exitCode);
}

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

main().catch((err) => {
  process.stderr.write(`[mcp-tool-router] Fatal: ${err}\n`);
  process.exit(1);
});
