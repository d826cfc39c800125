import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerSessionTools, type SessionServiceFactory } from './tools/session.tools.js';

export function createServer(createService: SessionServiceFactory): McpServer {
  const server = new McpServer({
    name: 'remote-jupyter',
    version: '0.1.0',
  });

  registerSessionTools(server, createService);

  return server;
}
