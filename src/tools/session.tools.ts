import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { SessionService } from '../domain/services/session.service.js';
import { SessionError, describeError } from '../domain/errors/session.error.js';
import { BufferedLogger, type Logger } from '../utils/logger.js';

export type SessionServiceFactory = (logger: Logger) => SessionService;

function textResult(payload: Record<string, unknown>) {
  return {
    content: [{
      type: 'text' as const,
      text: JSON.stringify(payload),
    }],
  };
}

function errorResult(error: unknown, messages: string[]) {
  return textResult({
    success: false,
    error: describeError(error),
    code: error instanceof SessionError ? error.code : undefined,
    messages,
  });
}

export function registerSessionTools(server: McpServer, createService: SessionServiceFactory): void {
  server.tool(
    'session_new',
    'Open an SSH tunnel to a remote Jupyter server so its notebook link works on this machine',
    {
      link: z.string().describe('Notebook link including port and token (e.g., "http://localhost:8888/?token=...")'),
      host: z.string().describe('SSH host the notebook server runs on'),
    },
    async ({ link, host }) => {
      const logger = new BufferedLogger();
      try {
        const session = await createService(logger).create(link, host);
        return textResult({
          success: true,
          session,
          messages: logger.drain(),
        });
      } catch (error) {
        return errorResult(error, logger.drain());
      }
    }
  );

  server.tool(
    'session_list',
    'List tracked remote Jupyter sessions with their live status',
    {},
    async () => {
      const logger = new BufferedLogger();
      try {
        const sessions = createService(logger).list();
        return textResult({
          success: true,
          count: sessions.length,
          sessions,
        });
      } catch (error) {
        return errorResult(error, logger.drain());
      }
    }
  );

  server.tool(
    'session_reconnect',
    'Restart the tunnel for a session whose forwarding process has exited (all sessions if no key)',
    {
      key: z.string().optional().describe('Session key "host:port"; omit to reconnect all'),
    },
    async ({ key }) => {
      const logger = new BufferedLogger();
      try {
        await createService(logger).reconnect(key);
        return textResult({ success: true, messages: logger.drain() });
      } catch (error) {
        return errorResult(error, logger.drain());
      }
    }
  );

  server.tool(
    'session_disconnect',
    'Stop the tunnel process for a session but keep it for later reconnection (all sessions if no key)',
    {
      key: z.string().optional().describe('Session key "host:port"; omit to disconnect all'),
    },
    async ({ key }) => {
      const logger = new BufferedLogger();
      try {
        await createService(logger).disconnect(key);
        return textResult({ success: true, messages: logger.drain() });
      } catch (error) {
        return errorResult(error, logger.drain());
      }
    }
  );

  server.tool(
    'session_drop',
    'Stop a session tunnel and forget it. Pass either a key or all=true',
    {
      key: z.string().optional().describe('Session key "host:port"'),
      all: z.boolean().optional().describe('Drop every session'),
    },
    async ({ key, all }) => {
      const logger = new BufferedLogger();
      try {
        await createService(logger).drop({ key, all });
        return textResult({ success: true, messages: logger.drain() });
      } catch (error) {
        return errorResult(error, logger.drain());
      }
    }
  );
}
