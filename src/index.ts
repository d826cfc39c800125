#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createProgram } from './cli.js';
import { createServer } from './server.js';
import { loadConfig, type RemoteJupyterConfig } from './config.js';
import { SessionStore } from './adapters/storage/session-store.js';
import { SshForwardAdapter } from './adapters/process/ssh-forward.adapter.js';
import { SessionService } from './domain/services/session.service.js';
import { describeError } from './domain/errors/session.error.js';
import { consoleLogger, stderrLogger, type Logger } from './utils/logger.js';

function createService(config: RemoteJupyterConfig, logger: Logger): SessionService {
  return new SessionService({
    store: new SessionStore(config.stateFile),
    processes: new SshForwardAdapter({
      sshBinary: config.sshBinary,
      x11Forwarding: config.x11Forwarding,
    }),
    logger,
  });
}

async function serve(): Promise<void> {
  const config = loadConfig();
  const server = createServer((logger) => createService(config, logger));

  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log to stderr (stdout is for MCP communication)
  stderrLogger.info(`remote-jupyter MCP server running on stdio (sessions in ${config.stateFile})`);
}

async function main() {
  const program = createProgram({
    service: () => createService(loadConfig(), consoleLogger),
    logger: consoleLogger,
    serve,
  });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  consoleLogger.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
