import { Command } from 'commander';
import type { SessionService } from './domain/services/session.service.js';
import { formatSessionTable } from './utils/table.js';
import type { Logger } from './utils/logger.js';

export interface ProgramDependencies {
  // Resolved lazily so `--help` works without a HOME or a state file
  service: () => SessionService;
  logger: Logger;
  serve: () => Promise<void>;
}

export const EMPTY_LIST_MESSAGE = 'No active remote Jupyter sessions.';

export function createProgram(deps: ProgramDependencies): Command {
  const program = new Command()
    .name('rjy')
    .description('Manage SSH tunnels to remote Jupyter notebook servers')
    .version('0.1.0');

  program
    .command('new')
    .description('Open a tunnel for a notebook link on a remote host')
    .argument('<link>', 'Notebook link, e.g. http://localhost:8888/?token=...')
    .argument('<host>', 'SSH host running the notebook server')
    .action(async (link: string, host: string) => {
      await deps.service().create(link, host);
    });

  program
    .command('list')
    .description('List tracked sessions and their status')
    .action(() => {
      const rows = deps.service().list();
      deps.logger.info(rows.length === 0 ? EMPTY_LIST_MESSAGE : formatSessionTable(rows));
    });

  program
    .command('drop')
    .description('Disconnect a session and stop tracking it')
    .argument('[key]', 'Session key (host:port)')
    .option('--all', 'Drop every session')
    .action(async (key: string | undefined, options: { all?: boolean }) => {
      await deps.service().drop({ key, all: options.all });
    });

  program
    .command('rc')
    .description('Reconnect a session, or all sessions when no key is given')
    .argument('[key]', 'Session key (host:port)')
    .action(async (key: string | undefined) => {
      await deps.service().reconnect(key);
    });

  program
    .command('dc')
    .description('Disconnect a session, or all sessions when no key is given')
    .argument('[key]', 'Session key (host:port)')
    .action(async (key: string | undefined) => {
      await deps.service().disconnect(key);
    });

  program
    .command('mcp')
    .description('Serve session tools over MCP on stdio')
    .action(async () => {
      await deps.serve();
    });

  return program;
}
