import type { ProcessPort } from '../ports/process.port.js';
import type { TunnelListing } from '../entities/tunnel.entity.js';
import { SessionError } from '../errors/session.error.js';
import type { TunnelRegistry } from '../registry/tunnel.registry.js';
import type { SessionStore } from '../../adapters/storage/session-store.js';
import type { Logger } from '../../utils/logger.js';

export interface SessionServiceDependencies {
  store: SessionStore;
  processes: ProcessPort;
  logger: Logger;
}

export interface DropRequest {
  key?: string;
  all?: boolean;
}

/**
 * Entry points shared by the CLI and the MCP tools.
 * Every call is one load → operation → save cycle against the state file;
 * a failed operation leaves the file as the last successful save wrote it.
 */
export class SessionService {
  private readonly store: SessionStore;
  private readonly processes: ProcessPort;
  private readonly logger: Logger;

  constructor(deps: SessionServiceDependencies) {
    this.store = deps.store;
    this.processes = deps.processes;
    this.logger = deps.logger;
  }

  async create(link: string, host: string): Promise<TunnelListing> {
    return this.mutate((registry) => registry.create(link, host));
  }

  list(): TunnelListing[] {
    return this.load().list();
  }

  /**
   * Reconnect one session, or every session when no key is given.
   */
  async reconnect(key?: string): Promise<void> {
    await this.mutate(async (registry) => {
      if (key === undefined) {
        await registry.reconnectAll();
      } else {
        await registry.reconnect(key);
      }
    });
  }

  async disconnect(key?: string): Promise<void> {
    await this.mutate((registry) => {
      if (key === undefined) {
        registry.disconnectAll();
      } else {
        registry.disconnect(key);
      }
    });
  }

  async drop(request: DropRequest): Promise<void> {
    const target = resolveDropTarget(request);
    await this.mutate((registry) => {
      if (target === 'all') {
        registry.dropAll();
      } else {
        registry.drop(target.key);
      }
    });
  }

  private load(): TunnelRegistry {
    return this.store.load({ processes: this.processes, logger: this.logger });
  }

  private async mutate<T>(operation: (registry: TunnelRegistry) => T | Promise<T>): Promise<T> {
    const registry = this.load();
    const result = await operation(registry);
    this.store.save(registry);
    return result;
  }
}

/**
 * A drop names exactly one target: a key or --all.
 */
export function resolveDropTarget(request: DropRequest): 'all' | { key: string } {
  if (request.all && request.key !== undefined) {
    throw new SessionError('AmbiguousArguments', 'Specify either a key or --all, not both.');
  }
  if (request.all) {
    return 'all';
  }
  if (request.key === undefined) {
    throw new SessionError('AmbiguousArguments', 'Specify either a key or --all.');
  }
  return { key: request.key };
}
