import type { ProcessPort } from '../ports/process.port.js';
import { tunnelKey, type TunnelListing, type TunnelRecord } from '../entities/tunnel.entity.js';
import { SessionError } from '../errors/session.error.js';
import { Tunnel, assertHost } from '../services/tunnel.js';
import { parseLink } from '../../utils/link-parser.js';
import type { Logger } from '../../utils/logger.js';

export interface RegistryDependencies {
  processes: ProcessPort;
  logger: Logger;
}

/**
 * All tunnels tracked for the current user, keyed by "host:port".
 *
 * Bulk operations walk a snapshot of the keys and stop at the first failure;
 * keys handled before the failure stay applied.
 */
export class TunnelRegistry {
  private tunnels = new Map<string, Tunnel>();
  private readonly processes: ProcessPort;
  private readonly logger: Logger;

  constructor(deps: RegistryDependencies) {
    this.processes = deps.processes;
    this.logger = deps.logger;
  }

  /**
   * Rebuild a registry from persisted records.
   * Throws CorruptState if a stored key differs from the one its record derives.
   */
  static fromRecords(records: Record<string, TunnelRecord>, deps: RegistryDependencies): TunnelRegistry {
    const registry = new TunnelRegistry(deps);
    for (const [key, record] of Object.entries(records)) {
      const derived = tunnelKey(record.host, record.port);
      if (key !== derived) {
        throw new SessionError(
          'CorruptState',
          `Stored session key '${key}' does not match its host and port ('${derived}').`
        );
      }
      registry.tunnels.set(key, new Tunnel(registry.processes, record));
    }
    return registry;
  }

  toRecords(): Record<string, TunnelRecord> {
    const records: Record<string, TunnelRecord> = {};
    for (const [key, tunnel] of this.tunnels) {
      records[key] = tunnel.toRecord();
    }
    return records;
  }

  get size(): number {
    return this.tunnels.size;
  }

  keys(): string[] {
    return [...this.tunnels.keys()];
  }

  has(key: string): boolean {
    return this.tunnels.has(key);
  }

  /**
   * Snapshot of one tunnel's persisted fields.
   */
  get(key: string): TunnelRecord | undefined {
    return this.tunnels.get(key)?.toRecord();
  }

  /**
   * Start a new tunnel for a link on a host.
   */
  async create(link: string, host: string): Promise<TunnelListing> {
    assertHost(host);
    const { port } = parseLink(link);
    const key = tunnelKey(host, port);
    if (this.tunnels.has(key)) {
      throw new SessionError(
        'DuplicateKey',
        `A remote Jupyter session with key '${key}' is already registered.\n` +
          `If you'd like to reconnect, use 'rjy rc ${key}'.`
      );
    }

    const tunnel = await Tunnel.start(this.processes, host, link);
    this.tunnels.set(tunnel.key, tunnel);
    this.logger.info(`Created new session ${tunnel.key}.`);
    return this.describe(key, tunnel);
  }

  list(): TunnelListing[] {
    return [...this.tunnels].map(([key, tunnel]) => this.describe(key, tunnel));
  }

  /**
   * Restart the forwarder for a key unless it is still running.
   */
  async reconnect(key: string): Promise<TunnelListing> {
    const tunnel = this.take(key);
    if (tunnel.isAlive()) {
      this.tunnels.set(key, tunnel);
      this.logger.info(`Session ${key} is already connected.`);
      return this.describe(key, tunnel);
    }

    let restarted: Tunnel;
    try {
      restarted = await Tunnel.start(this.processes, tunnel.host, tunnel.link);
    } catch (error) {
      this.tunnels.set(key, tunnel);
      throw error;
    }

    this.tunnels.set(key, restarted);
    this.logger.info(`Reconnected session ${key}.`);
    return this.describe(key, restarted);
  }

  async reconnectAll(): Promise<void> {
    for (const key of this.keys()) {
      await this.reconnect(key);
    }
  }

  /**
   * Stop a tunnel's process but keep tracking it.
   */
  disconnect(key: string): void {
    const tunnel = this.find(key);
    this.stop(tunnel);
  }

  disconnectAll(): void {
    for (const key of this.keys()) {
      this.disconnect(key);
    }
  }

  /**
   * Stop tracking a tunnel, terminating its process first if it runs.
   */
  drop(key: string): void {
    const tunnel = this.take(key);
    this.stop(tunnel);
  }

  dropAll(): void {
    for (const key of this.keys()) {
      this.drop(key);
    }
  }

  private stop(tunnel: Tunnel): void {
    const outcome = tunnel.terminate();
    if (outcome.kind === 'terminated') {
      this.logger.info(`Disconnected session ${tunnel.key} (Process ID=${outcome.processId}).`);
    } else {
      this.logger.info(`Session ${tunnel.key} has already closed.`);
    }
  }

  private find(key: string): Tunnel {
    const tunnel = this.tunnels.get(key);
    if (!tunnel) {
      throw notFound(key);
    }
    return tunnel;
  }

  private take(key: string): Tunnel {
    const tunnel = this.find(key);
    this.tunnels.delete(key);
    return tunnel;
  }

  private describe(key: string, tunnel: Tunnel): TunnelListing {
    // probe once per row; pid and status must agree
    const status = tunnel.status();
    return {
      key,
      processId: status === 'connected' ? tunnel.processId : null,
      status,
      link: tunnel.link,
    };
  }
}

function notFound(key: string): SessionError {
  return new SessionError('KeyNotFound', `Could not find a remote Jupyter session with key '${key}'.`);
}
