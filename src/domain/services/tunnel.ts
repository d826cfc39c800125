import type { ProcessPort } from '../ports/process.port.js';
import { tunnelKey, type TunnelRecord, type TunnelStatus } from '../entities/tunnel.entity.js';
import { SessionError, describeError } from '../errors/session.error.js';
import { parseLink } from '../../utils/link-parser.js';

/**
 * Reject hosts that could not be stored or passed to ssh.
 */
export function assertHost(host: string): void {
  if (!host.trim()) {
    throw new SessionError('InvalidLink', 'SSH host must not be empty.');
  }
}

export type TerminateOutcome =
  | { kind: 'terminated'; processId: number }
  | { kind: 'already-closed' };

/**
 * One SSH forward to a remote notebook server.
 *
 * Status is never cached: every call to status() probes the OS, and a dead
 * pid stays recorded until terminate() clears it.
 */
export class Tunnel {
  readonly host: string;
  readonly port: number;
  readonly link: string;
  readonly token: string;
  private pid: number | null;

  constructor(
    private readonly processes: ProcessPort,
    record: TunnelRecord
  ) {
    this.host = record.host;
    this.port = record.port;
    this.link = record.link;
    this.token = record.token;
    this.pid = record.processId;
  }

  /**
   * Parse the link and spawn a forwarder for host:port.
   */
  static async start(processes: ProcessPort, host: string, link: string): Promise<Tunnel> {
    assertHost(host);
    const { port, token } = parseLink(link);
    const processId = await processes.spawnForward(host, port);
    return new Tunnel(processes, { host, port, link, token, processId });
  }

  get key(): string {
    return tunnelKey(this.host, this.port);
  }

  /**
   * Pid as recorded, stale or not.
   */
  get processId(): number | null {
    return this.pid;
  }

  status(): TunnelStatus {
    if (this.pid === null) {
      return 'disconnected';
    }
    return this.processes.isAlive(this.pid) ? 'connected' : 'disconnected';
  }

  isAlive(): boolean {
    return this.status() === 'connected';
  }

  /**
   * Pid for display: null unless the process is alive.
   */
  effectiveProcessId(): number | null {
    return this.isAlive() ? this.pid : null;
  }

  /**
   * Stop the forwarding process if it is running.
   * The recorded pid is cleared whatever happens, including when the signal fails.
   */
  terminate(): TerminateOutcome {
    const pid = this.pid;
    if (pid === null || !this.isAlive()) {
      this.pid = null;
      return { kind: 'already-closed' };
    }

    try {
      this.processes.terminate(pid);
    } catch (error) {
      throw new SessionError(
        'SignalError',
        `Failed to stop session ${this.key} (Process ID=${pid}): ${describeError(error)}`,
        { cause: error }
      );
    } finally {
      this.pid = null;
    }

    return { kind: 'terminated', processId: pid };
  }

  toRecord(): TunnelRecord {
    return {
      host: this.host,
      port: this.port,
      link: this.link,
      processId: this.pid,
      token: this.token,
    };
  }
}
