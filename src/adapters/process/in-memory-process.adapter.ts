import type { ProcessPort } from '../../domain/ports/process.port.js';
import { SessionError } from '../../domain/errors/session.error.js';

export interface SpawnedForward {
  pid: number;
  host: string;
  port: number;
}

/**
 * Process table kept in memory. Stands in for real ssh processes wherever
 * spawning them is not wanted.
 */
export class InMemoryProcessAdapter implements ProcessPort {
  readonly spawned: SpawnedForward[] = [];
  readonly signalled: number[] = [];
  private readonly alive = new Set<number>();
  private readonly failingSignals = new Set<number>();
  private failNextSpawn: string | null = null;
  private nextPid: number;

  constructor(firstPid = 4000) {
    this.nextPid = firstPid;
  }

  async spawnForward(host: string, port: number): Promise<number> {
    if (this.failNextSpawn !== null) {
      const message = this.failNextSpawn;
      this.failNextSpawn = null;
      throw new SessionError('SpawnError', message);
    }

    const pid = this.nextPid++;
    this.spawned.push({ pid, host, port });
    this.alive.add(pid);
    return pid;
  }

  isAlive(pid: number): boolean {
    return this.alive.has(pid);
  }

  terminate(pid: number): void {
    this.signalled.push(pid);
    if (this.failingSignals.has(pid)) {
      throw new Error(`kill ${pid}: operation not permitted`);
    }
    this.alive.delete(pid);
  }

  /**
   * Simulate a forward exiting on its own (network drop, remote reboot).
   */
  exit(pid: number): void {
    this.alive.delete(pid);
  }

  markAlive(pid: number): void {
    this.alive.add(pid);
  }

  failSpawn(message: string): void {
    this.failNextSpawn = message;
  }

  failSignal(pid: number): void {
    this.failingSignals.add(pid);
  }
}
