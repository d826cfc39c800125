/**
 * OS process capabilities the tunnel lifecycle depends on.
 * Real ssh processes in production, an in-memory table in tests.
 */
export interface ProcessPort {
  /**
   * Start a local forward of `port` to the same port on `host`.
   * Resolves with the pid of the forwarding process.
   */
  spawnForward(host: string, port: number): Promise<number>;

  /**
   * Check whether a process with this pid exists
   */
  isAlive(pid: number): boolean;

  /**
   * Deliver a termination request (SIGTERM)
   */
  terminate(pid: number): void;
}
