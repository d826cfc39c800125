import { spawn } from 'child_process';
import type { ProcessPort } from '../../domain/ports/process.port.js';
import { SessionError } from '../../domain/errors/session.error.js';

export interface SshForwardOptions {
  sshBinary?: string;
  x11Forwarding?: boolean;
}

/**
 * Runs `ssh -N -L localhost:<port>:localhost:<port> <host>` as a detached
 * background process so the forward outlives the CLI invocation.
 */
export class SshForwardAdapter implements ProcessPort {
  private readonly sshBinary: string;
  private readonly x11Forwarding: boolean;

  constructor(options: SshForwardOptions = {}) {
    this.sshBinary = options.sshBinary ?? 'ssh';
    this.x11Forwarding = options.x11Forwarding ?? true;
  }

  buildArgs(host: string, port: number): string[] {
    const args = ['-N', '-L', `localhost:${port}:localhost:${port}`, host];
    if (this.x11Forwarding) {
      args.unshift('-Y');
    }
    return args;
  }

  spawnForward(host: string, port: number): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.sshBinary, this.buildArgs(host, port), {
        detached: true,
        stdio: 'ignore',
      });

      child.on('error', (error) => {
        reject(
          new SessionError('SpawnError', `Failed to start ${this.sshBinary} for ${host}:${port}: ${error.message}`, {
            cause: error,
          })
        );
      });

      child.once('spawn', () => {
        if (child.pid === undefined) {
          reject(new SessionError('SpawnError', `No process ID reported for ${this.sshBinary} ${host}:${port}`));
          return;
        }
        child.unref();
        resolve(child.pid);
      });
    });
  }

  /**
   * Signal 0 checks existence without delivering anything.
   * EPERM means the process exists but belongs to another user.
   */
  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      return error instanceof Error && 'code' in error && error.code === 'EPERM';
    }
  }

  terminate(pid: number): void {
    process.kill(pid, 'SIGTERM');
  }
}
