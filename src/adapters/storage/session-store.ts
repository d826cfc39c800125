import { chmodSync, existsSync, readFileSync, writeFileSync } from 'fs';
import { SessionError, describeError } from '../../domain/errors/session.error.js';
import { TunnelRegistry, type RegistryDependencies } from '../../domain/registry/tunnel.registry.js';
import { sessionFileSchema } from '../../schemas/session.schema.js';

const FILE_MODE = 0o600;

/**
 * Durable copy of the tunnel registry: one JSON file readable only by its owner.
 *
 * Callers load once, apply one operation and save. There is no locking and
 * no atomic replace; concurrent invocations race and the last save wins.
 */
export class SessionStore {
  constructor(readonly filePath: string) {}

  /**
   * Read the registry. A missing or blank file bootstraps an empty registry
   * and writes it out straight away.
   */
  load(deps: RegistryDependencies): TunnelRegistry {
    const content = existsSync(this.filePath) ? this.read() : '';
    if (!content.trim()) {
      const registry = new TunnelRegistry(deps);
      this.save(registry);
      return registry;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new SessionError(
        'CorruptState',
        `Session file ${this.filePath} is not valid JSON: ${describeError(error)}`,
        { cause: error }
      );
    }

    const parsed = sessionFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SessionError(
        'CorruptState',
        `Session file ${this.filePath} has an unexpected shape: ${parsed.error.message}`,
        { cause: parsed.error }
      );
    }

    return TunnelRegistry.fromRecords(parsed.data, deps);
  }

  save(registry: TunnelRegistry): void {
    const serialized = JSON.stringify(registry.toRecords(), null, 2) + '\n';
    try {
      writeFileSync(this.filePath, serialized, { mode: FILE_MODE });
      // mode only applies when the file is created
      chmodSync(this.filePath, FILE_MODE);
    } catch (error) {
      throw fileError(`Failed to write the session file ${this.filePath}`, error);
    }
  }

  private read(): string {
    try {
      return readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      throw fileError(`Failed to read the session file ${this.filePath}`, error);
    }
  }
}

export function fileError(prefix: string, error: unknown): SessionError {
  const code = errnoCode(error);
  const kind = code === 'EACCES' || code === 'EPERM' ? 'PermissionError' : 'IOError';
  return new SessionError(kind, `${prefix}: ${describeError(error)}`, { cause: error });
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
