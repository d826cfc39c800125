export type SessionErrorCode =
  | 'InvalidLink'
  | 'DuplicateKey'
  | 'KeyNotFound'
  | 'AmbiguousArguments'
  | 'SpawnError'
  | 'SignalError'
  | 'CorruptState'
  | 'IOError'
  | 'PermissionError'
  | 'ConfigError';

/**
 * Error raised by the session registry, the state store and their collaborators.
 * Nothing in the core retries; every SessionError aborts the current invocation.
 */
export class SessionError extends Error {
  readonly code: SessionErrorCode;

  constructor(code: SessionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionError';
    this.code = code;
  }
}

export function isSessionError(error: unknown, code?: SessionErrorCode): error is SessionError {
  return error instanceof SessionError && (code === undefined || error.code === code);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
