import path from 'path';
import { SessionError } from '../../domain/errors/session.error.js';

export const STATE_FILE_NAME = '.remote_jupyter_sessions';

/**
 * Location of the session state file.
 * Priority:
 * 1) REMOTE_JUPYTER_STATE_FILE override
 * 2) $HOME/.remote_jupyter_sessions (USERPROFILE on Windows)
 */
export function getStateFilePath(env: NodeJS.ProcessEnv = process.env): string {
  const envOverride = env.REMOTE_JUPYTER_STATE_FILE?.trim();
  if (envOverride) {
    return envOverride;
  }

  const home = env.HOME?.trim() || env.USERPROFILE?.trim();
  if (!home) {
    throw new SessionError('ConfigError', 'Cannot locate the session file: HOME is not set.');
  }

  return path.join(home, STATE_FILE_NAME);
}
