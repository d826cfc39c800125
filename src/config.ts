import { getStateFilePath } from './adapters/storage/paths.js';

/**
 * Runtime configuration, resolved once per invocation from the environment.
 */
export interface RemoteJupyterConfig {
  stateFile: string;
  sshBinary: string;
  // Forward X11 (ssh -Y)
  x11Forwarding: boolean;
}

/**
 * Load configuration from environment variables with defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RemoteJupyterConfig {
  return {
    stateFile: getStateFilePath(env),
    sshBinary: env.REMOTE_JUPYTER_SSH?.trim() || 'ssh',
    x11Forwarding: env.REMOTE_JUPYTER_X11 !== 'false',
  };
}
