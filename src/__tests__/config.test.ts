import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('places the state file in the home directory', () => {
    expect(loadConfig({ HOME: '/home/ada' })).toEqual({
      stateFile: '/home/ada/.remote_jupyter_sessions',
      sshBinary: 'ssh',
      x11Forwarding: true,
    });
  });

  it('falls back to USERPROFILE', () => {
    expect(loadConfig({ USERPROFILE: '/profiles/ada' }).stateFile).toBe('/profiles/ada/.remote_jupyter_sessions');
  });

  it('honours overrides', () => {
    expect(
      loadConfig({
        HOME: '/home/ada',
        REMOTE_JUPYTER_STATE_FILE: '/tmp/sessions.json',
        REMOTE_JUPYTER_SSH: '/usr/local/bin/ssh',
        REMOTE_JUPYTER_X11: 'false',
      })
    ).toEqual({
      stateFile: '/tmp/sessions.json',
      sshBinary: '/usr/local/bin/ssh',
      x11Forwarding: false,
    });
  });

  it('fails without a home directory', () => {
    expect(() => loadConfig({})).toThrow('Cannot locate the session file: HOME is not set.');
    try {
      loadConfig({ HOME: '  ' });
    } catch (error) {
      expect(error).toMatchObject({ code: 'ConfigError' });
      return;
    }
    throw new Error('expected ConfigError');
  });
});
