import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { SessionService, resolveDropTarget } from '../session.service.js';
import { SessionStore } from '../../../adapters/storage/session-store.js';
import { InMemoryProcessAdapter } from '../../../adapters/process/in-memory-process.adapter.js';
import { BufferedLogger } from '../../../utils/logger.js';

const LINK = 'https://x.example.com:8888/?token=abc123';

describe('SessionService', () => {
  let dir: string;
  let filePath: string;
  let processes: InMemoryProcessAdapter;
  let service: SessionService;

  function stored(): unknown {
    return JSON.parse(readFileSync(filePath, 'utf-8'));
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rjy-service-test-'));
    filePath = join(dir, '.remote_jupyter_sessions');
    processes = new InMemoryProcessAdapter();
    service = new SessionService({
      store: new SessionStore(filePath),
      processes,
      logger: new BufferedLogger(),
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('persists a created session', async () => {
    await service.create(LINK, 'myhost');

    expect(stored()).toEqual({
      'myhost:8888': { host: 'myhost', port: 8888, link: LINK, processId: 4000, token: 'abc123' },
    });
  });

  it('keeps the state file loadable after rejecting an out-of-range port', async () => {
    await expect(service.create('http://localhost:0/?token=x', 'myhost')).rejects.toMatchObject({
      code: 'InvalidLink',
    });
    expect(service.list()).toEqual([]);
  });

  it('keeps the state file loadable after rejecting an empty host', async () => {
    await expect(service.create(LINK, '')).rejects.toMatchObject({ code: 'InvalidLink' });
    expect(service.list()).toEqual([]);
  });

  it('lists sessions from the state file', async () => {
    await service.create(LINK, 'myhost');

    expect(service.list()).toEqual([{ key: 'myhost:8888', processId: 4000, status: 'connected', link: LINK }]);
  });

  it('bootstraps the state file on the first list', () => {
    expect(service.list()).toEqual([]);
    expect(stored()).toEqual({});
  });

  it('persists a disconnect', async () => {
    await service.create(LINK, 'myhost');
    await service.disconnect('myhost:8888');

    expect(stored()).toEqual({
      'myhost:8888': { host: 'myhost', port: 8888, link: LINK, processId: null, token: 'abc123' },
    });
    expect(service.list()[0].status).toBe('disconnected');
  });

  it('reconnects every session when no key is given', async () => {
    await service.create(LINK, 'myhost');
    await service.disconnect();

    await service.reconnect();

    expect(service.list()).toEqual([{ key: 'myhost:8888', processId: 4001, status: 'connected', link: LINK }]);
  });

  it('drops a session by key', async () => {
    await service.create(LINK, 'myhost');
    await service.drop({ key: 'myhost:8888' });

    expect(stored()).toEqual({});
    await expect(service.drop({ key: 'myhost:8888' })).rejects.toMatchObject({ code: 'KeyNotFound' });
  });

  it('drops everything with all', async () => {
    await service.create(LINK, 'myhost');
    await service.create('http://localhost:9999/?token=t', 'gpu-box');

    await service.drop({ all: true });

    expect(stored()).toEqual({});
    expect(processes.signalled).toEqual([4000, 4001]);
  });

  it('rejects a drop with both a key and all before touching the file', async () => {
    await expect(service.drop({ key: 'myhost:8888', all: true })).rejects.toMatchObject({
      code: 'AmbiguousArguments',
    });
    expect(existsSync(filePath)).toBe(false);
  });

  it('does not save after a failed operation', async () => {
    await service.create(LINK, 'myhost');
    await service.create('http://localhost:9999/?token=t', 'gpu-box');
    processes.failSignal(4000);

    await expect(service.drop({ all: true })).rejects.toMatchObject({ code: 'SignalError' });

    expect(Object.keys(stored() as object)).toEqual(['myhost:8888', 'gpu-box:9999']);
  });
});

describe('resolveDropTarget', () => {
  it('accepts a key', () => {
    expect(resolveDropTarget({ key: 'myhost:8888' })).toEqual({ key: 'myhost:8888' });
  });

  it('accepts all', () => {
    expect(resolveDropTarget({ all: true })).toBe('all');
  });

  it('rejects neither', () => {
    expect(() => resolveDropTarget({})).toThrow('Specify either a key or --all.');
  });

  it('rejects both', () => {
    expect(() => resolveDropTarget({ key: 'a:1', all: true })).toThrow('Specify either a key or --all, not both.');
  });
});
