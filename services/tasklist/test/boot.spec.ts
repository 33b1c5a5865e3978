import { beforeEach, describe, expect, it, vi } from 'vitest';
import { start, bootstrap } from '../src/boot';
import { loadConfig, type DatabaseConfig } from '../src/config';
import type { Session } from '../src/db/connection';
import { ConfigError, ConnectionError, SchemaError } from '../src/errors';
import { createLogger } from '../src/logger';
import { fakeSession, noSleep } from './helpers';

const serverMock = vi.hoisted(() => {
  const events: string[] = [];
  const app = {
    listen: vi.fn(async () => {
      events.push('listen');
      return 'http://0.0.0.0:5000';
    }),
    close: vi.fn(async () => undefined),
  };
  return { events, app, buildApp: vi.fn(async () => app) };
});

vi.mock('../src/server', () => ({
  buildApp: serverMock.buildApp,
}));

const ENV = {
  DB_HOST: 'db',
  DB_USER: 'todo',
  DB_PASSWORD: 'test-secret',
  DB_NAME: 'todos',
  DB_CONNECT_ATTEMPTS: '2',
};

const config = loadConfig(ENV);

function schemaSession(): Session {
  return fakeSession(async () => {
    serverMock.events.push('schema');
    return [];
  });
}

describe('start', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    serverMock.events.length = 0;
  });

  it('creates the schema before the listener opens', async () => {
    const logger = createLogger('silent');

    await start(config, { logger, sleep: noSleep, sessionFactory: () => async () => schemaSession() });

    expect(serverMock.events).toEqual(['schema', 'listen']);
    expect(serverMock.app.listen).toHaveBeenCalledWith({ port: 5000, host: '0.0.0.0' });
    expect(serverMock.buildApp).toHaveBeenCalledWith(expect.objectContaining({ logger }));
  });

  it('opens health sessions with the shorter probe timeout', async () => {
    const seen: DatabaseConfig[] = [];

    await start(config, {
      logger: createLogger('silent'),
      sleep: noSleep,
      sessionFactory: (db) => {
        seen.push(db);
        return async () => schemaSession();
      },
    });

    expect(seen.map((db) => db.connectTimeoutMs)).toEqual([5000, 2000]);
  });

  it('never listens when the schema cannot be created', async () => {
    const denied = Object.assign(new Error('permission denied for schema public'), { code: '42501' });
    const session = fakeSession(async () => {
      throw denied;
    });

    await expect(
      start(config, { logger: createLogger('silent'), sleep: noSleep, sessionFactory: () => async () => session }),
    ).rejects.toBeInstanceOf(SchemaError);

    expect(serverMock.buildApp).not.toHaveBeenCalled();
    expect(serverMock.app.listen).not.toHaveBeenCalled();
    expect(session.end).toHaveBeenCalledOnce();
  });

  it('never listens when the database stays unreachable', async () => {
    const openSession = vi.fn(async (): Promise<Session> => {
      throw new Error('connect ECONNREFUSED 10.0.0.2:5432');
    });

    await expect(
      start(config, { logger: createLogger('silent'), sleep: noSleep, sessionFactory: () => openSession }),
    ).rejects.toBeInstanceOf(ConnectionError);

    expect(openSession).toHaveBeenCalledTimes(2);
    expect(serverMock.app.listen).not.toHaveBeenCalled();
  });
});

describe('bootstrap', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    serverMock.events.length = 0;
  });

  it('logs a fatal diagnostic and exits 1 on invalid configuration', async () => {
    const logger = createLogger('silent');
    const fatal = vi.spyOn(logger, 'fatal');
    const exit = vi.fn();

    await bootstrap({ DB_USER: 'todo', DB_PASSWORD: 'test-secret', DB_NAME: 'todos' }, { logger, exit });

    expect(exit).toHaveBeenCalledOnce();
    expect(exit).toHaveBeenCalledWith(1);
    expect(fatal).toHaveBeenCalledWith({ err: expect.any(ConfigError) }, 'Fatal error starting task list');
    expect(serverMock.buildApp).not.toHaveBeenCalled();
  });

  it('logs a fatal diagnostic and exits 1 when the schema fails', async () => {
    const logger = createLogger('silent');
    const fatal = vi.spyOn(logger, 'fatal');
    const exit = vi.fn();
    const session = fakeSession(async () => {
      throw new Error('syntax error at or near "CREATE"');
    });

    await bootstrap(ENV, { logger, exit, sleep: noSleep, sessionFactory: () => async () => session });

    expect(exit).toHaveBeenCalledOnce();
    expect(exit).toHaveBeenCalledWith(1);
    expect(fatal).toHaveBeenCalledWith({ err: expect.any(SchemaError) }, 'Fatal error starting task list');
    expect(serverMock.app.listen).not.toHaveBeenCalled();
  });
});
