import pg from 'pg';
import type { QueryResultRow } from 'pg';
import type { DatabaseConfig, RetryPolicy } from '../config';
import { ConnectionError } from '../errors';
import type { Logger } from '../logger';
import { retry, type Sleep } from '../retry';

/** One live, exclusively owned session to the database. */
export interface Session {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<R[]>;
  end(): Promise<void>;
}

/** Opens a single session or rejects; no retrying at this level. */
export type SessionFactory = () => Promise<Session>;

/** Anything constructible like `pg.Client`. */
export type PgClientConstructor = new (config: pg.ClientConfig) => pg.Client;

export function createPgSessionFactory(
  db: DatabaseConfig,
  logger: Logger,
  Client: PgClientConstructor = pg.Client,
): SessionFactory {
  return async () => {
    const client = new Client({
      host: db.host,
      port: db.port,
      user: db.user,
      password: db.password,
      database: db.database,
      connectionTimeoutMillis: db.connectTimeoutMs,
    });
    // an unhandled 'error' event on a dropped socket would crash the process
    client.on('error', (err) => {
      logger.error({ err }, 'Database session error');
    });
    try {
      await client.connect();
    } catch (err) {
      // a client that failed to connect still holds a socket until ended
      await client.end().catch((endErr: unknown) => {
        logger.debug({ err: endErr }, 'Ending unconnected client failed');
      });
      throw err;
    }
    return {
      async query<R extends QueryResultRow>(text: string, values?: unknown[]) {
        const res = await client.query<R>(text, values);
        return res.rows;
      },
      end: () => client.end(),
    };
  };
}

export interface ConnectionManagerOptions {
  retry: RetryPolicy;
  logger: Logger;
  sleep?: Sleep;
}

/**
 * Turns "the database may not be up yet" into a synchronous precondition:
 * every `acquire` opens a fresh session, polling at a fixed interval up to a
 * fixed number of attempts. Sessions are never pooled or shared.
 */
export class ConnectionManager {
  constructor(
    private readonly openSession: SessionFactory,
    private readonly options: ConnectionManagerOptions,
  ) {}

  async acquire(policy: RetryPolicy = this.options.retry): Promise<Session> {
    const { logger } = this.options;
    const outcome = await retry(() => this.openSession(), {
      ...policy,
      sleep: this.options.sleep,
      onAttemptFailed: (attempt, err) => {
        logger.warn({ attempt, maxAttempts: policy.maxAttempts, err }, 'Database connection attempt failed');
      },
    });

    if (!outcome.ok) {
      throw new ConnectionError(outcome.attempts, outcome.lastError);
    }
    if (outcome.attempts > 1) {
      logger.info({ attempts: outcome.attempts }, 'Database connection established after retry');
    }
    return outcome.value;
  }

  /** Acquire, run `fn`, and always end the session before returning. */
  async withSession<T>(fn: (session: Session) => Promise<T>, policy?: RetryPolicy): Promise<T> {
    const session = await this.acquire(policy);
    try {
      return await fn(session);
    } finally {
      await session.end().catch((err: unknown) => {
        this.options.logger.error({ err }, 'Failed to close database session');
      });
    }
  }
}
