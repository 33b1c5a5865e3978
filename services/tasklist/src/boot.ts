import { loadConfig, type AppConfig, type DatabaseConfig } from './config';
import { ConnectionManager, createPgSessionFactory, type SessionFactory } from './db/connection';
import { ensureSchema } from './db/schema';
import { HealthReporter } from './health';
import { createLogger, type Logger } from './logger';
import type { Sleep } from './retry';
import { buildApp } from './server';
import { PgTaskStore } from './storage/pgTaskStore';

type ProcessLogger = ReturnType<typeof createLogger>;

export interface StartDeps {
  logger: ProcessLogger;
  /** Builds the per-attempt session opener; a real pg client unless overridden. */
  sessionFactory?: (db: DatabaseConfig, logger: Logger) => SessionFactory;
  sleep?: Sleep;
}

/**
 * Waits for the database, ensures the schema, then opens the HTTP listener.
 * Any failure before `listen` rejects and leaves the port closed.
 */
export async function start(config: AppConfig, deps: StartDeps) {
  const { logger, sleep } = deps;
  const openFor = deps.sessionFactory ?? createPgSessionFactory;

  const connections = new ConnectionManager(openFor(config.db, logger), {
    retry: config.connectRetry,
    logger,
    sleep,
  });

  // --- Schema (fatal on failure) ---
  await connections.withSession(ensureSchema);
  logger.info({ database: config.db.database }, 'Schema ready');

  // probes get their own per-attempt timeout so one fits the orchestrator's window
  const probeConnections = new ConnectionManager(
    openFor({ ...config.db, connectTimeoutMs: config.healthConnectTimeoutMs }, logger),
    { retry: config.healthRetry, logger, sleep },
  );

  const store = new PgTaskStore(connections, logger);
  const health = new HealthReporter(probeConnections, config.healthRetry, logger);
  const app = await buildApp({ store, health, logger });

  // --- Start server ---
  await app.listen({ port: config.port, host: config.host });
  logger.info(`Task list server listening on http://${config.host}:${config.port}`);
  return app;
}

export interface BootstrapDeps extends Partial<StartDeps> {
  exit?: (code: number) => void;
}

/** Config, then `start`; any boot failure is logged as fatal and exits 1. */
export async function bootstrap(env: NodeJS.ProcessEnv = process.env, deps: BootstrapDeps = {}): Promise<void> {
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  let logger = deps.logger ?? createLogger('info');

  try {
    const config = loadConfig(env);
    if (!deps.logger) logger = createLogger(config.logLevel);
    const app = await start(config, { ...deps, logger });

    const shutdown = (signal: string) => {
      logger.info({ signal }, 'Shutting down');
      void app.close().then(
        () => exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          exit(1);
        },
      );
    };
    process.once('SIGTERM', shutdown);
    process.once('SIGINT', shutdown);
  } catch (err) {
    logger.fatal({ err }, 'Fatal error starting task list');
    exit(1);
  }
}
