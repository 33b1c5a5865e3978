import Fastify from 'fastify';
import formbody from '@fastify/formbody';
import type { FastifyServerOptions } from 'fastify';
import type { TaskStore } from './contracts/taskStore';
import type { HealthReporter } from './health';
import { registerHealthRoutes } from './routes/health';
import { registerTaskRoutes } from './routes/tasks';
import { renderErrorPage } from './views/taskList';

export interface AppDeps {
  store: TaskStore;
  health: HealthReporter;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(deps: AppDeps) {
  const app = Fastify({ logger: deps.logger ?? false });

  await app.register(formbody);

  // Full detail goes to the log; clients only ever see a generic failure.
  app.setErrorHandler((err, req, reply) => {
    if (err.statusCode && err.statusCode < 500) {
      req.log.info({ err }, 'Request rejected');
      return reply.code(err.statusCode).send({ error: clientErrorCode(err.statusCode) });
    }
    req.log.error({ err }, 'Request failed');
    if (req.url === '/' || req.url.startsWith('/?')) {
      return reply.code(500).type('text/html; charset=utf-8').send(renderErrorPage());
    }
    return reply.code(500).send({ error: 'internal_error' });
  });

  await registerHealthRoutes(app, deps.health);
  await registerTaskRoutes(app, deps.store);
  return app;
}

/** Stable client-facing codes; framework-internal error codes stay in the log. */
export function clientErrorCode(statusCode: number): string {
  switch (statusCode) {
    case 404:
      return 'not_found';
    case 413:
      return 'payload_too_large';
    case 415:
      return 'unsupported_media_type';
    default:
      return 'bad_request';
  }
}
