import { bootstrap } from './boot';

/**
 * Main entrypoint for the task-list service.
 * Waits for the database, ensures the schema, then starts Fastify.
 */
void bootstrap();
