import type { RetryPolicy } from './config';
import type { ConnectionManager } from './db/connection';
import { describeCause } from './errors';
import type { Logger } from './logger';

export type HealthReport =
  | { status: 'healthy'; database: 'connected' }
  | { status: 'unhealthy'; database: 'unreachable'; detail: string };

/**
 * Reports whether a database session can be opened right now. Bounded by
 * `policy`, and never throws.
 */
export class HealthReporter {
  constructor(
    private readonly connections: ConnectionManager,
    private readonly policy: RetryPolicy,
    private readonly logger: Logger,
  ) {}

  async checkHealth(): Promise<HealthReport> {
    try {
      await this.connections.withSession(async () => undefined, this.policy);
      return { status: 'healthy', database: 'connected' };
    } catch (err) {
      this.logger.error({ err }, 'Health check failed');
      return { status: 'unhealthy', database: 'unreachable', detail: describeCause(err) };
    }
  }
}
