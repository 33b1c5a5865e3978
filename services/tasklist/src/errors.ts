/** Stable machine-readable codes for every failure class the service reports. */
export type TaskListErrorCode = 'config_invalid' | 'connection_failed' | 'schema_failed' | 'data_failed';

export abstract class TaskListError extends Error {
  abstract readonly code: TaskListErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Process configuration is missing or malformed. Fatal at boot. */
export class ConfigError extends TaskListError {
  readonly code = 'config_invalid';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

/** No usable database session could be opened within the attempt ceiling. */
export class ConnectionError extends TaskListError {
  readonly code = 'connection_failed';
  readonly exhausted = true;

  constructor(
    readonly attempts: number,
    readonly lastCause: unknown,
  ) {
    super(`Database unreachable after ${attempts} attempt(s): ${describeCause(lastCause)}`, { cause: lastCause });
  }
}

/** The create-table statement failed for a reason other than "already exists". */
export class SchemaError extends TaskListError {
  readonly code = 'schema_failed';

  constructor(cause: unknown) {
    super(`Schema initialization failed: ${describeCause(cause)}`, { cause });
  }
}

/** A query against the established schema failed. Never retried. */
export class DataError extends TaskListError {
  readonly code = 'data_failed';

  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    super(`${operation} failed: ${describeCause(cause)}`, { cause });
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message || cause.name;
  if (typeof cause === 'string') return cause;
  return String(cause ?? 'unknown error');
}
