import { SchemaError } from '../errors';
import type { Session } from './connection';

export const TODOS_TABLE = 'todos';
export const NAME_MAX_LENGTH = 255;

export const CREATE_TODOS_TABLE = `
  CREATE TABLE IF NOT EXISTS ${TODOS_TABLE} (
    id SERIAL PRIMARY KEY,
    name VARCHAR(${NAME_MAX_LENGTH}) NOT NULL,
    task TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`;

// duplicate_table, and the catalog unique_violation two racing IF NOT EXISTS can hit
const ALREADY_EXISTS_CODES = new Set(['42P07', '23505']);

/** Creates the todos table if absent. Safe to call on every boot. */
export async function ensureSchema(session: Session): Promise<void> {
  try {
    await session.query(CREATE_TODOS_TABLE);
  } catch (err) {
    if (isAlreadyExists(err)) return;
    throw new SchemaError(err);
  }
}

function isAlreadyExists(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false;
  return typeof err.code === 'string' && ALREADY_EXISTS_CODES.has(err.code);
}
