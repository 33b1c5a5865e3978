import type { ConnectionManager } from '../db/connection';
import { NAME_MAX_LENGTH, TODOS_TABLE } from '../db/schema';
import { DataError } from '../errors';
import type { Logger } from '../logger';
import type { CreateTaskResult, TaskStore } from '../contracts/taskStore';
import type { CreateTaskArgs, TaskItem, TaskRow } from '../types';

const LIST_SQL = `SELECT id, name, task, created_at FROM ${TODOS_TABLE} ORDER BY created_at DESC, id DESC`;
const INSERT_SQL = `INSERT INTO ${TODOS_TABLE} (name, task) VALUES ($1, $2) RETURNING id, name, task, created_at`;

/**
 * Implements `TaskStore` with one fresh session per call. Connection failures
 * surface as `ConnectionError` from the manager; query failures as `DataError`.
 */
export class PgTaskStore implements TaskStore {
  constructor(
    private readonly connections: ConnectionManager,
    private readonly logger: Logger,
  ) {}

  async listItems(): Promise<TaskItem[]> {
    return this.connections.withSession(async (session) => {
      let rows: TaskRow[];
      try {
        rows = await session.query<TaskRow>(LIST_SQL);
      } catch (err) {
        throw new DataError('listItems', err);
      }
      return rows.map(toTaskItem);
    });
  }

  async createItem(args: CreateTaskArgs): Promise<CreateTaskResult> {
    const input = normalizeInput(args);
    if (!input) {
      this.logger.debug('Ignoring create with empty or oversized fields');
      return { created: false };
    }

    return this.connections.withSession(async (session) => {
      let rows: TaskRow[];
      try {
        rows = await session.query<TaskRow>(INSERT_SQL, [input.name, input.task]);
      } catch (err) {
        throw new DataError('createItem', err);
      }
      const [row] = rows;
      if (!row) throw new DataError('createItem', new Error('insert returned no row'));
      return { created: true, item: toTaskItem(row) };
    });
  }
}

/** Trims both fields; `null` means the write must be skipped. */
export function normalizeInput(args: CreateTaskArgs): CreateTaskArgs | null {
  const name = args.name.trim();
  const task = args.task.trim();
  // VARCHAR counts characters, not UTF-16 code units
  if (!name || !task || [...name].length > NAME_MAX_LENGTH) return null;
  return { name, task };
}

export function toTaskItem(row: TaskRow): TaskItem {
  return {
    id: Number(row.id),
    name: row.name,
    task: row.task,
    createdAt: row.created_at instanceof Date ? row.created_at : new Date(row.created_at),
  };
}
