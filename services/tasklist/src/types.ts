export type TaskId = number;

/** A persisted to-do entry. `id` and `createdAt` are assigned by the database. */
export interface TaskItem {
  id: TaskId;
  name: string;
  task: string;
  createdAt: Date;
}

/** Raw row shape as stored in the `todos` table. */
export interface TaskRow {
  id: number;
  name: string;
  task: string;
  created_at: Date | string;
}

export interface CreateTaskArgs {
  name: string;
  task: string;
}
