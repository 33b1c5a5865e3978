import type { CreateTaskArgs, TaskItem } from '../types';

/** Result of a create call. Invalid input is absorbed, not rejected. */
export type CreateTaskResult = { created: true; item: TaskItem } | { created: false };

/** The data operations the HTTP surface depends on. */
export interface TaskStore {
  /** Newest first: `createdAt` descending, ties broken by `id` descending. */
  listItems(): Promise<TaskItem[]>;
  createItem(args: CreateTaskArgs): Promise<CreateTaskResult>;
}
