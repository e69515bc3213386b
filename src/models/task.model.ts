/**
 * Task Model
 * A unit of work tracked by the task API, with an optional suggested priority.
 */

export const PRIORITY_LEVELS = ["low", "medium", "high"] as const;

/** Ordered by ascending urgency; the order carries no arithmetic meaning. */
export type Priority = (typeof PRIORITY_LEVELS)[number];

export const TASK_STATUSES = ["todo", "done"] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TITLE_MAX_LENGTH = 200;
export const DESCRIPTION_MAX_LENGTH = 1000;
export const PRIORITY_REASON_MAX_LENGTH = 500;

export interface Task {
  id: number;
  title: string;
  description: string | null;
  priority: Priority;
  priorityReason: string | null;
  status: TaskStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateTaskInput {
  title: string;
  description?: string | null;
  priority?: Priority;
  priorityReason?: string | null;
  status?: TaskStatus;
}

export interface UpdateTaskInput {
  title?: string;
  description?: string | null;
  priority?: Priority;
  priorityReason?: string | null;
  status?: TaskStatus;
}

export interface TaskFilters {
  status?: TaskStatus;
  priority?: Priority;
  skip?: number;
  limit?: number;
}

export function isPriority(value: string): value is Priority {
  return (PRIORITY_LEVELS as readonly string[]).includes(value);
}
