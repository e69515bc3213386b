import type {
  CreateTaskInput,
  Task,
  TaskFilters,
  UpdateTaskInput,
} from "../models/task.model";

export const DEFAULT_LIST_LIMIT = 100;

export interface TaskRepository {
  create(input: CreateTaskInput): Promise<Task>;
  findById(id: number): Promise<Task | null>;
  findMany(filters?: TaskFilters): Promise<Task[]>;
  update(id: number, changes: UpdateTaskInput): Promise<Task | null>;
  delete(id: number): Promise<boolean>;
  disconnect?(): Promise<void>;
}

export function buildTask(id: number, input: CreateTaskInput, now: Date = new Date()): Task {
  return {
    id,
    title: input.title,
    description: input.description ?? null,
    priority: input.priority ?? "medium",
    priorityReason: input.priorityReason ?? null,
    status: input.status ?? "todo",
    createdAt: now,
    updatedAt: now,
  };
}

/** Copies only the fields present in `changes`; `updatedAt` always moves. */
export function applyChanges(task: Task, changes: UpdateTaskInput, now: Date = new Date()): Task {
  const updated: Task = { ...task, updatedAt: now };

  if (changes.title !== undefined) updated.title = changes.title;
  if (changes.description !== undefined) updated.description = changes.description;
  if (changes.priority !== undefined) updated.priority = changes.priority;
  if (changes.priorityReason !== undefined) updated.priorityReason = changes.priorityReason;
  if (changes.status !== undefined) updated.status = changes.status;

  return updated;
}

export function matchesFilters(task: Task, filters: TaskFilters): boolean {
  if (filters.status && task.status !== filters.status) return false;
  if (filters.priority && task.priority !== filters.priority) return false;
  return true;
}

export class InMemoryTaskRepository implements TaskRepository {
  private tasks = new Map<number, Task>();
  private nextId = 1;

  async create(input: CreateTaskInput): Promise<Task> {
    const task = buildTask(this.nextId++, input);
    this.tasks.set(task.id, task);
    return { ...task };
  }

  async findById(id: number): Promise<Task | null> {
    const task = this.tasks.get(id);
    return task ? { ...task } : null;
  }

  async findMany(filters: TaskFilters = {}): Promise<Task[]> {
    const skip = filters.skip ?? 0;
    const limit = filters.limit ?? DEFAULT_LIST_LIMIT;

    return [...this.tasks.values()]
      .filter((task) => matchesFilters(task, filters))
      .slice(skip, skip + limit)
      .map((task) => ({ ...task }));
  }

  async update(id: number, changes: UpdateTaskInput): Promise<Task | null> {
    const existing = this.tasks.get(id);
    if (!existing) return null;

    const updated = applyChanges(existing, changes);
    this.tasks.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    return this.tasks.delete(id);
  }
}
