import {
  PRIORITY_REASON_MAX_LENGTH,
  type CreateTaskInput,
  type Task,
  type TaskFilters,
  type UpdateTaskInput,
} from "../models/task.model";
import type { TaskRepository } from "../repositories/task.repository";
import type { PriorityService, Suggestion } from "./prioritization";
import { logger } from "../utils/logger";

export interface CreateTaskOptions {
  useAiPriority?: boolean;
}

function storedReason(suggestion: Suggestion): string {
  return suggestion.reason.slice(0, PRIORITY_REASON_MAX_LENGTH);
}

export class TaskService {
  constructor(
    private readonly repository: TaskRepository,
    private readonly priorityService: PriorityService,
  ) {}

  /**
   * With `useAiPriority` the suggested priority replaces whatever priority the
   * caller sent, and its reason is stored alongside.
   */
  async createTask(input: CreateTaskInput, options: CreateTaskOptions = {}): Promise<Task> {
    let priority = input.priority;
    let priorityReason = input.priorityReason ?? null;

    if (options.useAiPriority) {
      const suggestion = await this.priorityService.suggestPriority(
        input.title,
        input.description,
      );
      priority = suggestion.priority;
      priorityReason = storedReason(suggestion);
    }

    const task = await this.repository.create({ ...input, priority, priorityReason });

    logger.info("Task created", {
      taskId: task.id,
      priority: task.priority,
      usedSuggestion: Boolean(options.useAiPriority),
    });

    return task;
  }

  async suggestPriority(title: string, description?: string | null): Promise<Suggestion> {
    return this.priorityService.suggestPriority(title, description);
  }

  async getTask(id: number): Promise<Task | null> {
    return this.repository.findById(id);
  }

  async getTasks(filters: TaskFilters = {}): Promise<Task[]> {
    return this.repository.findMany(filters);
  }

  async updateTask(id: number, changes: UpdateTaskInput): Promise<Task | null> {
    const task = await this.repository.update(id, changes);
    if (task) {
      logger.info("Task updated", { taskId: id, fields: Object.keys(changes) });
    }
    return task;
  }

  async reanalyzePriority(id: number): Promise<Task | null> {
    const task = await this.repository.findById(id);
    if (!task) {
      return null;
    }

    const suggestion = await this.priorityService.reanalyze(task.title, task.description);

    logger.info("Task priority re-analyzed", {
      taskId: id,
      previous: task.priority,
      suggested: suggestion.priority,
    });

    return this.repository.update(id, {
      priority: suggestion.priority,
      priorityReason: storedReason(suggestion),
    });
  }

  async deleteTask(id: number): Promise<boolean> {
    const deleted = await this.repository.delete(id);
    if (deleted) {
      logger.info("Task deleted", { taskId: id });
    }
    return deleted;
  }
}
