import Redis from "ioredis";
import { z } from "zod";
import {
  PRIORITY_LEVELS,
  TASK_STATUSES,
  type CreateTaskInput,
  type Task,
  type TaskFilters,
  type UpdateTaskInput,
} from "../models/task.model";
import { logger, toError } from "../utils/logger";
import {
  applyChanges,
  buildTask,
  DEFAULT_LIST_LIMIT,
  matchesFilters,
  type TaskRepository,
} from "./task.repository";

const TASK_KEY_PREFIX = "task:";
const TASK_INDEX_KEY = "tasks";
const TASK_SEQUENCE_KEY = "tasks:seq";

const storedTaskSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  description: z.string().nullable(),
  priority: z.enum(PRIORITY_LEVELS),
  priorityReason: z.string().nullable(),
  status: z.enum(TASK_STATUSES),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

function taskKey(id: number): string {
  return `${TASK_KEY_PREFIX}${id}`;
}

type TransactionResult = [error: Error | null, result: unknown][] | null;

/** Results of a MULTI/EXEC block; throws when it was aborted or a command failed. */
function transactionResults(results: TransactionResult): unknown[] {
  if (!results) {
    throw new Error("Redis transaction aborted");
  }
  return results.map(([error, result]) => {
    if (error) {
      throw error;
    }
    return result;
  });
}

/**
 * Tasks are JSON documents under `task:<id>`; the sorted set `tasks` holds ids
 * scored by id so listing keeps creation order.
 */
export class RedisTaskRepository implements TaskRepository {
  constructor(private readonly redis: Redis) {}

  static fromUrl(url: string): RedisTaskRepository {
    const redis = new Redis(url, { maxRetriesPerRequest: 3 });
    redis.on("error", (error: Error) => {
      logger.error("Redis task store error", {}, error);
    });
    return new RedisTaskRepository(redis);
  }

  async create(input: CreateTaskInput): Promise<Task> {
    const id = await this.redis.incr(TASK_SEQUENCE_KEY);
    const task = buildTask(id, input);

    transactionResults(
      await this.redis
        .multi()
        .set(taskKey(id), JSON.stringify(task))
        .zadd(TASK_INDEX_KEY, id, String(id))
        .exec(),
    );

    return task;
  }

  async findById(id: number): Promise<Task | null> {
    const raw = await this.redis.get(taskKey(id));
    return raw ? this.deserialize(raw) : null;
  }

  async findMany(filters: TaskFilters = {}): Promise<Task[]> {
    const skip = filters.skip ?? 0;
    const limit = filters.limit ?? DEFAULT_LIST_LIMIT;

    const ids = await this.redis.zrange(TASK_INDEX_KEY, 0, -1);
    if (ids.length === 0) {
      return [];
    }

    const records = await this.redis.mget(...ids.map((id) => `${TASK_KEY_PREFIX}${id}`));
    const tasks: Task[] = [];
    for (const raw of records) {
      if (!raw) continue;
      const task = this.deserialize(raw);
      if (task && matchesFilters(task, filters)) {
        tasks.push(task);
      }
    }

    return tasks.slice(skip, skip + limit);
  }

  async update(id: number, changes: UpdateTaskInput): Promise<Task | null> {
    const existing = await this.findById(id);
    if (!existing) return null;

    const updated = applyChanges(existing, changes);
    await this.redis.set(taskKey(id), JSON.stringify(updated));
    return updated;
  }

  async delete(id: number): Promise<boolean> {
    const [removed] = transactionResults(
      await this.redis.multi().del(taskKey(id)).zrem(TASK_INDEX_KEY, String(id)).exec(),
    );
    return typeof removed === "number" && removed > 0;
  }

  async disconnect(): Promise<void> {
    await this.redis.quit();
  }

  private deserialize(raw: string): Task | null {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      logger.error("Stored task is not valid JSON", {}, toError(error));
      return null;
    }

    const parsed = storedTaskSchema.safeParse(data);
    if (!parsed.success) {
      logger.error("Stored task failed validation", {
        issues: parsed.error.issues.map((i) => i.path.join(".")),
      });
      return null;
    }
    return parsed.data;
  }
}
