/**
 * Tasks API
 * CRUD endpoints for tasks plus priority suggestion and re-analysis.
 */

import { Router, Request, Response } from "express";
import { asyncHandler, NotFoundError } from "../middleware/error-handler";
import {
  validate,
  createTaskSchema,
  createTaskQuerySchema,
  updateTaskSchema,
  listTasksQuerySchema,
  priorityAnalysisSchema,
  taskIdParamSchema,
  CreateTaskBody,
  UpdateTaskBody,
  PriorityAnalysisBody,
} from "../middleware/validation.middleware";
import type { TaskService } from "../services/task-service";

function readTaskId(req: Request): number {
  return taskIdParamSchema.parse(req.params).taskId;
}

export function createTasksRouter(taskService: TaskService): Router {
  const router = Router();

  /**
   * POST /tasks
   * Create a task; `?useAiPriority=true` replaces the priority with a suggestion
   */
  router.post(
    "/tasks",
    validate({ body: createTaskSchema, query: createTaskQuerySchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const body: CreateTaskBody = req.body;
      const { useAiPriority } = createTaskQuerySchema.parse(req.query);

      const task = await taskService.createTask(body, { useAiPriority });
      return res.status(201).json(task);
    }),
  );

  /**
   * POST /tasks/priority/analyze
   * Suggest a priority without creating a task
   */
  router.post(
    "/tasks/priority/analyze",
    validate({ body: priorityAnalysisSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const { title, description }: PriorityAnalysisBody = req.body;
      const suggestion = await taskService.suggestPriority(title, description);

      return res.json({
        priority: suggestion.priority,
        priorityReason: suggestion.reason,
      });
    }),
  );

  /**
   * GET /tasks
   * List tasks, optionally filtered by status and priority
   */
  router.get(
    "/tasks",
    validate({ query: listTasksQuerySchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const filters = listTasksQuerySchema.parse(req.query);
      const tasks = await taskService.getTasks(filters);
      return res.json(tasks);
    }),
  );

  router.get(
    "/tasks/:taskId",
    validate({ params: taskIdParamSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const task = await taskService.getTask(readTaskId(req));
      if (!task) {
        throw new NotFoundError("Task");
      }
      return res.json(task);
    }),
  );

  router.patch(
    "/tasks/:taskId",
    validate({ params: taskIdParamSchema, body: updateTaskSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const changes: UpdateTaskBody = req.body;
      const task = await taskService.updateTask(readTaskId(req), changes);
      if (!task) {
        throw new NotFoundError("Task");
      }
      return res.json(task);
    }),
  );

  /**
   * POST /tasks/:taskId/reanalyze-priority
   * Re-run the suggestion on the stored title and description
   */
  router.post(
    "/tasks/:taskId/reanalyze-priority",
    validate({ params: taskIdParamSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const task = await taskService.reanalyzePriority(readTaskId(req));
      if (!task) {
        throw new NotFoundError("Task");
      }
      return res.json(task);
    }),
  );

  router.delete(
    "/tasks/:taskId",
    validate({ params: taskIdParamSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const deleted = await taskService.deleteTask(readTaskId(req));
      if (!deleted) {
        throw new NotFoundError("Task");
      }
      return res.status(204).send();
    }),
  );

  return router;
}
