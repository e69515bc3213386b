import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import { correlationIdMiddleware } from "./middleware/correlation-id.middleware";
import { errorHandler } from "./middleware/error-handler";
import { createTasksRouter } from "./api/tasks";
import { TaskService } from "./services/task-service";
import type { PriorityService } from "./services/prioritization";
import type { TaskRepository } from "./repositories/task.repository";

export const APP_VERSION = "0.1.0";

export interface AppDependencies {
  repository: TaskRepository;
  priorityService: PriorityService;
  corsOrigin?: string;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const taskService = new TaskService(deps.repository, deps.priorityService);

  app.use(helmet());
  app.use(
    cors({
      origin: deps.corsOrigin || "http://localhost:3000",
    }),
  );
  app.use(correlationIdMiddleware);
  app.use(express.json());

  app.get("/", (_req, res) => {
    res.json({ message: "Task API", version: APP_VERSION });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy" });
  });

  app.get("/health/priority-cache", (_req, res) => {
    res.json(deps.priorityService.cacheStats());
  });

  app.use("/api", createTasksRouter(taskService));

  app.use(errorHandler);

  return app;
}
