import "dotenv/config";
import { createApp } from "./app";
import { getEnv } from "./utils/env";
import { logger, toError } from "./utils/logger";
import { initSentry, closeSentry } from "./services/sentry";
import { createPriorityService } from "./services/prioritization";
import { InMemoryTaskRepository, TaskRepository } from "./repositories/task.repository";
import { RedisTaskRepository } from "./repositories/redis-task.repository";

const env = getEnv();
logger.setLevel(env.LOG_LEVEL);

logger.info("Starting task API", {
  nodeVersion: process.version,
  environment: env.NODE_ENV,
  port: env.PORT,
});

initSentry(env.SENTRY_DSN, env.NODE_ENV);

const repository: TaskRepository = env.REDIS_URL
  ? RedisTaskRepository.fromUrl(env.REDIS_URL)
  : new InMemoryTaskRepository();

if (!env.REDIS_URL) {
  logger.warn("REDIS_URL not set - tasks are kept in memory and lost on restart");
}

const priorityService = createPriorityService({
  openaiApiKey: env.OPENAI_API_KEY,
  model: env.OPENAI_MODEL,
  timeout: env.PRIORITY_TIMEOUT_MS,
});

const app = createApp({ repository, priorityService, corsOrigin: env.BASE_URL });

let isShuttingDown = false;

const server = app.listen(env.PORT, "0.0.0.0", () => {
  logger.info("Server listening", {
    port: env.PORT,
    priorityMode: priorityService.mode,
    storage: env.REDIS_URL ? "redis" : "memory",
  });
});

server.on("error", (error: NodeJS.ErrnoException) => {
  logger.error(
    "Server failed to start",
    { code: error.code, port: error.code === "EADDRINUSE" ? env.PORT : undefined },
    error,
  );
  process.exit(1);
});

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.info("Shutdown already in progress");
    return;
  }

  logger.info("Starting graceful shutdown", { signal });
  isShuttingDown = true;

  const shutdownTimeout = setTimeout(() => {
    logger.error("Graceful shutdown timeout (10s), forcing exit");
    process.exit(1);
  }, 10000);

  try {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info("HTTP server closed");

    if (repository.disconnect) {
      await repository.disconnect();
      logger.info("Task store disconnected");
    }

    await closeSentry();

    clearTimeout(shutdownTimeout);
    logger.info("Graceful shutdown complete");
    process.exit(0);
  } catch (error) {
    logger.error("Error during graceful shutdown", {}, toError(error));
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled Rejection", { reason: String(reason) });
});

process.on("uncaughtException", (error) => {
  logger.error("Uncaught Exception", {}, error);
  process.exit(1);
});
