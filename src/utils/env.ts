import { z } from "zod";
import { logger } from "./logger";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).optional().default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).optional().default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional().default("info"),
  BASE_URL: z.string().optional().default("http://localhost:3000"),
  OPENAI_API_KEY: z.string().optional().default(""),
  OPENAI_MODEL: z.string().min(1).optional().default("gpt-3.5-turbo"),
  PRIORITY_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(5000),
  REDIS_URL: z.string().min(1).optional(),
  SENTRY_DSN: z.string().url().optional(),
});

export type AppEnv = z.infer<typeof envSchema>;

export function getEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    logger.error("Invalid environment variables", {
      errorCount: parsed.error.issues.length,
      issues: parsed.error.issues.map((i) => ({
        path: i.path.join("."),
        message: i.message,
      })),
    });
    throw new Error(
      `Invalid environment variables: ${parsed.error.issues.length} validation error(s)`,
    );
  }

  const data = parsed.data;

  if (data.NODE_ENV === "production" && !data.OPENAI_API_KEY.trim()) {
    logger.warn("OPENAI_API_KEY not set - priority suggestions will use keyword heuristics");
  }

  return data;
}
