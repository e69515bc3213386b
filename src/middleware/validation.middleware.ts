import { Request, Response, NextFunction } from "express";
import { z, ZodError, ZodSchema } from "zod";
import {
  DESCRIPTION_MAX_LENGTH,
  PRIORITY_LEVELS,
  PRIORITY_REASON_MAX_LENGTH,
  TASK_STATUSES,
  TITLE_MAX_LENGTH,
} from "../models/task.model";

interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
  query?: ZodSchema;
}

/**
 * Rejects the request with 400 when any part fails its schema. The parsed body
 * replaces `req.body`; handlers parse params and query again for typed values.
 */
export function validate(schemas: ValidationSchemas) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      if (schemas.body) {
        req.body = await schemas.body.parseAsync(req.body);
      }
      if (schemas.params) {
        await schemas.params.parseAsync(req.params);
      }
      if (schemas.query) {
        await schemas.query.parseAsync(req.query);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const formattedErrors = error.errors.map((err) => ({
          path: err.path.join("."),
          message: err.message,
          code: err.code,
        }));

        res.status(400).json({
          error: "Validation failed",
          details: formattedErrors,
        });
        return;
      }
      next(error);
    }
  };
}

const prioritySchema = z.enum(PRIORITY_LEVELS);
const statusSchema = z.enum(TASK_STATUSES);
const booleanQuerySchema = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

export const taskIdParamSchema = z.object({
  taskId: z.coerce.number().int().positive("Invalid task ID"),
});

export const createTaskSchema = z.object({
  title: z.string().max(TITLE_MAX_LENGTH),
  description: z.string().max(DESCRIPTION_MAX_LENGTH).optional().nullable(),
  priority: prioritySchema.optional().default("medium"),
  status: statusSchema.optional().default("todo"),
});

export const createTaskQuerySchema = z.object({
  useAiPriority: booleanQuerySchema.optional().default("false"),
});

export const updateTaskSchema = z
  .object({
    title: z.string().max(TITLE_MAX_LENGTH).optional(),
    description: z.string().max(DESCRIPTION_MAX_LENGTH).optional().nullable(),
    priority: prioritySchema.optional(),
    priorityReason: z.string().max(PRIORITY_REASON_MAX_LENGTH).optional().nullable(),
    status: statusSchema.optional(),
  })
  .refine((data) => Object.keys(data).length > 0, {
    message: "At least one field must be provided",
  });

export const listTasksQuerySchema = z.object({
  status: statusSchema.optional(),
  priority: prioritySchema.optional(),
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const priorityAnalysisSchema = z.object({
  title: z.string().max(TITLE_MAX_LENGTH),
  description: z.string().max(DESCRIPTION_MAX_LENGTH).optional().nullable(),
});

export type CreateTaskBody = z.infer<typeof createTaskSchema>;
export type UpdateTaskBody = z.infer<typeof updateTaskSchema>;
export type PriorityAnalysisBody = z.infer<typeof priorityAnalysisSchema>;
