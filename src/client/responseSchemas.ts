import { z } from "zod";
import { isPriority, type Priority } from "../core/entities/todo";

export const TodoResponseSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string().nullable(),
  isCompleted: z.boolean(),
  createdAt: z.string(),
  dueDate: z.string().nullable(),
  priority: z.custom<Priority>((value) => isPriority(value)),
});

export const TodoListResponseSchema = z.object({
  items: z.array(TodoResponseSchema),
  totalCount: z.number().int(),
  page: z.number().int(),
  pageSize: z.number().int(),
});

export const ErrorResponseSchema = z.object({
  statusCode: z.number(),
  message: z.string(),
  type: z.enum(["ValidationError", "NotFound", "BadRequest", "Unauthorized", "InternalServerError"]),
  timestamp: z.string(),
  errors: z.record(z.array(z.string())).optional(),
});
