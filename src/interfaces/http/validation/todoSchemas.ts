import { z } from "zod";
import { isPriority, parsePriority, type Priority } from "../../../core/entities/todo";
import { BadRequestError, ValidationError, type FieldErrors } from "../../../core/errors";
import { DEFAULT_PAGE, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE, SORT_KEYS, isSortKey } from "../../../core/query/todoQuery";

export const TITLE_MAX_LENGTH = 200;
export const DESCRIPTION_MAX_LENGTH = 1000;

// Lets a client a few time zones behind UTC still pick "today".
const DUE_DATE_GRACE_HOURS = 12;

const PRIORITY_MESSAGE = "Priority must be Low (0), Medium (1), or High (2)";
const SORT_BY_MESSAGE = `SortBy must be one of: ${SORT_KEYS.join(", ")} (case-insensitive)`;
const PAGE_MESSAGE = "Page must be at least 1";
const PAGE_SIZE_MESSAGE = `PageSize must be between 1 and ${MAX_PAGE_SIZE}`;

/** Compares UTC calendar dates: the due date must not fall before the day of `now - 12h`. */
export function isTodayOrLater(dueDate: Date, now: Date = new Date()): boolean {
  const floor = new Date(now.getTime() - DUE_DATE_GRACE_HOURS * 60 * 60 * 1000);
  return dueDate.toISOString().slice(0, 10) >= floor.toISOString().slice(0, 10);
}

const LOCAL_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/** Date-times without an offset are read as UTC, never in the host's zone. */
export function parseDueDate(value: string): Date {
  const trimmed = value.trim();
  return new Date(LOCAL_DATE_TIME.test(trimmed) ? `${trimmed}Z` : trimmed);
}

function toIsoIfValid(value: string): string {
  const date = parseDueDate(value);
  return Number.isNaN(date.getTime()) ? value : date.toISOString();
}

function parseBooleanParam(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const v = value.trim().toLowerCase();
  if (v === "") return undefined;
  if (v === "true") return true;
  if (v === "false") return false;
  return value;
}

function parseIntegerParam(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const v = value.trim();
  if (v === "") return undefined;
  return /^-?\d+$/.test(v) ? Number(v) : value;
}

const titleSchema = z
  .string({ required_error: "Title is required", invalid_type_error: "Title must be a string" })
  .superRefine((value, ctx) => {
    const length = value.trim().length;
    if (length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Title cannot be empty" });
    } else if (length > TITLE_MAX_LENGTH) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Title cannot exceed ${TITLE_MAX_LENGTH} characters` });
    }
  });

const descriptionSchema = z
  .string({ invalid_type_error: "Description must be a string" })
  .max(DESCRIPTION_MAX_LENGTH, `Description cannot exceed ${DESCRIPTION_MAX_LENGTH} characters`)
  .nullish();

const dueDateSchema = z
  .string({ invalid_type_error: "Due date must be a date string" })
  .superRefine((value, ctx) => {
    const date = parseDueDate(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Due date must be a valid date" });
    } else if (!isTodayOrLater(date)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Due date must be today or later" });
    }
  })
  .transform(toIsoIfValid)
  .nullish();

/** Accepts 0..2 as number or string, or a case-insensitive level name. */
export const prioritySchema = z.preprocess(
  (value) => parsePriority(value) ?? value,
  z.custom<Priority>((value) => isPriority(value), { message: PRIORITY_MESSAGE })
);

export const CreateTodoSchema = z.object({
  title: titleSchema,
  description: descriptionSchema,
  dueDate: dueDateSchema,
  priority: prioritySchema.optional(),
});

export const UpdateTodoSchema = z.object({
  title: titleSchema,
  description: descriptionSchema,
  isCompleted: z.boolean({
    required_error: "IsCompleted is required",
    invalid_type_error: "IsCompleted must be true or false",
  }),
  dueDate: dueDateSchema,
  priority: prioritySchema,
});

export const TodoQuerySchema = z.object({
  isCompleted: z.preprocess(
    parseBooleanParam,
    z.boolean({ invalid_type_error: "IsCompleted must be true or false" }).optional()
  ),
  priority: prioritySchema.optional(),
  sortBy: z
    .string({ invalid_type_error: SORT_BY_MESSAGE })
    .optional()
    .refine((value) => value === undefined || value.trim() === "" || isSortKey(value.trim().toLowerCase()), SORT_BY_MESSAGE),
  sortDescending: z.preprocess(
    parseBooleanParam,
    z.boolean({ invalid_type_error: "SortDescending must be true or false" }).default(true)
  ),
  page: z.preprocess(
    parseIntegerParam,
    z.number({ invalid_type_error: PAGE_MESSAGE }).int(PAGE_MESSAGE).min(1, PAGE_MESSAGE).default(DEFAULT_PAGE)
  ),
  pageSize: z.preprocess(
    parseIntegerParam,
    z.number({ invalid_type_error: PAGE_SIZE_MESSAGE })
      .int(PAGE_SIZE_MESSAGE)
      .min(1, PAGE_SIZE_MESSAGE)
      .max(MAX_PAGE_SIZE, PAGE_SIZE_MESSAGE)
      .default(DEFAULT_PAGE_SIZE)
  ),
});

export type CreateTodoInput = z.output<typeof CreateTodoSchema>;
export type UpdateTodoInput = z.output<typeof UpdateTodoSchema>;
export type TodoQueryInput = z.output<typeof TodoQuerySchema>;

function toFieldName(path: (string | number)[]): string {
  if (path.length === 0) return "Body";
  return path
    .map((segment) => (typeof segment === "string" ? segment.charAt(0).toUpperCase() + segment.slice(1) : String(segment)))
    .join(".");
}

export function toFieldErrors(error: z.ZodError): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of error.issues) {
    const field = toFieldName(issue.path);
    (errors[field] ??= []).push(issue.message);
  }
  return errors;
}

/** Parses or throws a ValidationError carrying every field violation. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) throw new ValidationError(toFieldErrors(result.error));
  return result.data;
}

export function parseTodoId(raw: string | undefined): number {
  const id = raw !== undefined && /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new BadRequestError(`Invalid todo id: ${raw ?? ""}`);
  }
  return id;
}
