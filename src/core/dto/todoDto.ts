import type { Priority, Todo } from "../entities/todo";

/** Wire shape of a todo; soft-delete bookkeeping stays on the server. */
export type TodoResponse = Omit<Todo, "isDeleted" | "deletedAt">;

export interface TodoListResponse<T = TodoResponse> {
  items: T[];
  totalCount: number;
  page: number;
  pageSize: number;
}

export interface CreateTodoRequest {
  title: string;
  description?: string | null;
  dueDate?: string | null;
  priority?: Priority;
}

export interface UpdateTodoRequest {
  title: string;
  description?: string | null;
  isCompleted: boolean;
  dueDate?: string | null;
  priority: Priority;
}

export interface TodoQueryParams {
  isCompleted?: boolean;
  priority?: Priority;
  sortBy?: string;
  sortDescending?: boolean;
  page?: number;
  pageSize?: number;
}

export type ErrorType = "ValidationError" | "NotFound" | "BadRequest" | "Unauthorized" | "InternalServerError";

export interface ErrorResponse {
  statusCode: number;
  message: string;
  type: ErrorType;
  timestamp: string;
  errors?: Record<string, string[]>;
}

export function toTodoResponse(todo: Todo): TodoResponse {
  return {
    id: todo.id,
    title: todo.title,
    description: todo.description,
    isCompleted: todo.isCompleted,
    createdAt: todo.createdAt,
    dueDate: todo.dueDate,
    priority: todo.priority,
  };
}
