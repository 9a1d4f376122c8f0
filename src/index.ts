export * from "./client";
export { Priority, PRIORITY_NAMES, isPriority, parsePriority } from "./core/entities/todo";
export type { Todo } from "./core/entities/todo";
export type {
  TodoResponse,
  TodoListResponse,
  CreateTodoRequest,
  UpdateTodoRequest,
  TodoQueryParams,
  ErrorResponse,
  ErrorType,
} from "./core/dto/todoDto";
export {
  queryTodos,
  matchesFilter,
  compareTodos,
  resolveSortKey,
  selectView,
  SORT_KEYS,
  DEFAULT_PAGE,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
} from "./core/query/todoQuery";
export type { SortKey, TodoFilter, TodoView, QueryableTodo, QueryResult } from "./core/query/todoQuery";
export { createApp } from "./app";
export { loadConfig } from "./config";
export type { AppConfig } from "./config";
export { createContainer } from "./container";
