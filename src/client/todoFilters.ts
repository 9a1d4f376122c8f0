import type { TodoQueryParams } from "../core/dto/todoDto";
import type { Priority } from "../core/entities/todo";
import { DEFAULT_PAGE_SIZE } from "../core/query/todoQuery";
import { DELETED_ALL_KEY, TODOS_ALL_KEY, type CacheKey } from "./todoCache";

export type StatusFilter = "all" | "active" | "completed" | "deleted";

export const PAGE_SIZE_OPTIONS = [5, 10, 20] as const;
export type PageSizeOption = (typeof PAGE_SIZE_OPTIONS)[number];

export interface TodoFilterState {
  status: StatusFilter;
  priority?: Priority;
  sortBy?: string;
  sortDescending: boolean;
  page: number;
  pageSize: number;
}

export function isPageSizeOption(size: number): size is PageSizeOption {
  return PAGE_SIZE_OPTIONS.some((option) => option === size);
}

export function createTodoFilters(initial: Partial<TodoFilterState> = {}): TodoFilterState {
  const pageSize = initial.pageSize !== undefined && isPageSizeOption(initial.pageSize)
    ? initial.pageSize
    : DEFAULT_PAGE_SIZE;
  return {
    status: initial.status ?? "all",
    priority: initial.priority,
    sortBy: initial.sortBy,
    sortDescending: initial.sortDescending ?? true,
    page: initial.page ?? 1,
    pageSize,
  };
}

// Narrowing the result set sends the user back to the first page.

export function setStatusFilter(state: TodoFilterState, status: StatusFilter): TodoFilterState {
  return { ...state, status, page: 1 };
}

export function setPriorityFilter(state: TodoFilterState, priority: Priority | undefined): TodoFilterState {
  return { ...state, priority, page: 1 };
}

export function setPageSize(state: TodoFilterState, pageSize: number): TodoFilterState {
  if (!isPageSizeOption(pageSize)) return state;
  return { ...state, pageSize, page: 1 };
}

export function setSortBy(state: TodoFilterState, sortBy: string | undefined): TodoFilterState {
  return { ...state, sortBy };
}

export function toggleSortDirection(state: TodoFilterState): TodoFilterState {
  return { ...state, sortDescending: !state.sortDescending };
}

export function setPage(state: TodoFilterState, page: number): TodoFilterState {
  return { ...state, page: Math.max(1, Math.floor(page)) };
}

/** `all` and `deleted` leave completion unfiltered. */
export function completedFilterFor(status: StatusFilter): boolean | undefined {
  if (status === "active") return false;
  if (status === "completed") return true;
  return undefined;
}

export function toQueryParams(state: TodoFilterState): TodoQueryParams {
  return {
    page: state.page,
    pageSize: state.pageSize,
    sortBy: state.sortBy,
    sortDescending: state.sortDescending,
    isCompleted: completedFilterFor(state.status),
    priority: state.priority,
  };
}

export function hasFilters(state: TodoFilterState): boolean {
  return completedFilterFor(state.status) !== undefined || state.priority !== undefined;
}

export function cacheKeyFor(state: TodoFilterState): CacheKey {
  return state.status === "deleted" ? DELETED_ALL_KEY : TODOS_ALL_KEY;
}
