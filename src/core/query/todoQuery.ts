import type { Priority } from "../entities/todo";

/**
 * Filter/sort/paginate over any sequence of todos.
 *
 * Both store adapters and the client cache call `queryTodos`, so the same
 * filter over the same items yields the same ids in the same order wherever
 * it runs.
 */

export const SORT_KEYS = ["title", "duedate", "priority", "iscompleted", "createdat"] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export const DEFAULT_SORT_KEY: SortKey = "createdat";
export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export type TodoView = "active" | "deleted";

/** The fields the engine reads. Server entities and wire DTOs both satisfy it. */
export interface QueryableTodo {
  id: number;
  title: string;
  isCompleted: boolean;
  priority: Priority;
  createdAt: string;
  dueDate: string | null;
}

export interface TodoFilter {
  isCompleted?: boolean;
  priority?: Priority;
  sortBy?: string;
  sortDescending?: boolean;
  page?: number;
  pageSize?: number;
}

export interface QueryResult<T> {
  items: T[];
  totalCount: number;
}

export function isSortKey(value: string): value is SortKey {
  return SORT_KEYS.some((key) => key === value);
}

export function resolveSortKey(sortBy: string | undefined | null): SortKey {
  const key = (sortBy ?? "").trim().toLowerCase();
  return isSortKey(key) ? key : DEFAULT_SORT_KEY;
}

export function selectView<T extends { isDeleted: boolean }>(items: Iterable<T>, view: TodoView): T[] {
  const wantDeleted = view === "deleted";
  return Array.from(items).filter((item) => item.isDeleted === wantDeleted);
}

export function matchesFilter(item: QueryableTodo, filter: Pick<TodoFilter, "isCompleted" | "priority">): boolean {
  if (filter.isCompleted !== undefined && item.isCompleted !== filter.isCompleted) return false;
  if (filter.priority !== undefined && item.priority !== filter.priority) return false;
  return true;
}

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function timeOf(iso: string): number {
  return new Date(iso).getTime();
}

export function compareTodos(sortKey: SortKey, descending: boolean) {
  const direction = descending ? -1 : 1;

  return (a: QueryableTodo, b: QueryableTodo): number => {
    let result = 0;
    switch (sortKey) {
      case "title":
        result = compareStrings(a.title, b.title);
        break;
      case "priority":
        result = compareNumbers(a.priority, b.priority);
        break;
      case "iscompleted":
        result = compareNumbers(Number(a.isCompleted), Number(b.isCompleted));
        break;
      case "duedate":
        // Missing due dates go last in either direction.
        if (a.dueDate === null && b.dueDate === null) {
          result = 0;
        } else if (a.dueDate === null) {
          return 1;
        } else if (b.dueDate === null) {
          return -1;
        } else {
          result = compareNumbers(timeOf(a.dueDate), timeOf(b.dueDate));
        }
        break;
      case "createdat":
        result = compareNumbers(timeOf(a.createdAt), timeOf(b.createdAt));
        break;
    }
    if (result === 0) result = compareNumbers(a.id, b.id);
    return result * direction;
  };
}

export function queryTodos<T extends QueryableTodo>(source: Iterable<T>, filter: TodoFilter = {}): QueryResult<T> {
  const filtered = Array.from(source).filter((item) => matchesFilter(item, filter));
  const totalCount = filtered.length;

  filtered.sort(compareTodos(resolveSortKey(filter.sortBy), filter.sortDescending ?? true));

  const page = filter.page ?? DEFAULT_PAGE;
  const pageSize = filter.pageSize ?? DEFAULT_PAGE_SIZE;
  const start = (page - 1) * pageSize;

  return { items: filtered.slice(start, start + pageSize), totalCount };
}
