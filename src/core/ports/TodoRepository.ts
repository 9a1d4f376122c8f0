import type { Todo, TodoDraft } from "../entities/todo";
import type { QueryResult, TodoFilter, TodoView } from "../query/todoQuery";

export type TodoChanges = Pick<Todo, "title" | "description" | "isCompleted" | "dueDate" | "priority">;

/**
 * Storage port. Every mutation is committed before its promise resolves.
 * `get`/`update` only see active items; `getRaw` sees deleted ones too.
 */
export interface TodoRepository {
  get(id: number): Promise<Todo | null>;
  getRaw(id: number): Promise<Todo | null>;
  add(draft: TodoDraft): Promise<Todo>;
  update(id: number, changes: TodoChanges): Promise<Todo | null>;
  softDelete(id: number, deletedAt: string): Promise<boolean>;
  restore(id: number): Promise<Todo | null>;
  query(view: TodoView, filter: TodoFilter): Promise<QueryResult<Todo>>;
}
