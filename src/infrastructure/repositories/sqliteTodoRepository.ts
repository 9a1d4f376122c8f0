import { and, eq, type SQL } from "drizzle-orm";
import type { Todo, TodoDraft } from "../../core/entities/todo";
import type { TodoChanges, TodoRepository } from "../../core/ports/TodoRepository";
import { type QueryResult, type TodoFilter, type TodoView, queryTodos } from "../../core/query/todoQuery";
import type { TodoDb } from "../database/db";
import { todoItems, type TodoRow } from "../database/schema";

function toTodo(row: TodoRow): Todo {
  return { ...row };
}

/**
 * Drizzle-backed store. View, completion and priority predicates run in SQL
 * against the indexed columns; ordering and paging go through `queryTodos`
 * so results match the in-memory store and the client cache exactly.
 */
export default class SqliteTodoRepository implements TodoRepository {
  constructor(private readonly db: TodoDb) {}

  async get(id: number): Promise<Todo | null> {
    const row = this.db.select().from(todoItems)
      .where(and(eq(todoItems.id, id), eq(todoItems.isDeleted, false)))
      .get();
    return row ? toTodo(row) : null;
  }

  async getRaw(id: number): Promise<Todo | null> {
    const row = this.db.select().from(todoItems).where(eq(todoItems.id, id)).get();
    return row ? toTodo(row) : null;
  }

  async add(draft: TodoDraft): Promise<Todo> {
    const row = this.db.insert(todoItems).values(draft).returning().get();
    return toTodo(row);
  }

  async update(id: number, changes: TodoChanges): Promise<Todo | null> {
    const row = this.db.update(todoItems)
      .set({
        title: changes.title,
        description: changes.description,
        isCompleted: changes.isCompleted,
        dueDate: changes.dueDate,
        priority: changes.priority,
      })
      .where(and(eq(todoItems.id, id), eq(todoItems.isDeleted, false)))
      .returning()
      .get();
    return row ? toTodo(row) : null;
  }

  async softDelete(id: number, deletedAt: string): Promise<boolean> {
    const result = this.db.update(todoItems)
      .set({ isDeleted: true, deletedAt })
      .where(and(eq(todoItems.id, id), eq(todoItems.isDeleted, false)))
      .run();
    return result.changes > 0;
  }

  async restore(id: number): Promise<Todo | null> {
    const row = this.db.update(todoItems)
      .set({ isDeleted: false, deletedAt: null })
      .where(and(eq(todoItems.id, id), eq(todoItems.isDeleted, true)))
      .returning()
      .get();
    return row ? toTodo(row) : null;
  }

  async query(view: TodoView, filter: TodoFilter): Promise<QueryResult<Todo>> {
    const conditions: SQL[] = [eq(todoItems.isDeleted, view === "deleted")];
    if (filter.isCompleted !== undefined) {
      conditions.push(eq(todoItems.isCompleted, filter.isCompleted));
    }
    if (filter.priority !== undefined) {
      conditions.push(eq(todoItems.priority, filter.priority));
    }

    const rows = this.db.select().from(todoItems).where(and(...conditions)).all();
    return queryTodos(rows.map(toTodo), filter);
  }
}
