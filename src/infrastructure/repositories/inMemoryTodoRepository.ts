import type { Todo, TodoDraft } from "../../core/entities/todo";
import type { TodoChanges, TodoRepository } from "../../core/ports/TodoRepository";
import { type QueryResult, type TodoFilter, type TodoView, queryTodos, selectView } from "../../core/query/todoQuery";

export default class InMemoryTodoRepository implements TodoRepository {
  private items = new Map<number, Todo>();
  private seq = 1;

  private nextId(): number {
    return this.seq++;
  }

  async get(id: number): Promise<Todo | null> {
    const t = this.items.get(id);
    return t && !t.isDeleted ? { ...t } : null;
  }

  async getRaw(id: number): Promise<Todo | null> {
    const t = this.items.get(id);
    return t ? { ...t } : null;
  }

  async add(draft: TodoDraft): Promise<Todo> {
    const todo: Todo = { ...draft, id: this.nextId() };
    this.items.set(todo.id, todo);
    return { ...todo };
  }

  async update(id: number, changes: TodoChanges): Promise<Todo | null> {
    const current = this.items.get(id);
    if (!current || current.isDeleted) return null;
    const updated: Todo = {
      ...current,
      title: changes.title,
      description: changes.description,
      isCompleted: changes.isCompleted,
      dueDate: changes.dueDate,
      priority: changes.priority,
    };
    this.items.set(id, updated);
    return { ...updated };
  }

  async softDelete(id: number, deletedAt: string): Promise<boolean> {
    const current = this.items.get(id);
    if (!current || current.isDeleted) return false;
    this.items.set(id, { ...current, isDeleted: true, deletedAt });
    return true;
  }

  async restore(id: number): Promise<Todo | null> {
    const current = this.items.get(id);
    if (!current || !current.isDeleted) return null;
    const restored: Todo = { ...current, isDeleted: false, deletedAt: null };
    this.items.set(id, restored);
    return { ...restored };
  }

  async query(view: TodoView, filter: TodoFilter): Promise<QueryResult<Todo>> {
    const { items, totalCount } = queryTodos(selectView(this.items.values(), view), filter);
    return { items: items.map((t) => ({ ...t })), totalCount };
  }
}
