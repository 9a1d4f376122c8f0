import { TodoApiError, type RequestOptions, type TodoApi } from "../../src/client/todoApiClient";
import {
  toTodoResponse,
  type CreateTodoRequest,
  type TodoListResponse,
  type TodoQueryParams,
  type TodoResponse,
  type UpdateTodoRequest,
} from "../../src/core/dto/todoDto";
import type { Todo } from "../../src/core/entities/todo";
import type { TodoService } from "../../src/core/use-cases";

function notFound(id: number): TodoApiError {
  return new TodoApiError(`Todo with ID ${id} not found`, 404, "NotFound");
}

function found(todo: Todo | null, id: number): TodoResponse {
  if (!todo) throw notFound(id);
  return toTodoResponse(todo);
}

function toWire(list: TodoListResponse<Todo>): TodoListResponse {
  return { ...list, items: list.items.map(toTodoResponse) };
}

/** TodoApi that calls a TodoService directly, with switches for failures and slow loads. */
export class FakeTodoApi implements TodoApi {
  fullLoads = 0;
  loadFailure: Error | null = null;
  writeFailure: Error | null = null;
  lastSignal: AbortSignal | undefined;
  private gate: Promise<void> | null = null;

  constructor(private readonly service: TodoService) {}

  /** Holds full loads until the returned function is called. */
  hold(): () => void {
    let release = () => {};
    this.gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    return () => {
      this.gate = null;
      release();
    };
  }

  async getAll(params: TodoQueryParams = {}): Promise<TodoListResponse> {
    return toWire(await this.service.listTodos(params));
  }

  async getDeleted(params: TodoQueryParams = {}): Promise<TodoListResponse> {
    return toWire(await this.service.listDeletedTodos(params));
  }

  async getById(id: number): Promise<TodoResponse> {
    return found(await this.service.getTodo(id), id);
  }

  async getAllFull(_batchSize?: number, options?: RequestOptions): Promise<TodoListResponse> {
    await this.beforeLoad(options);
    return this.getAll({ pageSize: 100 });
  }

  async getDeletedFull(_batchSize?: number, options?: RequestOptions): Promise<TodoListResponse> {
    await this.beforeLoad(options);
    return this.getDeleted({ pageSize: 100 });
  }

  async create(todo: CreateTodoRequest): Promise<TodoResponse> {
    this.beforeWrite();
    return toTodoResponse(await this.service.createTodo(todo));
  }

  async update(id: number, todo: UpdateTodoRequest): Promise<TodoResponse> {
    this.beforeWrite();
    return found(await this.service.updateTodo(id, todo), id);
  }

  async toggle(id: number): Promise<TodoResponse> {
    this.beforeWrite();
    return found(await this.service.toggleTodo(id), id);
  }

  async delete(id: number): Promise<void> {
    this.beforeWrite();
    if (!(await this.service.deleteTodo(id))) throw notFound(id);
  }

  async restore(id: number): Promise<TodoResponse> {
    this.beforeWrite();
    return found(await this.service.restoreTodo(id), id);
  }

  private async beforeLoad(options?: RequestOptions): Promise<void> {
    this.fullLoads += 1;
    this.lastSignal = options?.signal;
    if (this.gate) await this.gate;
    if (this.loadFailure) throw this.loadFailure;
  }

  private beforeWrite(): void {
    if (this.writeFailure) throw this.writeFailure;
  }
}
