import type { z } from "zod";
import type {
  CreateTodoRequest,
  ErrorType,
  TodoListResponse,
  TodoQueryParams,
  TodoResponse,
  UpdateTodoRequest,
} from "../core/dto/todoDto";
import type { FieldErrors } from "../core/errors";
import { ErrorResponseSchema, TodoListResponseSchema, TodoResponseSchema } from "./responseSchemas";

export const DEFAULT_BASE_URL = "http://localhost:5121/todo";
export const DEFAULT_BATCH_SIZE = 100;

export interface TodoApiClientOptions {
  baseUrl?: string;
  /** Page size used by the *Full loaders */
  batchSize?: number;
  fetch?: typeof fetch;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/** A non-2xx answer from the API, with a message fit for display. */
export class TodoApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly type: ErrorType | null = null,
    readonly fieldErrors: FieldErrors = {}
  ) {
    super(message);
    this.name = "TodoApiError";
  }
}

export interface TodoApi {
  getAll(params?: TodoQueryParams, options?: RequestOptions): Promise<TodoListResponse>;
  getDeleted(params?: TodoQueryParams, options?: RequestOptions): Promise<TodoListResponse>;
  getById(id: number, options?: RequestOptions): Promise<TodoResponse>;
  getAllFull(batchSize?: number, options?: RequestOptions): Promise<TodoListResponse>;
  getDeletedFull(batchSize?: number, options?: RequestOptions): Promise<TodoListResponse>;
  create(todo: CreateTodoRequest, options?: RequestOptions): Promise<TodoResponse>;
  update(id: number, todo: UpdateTodoRequest, options?: RequestOptions): Promise<TodoResponse>;
  toggle(id: number, options?: RequestOptions): Promise<TodoResponse>;
  delete(id: number, options?: RequestOptions): Promise<void>;
  restore(id: number, options?: RequestOptions): Promise<TodoResponse>;
}

export function toSearchParams(params: TodoQueryParams = {}): URLSearchParams {
  const searchParams = new URLSearchParams();
  if (params.isCompleted !== undefined) searchParams.set("isCompleted", String(params.isCompleted));
  if (params.priority !== undefined) searchParams.set("priority", String(params.priority));
  if (params.sortBy) searchParams.set("sortBy", params.sortBy);
  if (params.sortDescending !== undefined) searchParams.set("sortDescending", String(params.sortDescending));
  if (params.page) searchParams.set("page", String(params.page));
  if (params.pageSize) searchParams.set("pageSize", String(params.pageSize));
  return searchParams;
}

async function toApiError(response: Response): Promise<TodoApiError> {
  const text = await response.text();
  let body: unknown = null;
  try {
    body = JSON.parse(text);
  } catch {
    body = null; // plain-text error body
  }

  const parsed = ErrorResponseSchema.safeParse(body);
  if (!parsed.success) {
    return new TodoApiError(text || `Request failed (${response.status})`, response.status);
  }

  const { type, message, errors = {} } = parsed.data;
  const fieldMessages = Object.values(errors).flat();
  const display = type === "ValidationError" && fieldMessages.length > 0 ? fieldMessages.join("; ") : message;
  return new TodoApiError(display, response.status, type, errors);
}

export function createTodoApiClient(options: TodoApiClientOptions = {}): TodoApi {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  const defaultBatchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const doFetch = options.fetch ?? fetch;

  async function send(path: string, init: RequestInit): Promise<Response> {
    const response = await doFetch(`${baseUrl}${path}`, init);
    if (!response.ok) throw await toApiError(response);
    return response;
  }

  async function request<S extends z.ZodTypeAny>(schema: S, path: string, init: RequestInit): Promise<z.output<S>> {
    const response = await send(path, init);
    return schema.parse(await response.json());
  }

  function withQuery(path: string, params?: TodoQueryParams): string {
    const query = toSearchParams(params).toString();
    return query ? `${path}?${query}` : path;
  }

  function jsonInit(method: string, body: unknown, signal?: AbortSignal): RequestInit {
    return {
      method,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal,
    };
  }

  /** Pages through a listing until the reported total is reached or a page comes back empty. */
  async function loadAll(
    fetchPage: (params: TodoQueryParams, opts?: RequestOptions) => Promise<TodoListResponse>,
    batchSize: number,
    opts?: RequestOptions
  ): Promise<TodoListResponse> {
    let page = 1;
    let items: TodoResponse[] = [];
    let totalCount = 0;

    while (true) {
      const response = await fetchPage({ page, pageSize: batchSize }, opts);
      totalCount = response.totalCount;
      items = items.concat(response.items);
      if (items.length >= totalCount || response.items.length === 0) {
        break;
      }
      page += 1;
    }

    return { items, totalCount, page: 1, pageSize: items.length || batchSize };
  }

  const api: TodoApi = {
    getAll: (params, opts) =>
      request(TodoListResponseSchema, withQuery("", params), { signal: opts?.signal }),

    getDeleted: (params, opts) =>
      request(TodoListResponseSchema, withQuery("/deleted", params), { signal: opts?.signal }),

    getById: (id, opts) => request(TodoResponseSchema, `/${id}`, { signal: opts?.signal }),

    getAllFull: (batchSize = defaultBatchSize, opts) => loadAll(api.getAll, batchSize, opts),

    getDeletedFull: (batchSize = defaultBatchSize, opts) => loadAll(api.getDeleted, batchSize, opts),

    create: (todo, opts) => request(TodoResponseSchema, "", jsonInit("POST", todo, opts?.signal)),

    update: (id, todo, opts) => request(TodoResponseSchema, `/${id}`, jsonInit("PUT", todo, opts?.signal)),

    toggle: (id, opts) =>
      request(TodoResponseSchema, `/${id}/toggle`, { method: "PATCH", signal: opts?.signal }),

    delete: async (id, opts) => {
      await send(`/${id}`, { method: "DELETE", signal: opts?.signal });
    },

    restore: (id, opts) =>
      request(TodoResponseSchema, `/${id}/restore`, { method: "PATCH", signal: opts?.signal }),
  };

  return api;
}
