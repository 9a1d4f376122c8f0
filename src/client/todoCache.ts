import type {
  CreateTodoRequest,
  TodoListResponse,
  TodoQueryParams,
  TodoResponse,
  UpdateTodoRequest,
} from "../core/dto/todoDto";
import { DEFAULT_PAGE, DEFAULT_PAGE_SIZE, queryTodos } from "../core/query/todoQuery";
import type { TodoApi } from "./todoApiClient";

/** Cache key for the active list */
export const TODOS_ALL_KEY = "todos/all";

/** Cache key for soft-deleted todos */
export const DELETED_ALL_KEY = "deleted-todos/all";

export type CacheKey = typeof TODOS_ALL_KEY | typeof DELETED_ALL_KEY;

export const DEFAULT_REFRESH_INTERVAL_MS = 60_000;

export interface CachedList {
  items: TodoResponse[];
  totalCount: number;
}

export interface CacheEntry {
  /** Last good snapshot; kept while a refresh runs and after a failed one. */
  data?: CachedList;
  error?: Error;
  isValidating: boolean;
}

export interface TodoCacheOptions {
  refreshIntervalMs?: number;
  /** Forwarded to the API's full loaders; the API default applies when omitted */
  batchSize?: number;
}

export type CacheListener = (key: CacheKey, entry: Readonly<CacheEntry>) => void;

export interface TodoCounts {
  total: number;
  active: number;
  completed: number;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function withoutId(items: TodoResponse[], id: number): TodoResponse[] {
  return items.filter((item) => item.id !== id);
}

/**
 * Local mirror of the active and deleted todo sets.
 *
 * Reads never touch the network: `query` runs the shared query engine over the
 * cached set. Writes go to the API first and patch the cache only once the
 * server accepted them. Refreshes and patches for one key run one at a time,
 * in order, so a patch queued behind a refresh lands on top of the fresh data.
 *
 * Coherence is read-your-writes for this instance only.
 */
export class TodoCache {
  private readonly entries: Record<CacheKey, CacheEntry> = {
    [TODOS_ALL_KEY]: { isValidating: false },
    [DELETED_ALL_KEY]: { isValidating: false },
  };
  private readonly queues: Record<CacheKey, Promise<void>> = {
    [TODOS_ALL_KEY]: Promise.resolve(),
    [DELETED_ALL_KEY]: Promise.resolve(),
  };
  private readonly inflight: Partial<Record<CacheKey, Promise<void>>> = {};
  private readonly listeners = new Set<CacheListener>();
  private readonly refreshIntervalMs: number;
  private readonly batchSize?: number;
  private timer: NodeJS.Timeout | null = null;
  private abort = new AbortController();

  constructor(private readonly api: TodoApi, options: TodoCacheOptions = {}) {
    this.refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.batchSize = options.batchSize;
  }

  /** Populates both keys and schedules the periodic refresh. */
  async start(): Promise<void> {
    if (this.timer) return;
    if (this.abort.signal.aborted) this.abort = new AbortController();
    this.timer = setInterval(() => {
      // Never rejects: failures are recorded on the entry.
      void this.refetch();
    }, this.refreshIntervalMs);
    this.timer.unref();
    await this.refetch();
  }

  /** Stops the timer and discards responses of refreshes still in flight. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.abort.abort();
    delete this.inflight[TODOS_ALL_KEY];
    delete this.inflight[DELETED_ALL_KEY];
  }

  /** Refreshes one key, or both. Concurrent calls for a key share one request. */
  async refetch(key?: CacheKey): Promise<void> {
    const keys: CacheKey[] = key ? [key] : [TODOS_ALL_KEY, DELETED_ALL_KEY];
    await Promise.all(keys.map((k) => this.revalidate(k)));
  }

  getEntry(key: CacheKey): Readonly<CacheEntry> {
    return this.entries[key];
  }

  /** Filter/sort/paginate the cached set; undefined until the first load finishes. */
  query(key: CacheKey, params: TodoQueryParams = {}): TodoListResponse | undefined {
    const data = this.entries[key].data;
    if (!data) return undefined;
    const { items, totalCount } = queryTodos(data.items, params);
    return {
      items,
      totalCount,
      page: params.page ?? DEFAULT_PAGE,
      pageSize: params.pageSize ?? DEFAULT_PAGE_SIZE,
    };
  }

  /** Tallies over the unfiltered active set, for status tabs. */
  counts(): TodoCounts {
    const items = this.entries[TODOS_ALL_KEY].data?.items ?? [];
    const completed = items.filter((t) => t.isCompleted).length;
    return { total: items.length, active: items.length - completed, completed };
  }

  subscribe(listener: CacheListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async create(request: CreateTodoRequest): Promise<TodoResponse> {
    const created = await this.api.create(request);
    // A refresh that ran ahead of this patch may already hold the new item.
    await this.patch(TODOS_ALL_KEY, (list) => ({
      items: [created, ...withoutId(list.items, created.id)],
      totalCount: list.items.some((item) => item.id === created.id) ? list.totalCount : list.totalCount + 1,
    }));
    return created;
  }

  async update(id: number, request: UpdateTodoRequest): Promise<TodoResponse> {
    const updated = await this.api.update(id, request);
    await this.patch(TODOS_ALL_KEY, (list) => this.replace(list, updated));
    return updated;
  }

  async toggle(id: number): Promise<TodoResponse> {
    const toggled = await this.api.toggle(id);
    await this.patch(TODOS_ALL_KEY, (list) => this.replace(list, toggled));
    return toggled;
  }

  async delete(id: number): Promise<void> {
    await this.api.delete(id);

    const removal: { item?: TodoResponse } = {};
    await this.patch(TODOS_ALL_KEY, (list) => {
      removal.item = list.items.find((item) => item.id === id);
      if (!removal.item) return list;
      return { items: withoutId(list.items, id), totalCount: Math.max(0, list.totalCount - 1) };
    });

    const moved = removal.item;
    if (moved) {
      await this.patch(DELETED_ALL_KEY, (list) => ({
        items: [moved, ...withoutId(list.items, id)],
        totalCount: list.totalCount + 1,
      }));
    }
  }

  async restore(id: number): Promise<TodoResponse> {
    const restored = await this.api.restore(id);

    await this.patch(DELETED_ALL_KEY, (list) => {
      if (!list.items.some((item) => item.id === id)) return list;
      return { items: withoutId(list.items, id), totalCount: Math.max(0, list.totalCount - 1) };
    });
    await this.patch(TODOS_ALL_KEY, (list) => ({
      items: [restored, ...withoutId(list.items, id)],
      totalCount: list.items.some((item) => item.id === id) ? list.totalCount : list.totalCount + 1,
    }));
    return restored;
  }

  private replace(list: CachedList, updated: TodoResponse): CachedList {
    return {
      ...list,
      items: list.items.map((item) => (item.id === updated.id ? updated : item)),
    };
  }

  private revalidate(key: CacheKey): Promise<void> {
    const pending = this.inflight[key];
    if (pending) return pending;

    const signal = this.abort.signal;
    const run = this.enqueue(key, async () => {
      this.setEntry(key, { ...this.entries[key], isValidating: true });
      try {
        const { items, totalCount } = key === TODOS_ALL_KEY
          ? await this.api.getAllFull(this.batchSize, { signal })
          : await this.api.getDeletedFull(this.batchSize, { signal });
        if (signal.aborted) {
          this.setEntry(key, { ...this.entries[key], isValidating: false });
          return;
        }
        this.setEntry(key, { data: { items, totalCount }, isValidating: false });
      } catch (err) {
        const error = signal.aborted ? this.entries[key].error : toError(err);
        this.setEntry(key, { ...this.entries[key], error, isValidating: false });
      }
    }).finally(() => {
      if (this.inflight[key] === run) delete this.inflight[key];
    });

    this.inflight[key] = run;
    return run;
  }

  /** Applies `fn` to the cached list in queue order; a key that never loaded stays unloaded. */
  private patch(key: CacheKey, fn: (list: CachedList) => CachedList): Promise<void> {
    return this.enqueue(key, () => {
      const data = this.entries[key].data;
      if (!data) return;
      const next = fn(data);
      if (next !== data) this.setEntry(key, { ...this.entries[key], data: next });
    });
  }

  private enqueue(key: CacheKey, task: () => void | Promise<void>): Promise<void> {
    const run = this.queues[key].then(task);
    // The caller sees the failure through `run`; the queue itself keeps going.
    this.queues[key] = run.catch(() => undefined);
    return run;
  }

  private setEntry(key: CacheKey, entry: CacheEntry): void {
    this.entries[key] = entry;
    for (const listener of this.listeners) listener(key, entry);
  }
}
