export {
  createTodoApiClient,
  toSearchParams,
  TodoApiError,
  DEFAULT_BASE_URL,
  DEFAULT_BATCH_SIZE,
} from "./todoApiClient";
export type { TodoApi, TodoApiClientOptions, RequestOptions } from "./todoApiClient";
export {
  TodoCache,
  TODOS_ALL_KEY,
  DELETED_ALL_KEY,
  DEFAULT_REFRESH_INTERVAL_MS,
} from "./todoCache";
export type { CacheKey, CacheEntry, CachedList, CacheListener, TodoCacheOptions, TodoCounts } from "./todoCache";
export * from "./todoFilters";
