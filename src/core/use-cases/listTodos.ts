import type { Todo } from "../entities/todo";
import type { TodoListResponse } from "../dto/todoDto";
import type { TodoRepository } from "../ports/TodoRepository";
import { DEFAULT_PAGE, DEFAULT_PAGE_SIZE, type TodoFilter, type TodoView } from "../query/todoQuery";

export default (repo: TodoRepository, view: TodoView) => async (
  filter: TodoFilter
): Promise<TodoListResponse<Todo>> => {
  const { items, totalCount } = await repo.query(view, filter);
  return {
    items,
    totalCount,
    page: filter.page ?? DEFAULT_PAGE,
    pageSize: filter.pageSize ?? DEFAULT_PAGE_SIZE,
  };
};
