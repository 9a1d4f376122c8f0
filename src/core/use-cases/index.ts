import type { TodoRepository } from "../ports/TodoRepository";
import type { UseCaseDeps } from "./deps";
import makeCreateTodo from "./createTodo";
import makeGetTodo from "./getTodo";
import makeUpdateTodo from "./updateTodo";
import makeToggleTodo from "./toggleTodo";
import makeDeleteTodo from "./deleteTodo";
import makeRestoreTodo from "./restoreTodo";
import makeListTodos from "./listTodos";

export function makeTodoService(repo: TodoRepository, deps: UseCaseDeps) {
  return {
    createTodo: makeCreateTodo(repo, deps),
    getTodo: makeGetTodo(repo),
    updateTodo: makeUpdateTodo(repo, deps),
    toggleTodo: makeToggleTodo(repo, deps),
    deleteTodo: makeDeleteTodo(repo, deps),
    restoreTodo: makeRestoreTodo(repo, deps),
    listTodos: makeListTodos(repo, "active"),
    listDeletedTodos: makeListTodos(repo, "deleted"),
  };
}

export type TodoService = ReturnType<typeof makeTodoService>;
export type { UseCaseDeps } from "./deps";
