import { createTodo } from "../entities/todo";
import type { CreateTodoRequest } from "../dto/todoDto";
import type { TodoRepository } from "../ports/TodoRepository";
import { type UseCaseDeps, normalizeOptionalText } from "./deps";

export default (repo: TodoRepository, { clock, logger }: UseCaseDeps) => async (
  input: CreateTodoRequest
) => {
  const created = await repo.add(createTodo({
    title: input.title.trim(),
    description: normalizeOptionalText(input.description),
    dueDate: input.dueDate ?? null,
    priority: input.priority,
    createdAt: clock().toISOString(),
  }));

  logger.info({ id: created.id }, "Created todo");
  return created;
};
