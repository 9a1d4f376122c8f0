import type { UpdateTodoRequest } from "../dto/todoDto";
import type { TodoRepository } from "../ports/TodoRepository";
import { type UseCaseDeps, normalizeOptionalText } from "./deps";

export default (repo: TodoRepository, { logger }: UseCaseDeps) => async (
  id: number,
  input: UpdateTodoRequest
) => {
  const current = await repo.get(id);
  if (!current) return null;

  const updated = await repo.update(id, {
    title: input.title.trim(),
    description: normalizeOptionalText(input.description),
    isCompleted: input.isCompleted,
    dueDate: input.dueDate ?? null,
    priority: input.priority,
  });

  if (updated) logger.info({ id }, "Updated todo");
  return updated;
};
