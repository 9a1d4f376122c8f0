import type { TodoRepository } from "../ports/TodoRepository";
import type { UseCaseDeps } from "./deps";

export default (repo: TodoRepository, { logger }: UseCaseDeps) => async (id: number) => {
  const current = await repo.get(id);
  if (!current) return null;

  const toggled = await repo.update(id, {
    title: current.title,
    description: current.description,
    isCompleted: !current.isCompleted,
    dueDate: current.dueDate,
    priority: current.priority,
  });

  if (toggled) {
    logger.info({ id, status: toggled.isCompleted ? "completed" : "incomplete" }, "Toggled todo");
  }
  return toggled;
};
