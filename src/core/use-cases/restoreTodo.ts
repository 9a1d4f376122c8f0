import type { TodoRepository } from "../ports/TodoRepository";
import type { UseCaseDeps } from "./deps";

export default (repo: TodoRepository, { logger }: UseCaseDeps) => async (id: number) => {
  const restored = await repo.restore(id);
  if (restored) logger.info({ id }, "Restored todo");
  return restored;
};
