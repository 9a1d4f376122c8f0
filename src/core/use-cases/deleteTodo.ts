import type { TodoRepository } from "../ports/TodoRepository";
import type { UseCaseDeps } from "./deps";

/** false for both a missing id and an already deleted one. */
export default (repo: TodoRepository, { clock, logger }: UseCaseDeps) => async (id: number) => {
  const deleted = await repo.softDelete(id, clock().toISOString());
  if (deleted) logger.info({ id }, "Deleted todo");
  return deleted;
};
