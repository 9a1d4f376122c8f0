import type { AppConfig } from "./config";
import type { TodoRepository } from "./core/ports/TodoRepository";
import { makeTodoService, type TodoService } from "./core/use-cases";
import { createDatabase } from "./infrastructure/database/db";
import { getLogger } from "./infrastructure/logging/logger";
import InMemoryTodoRepository from "./infrastructure/repositories/inMemoryTodoRepository";
import SqliteTodoRepository from "./infrastructure/repositories/sqliteTodoRepository";

export interface Container {
  repository: TodoRepository;
  service: TodoService;
  close(): void;
}

export function createContainer(config: Pick<AppConfig, "store" | "databasePath">): Container {
  let repository: TodoRepository;
  let close = () => {};

  if (config.store === "sqlite") {
    const connection = createDatabase(config.databasePath);
    repository = new SqliteTodoRepository(connection.db);
    close = connection.close;
  } else {
    repository = new InMemoryTodoRepository();
  }

  const service = makeTodoService(repository, {
    clock: () => new Date(),
    logger: getLogger("todo-service"),
  });

  return { repository, service, close };
}
