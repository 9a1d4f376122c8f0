import InMemoryTodoRepository from "../../../src/infrastructure/repositories/inMemoryTodoRepository";
import { describeRepositoryContract } from "./repositoryContract";

describeRepositoryContract("InMemoryTodoRepository", () => ({
  repo: new InMemoryTodoRepository(),
  close: () => {},
}));
