import { Router } from "express";
import { healthRoutes } from "./health";
import { todoRoutes } from "./todos";
import type { TodoControllerDeps } from "../controllers/todoController";
import type { HealthInfo } from "../controllers/healthController";

export function makeHttpRouter(deps: TodoControllerDeps, health: HealthInfo) {
  const router = Router();

  router.use(healthRoutes(health));
  router.use(todoRoutes(deps));

  return router;
}
