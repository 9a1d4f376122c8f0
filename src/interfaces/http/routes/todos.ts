import { Router } from "express";
import createTodoController, { type TodoControllerDeps } from "../controllers/todoController";
import { asyncHandler } from "../asyncHandler";

export function todoRoutes(deps: TodoControllerDeps) {
  const controller = createTodoController(deps);
  const router = Router();

  router.get("/todo", asyncHandler(controller.list));
  router.get("/todo/deleted", asyncHandler(controller.listDeleted));
  router.get("/todo/:id", asyncHandler(controller.get));
  router.post("/todo", asyncHandler(controller.create));
  router.put("/todo/:id", asyncHandler(controller.update));
  router.patch("/todo/:id/toggle", asyncHandler(controller.toggle));
  router.delete("/todo/:id", asyncHandler(controller.remove));
  router.patch("/todo/:id/restore", asyncHandler(controller.restore));

  return router;
}
