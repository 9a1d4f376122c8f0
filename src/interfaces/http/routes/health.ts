import { Router } from "express";
import { createHealthController, type HealthInfo } from "../controllers/healthController";

export function healthRoutes(info: HealthInfo) {
  const router = Router();
  router.get("/health", createHealthController(info));
  return router;
}
