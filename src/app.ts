import express from "express";
import cors from "cors";
import morgan from "morgan";
import swaggerUi from "swagger-ui-express";
import apiSpec from "./docs/openapi.json";

import type { AppConfig } from "./config";
import type { TodoService } from "./core/use-cases";
import { getLogger } from "./infrastructure/logging/logger";
import { makeHttpRouter } from "./interfaces/http/routes";
import { errorHandler, notFoundHandler } from "./interfaces/http/middlewares/errorHandler";

export interface AppDeps {
  service: TodoService;
  config: Pick<AppConfig, "logFormat" | "corsOrigins" | "store">;
}

export function createApp({ service, config }: AppDeps) {
  const app = express();
  const accessLog = getLogger("access");

  app.use(cors({ origin: config.corsOrigins }));
  app.use(express.json({ limit: "1mb" }));
  app.use(morgan(config.logFormat, {
    stream: { write: (line: string) => accessLog.info(line.trimEnd()) },
  }));

  // API Docs (Swagger UI)
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(apiSpec));
  app.get("/docs-json", (_req, res) => res.json(apiSpec));

  app.use(makeHttpRouter(service, { store: config.store }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
