import "dotenv/config";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createContainer } from "./container";
import { initLogger } from "./infrastructure/logging/logger";

const config = loadConfig();
const log = initLogger(config.logLevel).child({ component: "server" });

const container = createContainer(config);
const app = createApp({ service: container.service, config });

const server = app.listen(config.port, config.host, () => {
  log.info({ host: config.host, port: config.port, store: config.store }, "Todo API listening");
});

function shutdown(signal: string) {
  log.info({ signal }, "Shutting down");
  server.close((err) => {
    container.close();
    if (err) {
      log.error({ err }, "Error while closing server");
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
