import "dotenv/config";

import { createApp } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { createServices } from "./services";
import { createStorageBackend } from "./storage";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const storage = await createStorageBackend(config.storage, config.scoring.bounds, logger);
  const app = createApp(createServices(config, storage, logger));

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, `Server running on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    server.close((error) => {
      storage
        .close()
        .then(() => process.exit(error ? 1 : 0))
        .catch((closeError: unknown) => {
          logger.error({ err: closeError }, "failed to close storage");
          process.exit(1);
        });
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
