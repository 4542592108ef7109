import "dotenv/config";
import { createServer } from "node:http";
import { buildApiApp } from "./app.js";
import { loadApiConfig } from "./config.js";
import { createAppContext } from "./context.js";
import { createLogger, serializeError } from "./logger.js";
import { InMemoryRepository } from "./storage/memory-repository.js";
import { PostgresRepository } from "./storage/postgres-repository.js";

const config = loadApiConfig();
const logger = createLogger(config.logLevel, { base: { service: "api" } });

if (!config.databaseUrl) {
  logger.warn({ event: "storage.in_memory" }, "DATABASE_URL is not set; data will not persist");
}

const repository = config.databaseUrl
  ? PostgresRepository.fromUrl(config.databaseUrl)
  : new InMemoryRepository();
const context = createAppContext({ config, logger, repository });
const server = createServer(buildApiApp({ context }));

server.listen(config.port, config.host, () => {
  logger.info(
    { event: "api.listening", host: config.host, port: config.port },
    `API listening on ${config.host}:${config.port}`
  );
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    server.close(() => {
      void repository
        .close()
        .catch((error: unknown) => {
          logger.error(
            { event: "api.shutdown_failed", error: serializeError(error) },
            "Repository close failed"
          );
        })
        .finally(() => {
          process.exit(0);
        });
    });
  });
}
