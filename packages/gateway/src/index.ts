import {
  createFederationContext,
  createLogger,
  createPinoLog,
  DatabaseBackend,
  loadConfig,
} from "@calfed/core";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig(undefined, createPinoLog());
  const logger = createLogger(config.log.level);

  const context = createFederationContext(config, {
    log: createPinoLog(logger),
  });
  if (context.report.activated.length === 0) {
    logger.warn("No backend could be set up, activating the default backend");
    context.registry.activate();
  }
  logger.info(
    `Backends: ${Array.from(context.registry.listActivatedNames()).join(", ")}`,
  );

  const server = await createServer({
    federation: context.federation,
    engine: context.engine,
    logger,
  });

  const { host, port } = config.server;
  try {
    await server.listen({ port, host });
  } catch (err) {
    logger.error(err, "Failed to start server");
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    try {
      await server.close();
      for (const [, backend] of context.registry.entries()) {
        if (backend instanceof DatabaseBackend) {
          backend.close();
        }
      }
      process.exit(0);
    } catch (err) {
      logger.error(err, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
