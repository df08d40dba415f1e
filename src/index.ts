import { loadRuntimeConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";
import { buildApp } from "./server.js";

const config = loadRuntimeConfig();
const logger = createLogger({ level: config.logLevel });
const app = buildApp(config, { logger });

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "shutting down");
  await app.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, "shutdown failed");
      process.exit(1);
    });
  });
}

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    logger.info(
      { host: config.host, port: config.port, store: config.storeBackend, channel: config.channelBackend },
      "card payments API listening",
    );
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "failed to start");
    process.exit(1);
  });
