import { createApp } from "./app";
import { config } from "./config";
import { initializePolling } from "./polling/startPolling";
import { logger } from "./utils/logger";

const polling = initializePolling();

const app = createApp({
  cache: polling.cache,
  client: polling.client,
  builder: polling.builder,
  sensors: polling.sensors,
  redis: polling.redis,
  metlinkApiBaseUrl: config.metlinkApiBaseUrl,
});

const server = app.listen(config.port, () => {
  logger.info(`Backend server listening on http://localhost:${config.port}`);
});

const shutdown = () => {
  logger.info("Shutting down server...");
  polling.stop();
  void polling.redis.disconnect();
  server.close(() => {
    process.exit(0);
  });
};

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
