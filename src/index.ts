import { Server } from "http";
import { createApp } from "./app";
import { config } from "./config";
import { createServices } from "./services";
import { errorMeta, logger } from "./services/logger";
import { seedSampleProducts } from "./services/seed";
import { RedisStore } from "./services/store";

const store = new RedisStore(config.redis.url);
const services = createServices(store, {
  adminIds: new Set(config.admin.ids),
  referralBonus: config.referral.bonus,
});
const app = createApp(services);
let server: Server | null = null;

// Startup
async function start(): Promise<void> {
  try {
    await store.connect();
    logger.info("Store connected", { url: config.redis.url });

    if (config.seed.sampleProducts) {
      await seedSampleProducts(services.products);
    }

    server = app.listen(config.server.port, config.server.host, () => {
      logger.info(
        `Shop API listening on ${config.server.host}:${config.server.port}`,
      );
    });
  } catch (error) {
    logger.error("Failed to start server", errorMeta(error));
    process.exit(1);
  }
}

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully`);
  server?.close();
  await store.disconnect();
  process.exit(0);
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

void start();
