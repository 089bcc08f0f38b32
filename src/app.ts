import express from "express";
import cors from "cors";
import { config } from "./config";
import { identify } from "./middleware/auth";
import { Services } from "./services";
import { errorMeta, logger } from "./services/logger";
import { adminRoutes } from "./routes/admin";
import { orderRoutes } from "./routes/orders";
import { productRoutes } from "./routes/products";
import { promoRoutes } from "./routes/promos";
import { statsRoutes } from "./routes/stats";
import { userRoutes } from "./routes/users";

export function createApp(services: Services): express.Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: config.cors.origin }));
  app.use(express.json());
  app.use(identify(services.users));

  // Health endpoints
  app.get("/health", (req, res) => {
    res.json({ status: "healthy", service: "vape-shop-api" });
  });

  app.get("/ready", async (req, res) => {
    const storeHealthy = await services.store.isHealthy();

    res.status(storeHealthy ? 200 : 503).json({
      status: storeHealthy ? "ready" : "degraded",
      service: "vape-shop-api",
      store: storeHealthy ? "connected" : "disconnected",
    });
  });

  // API routes
  app.use("/api/products", productRoutes(services));
  app.use("/api/orders", orderRoutes(services));
  app.use("/api/users", userRoutes(services));
  app.use("/api/promos", promoRoutes(services));
  app.use("/api/stats", statsRoutes(services));
  app.use("/api/admin", adminRoutes(services));

  // Error handler
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      logger.error("Unhandled error", { ...errorMeta(err), stack: err.stack });
      res.status(500).json({ error: "Internal server error" });
    },
  );

  return app;
}
