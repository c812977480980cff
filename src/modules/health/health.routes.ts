import { Router } from "express";
import { config } from "../../config/index.js";
import { errorMessage, logger } from "../../lib/logger.js";
import type { CommerceStore } from "../commerce/commerce.types.js";

export function createHealthRoutes(store: Pick<CommerceStore, "ping">): Router {
  const router = Router();

  router.get("/health", async (_req, res) => {
    let dbStatus: "up" | "down" = "down";
    try {
      await store.ping();
      dbStatus = "up";
    } catch (err) {
      logger.warn("Health check: database unreachable", { error: errorMessage(err) });
    }
    const ok = dbStatus === "up";
    const body: Record<string, unknown> = {
      status: ok ? "ok" : "degraded",
      db: dbStatus,
    };
    if (config.HEALTH_EXPOSE_ENV) {
      body.env = config.NODE_ENV;
    }
    res.status(ok ? 200 : 503).json(body);
  });

  router.get("/ready", async (_req, res) => {
    try {
      await store.ping();
      res.status(200).json({ status: "ready" });
    } catch {
      res.status(503).json({ status: "not ready" });
    }
  });

  return router;
}
