import { createApp } from "./app.js";
import { config } from "./config/index.js";
import { logger } from "./lib/logger.js";
import { db, pool } from "./lib/db.js";
import { createCommerceRepository } from "./modules/commerce/commerce.repository.js";
import { payfortSettingsFromConfig } from "./modules/payfort/payfort.settings.js";

const settings = payfortSettingsFromConfig(config);
const app = createApp({ store: createCommerceRepository(db), settings });

const server = app.listen(config.PORT, () => {
  logger.info(`Server listening on port ${config.PORT}`, {
    env: config.NODE_ENV,
    shaMethod: settings.shaMethod,
    amountPolicy: settings.amountPolicy,
  });
  if (config.NODE_ENV === "production" && config.TRUST_PROXY !== true) {
    logger.warn(
      "TRUST_PROXY not set in production: req.ip and rate-limit (e.g. /payfort/feedback/) may see a single proxy IP. Set TRUST_PROXY=1 if behind Nginx/Render/Fly."
    );
  }
});

let shuttingDown = false;

function gracefulShutdown(signal: string): void {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("shutdown start", { signal });
  server.close(() => {
    pool
      .end()
      .then(() => {
        logger.info("shutdown complete");
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error("pool end error", { error: String(err) });
        process.exit(1);
      });
  });
  const forceExit = setTimeout(() => {
    logger.warn("shutdown timeout, forcing exit");
    process.exit(1);
  }, 15000);
  forceExit.unref();
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

export default server;
