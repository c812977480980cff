import express, { type Express } from "express";
import cookieParser from "cookie-parser";
import helmet from "helmet";
import cors from "cors";
import { requestId, errorHandler, AppError, cspNonce, nonceDirective } from "./middleware/index.js";
import { config, getCorsOrigins, getTrustProxy } from "./config/index.js";
import { createHealthRoutes } from "./modules/health/health.routes.js";
import { createPayfortRoutes } from "./modules/payfort/payfort.routes.js";
import { PAYFORT_ROUTE_PREFIX, type PayfortSettings } from "./modules/payfort/payfort.settings.js";
import type { CommerceStore } from "./modules/commerce/commerce.types.js";

export interface AppDependencies {
  store: CommerceStore;
  settings: PayfortSettings;
}

function isLocalhostOrigin(origin: string): boolean {
  try {
    const u = new URL(origin);
    return u.protocol === "http:" && (u.hostname === "localhost" || u.hostname === "127.0.0.1");
  } catch {
    return false;
  }
}

export function createApp({ store, settings }: AppDependencies): Express {
  const app = express();

  // Trust proxy: required behind Nginx/Render/Fly for correct client IP and cookies
  if (getTrustProxy()) {
    app.set("trust proxy", 1);
  }

  app.use(requestId);
  app.use(cspNonce);
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          "script-src": ["'self'", (req) => nonceDirective(req)],
          // The redirect page posts the browser to the PayFort payment page.
          "form-action": ["'self'", settings.paymentPageOrigin],
        },
      },
    })
  );

  const origins = getCorsOrigins();
  app.use(
    cors({
      origin: (origin, cb) => {
        if (!origin) {
          cb(null, true);
          return;
        }
        if (origins === "*") {
          cb(null, config.NODE_ENV === "development" && isLocalhostOrigin(origin) ? origin : true);
          return;
        }
        cb(null, origins.includes(origin) ? origin : false);
      },
      credentials: true,
      optionsSuccessStatus: 200,
    })
  );

  app.use(cookieParser());

  app.use(PAYFORT_ROUTE_PREFIX, createPayfortRoutes({ settings, store }));
  app.use(createHealthRoutes(store));

  app.get("/", (_req, res) => res.status(200).json({ status: "ok" }));
  app.get("/favicon.ico", (_req, res) => res.status(204).end());
  app.get("/robots.txt", (_req, res) => res.type("text/plain").send("User-agent: *\nDisallow: /\n"));

  app.use((req, _res, next) => {
    next(new AppError(`Not found: ${req.method} ${req.originalUrl}`, 404, "NOT_FOUND"));
  });

  app.use(errorHandler);

  return app;
}
