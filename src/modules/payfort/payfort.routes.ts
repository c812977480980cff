import express, { Router, type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import { config } from "../../config/index.js";
import { logger } from "../../lib/logger.js";
import { safePaymentLogContext } from "../../lib/logContext.js";
import { AppError, authGuard, getCspNonce } from "../../middleware/index.js";
import { ORDER_STATUS, type CommerceStore } from "../commerce/commerce.types.js";
import { AuditActions, recordAuditSafely } from "../commerce/audit.js";
import { PayfortCallbackHandler } from "./payfort.callbacks.js";
import { renderErrorPage, renderRedirectForm, renderWaitPage } from "./payfort.pages.js";
import { PayfortProcessor } from "./payfort.processor.js";
import { PAYFORT_GATEWAY, type PayfortSettings } from "./payfort.settings.js";
import { checkPaymentStatus } from "./payfort.status.js";
import { orderIdParamSchema, toCallbackFields } from "./payfort.validation.js";

export interface PayfortRouteDependencies {
  settings: PayfortSettings;
  store: CommerceStore;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    void handler(req, res).catch(next);
  };
}

function nonceOf(req: Request): string {
  const nonce = getCspNonce(req);
  if (!nonce) throw new AppError("CSP nonce missing", 500, "CSP_NONCE_MISSING");
  return nonce;
}

/**
 * ACK policy for PayFort server calls:
 * - 400: reference resolves to no order/site, or bad signature.
 * - 200: every other decision, including ones that settle nothing, so PayFort stops redelivering.
 * - 5xx: store unreachable before a decision was taken; PayFort retries.
 */
export function createPayfortRoutes({ settings, store }: PayfortRouteDependencies): Router {
  const router = Router();
  const callbacks = new PayfortCallbackHandler(settings, store);
  const processor = new PayfortProcessor(settings);

  // PayFort posts from a small set of IPs; the threshold only guards against floods.
  const callbackLimiter = rateLimit({
    windowMs: config.RATE_LIMIT_CALLBACK_WINDOW_MS,
    max: config.RATE_LIMIT_CALLBACK_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn("PayFort callback rate limit exceeded (429)", { requestId: req.requestId, path: req.path });
      res.status(429).json({ error: "Too many callback requests" });
    },
  });

  const statusLimiter = rateLimit({
    windowMs: config.RATE_LIMIT_STATUS_WINDOW_MS,
    max: config.RATE_LIMIT_STATUS_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn("Payment status rate limit exceeded (429)", { requestId: req.requestId });
      res.status(429).json({ error: "Too many status requests" });
    },
  });

  const callbackBody = express.urlencoded({ extended: false, limit: config.CALLBACK_BODY_LIMIT });

  router.post(
    "/return/",
    callbackLimiter,
    callbackBody,
    asyncRoute(async (req, res) => {
      const outcome = await callbacks.handleReturn(toCallbackFields(req.body), { requestId: req.requestId });
      logger.info(
        "payfort_return_handled",
        safePaymentLogContext({ requestId: req.requestId, outcome: outcome.kind, metric: "payfort_return" })
      );
      const html =
        outcome.kind === "wait" ? renderWaitPage(outcome.context, nonceOf(req)) : renderErrorPage();
      res.status(200).type("html").send(html);
    })
  );

  router.post(
    "/feedback/",
    callbackLimiter,
    callbackBody,
    asyncRoute(async (req, res) => {
      const outcome = await callbacks.handleFeedback(toCallbackFields(req.body), {
        requestId: req.requestId,
        actorId: null,
      });
      logger.info(
        "payfort_feedback_handled",
        safePaymentLogContext({
          requestId: req.requestId,
          outcome: outcome.result,
          status: outcome.httpStatus,
          metric: "payfort_feedback",
        })
      );
      res.status(outcome.httpStatus).end();
    })
  );

  router.get(
    "/status/",
    statusLimiter,
    authGuard,
    asyncRoute(async (req, res) => {
      const result = await checkPaymentStatus(
        store,
        settings,
        { transaction_id: req.query.transaction_id, merchant_reference: req.query.merchant_reference },
        { requestId: req.requestId }
      );
      if (result.statusCode === 204 || !result.body) {
        res.status(result.statusCode).end();
        return;
      }
      res.status(result.statusCode).json(result.body);
    })
  );

  router.get(
    "/checkout/:orderId",
    authGuard,
    asyncRoute(async (req, res) => {
      const userId = req.user?.userId;
      if (!userId) throw new AppError("Unauthorized", 401, "UNAUTHORIZED");

      const idParam = orderIdParamSchema.safeParse(req.params);
      let order = idParam.success ? await store.resolveOrder(idParam.data.orderId) : null;
      // Another user's order is reported exactly like a missing one.
      if (!order || order.userId !== userId) throw new AppError("Order not found", 404, "NOT_FOUND");

      if (order.status === ORDER_STATUS.PENDING) {
        await store.markProcessing(order.id);
        order = await store.resolveOrder(order.id);
        if (!order) throw new AppError("Order not found", 404, "NOT_FOUND");
      }
      if (order.status !== ORDER_STATUS.PROCESSING) {
        throw new AppError(`Order is not payable in status: ${order.status}`, 409, "ORDER_NOT_PAYABLE");
      }

      const site = await store.resolveSite(order.siteId);
      if (!site) throw new AppError(`Site ${order.siteId} not found for order ${order.id}`, 500, "SITE_NOT_FOUND");

      const params = processor.buildInitiationParams(order, site);
      await recordAuditSafely(store, {
        action: AuditActions.REDIRECT_TO_PAYMENT,
        orderId: order.id,
        gateway: PAYFORT_GATEWAY,
        context: {
          merchant_reference: params.merchant_reference,
          amount: params.amount,
          currency: params.currency,
        },
      });
      logger.info(
        "payfort_checkout_rendered",
        safePaymentLogContext({
          requestId: req.requestId,
          orderId: order.id,
          merchantReference: params.merchant_reference,
          amount: params.amount,
          currency: params.currency,
          metric: "payfort_checkout",
        })
      );
      res.status(200).type("html").send(renderRedirectForm(params, nonceOf(req)));
    })
  );

  return router;
}
