import { ORDER_STATUS, type CommerceStore, type Order } from "../commerce/commerce.types.js";
import { AuditActions, recordAuditSafely, type AuditAction } from "../commerce/audit.js";
import { errorMessage, logger } from "../../lib/logger.js";
import { safePaymentLogContext } from "../../lib/logContext.js";
import { PayfortProcessor } from "./payfort.processor.js";
import { resolveOrderFromReference, resolveSiteFromReference } from "./payfort.reference.js";
import {
  PAYFORT_GATEWAY,
  PAYFORT_STATUS_PATH,
  PAYFORT_SUCCESS_STATUS,
  type PayfortSettings,
} from "./payfort.settings.js";
import { applySettlement, fulfillSettledOrder } from "./payfort.settlement.js";
import { validateResponseFormat, type CallbackFields } from "./payfort.validation.js";
import type { WaitPageContext } from "./payfort.pages.js";

export interface CallbackMeta {
  requestId?: string;
  /** Authenticated user behind the request, if any. PayFort's server calls carry none. */
  actorId?: string | null;
}

export type ReturnOutcome =
  | { kind: "wait"; context: WaitPageContext }
  | { kind: "error"; reason: "bad_signature" | "unsuccessful" | "invalid_format" };

export type FeedbackResult =
  | "unresolvable"
  | "bad_signature"
  | "unsuccessful"
  | "invalid_format"
  | "invalid_order_state"
  | "duplicate"
  | "stale"
  | "rolled_back"
  | "settled"
  | "settled_unfulfilled";

export interface FeedbackOutcome {
  /** 400 only for an unresolvable reference or a bad signature; everything else is acknowledged. */
  httpStatus: 200 | 400;
  result: FeedbackResult;
}

/**
 * Handles both PayFort callbacks. The browser return only verifies and renders the wait page;
 * settlement happens exclusively on the server-to-server feedback.
 */
export class PayfortCallbackHandler {
  private readonly processor: PayfortProcessor;

  constructor(
    private readonly settings: PayfortSettings,
    private readonly store: CommerceStore
  ) {
    this.processor = new PayfortProcessor(settings);
  }

  async handleReturn(fields: CallbackFields, meta: CallbackMeta = {}): Promise<ReturnOutcome> {
    const merchantReference = fields.merchant_reference;
    const log = (extra: Record<string, unknown>) =>
      safePaymentLogContext({ requestId: meta.requestId, merchantReference, ...extra });

    if (!this.processor.verifyResponseSignature(fields)) {
      const order = await this.orderForAudit(fields, meta);
      await this.audit(AuditActions.BAD_RESPONSE_SIGNATURE, order, { data: fields });
      logger.error("Invalid signature received in response from PayFort", log({ orderId: order?.id }));
      return { kind: "error", reason: "bad_signature" };
    }

    if (fields.status !== PAYFORT_SUCCESS_STATUS) {
      logger.error(
        "PayFort payment failed",
        log({ status: fields.status, responseCode: fields.response_code })
      );
      const order = await this.orderForAudit(fields, meta);
      if (order) {
        await this.audit(AuditActions.PAYMENT_UNSUCCESSFUL, order, {
          status: fields.status ?? null,
          response_code: fields.response_code ?? null,
          response_message: fields.response_message ?? null,
        });
      }
      return { kind: "error", reason: "unsuccessful" };
    }

    const format = validateResponseFormat(fields);
    if (!format.ok) {
      logger.error("PayFort response validation failed", log({ missing: format.missing, invalid: format.invalid }));
      return { kind: "error", reason: "invalid_format" };
    }

    const { fortId } = format.callback;
    return {
      kind: "wait",
      context: {
        transactionId: fortId,
        merchantReference: format.callback.merchantReference,
        statusUrl: PAYFORT_STATUS_PATH,
        successUrl: `${this.settings.successPath}/${encodeURIComponent(fortId)}/`,
        errorUrl: `${this.settings.errorPath}/${encodeURIComponent(fortId)}/`,
        maxAttempts: this.settings.waitMaxAttempts,
        waitTimeMs: this.settings.waitTimeMs,
      },
    };
  }

  /**
   * Authoritative settlement path; safe to call any number of times with the same payload.
   * Store failures while resolving the reference propagate so PayFort retries the delivery.
   */
  async handleFeedback(fields: CallbackFields, meta: CallbackMeta = {}): Promise<FeedbackOutcome> {
    const merchantReference = fields.merchant_reference;
    const [orderResolution, siteResolution] = await Promise.all([
      resolveOrderFromReference(this.store, merchantReference),
      resolveSiteFromReference(this.store, merchantReference),
    ]);

    if (orderResolution.kind !== "found") {
      await this.audit(AuditActions.RESPONSE_INVALID_ORDER, null, {
        order_status: "None",
        required_order_status: ORDER_STATUS.PROCESSING,
      });
    }
    if (
      orderResolution.kind !== "found" ||
      siteResolution.kind !== "found" ||
      orderResolution.value.siteId !== siteResolution.value.id
    ) {
      logger.warn(
        "PayFort response can not be processed further, unable to retrieve order or site from given reference",
        safePaymentLogContext({
          requestId: meta.requestId,
          merchantReference,
          reason: orderResolution.kind === "malformed" ? "malformed_reference" : "not_found",
        })
      );
      return { httpStatus: 400, result: "unresolvable" };
    }

    const order = orderResolution.value;
    const site = siteResolution.value;
    const log = (extra: Record<string, unknown>) =>
      safePaymentLogContext({ requestId: meta.requestId, orderId: order.id, siteId: site.id, ...extra });

    await this.audit(AuditActions.RECEIVED_RESPONSE, order, { data: fields });

    if (!this.processor.verifyResponseSignature(fields)) {
      logger.error("Invalid signature received in response from PayFort", log({}));
      await this.audit(AuditActions.BAD_RESPONSE_SIGNATURE, order, { data: fields });
      return { httpStatus: 400, result: "bad_signature" };
    }

    if (fields.status !== PAYFORT_SUCCESS_STATUS) {
      logger.warn("PayFort payment unsuccessful", log({ status: fields.status, responseCode: fields.response_code }));
      await this.audit(AuditActions.PAYMENT_UNSUCCESSFUL, order, {
        status: fields.status ?? null,
        response_code: fields.response_code ?? null,
        response_message: fields.response_message ?? null,
      });
      return { httpStatus: 200, result: "unsuccessful" };
    }

    const format = validateResponseFormat(fields);
    if (!format.ok) {
      logger.error("PayFort response validation failed", log({ missing: format.missing, invalid: format.invalid }));
      await this.audit(AuditActions.INVALID_RESPONSE_FORMAT, order, {
        missing: format.missing,
        invalid: format.invalid,
      });
      return { httpStatus: 200, result: "invalid_format" };
    }
    const callback = format.callback;

    if (order.status !== ORDER_STATUS.PROCESSING) {
      const existing = await this.store.findTransaction(PAYFORT_GATEWAY, callback.fortId);
      // A fort_id recorded against another order is not a redelivery for this one.
      if (existing?.orderId === order.id) {
        await this.audit(AuditActions.DUPLICATE_TRANSACTION, order, {
          transaction_id: callback.fortId,
          order_status: order.status,
        });
        logger.warn("Duplicate PayFort transaction ignored", log({ fortId: callback.fortId, orderStatus: order.status }));
        return { httpStatus: 200, result: "duplicate" };
      }
      await this.audit(AuditActions.RESPONSE_INVALID_ORDER, order, {
        order_status: order.status,
        required_order_status: ORDER_STATUS.PROCESSING,
      });
      logger.warn(
        `Order ${order.id} in invalid status: ${order.status} (expected: ${ORDER_STATUS.PROCESSING}).`,
        log({ orderStatus: order.status, requiredOrderStatus: ORDER_STATUS.PROCESSING })
      );
      return { httpStatus: 200, result: "invalid_order_state" };
    }

    logger.info(`Recording payment transaction for order ${order.id}.`, log({ fortId: callback.fortId }));
    const outcome = await applySettlement(this.store, {
      order,
      actorId: meta.actorId ?? null,
      gateway: PAYFORT_GATEWAY,
      status: callback.responseMessage,
      gatewayTransactionId: callback.fortId,
      method: callback.paymentOption,
      amount: this.processor.amountPolicy.fromGateway(callback.amount, callback.currency),
      currency: callback.currency,
      reason: callback.acquirerResponseMessage ?? callback.responseMessage,
      response: { ...callback.raw },
    });

    switch (outcome.kind) {
      case "duplicate":
        await this.audit(AuditActions.DUPLICATE_TRANSACTION, order, {
          transaction_id: callback.fortId,
          order_status: order.status,
        });
        logger.warn("Duplicate PayFort transaction ignored", log({ fortId: callback.fortId, orderStatus: order.status }));
        return { httpStatus: 200, result: "duplicate" };
      case "stale":
        await this.audit(AuditActions.RESPONSE_INVALID_ORDER, order, {
          transaction_id: callback.fortId,
          order_status: "changed",
          required_order_status: ORDER_STATUS.PROCESSING,
        });
        logger.warn("Order left processing before settlement committed", log({ fortId: callback.fortId }));
        return { httpStatus: 200, result: "stale" };
      case "failed":
        await this.audit(AuditActions.TRANSACTION_ROLLED_BACK, order, {
          transaction_id: callback.fortId,
          order_id: order.id,
          site_id: site.id,
        });
        logger.error(
          `Payment transaction failed and rolled back for order ${order.id}: ${outcome.error.message}`,
          log({ fortId: callback.fortId, error: outcome.error.message })
        );
        return { httpStatus: 200, result: "rolled_back" };
      case "committed":
        break;
    }

    const fulfillment = await fulfillSettledOrder(
      this.store,
      order.id,
      { site, requestId: meta.requestId },
      outcome.transaction
    );
    if (!fulfillment.ok) {
      const message = errorMessage(fulfillment.error);
      logger.error(`Failed to fulfill order ${order.id} or to create invoice: ${message}`, log({ error: message }));
      await this.audit(AuditActions.ORDER_FULFILLMENT_ERROR, order, {
        transaction_id: callback.fortId,
        error: message,
      });
      return { httpStatus: 200, result: "settled_unfulfilled" };
    }

    await this.audit(AuditActions.ORDER_FULFILLED, fulfillment.order, {
      invoice_number: fulfillment.invoice.invoiceNumber,
    });
    logger.info(
      `Successfully fulfilled order ${order.id} and created invoice ${fulfillment.invoice.id}.`,
      log({ invoiceId: fulfillment.invoice.id, invoiceNumber: fulfillment.invoice.invoiceNumber })
    );
    return { httpStatus: 200, result: "settled" };
  }

  /** Order for audit context on the browser path; a lookup failure only costs the reference. */
  private async orderForAudit(fields: CallbackFields, meta: CallbackMeta): Promise<Order | null> {
    try {
      const resolution = await resolveOrderFromReference(this.store, fields.merchant_reference);
      if (resolution.kind === "found") return resolution.value;
      await this.audit(AuditActions.RESPONSE_INVALID_ORDER, null, {
        order_status: "None",
        required_order_status: ORDER_STATUS.PROCESSING,
      });
      return null;
    } catch (err) {
      logger.error(
        "Order lookup failed while handling PayFort return",
        safePaymentLogContext({ requestId: meta.requestId, error: errorMessage(err) })
      );
      return null;
    }
  }

  private audit(action: AuditAction, order: Order | null, context: Record<string, unknown>): Promise<void> {
    return recordAuditSafely(this.store, {
      action,
      orderId: order?.id ?? null,
      gateway: PAYFORT_GATEWAY,
      context,
    });
  }
}
