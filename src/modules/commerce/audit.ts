import type { AuditEntry, CommerceStore } from "./commerce.types.js";
import { errorMessage, logger } from "../../lib/logger.js";
import { safePaymentLogContext } from "../../lib/logContext.js";

export const AuditActions = {
  REDIRECT_TO_PAYMENT: "redirect_to_payment_gateway",
  RECEIVED_RESPONSE: "received_gateway_response",
  BAD_RESPONSE_SIGNATURE: "bad_response_signature",
  PAYMENT_UNSUCCESSFUL: "payment_unsuccessful",
  INVALID_RESPONSE_FORMAT: "invalid_response_format",
  RESPONSE_INVALID_ORDER: "response_for_invalid_order",
  DUPLICATE_TRANSACTION: "duplicate_transaction_detected",
  TRANSACTION_ROLLED_BACK: "transaction_rolled_back",
  ORDER_FULFILLED: "order_fulfilled",
  ORDER_FULFILLMENT_ERROR: "order_fulfillment_error",
} as const;

export type AuditAction = (typeof AuditActions)[keyof typeof AuditActions];

/** Audit writes never decide the outcome of a callback: failures are logged and dropped. */
export async function recordAuditSafely(store: CommerceStore, entry: AuditEntry): Promise<void> {
  try {
    await store.recordAudit(entry);
  } catch (err) {
    logger.error(
      "Audit log write failed",
      safePaymentLogContext({
        action: entry.action,
        orderId: entry.orderId ?? undefined,
        gateway: entry.gateway,
        error: errorMessage(err),
      })
    );
  }
}
