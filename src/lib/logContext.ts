/**
 * Safe context for checkout/callback/settlement logs. Whitelist-only; no PII.
 * PayFort callbacks echo customer_email and card holder data, so the raw payload
 * is never logged: it is kept in the audit log only.
 */
const SAFE_PAYMENT_LOG_KEYS = new Set([
  "requestId",
  "orderId",
  "siteId",
  "userId",
  "merchantReference",
  "fortId",
  "transactionId",
  "invoiceId",
  "invoiceNumber",
  "gateway",
  "action",
  "status",
  "orderStatus",
  "requiredOrderStatus",
  "responseCode",
  "responseMessage",
  "paymentOption",
  "amount",
  "currency",
  "outcome",
  "reason",
  "missing",
  "invalid",
  "error",
  "errorCode",
  "metric",
  "count",
]);

/**
 * Returns a copy of ctx with only whitelisted keys and no value containing "@" (guards against email).
 * Undefined values are dropped so log lines stay compact.
 */
export function safePaymentLogContext(ctx: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(ctx).filter(([k, v]) => {
      if (!SAFE_PAYMENT_LOG_KEYS.has(k)) return false;
      if (v === undefined) return false;
      if (typeof v === "string" && v.includes("@")) return false;
      return true;
    })
  );
}
