import { ORDER_STATUS, type CommerceStore } from "../commerce/commerce.types.js";
import { AuditActions, recordAuditSafely } from "../commerce/audit.js";
import { logger } from "../../lib/logger.js";
import { safePaymentLogContext } from "../../lib/logContext.js";
import { resolveOrderFromReference } from "./payfort.reference.js";
import { PAYFORT_GATEWAY, type PayfortSettings } from "./payfort.settings.js";
import { MISSING_FIELD, fieldsWithIssue, statusQuerySchema, type StatusQuery } from "./payfort.validation.js";

export type StatusBody = { invoice: string; invoice_url: string } | { error: string };

export interface StatusResult {
  statusCode: 200 | 204 | 400 | 404;
  body?: StatusBody;
}

/** "merchant_reference" → "Merchant Reference". */
function fieldLabel(names: readonly string[]): string {
  return names
    .join(", ")
    .replace(/_/g, " ")
    .replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export async function checkPaymentStatus(
  store: CommerceStore,
  settings: PayfortSettings,
  query: StatusQuery,
  meta: { requestId?: string } = {}
): Promise<StatusResult> {
  const parsed = statusQuerySchema.safeParse(query);
  if (!parsed.success) {
    const missing = fieldsWithIssue(parsed.error, MISSING_FIELD);
    const error = `${fieldLabel(missing)} is required to verify payment status.`;
    logger.error(error, safePaymentLogContext({ requestId: meta.requestId, missing }));
    return { statusCode: 400, body: { error } };
  }
  const { transaction_id: transactionId, merchant_reference: merchantReference } = parsed.data;

  const resolution = await resolveOrderFromReference(store, merchantReference);
  if (resolution.kind !== "found") {
    await recordAuditSafely(store, {
      action: AuditActions.RESPONSE_INVALID_ORDER,
      orderId: null,
      gateway: PAYFORT_GATEWAY,
      context: { order_status: "None", required_order_status: ORDER_STATUS.PROCESSING },
    });
    return {
      statusCode: 404,
      body: { error: `merchant_reference: ${merchantReference} is invalid. Unable to retrieve order.` },
    };
  }

  const order = resolution.value;
  if (order.status === ORDER_STATUS.PROCESSING) return { statusCode: 204 };

  if (order.status === ORDER_STATUS.PAID) {
    const invoice = await store.findPaidInvoice(order.id, transactionId);
    if (invoice) {
      return {
        statusCode: 200,
        body: {
          invoice: invoice.invoiceNumber,
          invoice_url: `${settings.invoicePath}/${encodeURIComponent(invoice.invoiceNumber)}/`,
        },
      };
    }
    logger.error(
      "Order is paid, unable to retrieve invoice with given transaction id",
      safePaymentLogContext({ requestId: meta.requestId, orderId: order.id, transactionId })
    );
    return { statusCode: 204 };
  }

  return { statusCode: 404, body: { error: `order is in status: ${order.status}.` } };
}
