/**
 * Retry invoice creation and fulfillment for one paid order (ops only, not exposed as route).
 * Use when the feedback log shows "Failed to fulfill order X or to create invoice".
 * Settlement is never touched: the order must already be paid with a recorded transaction.
 *
 * Usage: ORDER_ID=42 npx tsx src/scripts/reconcileFulfillment.ts
 *    or: npx tsx src/scripts/reconcileFulfillment.ts 42
 *
 * Safe logs only (orderId, invoiceNumber, outcome); no PII.
 */
import "dotenv/config";
import { fileURLToPath } from "node:url";
import { ORDER_STATUS, type CommerceStore } from "../modules/commerce/commerce.types.js";
import { AuditActions, recordAuditSafely } from "../modules/commerce/audit.js";
import { PAYFORT_GATEWAY } from "../modules/payfort/payfort.settings.js";

export type ReconcileOutcome =
  | { outcome: "order_not_found" }
  | { outcome: "not_paid"; status: string }
  | { outcome: "no_transaction" }
  | { outcome: "already_fulfilled"; invoiceNumber: string }
  | { outcome: "fulfilled"; invoiceNumber: string };

/** argv[2] wins over ORDER_ID; undefined when neither is a decimal id. */
export function parseOrderId(argv: string[], env: NodeJS.ProcessEnv = process.env): number | undefined {
  const raw = (argv[2] ?? env.ORDER_ID ?? "").trim();
  if (!/^\d+$/.test(raw)) return undefined;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : undefined;
}

export async function reconcileFulfillment(store: CommerceStore, orderId: number): Promise<ReconcileOutcome> {
  const order = await store.resolveOrder(orderId);
  if (!order) return { outcome: "order_not_found" };
  if (order.status !== ORDER_STATUS.PAID) return { outcome: "not_paid", status: order.status };

  const transactions = await store.findTransactionsForOrder(order.id);
  const transaction = transactions[transactions.length - 1];
  if (!transaction) return { outcome: "no_transaction" };

  const site = await store.resolveSite(order.siteId);
  if (!site) throw new Error(`Site ${order.siteId} not found for order ${order.id}`);

  const invoice =
    (await store.findInvoiceForOrder(order.id)) ?? (await store.createInvoice(order, { site }, transaction));
  if (order.fulfilledAt) return { outcome: "already_fulfilled", invoiceNumber: invoice.invoiceNumber };

  await store.fulfill(order);
  await recordAuditSafely(store, {
    action: AuditActions.ORDER_FULFILLED,
    orderId: order.id,
    gateway: PAYFORT_GATEWAY,
    context: { invoice_number: invoice.invoiceNumber, reconciled: true },
  });
  return { outcome: "fulfilled", invoiceNumber: invoice.invoiceNumber };
}

async function main(): Promise<void> {
  const orderId = parseOrderId(process.argv);
  if (orderId === undefined) {
    console.error("Usage: ORDER_ID=42 npx tsx src/scripts/reconcileFulfillment.ts   OR   npx tsx src/scripts/reconcileFulfillment.ts <orderId>");
    process.exit(1);
  }

  const { db, pool } = await import("../lib/db.js");
  const { createCommerceRepository } = await import("../modules/commerce/commerce.repository.js");
  try {
    const result = await reconcileFulfillment(createCommerceRepository(db), orderId);
    console.info("Reconcile fulfillment", { orderId, ...result });
  } finally {
    await pool.end();
  }
}

const isMainModule =
  typeof process.argv[1] === "string" &&
  process.argv[1] === fileURLToPath(import.meta.url);
if (isMainModule) {
  main().catch((e: unknown) => {
    console.error("Reconcile fulfillment failed", e instanceof Error ? e.message : String(e));
    process.exit(1);
  });
}
