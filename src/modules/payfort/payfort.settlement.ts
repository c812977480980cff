import type {
  CommerceStore,
  Invoice,
  InvoiceContext,
  Order,
  SettlementInput,
  TransactionRecord,
} from "../commerce/commerce.types.js";
import {
  DuplicateTransactionError,
  FulfillmentError,
  StaleOrderStateError,
} from "../commerce/commerce.errors.js";

export type SettlementOutcome =
  | { kind: "committed"; transaction: TransactionRecord }
  | { kind: "duplicate"; error: DuplicateTransactionError }
  | { kind: "stale"; error: StaleOrderStateError }
  | { kind: "failed"; error: Error };

/**
 * Records the transaction and flips processing → paid in one atomic step.
 * Never throws: every failure is one of the outcome variants, and nothing was written for any of them.
 */
export async function applySettlement(store: CommerceStore, input: SettlementInput): Promise<SettlementOutcome> {
  try {
    const transaction = await store.commitSettlement(input);
    return { kind: "committed", transaction };
  } catch (err) {
    if (err instanceof DuplicateTransactionError) return { kind: "duplicate", error: err };
    if (err instanceof StaleOrderStateError) return { kind: "stale", error: err };
    return { kind: "failed", error: err instanceof Error ? err : new Error(String(err)) };
  }
}

export type FulfillmentResult = { ok: true; order: Order; invoice: Invoice } | { ok: false; error: Error };

/**
 * Post-commit work on a fresh read of the order: invoice first, then fulfillment.
 * Runs outside the settlement transaction; a failure leaves the order paid and is returned, not thrown.
 */
export async function fulfillSettledOrder(
  store: CommerceStore,
  orderId: number,
  context: InvoiceContext,
  transaction: TransactionRecord
): Promise<FulfillmentResult> {
  try {
    const order = await store.resolveOrder(orderId);
    if (!order) throw new FulfillmentError(`Order ${orderId} not found after settlement`);
    const invoice = await store.createInvoice(order, context, transaction);
    await store.fulfill(order);
    return { ok: true, order, invoice };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err : new FulfillmentError(String(err)) };
  }
}
