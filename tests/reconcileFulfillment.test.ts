import { describe, it, expect } from "vitest";
import { parseOrderId, reconcileFulfillment } from "../src/scripts/reconcileFulfillment.js";
import { PayfortCallbackHandler } from "../src/modules/payfort/payfort.callbacks.js";
import { seededStore, signedCallback, testSettings } from "./helpers/fixtures.js";

describe("parseOrderId", () => {
  it("prefers the CLI argument over ORDER_ID", () => {
    expect(parseOrderId(["node", "script", "42"], { ORDER_ID: "7" })).toBe(42);
    expect(parseOrderId(["node", "script"], { ORDER_ID: " 7 " })).toBe(7);
  });

  it("rejects anything but a decimal id", () => {
    expect(parseOrderId(["node", "script", "order_1"], {})).toBeUndefined();
    expect(parseOrderId(["node", "script"], {})).toBeUndefined();
  });
});

describe("reconcileFulfillment", () => {
  it("is a no-op for unknown, unpaid or transaction-less orders", async () => {
    expect(await reconcileFulfillment(seededStore(), 99)).toEqual({ outcome: "order_not_found" });
    expect(await reconcileFulfillment(seededStore(), 10)).toEqual({ outcome: "not_paid", status: "processing" });
    expect(await reconcileFulfillment(seededStore({ status: "paid" }), 10)).toEqual({ outcome: "no_transaction" });
  });

  it("fulfills an order whose post-settlement step failed", async () => {
    const store = seededStore();
    store.fulfillmentError = new Error("Unexpected error during enrollment");
    await new PayfortCallbackHandler(testSettings, store).handleFeedback(signedCallback());
    expect(store.fulfilledOrderIds).toEqual([]);

    store.fulfillmentError = null;
    const result = await reconcileFulfillment(store, 10);

    expect(result).toEqual({ outcome: "fulfilled", invoiceNumber: "INV-000010" });
    expect(store.fulfilledOrderIds).toEqual([10]);
    expect(store.invoices).toHaveLength(1);
    expect(store.audits.at(-1)).toEqual({
      action: "order_fulfilled",
      orderId: 10,
      gateway: "payfort",
      context: { invoice_number: "INV-000010", reconciled: true },
    });
  });

  it("does not fulfill twice", async () => {
    const store = seededStore();
    await new PayfortCallbackHandler(testSettings, store).handleFeedback(signedCallback());
    const result = await reconcileFulfillment(store, 10);

    expect(result).toEqual({ outcome: "already_fulfilled", invoiceNumber: "INV-000010" });
    expect(store.fulfilledOrderIds).toEqual([10]);
  });
});
