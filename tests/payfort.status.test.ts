import { describe, it, expect, vi, afterEach } from "vitest";
import request from "supertest";
import { logger } from "../src/lib/logger.js";
import { PayfortCallbackHandler } from "../src/modules/payfort/payfort.callbacks.js";
import { accessToken, FORT_ID, seededStore, signedCallback, testApp, testSettings } from "./helpers/fixtures.js";
import type { MemoryCommerceStore } from "./helpers/memoryStore.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function poll(store: MemoryCommerceStore, query: Record<string, string>) {
  return request(testApp(store))
    .get("/payfort/status/")
    .query(query)
    .set("Authorization", `Bearer ${accessToken()}`);
}

describe("GET /payfort/status/", () => {
  it("requires authentication", async () => {
    const res = await request(testApp(seededStore()))
      .get("/payfort/status/")
      .query({ transaction_id: FORT_ID, merchant_reference: "1-10" });

    expect(res.status).toBe(401);
    expect(res.body).toMatchObject({ error: "Unauthorized", code: "UNAUTHORIZED" });
  });

  it("accepts the access token from the auth cookie", async () => {
    const res = await request(testApp(seededStore()))
      .get("/payfort/status/")
      .query({ transaction_id: FORT_ID, merchant_reference: "1-10" })
      .set("Cookie", `access_token=${accessToken()}`);

    expect(res.status).toBe(204);
  });

  it("returns 400 naming the missing parameters", async () => {
    vi.spyOn(logger, "error").mockImplementation(() => {});
    const store = seededStore();

    const none = await poll(store, {});
    expect(none.status).toBe(400);
    expect(none.body).toEqual({
      error: "Transaction Id, Merchant Reference is required to verify payment status.",
    });

    const noReference = await poll(store, { transaction_id: FORT_ID });
    expect(noReference.body).toEqual({ error: "Merchant Reference is required to verify payment status." });
  });

  it("returns 404 and audits an unresolvable reference", async () => {
    const store = seededStore();
    const res = await poll(store, { transaction_id: FORT_ID, merchant_reference: "1-99999" });

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "merchant_reference: 1-99999 is invalid. Unable to retrieve order." });
    expect(store.auditActions()).toEqual(["response_for_invalid_order"]);
  });

  it("returns 204 while the order is processing", async () => {
    const res = await poll(seededStore(), { transaction_id: FORT_ID, merchant_reference: "1-10" });
    expect(res.status).toBe(204);
    expect(res.text).toBe("");
  });

  it("returns the invoice once the order is settled", async () => {
    const store = seededStore();
    await new PayfortCallbackHandler(testSettings, store).handleFeedback(signedCallback());
    const res = await poll(store, { transaction_id: FORT_ID, merchant_reference: "1-10" });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ invoice: "INV-000010", invoice_url: "/payments/invoices/INV-000010/" });
  });

  it("returns 204 for a paid order without an invoice for that transaction", async () => {
    vi.spyOn(logger, "error").mockImplementation(() => {});
    const store = seededStore();
    await new PayfortCallbackHandler(testSettings, store).handleFeedback(signedCallback());
    const res = await poll(store, { transaction_id: "999", merchant_reference: "1-10" });

    expect(res.status).toBe(204);
  });

  it("returns 404 for any other order status", async () => {
    const res = await poll(seededStore({ status: "pending" }), {
      transaction_id: FORT_ID,
      merchant_reference: "1-10",
    });

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "order is in status: pending." });
  });
});
