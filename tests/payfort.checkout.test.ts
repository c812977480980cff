import { describe, it, expect } from "vitest";
import request from "supertest";
import { accessToken, seededStore, testApp } from "./helpers/fixtures.js";

describe("GET /payfort/checkout/:orderId", () => {
  it("requires authentication", async () => {
    const res = await request(testApp(seededStore())).get("/payfort/checkout/10");
    expect(res.status).toBe(401);
  });

  it("moves a pending order to processing and renders the signed redirect form", async () => {
    const store = seededStore({ status: "pending" });
    const res = await request(testApp(store))
      .get("/payfort/checkout/10")
      .set("Authorization", `Bearer ${accessToken()}`);

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^text\/html/);
    expect(res.text).toContain('action="https://checkout.payfort.test/FortAPI/paymentPage"');
    expect(res.text).toContain('<input type="hidden" name="merchant_reference" value="1-10">');
    expect(res.text).toContain('<input type="hidden" name="amount" value="150">');
    expect(res.text).toContain(
      '<input type="hidden" name="signature" value="c0842663414f2d876363bf808fc17559e1e4fec60736b3a928930f7fc30c1529">'
    );
    expect(res.text).not.toContain('name="payment_page_url"');
    expect(store.orders.get(10)?.status).toBe("processing");
    expect(store.audits).toEqual([
      {
        action: "redirect_to_payment_gateway",
        orderId: 10,
        gateway: "payfort",
        context: { merchant_reference: "1-10", amount: 150, currency: "SAR" },
      },
    ]);
  });

  it("allows the form to post to the payment page origin", async () => {
    const res = await request(testApp(seededStore()))
      .get("/payfort/checkout/10")
      .set("Authorization", `Bearer ${accessToken()}`);

    expect(res.headers["content-security-policy"]).toContain("form-action 'self' https://checkout.payfort.test");
  });

  it("hides orders of other users", async () => {
    const res = await request(testApp(seededStore()))
      .get("/payfort/checkout/10")
      .set("Authorization", `Bearer ${accessToken("user-2")}`);

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ error: "Order not found", code: "NOT_FOUND" });
  });

  it("returns 404 for a non-numeric order id", async () => {
    const res = await request(testApp(seededStore()))
      .get("/payfort/checkout/abc")
      .set("Authorization", `Bearer ${accessToken()}`);

    expect(res.status).toBe(404);
  });

  it("refuses an order that is already paid", async () => {
    const store = seededStore({ status: "paid" });
    const res = await request(testApp(store))
      .get("/payfort/checkout/10")
      .set("Authorization", `Bearer ${accessToken()}`);

    expect(res.status).toBe(409);
    expect(res.body).toMatchObject({ error: "Order is not payable in status: paid", code: "ORDER_NOT_PAYABLE" });
    expect(store.audits).toEqual([]);
  });
});
