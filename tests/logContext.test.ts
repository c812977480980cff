import { describe, it, expect } from "vitest";
import { safePaymentLogContext } from "../src/lib/logContext.js";

describe("safePaymentLogContext", () => {
  it("returns only whitelisted keys and strips unknown keys (e.g. email, raw payload)", () => {
    const out = safePaymentLogContext({
      orderId: 10,
      merchantReference: "1-10",
      customer_email: "buyer@example.com",
      data: { card_holder_name: "Jane Doe" },
    });
    expect(out).toEqual({ orderId: 10, merchantReference: "1-10" });
  });

  it("never includes a value containing '@'", () => {
    const out = safePaymentLogContext({
      requestId: "req-1",
      reason: "buyer@example.com",
      responseMessage: "Success",
    });
    expect(out).toEqual({ requestId: "req-1", responseMessage: "Success" });
  });

  it("drops undefined values", () => {
    expect(safePaymentLogContext({ requestId: undefined, fortId: "169996200024", missing: [] })).toEqual({
      fortId: "169996200024",
      missing: [],
    });
  });
});
