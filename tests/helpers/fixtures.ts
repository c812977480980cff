import jwt from "jsonwebtoken";
import { config } from "../../src/config/index.js";
import { createApp } from "../../src/app.js";
import type { Order, OrderItem, Site } from "../../src/modules/commerce/commerce.types.js";
import { createPayfortSettings, type PayfortSettings } from "../../src/modules/payfort/payfort.settings.js";
import { signFields } from "../../src/modules/payfort/payfort.signature.js";
import { MemoryCommerceStore } from "./memoryStore.js";

export const REQUEST_PHRASE = "test-request-phrase";
export const RESPONSE_PHRASE = "test-response-phrase";
export const FORT_ID = "169996200024";

export const testSettings: PayfortSettings = createPayfortSettings({
  accessCode: "test-access-code",
  merchantIdentifier: "test-merchant",
  requestShaPhrase: REQUEST_PHRASE,
  responseShaPhrase: RESPONSE_PHRASE,
  shaMethod: "SHA-256",
  redirectUrl: "https://checkout.payfort.test/FortAPI/paymentPage",
  baseUrl: "https://shop.example.com",
});

export function testSite(overrides: Partial<Site> = {}): Site {
  return { id: 1, name: "Main shop", domain: "shop.example.com", invoicePrefix: "INV", ...overrides };
}

export function testItem(overrides: Partial<OrderItem> = {}): OrderItem {
  return {
    id: 1,
    sku: "COURSE-101",
    itemType: "paid_course",
    title: "Intro course",
    originalPrice: "200.00",
    discountAmount: "50.00",
    taxAmount: "0.75",
    finalPrice: "150.75",
    fulfilledAt: null,
    ...overrides,
  };
}

export function testOrder(overrides: Partial<Order> = {}): Order {
  return {
    id: 10,
    siteId: 1,
    userId: "user-1",
    customerEmail: "buyer@example.com",
    status: "processing",
    currency: "SAR",
    description: null,
    items: [testItem()],
    fulfilledAt: null,
    ...overrides,
  };
}

/** Site 1 with order 10 (processing, owned by user-1). */
export function seededStore(order: Partial<Order> = {}): MemoryCommerceStore {
  return new MemoryCommerceStore().addSite(testSite()).addOrder(testOrder(order));
}

/** A successful PayFort callback for order 10, signed with the response phrase unless fields override it. */
export function signedCallback(
  overrides: Record<string, string> = {},
  phrase: string = RESPONSE_PHRASE
): Record<string, string> {
  const fields: Record<string, string> = {
    command: "PURCHASE",
    fort_id: FORT_ID,
    status: "14",
    response_code: "14000",
    response_message: "Success",
    acquirer_response_message: "Approved",
    payment_option: "VISA",
    amount: "150",
    currency: "SAR",
    merchant_reference: "1-10",
    customer_email: "buyer@example.com",
    language: "en",
    ...overrides,
  };
  return { ...fields, signature: signFields(phrase, "SHA-256", fields) };
}

export function accessToken(sub: string = "user-1"): string {
  return jwt.sign({ sub, role: "customer" }, config.JWT_ACCESS_SECRET, {
    expiresIn: "15m",
    issuer: config.JWT_ISSUER,
  });
}

export function testApp(store: MemoryCommerceStore, settings: PayfortSettings = testSettings) {
  return createApp({ store, settings });
}
