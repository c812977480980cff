import type { CommerceStore, Order, Site } from "../commerce/commerce.types.js";

export interface MerchantReference {
  siteId: number;
  orderId: number;
}

export type ParsedReference = { kind: "parsed"; reference: MerchantReference } | { kind: "malformed" };

export type Resolution<T> = { kind: "found"; value: T } | { kind: "not_found" } | { kind: "malformed" };

const ID_TOKEN = /^\d+$/;

export function formatMerchantReference(siteId: number, orderId: number): string {
  return `${siteId}-${orderId}`;
}

function parseId(token: string): number | undefined {
  if (!ID_TOKEN.test(token)) return undefined;
  const id = Number(token);
  return Number.isSafeInteger(id) ? id : undefined;
}

/** Splits on the first "-"; both halves must be decimal ids. */
export function parseMerchantReference(ref: string | undefined): ParsedReference {
  if (!ref) return { kind: "malformed" };
  const separator = ref.indexOf("-");
  if (separator === -1) return { kind: "malformed" };
  const siteId = parseId(ref.slice(0, separator));
  const orderId = parseId(ref.slice(separator + 1));
  if (siteId === undefined || orderId === undefined) return { kind: "malformed" };
  return { kind: "parsed", reference: { siteId, orderId } };
}

export async function resolveOrderFromReference(
  store: CommerceStore,
  ref: string | undefined
): Promise<Resolution<Order>> {
  const parsed = parseMerchantReference(ref);
  if (parsed.kind === "malformed") return parsed;
  const order = await store.resolveOrder(parsed.reference.orderId);
  return order ? { kind: "found", value: order } : { kind: "not_found" };
}

export async function resolveSiteFromReference(
  store: CommerceStore,
  ref: string | undefined
): Promise<Resolution<Site>> {
  const parsed = parseMerchantReference(ref);
  if (parsed.kind === "malformed") return parsed;
  const site = await store.resolveSite(parsed.reference.siteId);
  return site ? { kind: "found", value: site } : { kind: "not_found" };
}
