import { ORDER_STATUS, type Order } from "./commerce.types.js";
import { FulfillmentError } from "./commerce.errors.js";

export const FULFILLABLE_ITEM_TYPES: ReadonlySet<string> = new Set(["paid_course", "digital_download", "service"]);

/** Throws FulfillmentError unless every item can be handed over and the order is paid. */
export function assertFulfillable(order: Order): void {
  if (order.status !== ORDER_STATUS.PAID) {
    throw new FulfillmentError(`Order ${order.id} is not paid (status: ${order.status})`);
  }
  const unsupported = order.items.find((item) => !FULFILLABLE_ITEM_TYPES.has(item.itemType));
  if (unsupported) {
    throw new FulfillmentError(`Unsupported catalogue item type: ${unsupported.itemType}`);
  }
}
