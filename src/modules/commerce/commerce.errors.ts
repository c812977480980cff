export class DuplicateTransactionError extends Error {
  constructor(
    public readonly gateway: string,
    public readonly gatewayTransactionId: string
  ) {
    super(`Transaction ${gatewayTransactionId} already recorded for gateway ${gateway}`);
    this.name = "DuplicateTransactionError";
  }
}

export class StaleOrderStateError extends Error {
  constructor(
    public readonly orderId: number,
    public readonly expectedStatus: string
  ) {
    super(`Order ${orderId} is no longer ${expectedStatus}`);
    this.name = "StaleOrderStateError";
  }
}

export class FulfillmentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FulfillmentError";
  }
}
