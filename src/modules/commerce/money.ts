import type { Order } from "./commerce.types.js";

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?$/;

/** ISO 4217 exponents that differ from 2. */
const CURRENCY_EXPONENTS: Record<string, number> = {
  BHD: 3,
  IQD: 3,
  JOD: 3,
  KWD: 3,
  LYD: 3,
  OMR: 3,
  TND: 3,
  CLP: 0,
  ISK: 0,
  JPY: 0,
  KRW: 0,
  UGX: 0,
  VND: 0,
  XAF: 0,
  XOF: 0,
};

export const DEFAULT_MONEY_SCALE = 2;

export function currencyExponent(currency: string): number {
  return CURRENCY_EXPONENTS[currency.toUpperCase()] ?? DEFAULT_MONEY_SCALE;
}

/** Scales a decimal string to an integer; digits beyond the exponent are truncated. */
export function toMinorUnits(value: string, exponent: number): number {
  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) throw new Error(`Invalid decimal amount: ${value}`);
  const [, sign, whole, fraction = ""] = match;
  const units = Number.parseInt(`${whole}${fraction.padEnd(exponent, "0").slice(0, exponent)}`, 10);
  return sign ? -units : units;
}

export function fromMinorUnits(units: number, exponent: number): string {
  const digits = String(Math.abs(units)).padStart(exponent + 1, "0");
  const whole = digits.slice(0, digits.length - exponent);
  const fraction = digits.slice(digits.length - exponent);
  return `${units < 0 ? "-" : ""}${whole}${exponent > 0 ? `.${fraction}` : ""}`;
}

export function sumAmounts(values: readonly string[], scale: number = DEFAULT_MONEY_SCALE): string {
  return fromMinorUnits(
    values.reduce((acc, v) => acc + toMinorUnits(v, scale), 0),
    scale
  );
}

export interface OrderTotals {
  grossTotal: string;
  discountTotal: string;
  taxTotal: string;
  total: string;
}

/** Aggregates are derived from the line items on every read, at the currency's exponent. */
export function orderTotals(order: Pick<Order, "items" | "currency">): OrderTotals {
  const scale = currencyExponent(order.currency);
  return {
    grossTotal: sumAmounts(order.items.map((i) => i.originalPrice), scale),
    discountTotal: sumAmounts(order.items.map((i) => i.discountAmount), scale),
    taxTotal: sumAmounts(order.items.map((i) => i.taxAmount), scale),
    total: sumAmounts(order.items.map((i) => i.finalPrice), scale),
  };
}

export function formatInvoiceNumber(prefix: string, orderId: number): string {
  return `${prefix}-${String(orderId).padStart(6, "0")}`;
}
