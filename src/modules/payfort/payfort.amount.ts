import { currencyExponent, toMinorUnits, fromMinorUnits } from "../commerce/money.js";
import type { AmountPolicyName } from "./payfort.settings.js";

/** How a decimal order total maps to PayFort's integer `amount` and back. */
export interface AmountPolicy {
  readonly name: AmountPolicyName;
  toGateway(total: string, currency: string): number;
  fromGateway(amount: string, currency: string): string;
}

/** Integer part of the decimal total; the amount echoed back is taken as a whole-unit value. */
export const truncateAmountPolicy: AmountPolicy = {
  name: "truncate",
  toGateway(total) {
    return toMinorUnits(total, 0);
  },
  fromGateway(amount) {
    return fromMinorUnits(toMinorUnits(amount, 0), 0);
  },
};

export const minorUnitsAmountPolicy: AmountPolicy = {
  name: "minor_units",
  toGateway(total, currency) {
    return toMinorUnits(total, currencyExponent(currency));
  },
  fromGateway(amount, currency) {
    const exponent = currencyExponent(currency);
    return fromMinorUnits(toMinorUnits(amount, 0), exponent);
  },
};

export function amountPolicyFor(name: AmountPolicyName): AmountPolicy {
  return name === "minor_units" ? minorUnitsAmountPolicy : truncateAmountPolicy;
}
