import type { Order, Site } from "../commerce/commerce.types.js";
import { orderTotals } from "../commerce/money.js";
import { amountPolicyFor, type AmountPolicy } from "./payfort.amount.js";
import { formatMerchantReference } from "./payfort.reference.js";
import type { PayfortSettings } from "./payfort.settings.js";
import { SIGNATURE_FIELD, signFields, verifySignature, type SignableFields } from "./payfort.signature.js";
import type { CallbackFields } from "./payfort.validation.js";

export interface InitiationOptions {
  /** Overrides settings.returnUrl (e.g. per-site domains). */
  returnUrl?: string;
  /** Anti-forgery token of the rendering layer; posted along but never signed. */
  antiForgeryToken?: string;
}

/** Fields PayFort signs on the purchase request. */
export type PurchaseRequestFields = {
  command: "PURCHASE";
  access_code: string;
  merchant_identifier: string;
  merchant_reference: string;
  customer_email: string;
  return_url: string;
  language: string;
  amount: number;
  currency: string;
  order_description: string;
};

export type InitiationParams = PurchaseRequestFields & {
  signature: string;
  payment_page_url: string;
  csrf_token?: string;
};

/**
 * PayFort payment-page processor: builds the signed purchase form and checks response signatures.
 * Reads the order and settings only; moving the order to processing is the caller's job.
 */
export class PayfortProcessor {
  readonly amountPolicy: AmountPolicy;

  constructor(private readonly settings: PayfortSettings) {
    this.amountPolicy = amountPolicyFor(settings.amountPolicy);
  }

  purchaseFields(order: Order, site: Site, returnUrl: string = this.settings.returnUrl): PurchaseRequestFields {
    return {
      command: "PURCHASE",
      access_code: this.settings.accessCode,
      merchant_identifier: this.settings.merchantIdentifier,
      merchant_reference: formatMerchantReference(site.id, order.id),
      customer_email: order.customerEmail,
      return_url: returnUrl,
      language: this.settings.language,
      amount: this.amountPolicy.toGateway(orderTotals(order).total, order.currency),
      currency: order.currency,
      order_description: order.description ?? `Order ${order.id}`,
    };
  }

  buildInitiationParams(order: Order, site: Site, options: InitiationOptions = {}): InitiationParams {
    const fields = this.purchaseFields(order, site, options.returnUrl);
    const params: InitiationParams = {
      ...fields,
      signature: this.generateSignature(fields),
      payment_page_url: this.settings.redirectUrl,
    };
    if (options.antiForgeryToken) params.csrf_token = options.antiForgeryToken;
    return params;
  }

  /** Request phrase unless another is given. */
  generateSignature(params: SignableFields, phrase: string = this.settings.requestShaPhrase): string {
    return signFields(phrase, this.settings.shaMethod, params);
  }

  verifyResponseSignature(fields: CallbackFields): boolean {
    return verifySignature(
      this.settings.responseShaPhrase,
      this.settings.shaMethod,
      fields,
      fields[SIGNATURE_FIELD]
    );
  }
}
