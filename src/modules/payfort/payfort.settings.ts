import { z } from "zod";
import type { Config } from "../../config/index.js";

export const PAYFORT_GATEWAY = "payfort";
/** `status` value PayFort sends for a captured purchase. */
export const PAYFORT_SUCCESS_STATUS = "14";
export const PAYFORT_ROUTE_PREFIX = "/payfort";
export const PAYFORT_STATUS_PATH = `${PAYFORT_ROUTE_PREFIX}/status/`;

export const SHA_METHODS = ["SHA-128", "SHA-256", "SHA-512"] as const;
export type ShaMethod = (typeof SHA_METHODS)[number];

export const PAYFORT_LANGUAGES = ["en", "ar"] as const;

export const AMOUNT_POLICIES = ["truncate", "minor_units"] as const;
export type AmountPolicyName = (typeof AMOUNT_POLICIES)[number];

const required = (name: string) => z.string({ required_error: `${name} is required` }).min(1, `${name} is required`);

const pathSetting = (d: string) =>
  z
    .string()
    .default(d)
    .refine((s) => s.startsWith("/"), "must be an absolute path");

const settingsSchema = z.object({
  accessCode: required("accessCode"),
  merchantIdentifier: required("merchantIdentifier"),
  requestShaPhrase: required("requestShaPhrase"),
  responseShaPhrase: required("responseShaPhrase"),
  shaMethod: z.enum(SHA_METHODS, { required_error: "shaMethod is required" }),
  redirectUrl: required("redirectUrl").url("redirectUrl must be a valid URL"),
  baseUrl: required("baseUrl").url("baseUrl must be a valid URL"),
  language: z.enum(PAYFORT_LANGUAGES).default("en"),
  amountPolicy: z.enum(AMOUNT_POLICIES).default("truncate"),
  waitMaxAttempts: z.number().int().min(1).default(24),
  waitTimeMs: z.number().int().min(100).default(5000),
  successPath: pathSetting("/payments/success"),
  errorPath: pathSetting("/payments/error"),
  invoicePath: pathSetting("/payments/invoices"),
});

export type PayfortSettingsInput = z.input<typeof settingsSchema>;

export type PayfortSettings = Readonly<
  z.output<typeof settingsSchema> & {
    /** Absolute URL PayFort posts the browser back to. */
    returnUrl: string;
    /** Origin of the payment page; allowed in the CSP form-action. */
    paymentPageOrigin: string;
  }
>;

/** Validates eagerly; a missing credential is a startup error, never a per-request one. */
export function createPayfortSettings(input: PayfortSettingsInput): PayfortSettings {
  const parsed = settingsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".")}: ${issue.message}` : parsed.error.message;
    throw new Error(`Invalid PayFort settings: ${detail}`);
  }
  const data = parsed.data;
  return Object.freeze({
    ...data,
    returnUrl: new URL(`${PAYFORT_ROUTE_PREFIX}/return/`, data.baseUrl).toString(),
    paymentPageOrigin: new URL(data.redirectUrl).origin,
  });
}

export function payfortSettingsFromConfig(cfg: Config): PayfortSettings {
  return createPayfortSettings({
    accessCode: cfg.PAYFORT_ACCESS_CODE,
    merchantIdentifier: cfg.PAYFORT_MERCHANT_IDENTIFIER,
    requestShaPhrase: cfg.PAYFORT_REQUEST_SHA_PHRASE,
    responseShaPhrase: cfg.PAYFORT_RESPONSE_SHA_PHRASE,
    shaMethod: cfg.PAYFORT_SHA_METHOD,
    redirectUrl: cfg.PAYFORT_REDIRECT_URL,
    baseUrl: cfg.PUBLIC_BASE_URL,
    language: cfg.PAYFORT_LANGUAGE,
    amountPolicy: cfg.PAYFORT_AMOUNT_POLICY,
    waitMaxAttempts: cfg.PAYFORT_WAIT_MAX_ATTEMPTS,
    waitTimeMs: cfg.PAYFORT_WAIT_TIME_MS,
    successPath: cfg.PAYMENT_SUCCESS_PATH,
    errorPath: cfg.PAYMENT_ERROR_PATH,
    invoicePath: cfg.INVOICE_PATH,
  });
}
