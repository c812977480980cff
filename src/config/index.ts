import "dotenv/config";
import { z } from "zod";
import { AMOUNT_POLICIES, PAYFORT_LANGUAGES, SHA_METHODS } from "../modules/payfort/payfort.settings.js";

/** Reusable boolean env: true only for true / "true" / "1". Accepts string or boolean (test stability). */
export const envBool = z
  .union([z.string(), z.boolean()])
  .transform((v) => v === true || v === "true" || v === "1");

/** Optional boolean env; undefined when absent. */
const envBoolOptional = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform((v) =>
    v === undefined ? undefined : v === true || v === "true" || v === "1"
  );

/** Optional boolean env with default. */
const envBoolDefault = (d: boolean) =>
  z
    .union([z.string(), z.boolean()])
    .optional()
    .transform((v) =>
      v === undefined ? d : v === true || v === "true" || v === "1"
    )
    .default(d);

const postgresUrlSchema = z
  .string()
  .min(1, "DATABASE_URL is required")
  .refine(
    (s) => s.startsWith("postgresql://") || s.startsWith("postgres://"),
    "DATABASE_URL must be a PostgreSQL URL (postgresql:// or postgres://)"
  );

const requiredSecret = (name: string, hint: string) =>
  z
    .string({ required_error: `${name} is required (${hint}).` })
    .min(1, `${name} must not be empty`);

const pathSchema = (name: string, d: string) =>
  z
    .string()
    .default(d)
    .refine((s) => s.startsWith("/"), `${name} must be an absolute path (e.g. ${d})`);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(3000),
  DATABASE_URL: postgresUrlSchema,
  JWT_ACCESS_SECRET: z.string().min(16),
  JWT_ISSUER: z.string().min(1).default("payfort-gateway"),
  JWT_AUDIENCE: z.string().min(1).optional(),
  /** Cookie holding the access token when the caller is a browser page (wait page polling). */
  AUTH_COOKIE_NAME: z.string().min(1).default("access_token"),
  CORS_ORIGINS: z.string().default("*"),
  TRUST_PROXY: envBoolOptional,
  /** In production, when true (default), TRUST_PROXY must be set. Set to false only if app is not behind a proxy. */
  REQUIRE_TRUST_PROXY_IN_PROD: envBoolOptional,
  CALLBACK_BODY_LIMIT: z.string().default("64kb"),
  /** PSP callbacks: high threshold, the PSP must never be throttled into redelivery. */
  RATE_LIMIT_CALLBACK_WINDOW_MS: z.coerce.number().default(60 * 1000),
  RATE_LIMIT_CALLBACK_MAX: z.coerce.number().default(1000),
  /** Status poll: one wait page polls at most PAYFORT_WAIT_MAX_ATTEMPTS times. */
  RATE_LIMIT_STATUS_WINDOW_MS: z.coerce.number().default(60 * 1000),
  RATE_LIMIT_STATUS_MAX: z.coerce.number().default(120),
  LOG_STACK_IN_PROD: envBoolDefault(false),
  HEALTH_EXPOSE_ENV: envBoolDefault(false),
  /** Public origin of this service; the PSP return URL is built from it. */
  PUBLIC_BASE_URL: z
    .string({ required_error: "PUBLIC_BASE_URL is required (public origin used to build the PayFort return URL)." })
    .url("PUBLIC_BASE_URL must be a valid URL (e.g. https://shop.example.com)."),
  PAYFORT_ACCESS_CODE: requiredSecret("PAYFORT_ACCESS_CODE", "PayFort merchant portal → Integration settings"),
  PAYFORT_MERCHANT_IDENTIFIER: requiredSecret("PAYFORT_MERCHANT_IDENTIFIER", "PayFort merchant portal → Integration settings"),
  PAYFORT_REQUEST_SHA_PHRASE: requiredSecret("PAYFORT_REQUEST_SHA_PHRASE", "SHA request phrase"),
  PAYFORT_RESPONSE_SHA_PHRASE: requiredSecret("PAYFORT_RESPONSE_SHA_PHRASE", "SHA response phrase"),
  PAYFORT_SHA_METHOD: z.enum(SHA_METHODS, {
    required_error: "PAYFORT_SHA_METHOD is required (SHA-128, SHA-256 or SHA-512, as configured in the merchant portal).",
  }),
  PAYFORT_REDIRECT_URL: z
    .string({ required_error: "PAYFORT_REDIRECT_URL is required (PayFort payment page URL)." })
    .url("PAYFORT_REDIRECT_URL must be a valid URL."),
  PAYFORT_LANGUAGE: z.enum(PAYFORT_LANGUAGES).default("en"),
  /** truncate = integer part of the decimal total; minor_units = total scaled by the currency exponent. */
  PAYFORT_AMOUNT_POLICY: z.enum(AMOUNT_POLICIES).default("truncate"),
  PAYFORT_WAIT_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(24),
  PAYFORT_WAIT_TIME_MS: z.coerce.number().int().min(100).default(5000),
  PAYMENT_SUCCESS_PATH: pathSchema("PAYMENT_SUCCESS_PATH", "/payments/success"),
  PAYMENT_ERROR_PATH: pathSchema("PAYMENT_ERROR_PATH", "/payments/error"),
  INVOICE_PATH: pathSchema("INVOICE_PATH", "/payments/invoices"),
});

export type Config = z.infer<typeof envSchema>;

const SHA_PHRASE_MIN_LENGTH = 8;
const SHA_PHRASE_PLACEHOLDERS = ["changeme", "placeholder", "secret", "test", "your_sha_phrase"];

function fail(msg: string): never {
  console.error(msg);
  throw new Error(msg);
}

/** Rejects weak or placeholder SHA phrases in production. */
function validateShaPhraseForProd(name: string, phrase: string): void {
  const s = phrase.trim();
  if (s.length < SHA_PHRASE_MIN_LENGTH) {
    fail(`${name} must be at least ${SHA_PHRASE_MIN_LENGTH} characters in production.`);
  }
  const lower = s.toLowerCase();
  if (SHA_PHRASE_PLACEHOLDERS.some((p) => lower === p || lower.startsWith("test-"))) {
    fail(`${name} must be the real phrase from the PayFort merchant portal. Placeholder values are not allowed in production.`);
  }
}

/** Production-only checks; throws if invalid. Used by loadConfig and by tests. */
export function validateProductionConfig(data: Config): void {
  if (data.NODE_ENV !== "production") return;
  if (data.CORS_ORIGINS === "*") {
    fail("CORS_ORIGINS must not be * in production. Set explicit origins (e.g. CORS_ORIGINS=https://shop.example.com).");
  }
  if (data.JWT_ACCESS_SECRET.length < 32) {
    fail("JWT_ACCESS_SECRET must be at least 32 characters in production.");
  }
  const requireTrustProxy = data.REQUIRE_TRUST_PROXY_IN_PROD !== false;
  if (requireTrustProxy && data.TRUST_PROXY !== true) {
    fail(
      "TRUST_PROXY is required in production when the app is behind a reverse proxy (Nginx, Render, Fly). Set TRUST_PROXY=1, or REQUIRE_TRUST_PROXY_IN_PROD=false if not behind a proxy."
    );
  }
  if (data.PAYFORT_REQUEST_SHA_PHRASE === data.PAYFORT_RESPONSE_SHA_PHRASE) {
    fail("PAYFORT_REQUEST_SHA_PHRASE and PAYFORT_RESPONSE_SHA_PHRASE must differ in production.");
  }
  validateShaPhraseForProd("PAYFORT_REQUEST_SHA_PHRASE", data.PAYFORT_REQUEST_SHA_PHRASE);
  validateShaPhraseForProd("PAYFORT_RESPONSE_SHA_PHRASE", data.PAYFORT_RESPONSE_SHA_PHRASE);
  if (!data.PAYFORT_REDIRECT_URL.startsWith("https://")) {
    fail("PAYFORT_REDIRECT_URL must use https:// in production.");
  }
  if (!data.PUBLIC_BASE_URL.startsWith("https://")) {
    fail("PUBLIC_BASE_URL must use https:// in production.");
  }
}

function formatConfigError(parsed: z.SafeParseError<Record<string, unknown>>): string {
  const flat = parsed.error.flatten();
  const field = flat.fieldErrors && Object.keys(flat.fieldErrors).length > 0 ? Object.keys(flat.fieldErrors)[0] : null;
  const msg = field && flat.fieldErrors?.[field]?.[0];
  if (typeof msg === "string") return `${field}: ${msg}`;
  return "Invalid environment configuration. Check the variables listed above.";
}

function loadConfig(): Config {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const message = formatConfigError(parsed);
    console.error("Invalid environment config:", message);
    console.error("Details:", parsed.error.flatten());
    throw new Error(message);
  }
  const data = parsed.data;
  validateProductionConfig(data);
  return data;
}

export const config = loadConfig();

export function getCorsOrigins(): string[] | "*" {
  if (config.CORS_ORIGINS === "*") return "*";
  return config.CORS_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean);
}

export function getTrustProxy(): boolean {
  return config.TRUST_PROXY === true;
}
