import { describe, it, expect, vi, afterEach } from "vitest";
import { config, envBool, validateProductionConfig, type Config } from "../src/config/index.js";
import {
  AMOUNT_POLICIES,
  PAYFORT_LANGUAGES,
  SHA_METHODS,
  payfortSettingsFromConfig,
} from "../src/modules/payfort/payfort.settings.js";

describe("config envBool", () => {
  it("parses true, 'true', '1' as true", () => {
    expect(envBool.parse(true)).toBe(true);
    expect(envBool.parse("true")).toBe(true);
    expect(envBool.parse("1")).toBe(true);
  });

  it("parses false, 'false', and other strings as false", () => {
    expect(envBool.parse(false)).toBe(false);
    expect(envBool.parse("false")).toBe(false);
    expect(envBool.parse("0")).toBe(false);
  });
});

describe("loaded test config", () => {
  it("applies PayFort defaults", () => {
    expect(config.PAYFORT_LANGUAGE).toBe("en");
    expect(config.PAYFORT_AMOUNT_POLICY).toBe("truncate");
    expect(config.PAYFORT_WAIT_MAX_ATTEMPTS).toBe(24);
    expect(config.PAYFORT_WAIT_TIME_MS).toBe(5000);
    expect(config.INVOICE_PATH).toBe("/payments/invoices");
  });

  it("accepts every SHA method, language and amount policy the env allows", () => {
    for (const method of SHA_METHODS) {
      expect(payfortSettingsFromConfig({ ...config, PAYFORT_SHA_METHOD: method }).shaMethod).toBe(method);
    }
    for (const language of PAYFORT_LANGUAGES) {
      expect(payfortSettingsFromConfig({ ...config, PAYFORT_LANGUAGE: language }).language).toBe(language);
    }
    for (const policy of AMOUNT_POLICIES) {
      expect(payfortSettingsFromConfig({ ...config, PAYFORT_AMOUNT_POLICY: policy }).amountPolicy).toBe(policy);
    }
  });
});

describe("validateProductionConfig", () => {
  const baseProdConfig: Config = {
    ...config,
    NODE_ENV: "production",
    CORS_ORIGINS: "https://shop.example.com",
    JWT_ACCESS_SECRET: "a".repeat(32),
    TRUST_PROXY: true,
    REQUIRE_TRUST_PROXY_IN_PROD: undefined,
    PAYFORT_REQUEST_SHA_PHRASE: "request-phrase-placeholder-value",
    PAYFORT_RESPONSE_SHA_PHRASE: "response-phrase-placeholder-value",
    PAYFORT_REDIRECT_URL: "https://checkout.payfort.test/FortAPI/paymentPage",
    PUBLIC_BASE_URL: "https://shop.example.com",
  };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function check(overrides: Partial<Config>): () => void {
    vi.spyOn(console, "error").mockImplementation(() => {});
    return () => validateProductionConfig({ ...baseProdConfig, ...overrides });
  }

  it("does not throw for a complete production config", () => {
    expect(check({})).not.toThrow();
  });

  it("does nothing outside production", () => {
    expect(check({ NODE_ENV: "development", CORS_ORIGINS: "*", JWT_ACCESS_SECRET: "short" })).not.toThrow();
  });

  it("throws in production when CORS_ORIGINS is *", () => {
    expect(check({ CORS_ORIGINS: "*" })).toThrow("CORS_ORIGINS must not be * in production.");
  });

  it("throws in production when JWT_ACCESS_SECRET is shorter than 32 characters", () => {
    expect(check({ JWT_ACCESS_SECRET: "short-secret-16c" })).toThrow(
      "JWT_ACCESS_SECRET must be at least 32 characters in production."
    );
  });

  it("throws in production when TRUST_PROXY is not set and REQUIRE_TRUST_PROXY_IN_PROD is not false", () => {
    expect(check({ TRUST_PROXY: undefined })).toThrow("TRUST_PROXY is required in production");
    expect(check({ TRUST_PROXY: false, REQUIRE_TRUST_PROXY_IN_PROD: true })).toThrow("TRUST_PROXY is required in production");
  });

  it("does not throw in production when REQUIRE_TRUST_PROXY_IN_PROD is false (no proxy)", () => {
    expect(check({ TRUST_PROXY: undefined, REQUIRE_TRUST_PROXY_IN_PROD: false })).not.toThrow();
  });

  it("throws when request and response SHA phrases are equal", () => {
    expect(
      check({ PAYFORT_REQUEST_SHA_PHRASE: "same-phrase-value", PAYFORT_RESPONSE_SHA_PHRASE: "same-phrase-value" })
    ).toThrow("PAYFORT_REQUEST_SHA_PHRASE and PAYFORT_RESPONSE_SHA_PHRASE must differ in production.");
  });

  it("throws for short or placeholder SHA phrases", () => {
    expect(check({ PAYFORT_REQUEST_SHA_PHRASE: "abc" })).toThrow(
      "PAYFORT_REQUEST_SHA_PHRASE must be at least 8 characters in production."
    );
    expect(check({ PAYFORT_RESPONSE_SHA_PHRASE: "test-response-phrase" })).toThrow(
      "PAYFORT_RESPONSE_SHA_PHRASE must be the real phrase from the PayFort merchant portal."
    );
    expect(check({ PAYFORT_REQUEST_SHA_PHRASE: "Changeme" })).toThrow(
      "PAYFORT_REQUEST_SHA_PHRASE must be the real phrase from the PayFort merchant portal."
    );
  });

  it("requires https for the payment page and the public base URL", () => {
    expect(check({ PAYFORT_REDIRECT_URL: "http://checkout.payfort.test/FortAPI/paymentPage" })).toThrow(
      "PAYFORT_REDIRECT_URL must use https:// in production."
    );
    expect(check({ PUBLIC_BASE_URL: "http://shop.example.com" })).toThrow(
      "PUBLIC_BASE_URL must use https:// in production."
    );
  });
});
