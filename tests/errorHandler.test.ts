import { describe, it, expect, vi, afterEach } from "vitest";
import request from "supertest";
import { logger } from "../src/lib/logger.js";
import { accessToken, seededStore, testApp } from "./helpers/fixtures.js";

describe("Error handler", () => {
  afterEach(() => {
    process.env.NODE_ENV = "test";
    vi.restoreAllMocks();
  });

  function failingStatusPoll(error: Error) {
    const store = seededStore();
    store.lookupError = error;
    return request(testApp(store))
      .get("/payfort/status/")
      .query({ transaction_id: "1", merchant_reference: "1-10" })
      .set("Authorization", `Bearer ${accessToken()}`);
  }

  it("returns AppError statusCode, message, code and the path for 404", async () => {
    vi.spyOn(logger, "error").mockImplementation(() => {});
    const res = await request(testApp(seededStore())).get("/nope").set("x-request-id", "req-abcdef12");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      error: "Not found: GET /nope",
      requestId: "req-abcdef12",
      path: "GET /nope",
      code: "NOT_FOUND",
    });
    expect(res.headers["x-request-id"]).toBe("req-abcdef12");
  });

  it("replaces an unusable inbound request id", async () => {
    vi.spyOn(logger, "error").mockImplementation(() => {});
    const res = await request(testApp(seededStore())).get("/nope").set("x-request-id", "bad id!");
    expect(res.headers["x-request-id"]).not.toBe("bad id!");
    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("returns 500 with generic message for a non-AppError outside development", async () => {
    const errorSpy = vi.spyOn(logger, "error").mockImplementation(() => {});
    const res = await failingStatusPoll(new Error("DB leak secret"));
    expect(res.status).toBe(500);
    expect(res.body.error).toBe("Internal server error");
    expect(res.body).not.toHaveProperty("stack");
    expect(errorSpy).toHaveBeenCalledWith(
      "DB leak secret",
      expect.objectContaining({ statusCode: 500, method: "GET", path: "/payfort/status/" })
    );
  });

  it("in production, 500 response body has neither stack nor code", async () => {
    vi.spyOn(logger, "error").mockImplementation(() => {});
    process.env.NODE_ENV = "production";
    const res = await failingStatusPoll(new Error("Unexpected"));
    expect(res.status).toBe(500);
    expect(res.body.error).toBe("Internal server error");
    expect(res.body).not.toHaveProperty("code");
    expect(res.body).not.toHaveProperty("stack");
  });

  it("in production, 4xx AppErrors keep message and code but not the path", async () => {
    vi.spyOn(logger, "error").mockImplementation(() => {});
    process.env.NODE_ENV = "production";
    const res = await request(testApp(seededStore())).get("/payfort/status/");
    expect(res.status).toBe(401);
    expect(res.body).toMatchObject({ error: "Unauthorized", code: "UNAUTHORIZED" });
    expect(res.body).not.toHaveProperty("path");
  });
});
