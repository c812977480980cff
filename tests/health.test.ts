import { describe, it, expect, vi, afterEach } from "vitest";
import request from "supertest";
import { logger } from "../src/lib/logger.js";
import { seededStore, testApp } from "./helpers/fixtures.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("GET /health", () => {
  it("returns 200 when the database answers", async () => {
    const res = await request(testApp(seededStore())).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok", db: "up" });
  });

  it("returns 503 when the database is down", async () => {
    vi.spyOn(logger, "warn").mockImplementation(() => {});
    const store = seededStore();
    store.pingError = new Error("connection refused");
    const res = await request(testApp(store)).get("/health");
    expect(res.status).toBe(503);
    expect(res.body).toEqual({ status: "degraded", db: "down" });
  });
});

describe("GET /ready", () => {
  it("returns 200 with status ready when the database is up, 503 otherwise", async () => {
    const store = seededStore();
    const up = await request(testApp(store)).get("/ready");
    expect(up.status).toBe(200);
    expect(up.body).toEqual({ status: "ready" });

    store.pingError = new Error("connection refused");
    const down = await request(testApp(store)).get("/ready");
    expect(down.status).toBe(503);
    expect(down.body).toEqual({ status: "not ready" });
  });
});
