import { describe, expect, it, vi } from "vitest";
import { buildTestApp, stubLedger, TEST_TOKEN } from "../test/app.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

vi.mock("../observability/sentry.js", () => ({
  captureError: vi.fn(),
}));

describe("createApp", () => {
  it("mounts the usage routes under /usage", async () => {
    const ledger = stubLedger();
    vi.mocked(ledger.fetch).mockResolvedValue({
      plan: "free",
      period: "2025-03",
      secondsUsed: 0,
      subscriptionLimitSeconds: 1800,
      topupBalanceSeconds: 0,
      limitSeconds: 1800,
      remainingSeconds: 1800,
    });

    const res = await buildTestApp({ ledger }).request("/usage/fetch", {
      method: "POST",
      headers: { "x-ledger-token": TEST_TOKEN, "Content-Type": "application/json" },
      body: JSON.stringify({ user_key: "u1" }),
    });

    expect(res.status).toBe(200);
    expect((await res.json()).remaining_seconds).toBe(1800);
    expect(ledger.fetch).toHaveBeenCalledWith({ userKey: "u1", plan: undefined });
  });

  it("mounts health under /health", async () => {
    const res = await buildTestApp().request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", service: "usage-ledger" });
  });

  it("answers unknown routes with a JSON 404", async () => {
    const res = await buildTestApp().request("/usage-report", { method: "GET" });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: "not_found", message: "No route for GET /usage-report" } });
  });

  it("rejects oversized bodies with 413", async () => {
    const ledger = stubLedger();
    const res = await buildTestApp({ ledger }).request("/usage/book", {
      method: "POST",
      headers: { Authorization: `Bearer ${TEST_TOKEN}`, "Content-Type": "application/json" },
      body: JSON.stringify({ user_key: "u1", seconds: 60, padding: "x".repeat(20_000) }),
    });

    expect(res.status).toBe(413);
    expect((await res.json()).error.code).toBe("payload_too_large");
    expect(ledger.book).not.toHaveBeenCalled();
  });
});
