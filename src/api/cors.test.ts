import { describe, expect, it, vi } from "vitest";
import { buildTestApp } from "../test/app.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe("CORS middleware", () => {
  const allowedOrigin = "https://console.example.com";

  it("allows any origin by default", async () => {
    const res = await buildTestApp().request("/health", {
      headers: { Origin: "https://anywhere.example.com" },
    });
    expect(res.status).toBe(200);
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
  });

  it("echoes a configured origin", async () => {
    const res = await buildTestApp({ corsOrigins: [allowedOrigin] }).request("/health", {
      headers: { Origin: allowedOrigin },
    });
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe(allowedOrigin);
  });

  it("answers preflight for the usage routes without requiring a token", async () => {
    const res = await buildTestApp({ corsOrigins: [allowedOrigin] }).request("/usage/book", {
      method: "OPTIONS",
      headers: {
        Origin: allowedOrigin,
        "Access-Control-Request-Method": "POST",
        "Access-Control-Request-Headers": "Content-Type, x-ledger-token",
      },
    });
    expect(res.status).toBe(204);

    const allowMethods = res.headers.get("Access-Control-Allow-Methods");
    expect(allowMethods).toContain("GET");
    expect(allowMethods).toContain("POST");

    const allowHeaders = res.headers.get("Access-Control-Allow-Headers");
    expect(allowHeaders).toContain("Content-Type");
    expect(allowHeaders).toContain("Authorization");
    expect(allowHeaders).toContain("x-ledger-token");
  });

  it("rejects requests from disallowed origins", async () => {
    const res = await buildTestApp({ corsOrigins: [allowedOrigin] }).request("/health", {
      headers: { Origin: "https://evil.example.com" },
    });
    expect(res.headers.get("Access-Control-Allow-Origin")).toBeNull();
  });
});
