import { describe, expect, it } from "vitest";
import { defaultPlanCatalog, FALLBACK_PLAN, PlanCatalog } from "./plan-catalog.js";

describe("PlanCatalog", () => {
  it("resolves every default plan to its allowance", () => {
    expect(defaultPlanCatalog.resolve("free")).toEqual({ plan: "free", limitSeconds: 1800 });
    expect(defaultPlanCatalog.resolve("standard")).toEqual({ plan: "standard", limitSeconds: 7200 });
    expect(defaultPlanCatalog.resolve("premium")).toEqual({ plan: "premium", limitSeconds: 36000 });
    expect(defaultPlanCatalog.resolve("own_key")).toEqual({ plan: "own_key", limitSeconds: 600000 });
  });

  it("falls back to free for unknown plans", () => {
    expect(defaultPlanCatalog.resolve("platinum")).toEqual({ plan: FALLBACK_PLAN, limitSeconds: 1800 });
  });

  it("falls back to free for absent or empty plans", () => {
    expect(defaultPlanCatalog.resolve()).toEqual({ plan: "free", limitSeconds: 1800 });
    expect(defaultPlanCatalog.resolve(null)).toEqual({ plan: "free", limitSeconds: 1800 });
    expect(defaultPlanCatalog.resolve("")).toEqual({ plan: "free", limitSeconds: 1800 });
    expect(defaultPlanCatalog.resolve("   ")).toEqual({ plan: "free", limitSeconds: 1800 });
  });

  it("normalizes case and surrounding whitespace", () => {
    expect(defaultPlanCatalog.resolve(" Premium ")).toEqual({ plan: "premium", limitSeconds: 36000 });
    expect(defaultPlanCatalog.resolve("STANDARD")).toEqual({ plan: "standard", limitSeconds: 7200 });
  });

  it("accepts a custom catalog", () => {
    const catalog = new PlanCatalog([
      { id: "free", monthlyAllowanceSeconds: 60 },
      { id: "team", monthlyAllowanceSeconds: 3600 },
    ]);
    expect(catalog.resolve("team")).toEqual({ plan: "team", limitSeconds: 3600 });
    expect(catalog.resolve("premium")).toEqual({ plan: "free", limitSeconds: 60 });
  });

  it("rejects a catalog without the fallback plan", () => {
    expect(() => new PlanCatalog([{ id: "pro", monthlyAllowanceSeconds: 100 }])).toThrow(/"free" plan/);
  });

  it("rejects duplicate plan ids", () => {
    expect(
      () =>
        new PlanCatalog([
          { id: "free", monthlyAllowanceSeconds: 100 },
          { id: "free", monthlyAllowanceSeconds: 200 },
        ]),
    ).toThrow(/Duplicate plan id/);
  });

  it("rejects negative allowances", () => {
    expect(() => new PlanCatalog([{ id: "free", monthlyAllowanceSeconds: -1 }])).toThrow();
  });
});
