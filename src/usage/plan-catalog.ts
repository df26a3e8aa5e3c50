import { z } from "zod";

/** Schema for a subscription plan's monthly allowance. */
export const planDefinitionSchema = z.object({
  id: z
    .string()
    .min(1)
    .regex(/^[a-z0-9_]+$/),
  monthlyAllowanceSeconds: z.number().int().min(0),
});

export type PlanDefinition = z.infer<typeof planDefinitionSchema>;

/** Plan every unknown, empty or absent plan identifier resolves to. */
export const FALLBACK_PLAN = "free";

const DEFAULT_PLANS: PlanDefinition[] = [
  { id: "free", monthlyAllowanceSeconds: 1_800 }, // 30 min
  { id: "standard", monthlyAllowanceSeconds: 7_200 }, // 120 min
  { id: "premium", monthlyAllowanceSeconds: 36_000 }, // 600 min
  { id: "own_key", monthlyAllowanceSeconds: 600_000 }, // 10,000 min
];

export interface ResolvedPlan {
  plan: string;
  limitSeconds: number;
}

/**
 * Static plan → monthly allowance lookup.
 *
 * All plan defaulting goes through {@link PlanCatalog.resolve} so every caller
 * gets the same fallback: identifiers are trimmed and lowercased, and anything
 * not in the catalog becomes {@link FALLBACK_PLAN}.
 */
export class PlanCatalog {
  private readonly plans: ReadonlyMap<string, number>;

  constructor(definitions: PlanDefinition[] = DEFAULT_PLANS) {
    const parsed = z.array(planDefinitionSchema).parse(definitions);
    const plans = new Map<string, number>();
    for (const def of parsed) {
      if (plans.has(def.id)) {
        throw new Error(`Duplicate plan id "${def.id}"`);
      }
      plans.set(def.id, def.monthlyAllowanceSeconds);
    }
    if (!plans.has(FALLBACK_PLAN)) {
      throw new Error(`Plan catalog must define the "${FALLBACK_PLAN}" plan`);
    }
    this.plans = plans;
  }

  resolve(plan?: string | null): ResolvedPlan {
    const id = plan ? normalize(plan) : FALLBACK_PLAN;
    const limitSeconds = this.plans.get(id);
    if (limitSeconds !== undefined) {
      return { plan: id, limitSeconds };
    }
    return { plan: FALLBACK_PLAN, limitSeconds: this.fallbackLimit() };
  }

  private fallbackLimit(): number {
    // Presence checked in the constructor
    return this.plans.get(FALLBACK_PLAN) ?? 0;
  }
}

function normalize(plan: string): string {
  return plan.trim().toLowerCase();
}

export const defaultPlanCatalog = new PlanCatalog();
