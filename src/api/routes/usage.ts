import { type Context, Hono } from "hono";
import { z } from "zod";
import { InvalidRequestError } from "../../usage/errors.js";
import type { IUsageLedger } from "../../usage/usage-ledger.js";
import { errorHandler } from "../error-handler.js";
import { serviceTokenAuth } from "../middleware/service-token-auth.js";

// Wire bodies are snake_case. These schemas only check shapes and rename;
// the ledger owns the business rules.
const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);
const optionalNumber = z
  .number()
  .nullish()
  .transform((v) => v ?? undefined);

const fetchBody = z
  .object({ user_key: z.string(), plan: optionalText })
  .transform((b) => ({ userKey: b.user_key, plan: b.plan }));

const bookBody = z
  .object({
    user_key: z.string(),
    seconds: z.number(),
    plan: optionalText,
    recorded_at: z
      .union([z.string(), z.number()])
      .nullish()
      .transform((v) => v ?? undefined),
  })
  .transform((b) => ({ userKey: b.user_key, seconds: b.seconds, plan: b.plan, recordedAt: b.recorded_at }));

const creditBody = z
  .object({
    user_key: z.string(),
    seconds_credited: z.number(),
    transaction_id: z.string(),
    product_id: optionalText,
    price_paid: optionalNumber,
    currency: optionalText,
  })
  .transform((b) => ({
    userKey: b.user_key,
    secondsCredited: b.seconds_credited,
    transactionId: b.transaction_id,
    productId: b.product_id,
    pricePaid: b.price_paid,
    currency: b.currency,
  }));

const purchasesBody = z
  .object({ user_key: z.string(), limit: optionalNumber, offset: optionalNumber })
  .transform((b) => ({ userKey: b.user_key, limit: b.limit, offset: b.offset }));

async function readBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch (err) {
    // Body-limit and stream failures keep their own handling.
    if (!(err instanceof SyntaxError)) throw err;
    throw new InvalidRequestError("Request body must be valid JSON");
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw InvalidRequestError.fromZodError(parsed.error);
  }
  return parsed.data;
}

export interface UsageRouteDeps {
  ledger: IUsageLedger;
  apiTokens: readonly string[];
}

/**
 * POST /fetch, /book, /credit and /purchases. Every route sits behind the
 * service token check, which runs before the body is read.
 */
export function createUsageRoutes(deps: UsageRouteDeps): Hono {
  const { ledger } = deps;
  const routes = new Hono();

  routes.onError(errorHandler);
  routes.use("/*", serviceTokenAuth(deps.apiTokens));

  routes.post("/fetch", async (c) => {
    const snapshot = await ledger.fetch(await readBody(c, fetchBody));
    return c.json({
      plan: snapshot.plan,
      period: snapshot.period,
      seconds_used: snapshot.secondsUsed,
      subscription_limit_seconds: snapshot.subscriptionLimitSeconds,
      topup_balance_seconds: snapshot.topupBalanceSeconds,
      limit_seconds: snapshot.limitSeconds,
      remaining_seconds: snapshot.remainingSeconds,
    });
  });

  routes.post("/book", async (c) => {
    const result = await ledger.book(await readBody(c, bookBody));
    return c.json({
      period: result.period,
      seconds_used: result.secondsUsed,
      topup_used: result.topupUsed,
      subscription_used: result.subscriptionUsed,
      topup_balance_seconds: result.topupBalanceSeconds,
      limit_seconds: result.limitSeconds,
      remaining_seconds: result.remainingSeconds,
    });
  });

  routes.post("/credit", async (c) => {
    const result = await ledger.credit(await readBody(c, creditBody));
    return c.json({
      success: true,
      seconds_credited: result.secondsCredited,
      new_topup_balance: result.newTopupBalance,
      already_credited: result.alreadyCredited,
      ...(result.alreadyCredited && { message: "Purchase already credited" }),
    });
  });

  routes.post("/purchases", async (c) => {
    const entries = await ledger.history(await readBody(c, purchasesBody));
    return c.json({
      purchases: entries.map((e) => ({
        transaction_id: e.transactionId,
        product_id: e.productId,
        seconds_credited: e.secondsCredited,
        credited_at: e.creditedAt.toISOString(),
        price_paid: e.pricePaid,
        currency: e.currency,
      })),
    });
  });

  return routes;
}
