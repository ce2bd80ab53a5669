/**
 * Transaction routes.
 *
 * GET    /api/v1/transactions                             : List (optionally by status)
 * GET    /api/v1/transactions/:index                      : Get one, with confirmers
 * GET    /api/v1/transactions/:index/confirmations/:owner : Has `owner` confirmed?
 * POST   /api/v1/transactions                             : Submit
 * POST   /api/v1/transactions/:index/confirm              : Confirm
 * POST   /api/v1/transactions/:index/revoke               : Revoke a confirmation
 * POST   /api/v1/transactions/:index/execute              : Execute
 *
 * Mutations act as the resolved caller. Unknown or malformed indexes are
 * passed through so the ledger answers TX_NOT_FOUND.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListTransactionsQuerySchema, SubmitTransactionSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { requireCaller } from "../middleware/auth.js";
import { formatZodErrors, validateBody } from "../middleware/validate.js";

/**
 * Decimal path segment → index. Anything else maps to NaN.
 */
export function parseIndex(raw: string): number {
  return /^\d{1,15}$/.test(raw) ? Number(raw) : Number.NaN;
}

export function createTransactionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/transactions: List
  routes.get("/", (c) => {
    const queryResult = ListTransactionsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const service = c.get("service");
    return c.json({
      data: service.listTransactions(queryResult.data.status),
      count: service.transactionCount(),
    });
  });

  // GET /api/v1/transactions/:index: Get one
  routes.get("/:index", (c) => {
    const service = c.get("service");
    return c.json({ data: service.getTransaction(parseIndex(c.req.param("index"))) });
  });

  // GET /api/v1/transactions/:index/confirmations/:owner
  routes.get("/:index/confirmations/:owner", (c) => {
    const service = c.get("service");
    const index = parseIndex(c.req.param("index"));
    const owner = c.req.param("owner");

    return c.json({
      data: { index, owner, confirmed: service.isConfirmed(index, owner) },
    });
  });

  // POST /api/v1/transactions: Submit
  routes.post("/", requireCaller(), validateBody(SubmitTransactionSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const transaction = service.submit(c.get("owner"), body.destination, body.amount);
    return c.json({ data: { index: transaction.index, transaction } }, 201);
  });

  // POST /api/v1/transactions/:index/confirm
  routes.post("/:index/confirm", requireCaller(), (c) => {
    const service = c.get("service");
    const transaction = service.confirm(c.get("owner"), parseIndex(c.req.param("index")));
    return c.json({ data: transaction });
  });

  // POST /api/v1/transactions/:index/revoke
  routes.post("/:index/revoke", requireCaller(), (c) => {
    const service = c.get("service");
    const transaction = service.revoke(c.get("owner"), parseIndex(c.req.param("index")));
    return c.json({ data: transaction });
  });

  // POST /api/v1/transactions/:index/execute
  routes.post("/:index/execute", requireCaller(), (c) => {
    const service = c.get("service");
    const transaction = service.execute(c.get("owner"), parseIndex(c.req.param("index")));
    return c.json({ data: transaction });
  });

  return routes;
}
