/**
 * Notification log routes.
 *
 * GET /api/v1/notifications?txIndex=&fromPosition=&limit=
 *   Committed ledger notifications, oldest first, with chain hashes
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListNotificationsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createNotificationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = ListNotificationsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const service = c.get("service");
    const { txIndex, fromPosition, limit } = queryResult.data;

    return c.json({
      data: service.notifications({ txIndex, fromPosition, limit }),
      total: service.notificationLog.size,
    });
  });

  return routes;
}
