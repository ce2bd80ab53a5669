/**
 * Request ID middleware.
 *
 * Propagates a caller-supplied X-Request-Id when it looks like a token,
 * otherwise generates a UUID. The id is echoed on every response.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const ACCEPTED_ID = /^[A-Za-z0-9._:-]{1,128}$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && ACCEPTED_ID.test(incoming) ? incoming : randomUUID();

    c.set("requestId", requestId);
    c.header(REQUEST_ID_HEADER, requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
