/**
 * Request ID middleware.
 *
 * Generates or propagates an X-Request-Id header for request tracing.
 * An incoming X-Request-Id is kept when it is 1..128 printable ASCII
 * characters; otherwise a new UUID is generated.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const ACCEPTED_REQUEST_ID = /^[\x21-\x7e]{1,128}$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && ACCEPTED_REQUEST_ID.test(incoming) ? incoming : randomUUID();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
