/**
 * Per-request values shared by the route modules.
 */

import type { Context } from "hono";
import type { OperationOptions } from "@fiscus/types";
import type { AppEnv } from "../types/api-contract.js";

/** Cancel domain work when the client goes away. */
export function operationOptions(c: Context<AppEnv>): OperationOptions {
  return { signal: c.req.raw.signal };
}
