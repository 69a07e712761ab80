/**
 * Zod request validation.
 *
 * Parses a request body, query string or path parameter against a Zod
 * schema. Failures throw ValidationError (VALIDATION_ERROR) with the
 * zod issues as details; the error handler turns that into a 400.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { ValidationError } from "@fiscus/types";
import type { AppEnv } from "../types/api-contract.js";

export type RequestSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/** Parse and validate the JSON request body. */
export async function parseJsonBody<T>(
  c: Context<AppEnv>,
  schema: RequestSchema<T>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError("VALIDATION_ERROR", "Invalid JSON in request body");
  }
  return check(schema, body, "Request body validation failed");
}

/** Validate the query string. */
export function parseQuery<T>(c: Context<AppEnv>, schema: RequestSchema<T>): T {
  return check(schema, c.req.query(), "Invalid query parameters");
}

/** Validate a single value, such as a path parameter. */
export function parseValue<T>(schema: RequestSchema<T>, value: unknown, label: string): T {
  return check(schema, value, `Invalid ${label}`);
}

export function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function check<T>(schema: RequestSchema<T>, value: unknown, message: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError("VALIDATION_ERROR", message, {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}
