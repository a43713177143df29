/**
 * Zod validation middleware for request bodies and query strings.
 *
 * Parsed values land in `validatedBody` or `validatedQuery`. Failures
 * answer 400 VALIDATION_ERROR with one issue per offending path.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}

export interface ValidatedQueryEnv<T> {
  Variables: {
    validatedQuery: T;
  };
}

const MALFORMED_JSON = Symbol("malformed-json");

export function validateBody<T>(schema: Schema<T>): MiddlewareHandler<AppEnv & ValidatedEnv<T>> {
  return async (c, next) => {
    const body: unknown = await c.req.json().catch(() => MALFORMED_JSON);
    if (body === MALFORMED_JSON) {
      return reject(c, "Invalid JSON in request body");
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return reject(c, "Request body validation failed", result.error);
    }
    c.set("validatedBody", result.data);
    return next();
  };
}

export function validateQuery<T>(schema: Schema<T>): MiddlewareHandler<AppEnv & ValidatedQueryEnv<T>> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return reject(c, "Invalid query parameters", result.error);
    }
    c.set("validatedQuery", result.data);
    return next();
  };
}

function reject(c: Context, message: string, error?: ZodError): Response {
  const issues = error?.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  return c.json(
    createErrorEnvelope("VALIDATION_ERROR", message, issues === undefined ? undefined : { issues }),
    400,
  );
}
