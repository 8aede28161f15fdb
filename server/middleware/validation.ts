/**
 * Validation Middleware
 *
 * Zod-based request validation. Failures reach the error handler as a
 * ValidationError listing every offending field.
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodSchema, ZodError } from "zod";
import { TODO_STATUSES } from "@shared/schema";
import { LIST_LIMITS } from "../config/constants";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
}

function toValidationError(error: ZodError): ValidationError {
  const messages = error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
  return new ValidationError(messages);
}

/**
 * Creates a validation middleware that validates request parts against Zod schemas.
 *
 * @example
 * app.post("/api/chat", validate({ body: chatRequestSchema }), async (req, res) => { ... });
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        next(toValidationError(error));
      } else {
        next(error);
      }
    }
  };
}

/**
 * Parses a request's query string. Express keeps `req.query` loosely typed,
 * so handlers read the typed result instead.
 */
export function parseQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: Request): T {
  const result = schema.safeParse(req.query);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

export const chatRequestSchema = z.object({
  message: z.string().refine(value => value.trim().length > 0, "Message must not be empty"),
  api_token: z.string().optional(),
});

export const todosQuerySchema = z.object({
  status: z.enum(TODO_STATUSES).optional(),
});

export const turnsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(LIST_LIMITS.TURNS_MAX).default(LIST_LIMITS.TURNS_DEFAULT),
});
