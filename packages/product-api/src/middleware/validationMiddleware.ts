/**
 * Validation Middleware
 * Parses request data with zod schemas and raises VALIDATION_ERROR on failure
 */

import type { Request } from 'express';
import { z } from 'zod';
import { ValidationError } from '@ticketdesk/core';

export type ValidationType = 'body' | 'query' | 'params';

export function toValidationError(error: z.ZodError): ValidationError {
  const errors = error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
    code: err.code,
  }));
  return new ValidationError('Validation failed', { errors });
}

/**
 * Validate one part of the request against a schema and return the parsed value.
 */
export function validateRequest<T extends z.ZodTypeAny>(
  req: Request,
  schema: T,
  type: ValidationType = 'body'
): z.infer<T> {
  const data: unknown = type === 'body' ? req.body ?? {} : type === 'query' ? req.query : req.params;
  const result = schema.safeParse(data);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

export const validateBody = <T extends z.ZodTypeAny>(req: Request, schema: T): z.infer<T> =>
  validateRequest(req, schema, 'body');

export const validateQuery = <T extends z.ZodTypeAny>(req: Request, schema: T): z.infer<T> =>
  validateRequest(req, schema, 'query');

export const validateParams = <T extends z.ZodTypeAny>(req: Request, schema: T): z.infer<T> =>
  validateRequest(req, schema, 'params');

// ids are pg `increments` (int4) columns
export const MAX_ID = 2_147_483_647;

const idBounds = (schema: z.ZodNumber) => schema.int().positive().max(MAX_ID, 'Id out of range');

/**
 * Common validation schemas
 */
export const commonValidations = {
  id: idBounds(z.coerce.number()),
  bodyId: idBounds(z.number()),
  booleanQuery: z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
};
