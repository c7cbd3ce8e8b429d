/**
 * Error middleware
 *
 * Renders application errors as `{ error: { code, message, details? } }` with
 * their status code. Anything unexpected is logged and answers 500.
 */

import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { isAppError, logger } from '@ticketdesk/core';
import { createErrorBody } from '../utils/response';
import { toValidationError } from './validationMiddleware';

function isJsonSyntaxError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

const CLIENT_ERROR_CODES: Readonly<Partial<Record<number, string>>> = {
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE',
};

/**
 * 4xx status carried by errors from the body parser and other express middleware.
 */
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  if (typeof status === 'number' && Number.isInteger(status) && status >= 400 && status < 500) {
    return status;
  }
  return null;
}

export function createErrorHandler(env: string): ErrorRequestHandler {
  return (error: unknown, req, res, _next) => {
    if (isAppError(error)) {
      res.status(error.statusCode).json(createErrorBody(error.code, error.message, error.details));
      return;
    }

    if (error instanceof ZodError) {
      const validationError = toValidationError(error);
      res
        .status(validationError.statusCode)
        .json(createErrorBody(validationError.code, validationError.message, validationError.details));
      return;
    }

    if (isJsonSyntaxError(error)) {
      res.status(400).json(createErrorBody('INVALID_JSON', 'Invalid JSON in request body'));
      return;
    }

    const clientStatus = clientErrorStatus(error);
    if (clientStatus !== null) {
      const message = error instanceof Error ? error.message : 'Bad request';
      res.status(clientStatus).json(createErrorBody(CLIENT_ERROR_CODES[clientStatus] ?? 'BAD_REQUEST', message));
      return;
    }

    logger.error('[errorHandler] unhandled error', {
      requestId: req.context?.requestId,
      path: req.originalUrl,
      error: error instanceof Error ? error.stack ?? error.message : String(error),
    });

    const message = env === 'development' && error instanceof Error ? error.message : 'Internal server error';
    res.status(500).json(createErrorBody('INTERNAL_ERROR', message));
  };
}
