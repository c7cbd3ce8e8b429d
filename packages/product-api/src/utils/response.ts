/**
 * API Response Utilities
 * Standardized response bodies for success and error cases
 */

import type { Response } from 'express';

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export function createErrorBody(
  code: string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorBody {
  return details === undefined ? { error: { code, message } } : { error: { code, message, details } };
}

export function sendData<T>(res: Response, data: T, status = 200): void {
  res.status(status).json(data);
}

export function sendNoContent(res: Response): void {
  res.status(204).end();
}
