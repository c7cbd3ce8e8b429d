import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '@ticketdesk/core';

/**
 * Assigns a request id, echoes it in `x-request-id` and logs the finished
 * request at http level.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = req.get('x-request-id') ?? uuidv4();
  const startedAt = process.hrtime.bigint();

  req.context = { requestId };
  res.setHeader('x-request-id', requestId);

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
    logger.http(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
      requestId,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Math.round(durationMs * 100) / 100,
      userId: req.context?.userId,
    });
  });

  next();
}
