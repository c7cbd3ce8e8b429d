/**
 * Request context attached by the authentication middleware.
 */

export interface ApiRequestContext {
  requestId: string;
  userId?: number;
  projectId?: number;
}

declare global {
  namespace Express {
    interface Request {
      context?: ApiRequestContext;
    }
  }
}

export {};
