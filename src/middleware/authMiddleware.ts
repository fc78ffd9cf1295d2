// src/middleware/authMiddleware.ts
import { Request, Response, NextFunction } from 'express';
import { resolveCurrentUser } from '../services/authService';
import { AppError, Unauthenticated } from '../utils/errors';
import logger from '../utils/logger';

export interface AuthContext {
  userId: string;
  email: string;
}

// Requests that went through authenticateJWT
export interface AuthenticatedRequest extends Request {
  auth?: AuthContext;
}

const BEARER_PREFIX = 'Bearer ';

export const authenticateJWT = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
  const authHeader = req.headers.authorization;
  const token = authHeader && authHeader.startsWith(BEARER_PREFIX) ? authHeader.substring(BEARER_PREFIX.length).trim() : undefined;

  try {
    const user = resolveCurrentUser(token);
    req.auth = { userId: user.id, email: user.email };
    next();
  } catch (error) {
    if (error instanceof AppError && error.kind === 'Unauthenticated') {
      logger.warn(`Rejected request to ${req.method} ${req.originalUrl}: ${error.message}`);
    }
    next(error);
  }
};

/** The authenticated user's id; fails when the router skipped authenticateJWT. */
export const getAuthUserId = (req: AuthenticatedRequest): string => {
  if (!req.auth) {
    throw new Unauthenticated();
  }
  return req.auth.userId;
};
