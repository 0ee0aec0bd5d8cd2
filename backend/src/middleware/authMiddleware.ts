// File: authMiddleware.ts
import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AuthService } from '../services/AuthService';
import type { AuthIdentity } from '../models/User';
import { LoggerService } from '../services/LoggerService';

// Extend Express Request interface to include the verified identity
declare global {
  namespace Express {
    interface Request {
      user?: AuthIdentity;
    }
  }
}

/**
 * Authentication middleware that verifies the bearer token and its session
 */
export function createAuthMiddleware(authService: AuthService, logger: LoggerService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    const token = authHeader.slice('Bearer '.length).trim();

    authService.verifyToken(token).then(
      (identity) => {
        if (!identity) {
          res.status(401).json({ error: 'Invalid or expired token' });
          return;
        }
        req.user = identity;
        next();
      },
      (error: unknown) => {
        logger.error('Auth middleware error', error);
        res.status(500).json({ error: 'Authentication error' });
      }
    );
  };
}

/**
 * The identity attached by the auth middleware. Routes mounted behind it
 * can rely on this being present.
 */
export function requireUser(req: Request, res: Response): AuthIdentity | null {
  if (!req.user) {
    res.status(401).json({ error: 'Not authenticated' });
    return null;
  }
  return req.user;
}
