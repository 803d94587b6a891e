import type { Request, RequestHandler } from 'express';
import { hasRole } from '../../src/auth/roles.js';
import type { Session, SessionManager } from '../../src/auth/sessions.js';
import { AuthenticationError, AuthorizationError } from '../../src/store/errors.js';
import type { Role } from '../../src/types/records.js';
import { sendError } from '../http.js';

declare global {
  namespace Express {
    interface Request {
      auth?: Session;
    }
  }
}

export function bearerToken(req: Request): string | null {
  const header = req.header('Authorization');
  if (!header) return null;
  const [scheme, token] = header.split(' ');
  return scheme === 'Bearer' && token ? token : null;
}

// Middleware to verify the bearer token and attach the session
export function verifyAuth(sessions: SessionManager): RequestHandler {
  return (req, res, next) => {
    const token = bearerToken(req);
    if (!token) {
      return sendError(res, new AuthenticationError('Unauthorized - no token provided'));
    }
    const session = sessions.get(token);
    if (!session) {
      return sendError(res, new AuthenticationError('Unauthorized - invalid token'));
    }
    req.auth = session;
    next();
  };
}

export function requireRole(allowed: readonly Role[], action: string): RequestHandler {
  return (req, res, next) => {
    const session = req.auth;
    if (!session) {
      return sendError(res, new AuthenticationError());
    }
    if (!hasRole(session.role, allowed)) {
      return sendError(res, new AuthorizationError(`Access denied - only ${allowed.join(', ')} can ${action}`));
    }
    next();
  };
}

export function requireSession(req: Request): Session {
  if (!req.auth) throw new AuthenticationError();
  return req.auth;
}
