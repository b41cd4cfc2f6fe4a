import type { NextFunction, Request, RequestHandler, Response } from "express";

import { AuthenticationError, AuthorizationError } from "../lib/errors.js";
import type { Role, Session, SessionService } from "../services/sessionService.js";

export function bearerToken(req: Request): string | null {
  const header = req.get("authorization") ?? "";
  const match = /^Bearer\s+(\S+)$/i.exec(header);
  return match ? match[1] : null;
}

/** Session attached by `requireSession`; routes behind it can rely on it. */
export function currentSession(res: Response): Session {
  const session: unknown = res.locals.session;
  if (!isSession(session)) {
    throw new AuthenticationError();
  }
  return session;
}

function isSession(value: unknown): value is Session {
  return typeof value === "object" && value !== null && "token" in value && "role" in value && "username" in value;
}

export function requireSession(sessions: SessionService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    const session = token ? sessions.resolve(token) : null;
    if (!session) {
      next(new AuthenticationError());
      return;
    }
    res.locals.session = session;
    next();
  };
}

/** Session plus one of `roles`. */
export function requireRole(sessions: SessionService, ...roles: Role[]): RequestHandler[] {
  const checkRole: RequestHandler = (_req, res, next) => {
    try {
      if (!roles.includes(currentSession(res).role)) {
        throw new AuthorizationError();
      }
      next();
    } catch (error) {
      next(error);
    }
  };
  return [requireSession(sessions), checkRole];
}
