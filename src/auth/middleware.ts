/**
 * ClinicDesk - Auth Middleware
 *
 * Bearer-token authentication for the local HTTP API. Permission checks
 * happen in the gateway. The account is re-read on every request, so a
 * deactivation or role change applies before the access token expires.
 */

import type { Request, Response, NextFunction } from "express";

import { findActiveUser } from "../repositories/users.ts";
import type { JwtPayload, TokenService } from "./jwt.ts";
import type { AccessContext } from "./rbac.ts";

declare global {
  namespace Express {
    interface Request {
      user?: JwtPayload;
      accessContext?: AccessContext;
    }
  }
}

function deny(res: Response, message: string): void {
  res.status(401).json({ error: { code: "AUTHENTICATION_ERROR", message } });
}

/**
 * Authenticate requests via Bearer token.
 * Populates req.user and req.accessContext on success.
 */
export function authenticate(tokens: TokenService) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith("Bearer ")) {
      deny(res, "Missing or invalid Authorization header");
      return;
    }

    const payload = tokens.verifyAccess(authHeader.slice(7));
    const userId = payload ? Number(payload.sub) : Number.NaN;
    if (!payload || !Number.isInteger(userId)) {
      deny(res, "Invalid or expired token");
      return;
    }

    const user = findActiveUser(userId);
    if (!user) {
      deny(res, "Account is no longer active");
      return;
    }

    req.user = payload;
    req.accessContext = { userId, username: user.username, role: user.role };
    next();
  };
}
