/**
 * ClinicDesk - Local HTTP API
 *
 * A thin Express layer over the gateway: login and refresh hand out bearer
 * tokens, and every other screen action goes through `POST /api/rpc/:method`.
 * Errors are JSON `{ error: { code, message, details? } }`.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import express, { type NextFunction, type Request, type Response } from "express";

import type { TokenService } from "../auth/jwt.ts";
import { authenticate } from "../auth/middleware.ts";
import type { AccessContext } from "../auth/rbac.ts";
import { AuthenticationError, ClinicError, ValidationError, toSafeErrorResponse } from "../errors.ts";
import type { Gateway } from "../gateway/gateway.ts";
import { createLogger } from "../logger.ts";
import { getUser, getUserByUsername, isCurrentRefreshToken, setRefreshToken } from "../repositories/users.ts";

const log = createLogger("http");

const LoginBody = Type.Object({ username: Type.String(), password: Type.String() });
const RefreshBody = Type.Object({ refreshToken: Type.String({ minLength: 1 }) });

type Route = (req: Request, res: Response) => Promise<void>;

/** Forward rejections from an async route to the error handler. */
function route(fn: Route) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };
}

function sessionOf(req: Request): AccessContext {
  if (!req.accessContext) throw new AuthenticationError("Authentication required");
  return req.accessContext;
}

/** Issue a token pair for a user and store the refresh half on the user row. */
function issueTokens(tokens: TokenService, user: { id: number; username: string; role: AccessContext["role"] }) {
  const pair = tokens.issue({ sub: String(user.id), username: user.username, role: user.role });
  setRefreshToken(user.id, pair.refreshToken);
  return pair;
}

export type HttpAppOptions = {
  gateway: Gateway;
  tokens: TokenService;
};

export function createHttpApp({ gateway, tokens }: HttpAppOptions): express.Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "1mb" }));

  const requireAuth = authenticate(tokens);

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // ── Auth ──────────────────────────────────────────────────
  app.post(
    "/api/auth/login",
    route(async (req, res) => {
      const login = await gateway.call("auth.login", req.body, null);
      // The gateway has validated the body by now.
      const body: unknown = req.body;
      const user = Value.Check(LoginBody, body) ? getUserByUsername(body.username.trim()) : undefined;
      if (!user) throw new AuthenticationError();
      res.json({ ...issueTokens(tokens, user), login });
    }),
  );

  app.post(
    "/api/auth/refresh",
    route(async (req, res) => {
      const body: unknown = req.body;
      if (!Value.Check(RefreshBody, body)) {
        throw new ValidationError("refreshToken is required", [
          { field: "refreshToken", message: "refreshToken is required" },
        ]);
      }
      const payload = tokens.verifyRefresh(body.refreshToken);
      const userId = payload ? Number(payload.sub) : Number.NaN;
      if (!payload || !Number.isInteger(userId) || !isCurrentRefreshToken(userId, body.refreshToken)) {
        throw new AuthenticationError("Invalid or expired refresh token");
      }
      // Re-read the role so a role change takes effect on the next refresh.
      const user = getUser(userId);
      res.json(issueTokens(tokens, user));
    }),
  );

  app.post(
    "/api/auth/logout",
    requireAuth,
    route(async (req, res) => {
      res.json(await gateway.call("auth.logout", {}, sessionOf(req)));
    }),
  );

  app.get(
    "/api/auth/me",
    requireAuth,
    route(async (req, res) => {
      res.json(await gateway.call("auth.me", {}, sessionOf(req)));
    }),
  );

  app.get(
    "/api/navigation",
    requireAuth,
    route(async (req, res) => {
      res.json(await gateway.call("auth.navigation", {}, sessionOf(req)));
    }),
  );

  // ── Gateway methods ───────────────────────────────────────
  app.get(
    "/api/methods",
    requireAuth,
    route(async (req, res) => {
      res.json({ methods: gateway.methodsFor(sessionOf(req)) });
    }),
  );

  app.post(
    "/api/rpc/:method",
    requireAuth,
    route(async (req, res) => {
      const method = req.params.method ?? "";
      res.json(await gateway.call(method, req.body, sessionOf(req)));
    }),
  );

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: { code: "NOT_FOUND", message: `No route for ${req.method} ${req.path}` } });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    // express.json() rejects malformed bodies with a SyntaxError.
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: { code: "BAD_REQUEST", message: "Malformed JSON body" } });
      return;
    }
    if (!(err instanceof ClinicError)) {
      log.error({ err, method: req.method, path: req.path }, "Unhandled request error");
    }
    const { statusCode, ...error } = toSafeErrorResponse(err);
    res.status(statusCode).json({ error });
  });

  return app;
}
