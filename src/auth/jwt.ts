/**
 * ClinicDesk - API Tokens
 *
 * HS256 JWTs signed with Node's built-in HMAC. Only the local HTTP API uses
 * them; a desktop front end talking to the gateway in-process holds a session
 * object instead.
 */

import { createHmac, randomBytes, timingSafeEqual } from "node:crypto";

import type { UserRole } from "../db/schema/users.ts";
import { USER_ROLES } from "../db/schema/users.ts";

export type TokenType = "access" | "refresh";

export type JwtPayload = {
  sub: string; // user id
  username: string;
  role: UserRole;
  type: TokenType;
  iat: number;
  exp: number;
  jti: string;
};

export type TokenSubject = Pick<JwtPayload, "sub" | "username" | "role">;

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
};

export type TokenServiceOptions = {
  secret: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  /** Seconds since epoch; injectable for tests. */
  clock?: () => number;
};

export type TokenService = {
  issue(subject: TokenSubject): TokenPair;
  verifyAccess(token: string): JwtPayload | null;
  verifyRefresh(token: string): JwtPayload | null;
};

const HEADER = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");

function isPayload(value: unknown): value is JwtPayload {
  if (typeof value !== "object" || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return (
    typeof v.sub === "string" &&
    typeof v.username === "string" &&
    typeof v.role === "string" &&
    USER_ROLES.some((r) => r === v.role) &&
    (v.type === "access" || v.type === "refresh") &&
    typeof v.iat === "number" &&
    typeof v.exp === "number" &&
    typeof v.jti === "string"
  );
}

export function createTokenService(options: TokenServiceOptions): TokenService {
  if (options.secret.length < 8) {
    throw new Error("[clinicdesk:auth] JWT secret must be at least 8 characters");
  }
  const now = options.clock ?? (() => Math.floor(Date.now() / 1000));

  const sign = (data: string): string =>
    createHmac("sha256", options.secret).update(data).digest("base64url");

  const encode = (subject: TokenSubject, type: TokenType, ttl: number): string => {
    const iat = now();
    const payload: JwtPayload = {
      sub: subject.sub,
      username: subject.username,
      role: subject.role,
      type,
      iat,
      exp: iat + ttl,
      jti: randomBytes(8).toString("base64url"),
    };
    const body = Buffer.from(JSON.stringify(payload)).toString("base64url");
    return `${HEADER}.${body}.${sign(`${HEADER}.${body}`)}`;
  };

  const decode = (token: string, expected: TokenType): JwtPayload | null => {
    const [header, body, signature, ...rest] = token.split(".");
    if (!header || !body || !signature || rest.length > 0) return null;

    const sigBuf = Buffer.from(signature, "base64url");
    const expectedBuf = Buffer.from(sign(`${header}.${body}`), "base64url");
    if (sigBuf.length !== expectedBuf.length || !timingSafeEqual(sigBuf, expectedBuf)) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(Buffer.from(body, "base64url").toString("utf8"));
    } catch {
      return null; // signed but not JSON: treat as invalid
    }
    if (!isPayload(parsed) || parsed.type !== expected) return null;
    if (parsed.exp <= now()) return null;
    return parsed;
  };

  return {
    issue(subject) {
      return {
        accessToken: encode(subject, "access", options.accessTokenTtlSeconds),
        refreshToken: encode(subject, "refresh", options.refreshTokenTtlSeconds),
        expiresIn: options.accessTokenTtlSeconds,
      };
    },
    verifyAccess: (token) => decode(token, "access"),
    verifyRefresh: (token) => decode(token, "refresh"),
  };
}
