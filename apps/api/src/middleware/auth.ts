/**
 * JWT Authentication Middleware for Fastify
 *
 * Provides token generation, verification, and route protection.
 * Public routes (health, login, registration submission) are whitelisted.
 * Tokens are stateless: suspending an account does not revoke tokens
 * already issued, they simply run to expiry.
 */
import { randomUUID } from "node:crypto";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import jwt, { type JwtPayload } from "jsonwebtoken";
import type { AuthenticatedPrincipal } from "../auth";
import { mergeLogContext } from "../log-context";
import { isTestRuntime } from "../runtime-safety";

function getJwtSecret(): string {
  const secret = process.env.JWT_SECRET;
  if (!secret && !isTestRuntime()) {
    throw new Error("FATAL: JWT_SECRET environment variable must be set in non-test runtime");
  }
  return secret || "test-secret";
}

const DEFAULT_TOKEN_TTL_SECONDS = 24 * 60 * 60;
const DURATION_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/** Accepts plain seconds or a number with an s/m/h/d suffix ("30m", "24h"). */
export function parseTokenTtl(value: string | undefined): number {
  const match = /^(\d+)\s*([smhd]?)$/.exec((value || "").trim());
  if (!match) return DEFAULT_TOKEN_TTL_SECONDS;
  const amount = Number.parseInt(match[1], 10);
  const seconds = amount * (match[2] ? DURATION_UNITS[match[2]] : 1);
  return seconds > 0 ? seconds : DEFAULT_TOKEN_TTL_SECONDS;
}

const JWT_SECRET = getJwtSecret();
const JWT_TTL_SECONDS = parseTokenTtl(process.env.JWT_EXPIRES_IN);

/** Routes available only outside production (API docs, metrics, OpenAPI document) */
const DEV_ONLY_ROUTES = ["/metrics", "/docs", "/api/v1/openapi.json"];
const DEV_ONLY_PREFIXES = ["/docs/"];

/** Routes that do NOT require authentication */
export const PUBLIC_ROUTES = [
  "/health",
  "/ready",
  "/api/v1/auth/login",
  "/api/v1/registrations",
  ...(process.env.NODE_ENV !== "production" ? DEV_ONLY_ROUTES : []),
];

const PUBLIC_ROUTE_PREFIXES = [...(process.env.NODE_ENV !== "production" ? DEV_ONLY_PREFIXES : [])];

export function isPublicRoutePath(url: string): boolean {
  if (PUBLIC_ROUTES.some((route) => url === route)) {
    return true;
  }
  return PUBLIC_ROUTE_PREFIXES.some((prefix) => url.startsWith(prefix));
}

export type AuthUserType = "CITIZEN" | "ADMIN";

export interface AuthPayload {
  userId: number;
  userType: AuthUserType;
  login: string;
  nationalId?: string;
  jti: string;
  iat?: number;
  exp?: number;
}

declare module "fastify" {
  interface FastifyRequest {
    authUser?: AuthPayload;
  }
}

/** Generate a JWT token for an authenticated principal */
export function generateToken(principal: AuthenticatedPrincipal): string {
  const payload: AuthPayload =
    principal.userType === "CITIZEN"
      ? {
          userId: principal.citizenId,
          userType: "CITIZEN",
          login: principal.username,
          nationalId: principal.nationalId,
          jti: randomUUID(),
        }
      : { userId: principal.adminId, userType: "ADMIN", login: principal.username, jti: randomUUID() };
  return jwt.sign(payload, JWT_SECRET, { expiresIn: JWT_TTL_SECONDS });
}

function parseAuthPayload(tokenPayload: string | JwtPayload): AuthPayload | null {
  if (!tokenPayload || typeof tokenPayload !== "object") return null;
  const { userId, userType, login, nationalId, jti } = tokenPayload;
  if (
    typeof userId !== "number" ||
    !Number.isSafeInteger(userId) ||
    typeof login !== "string" ||
    typeof jti !== "string" ||
    (userType !== "CITIZEN" && userType !== "ADMIN")
  ) {
    return null;
  }
  if (userType === "CITIZEN" && typeof nationalId !== "string") return null;
  return {
    userId,
    userType,
    login,
    nationalId: typeof nationalId === "string" ? nationalId : undefined,
    jti,
    iat: typeof tokenPayload.iat === "number" ? tokenPayload.iat : undefined,
    exp: typeof tokenPayload.exp === "number" ? tokenPayload.exp : undefined,
  };
}

/** Verify a JWT token and return the payload */
export function verifyToken(token: string): AuthPayload | null {
  try {
    return parseAuthPayload(jwt.verify(token, JWT_SECRET));
  } catch {
    return null;
  }
}

/** Register the auth middleware on a Fastify instance */
export function registerAuthMiddleware(app: FastifyInstance): void {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    const url = request.url.split("?")[0];
    if (isPublicRoutePath(url)) {
      return;
    }

    const authHeader = request.headers.authorization;
    const token = authHeader?.startsWith("Bearer ") ? authHeader.slice(7) : null;
    if (!token) {
      return reply
        .code(401)
        .send({ error: "AUTHENTICATION_REQUIRED", message: "Missing or invalid authentication", statusCode: 401 });
    }
    const payload = verifyToken(token);
    if (!payload) {
      return reply.code(401).send({ error: "INVALID_TOKEN", message: "Token is invalid or expired", statusCode: 401 });
    }

    request.authUser = payload;
    mergeLogContext({ actor: payload.login });
  });
}
