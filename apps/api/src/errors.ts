/**
 * Domain errors and standardized API error responses.
 */
import type { FastifyReply } from "fastify";
import type { ZodType, ZodTypeDef } from "zod";

export type RegistryErrorKind = "VALIDATION" | "CONFLICT" | "NOT_FOUND" | "INTEGRITY";

export class RegistryError extends Error {
  constructor(
    readonly kind: RegistryErrorKind,
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends RegistryError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super("VALIDATION", code, message, details);
  }
}

export class ConflictError extends RegistryError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super("CONFLICT", code, message, details);
  }
}

export class NotFoundError extends RegistryError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super("NOT_FOUND", code, message, details);
  }
}

export class IntegrityError extends RegistryError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super("INTEGRITY", code, message, details);
  }
}

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}

const STATUS_BY_KIND: Record<RegistryErrorKind, number> = {
  VALIDATION: 400,
  CONFLICT: 409,
  NOT_FOUND: 404,
  INTEGRITY: 422,
};

/**
 * Parse untrusted input with a zod schema. The first issue becomes the error
 * message; every issue is kept under `details.issues`.
 */
export function parseInput<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  raw: unknown
): Output {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;
  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  const first = issues[0];
  const message = first
    ? first.path
      ? `${first.path}: ${first.message}`
      : first.message
    : "Invalid input";
  throw new ValidationError("INVALID_INPUT", message, { issues });
}

export interface ApiError {
  error: string;
  message: string;
  statusCode: number;
}

export function sendError(reply: FastifyReply, statusCode: number, error: string, message?: string): ApiError {
  const body: ApiError = { error, message: message || error, statusCode };
  reply.code(statusCode);
  return body;
}

export function send400(reply: FastifyReply, error: string, message?: string) {
  return sendError(reply, 400, error, message);
}
export function send401(reply: FastifyReply, error: string, message?: string) {
  return sendError(reply, 401, error, message);
}
export function send403(reply: FastifyReply, error: string, message?: string) {
  return sendError(reply, 403, error, message);
}
export function send404(reply: FastifyReply, error: string, message?: string) {
  return sendError(reply, 404, error, message);
}

/** Map a domain error onto the standard error body and status. */
export function sendDomainError(reply: FastifyReply, error: RegistryError): ApiError {
  return sendError(reply, STATUS_BY_KIND[error.kind], error.code, error.message);
}
