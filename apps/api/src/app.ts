import { randomUUID } from "node:crypto";
import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { SpanStatusCode, trace } from "@opentelemetry/api";
import { isPublicRoutePath, registerAuthMiddleware } from "./middleware/auth";
import { registerAuthRoutes } from "./routes/auth.routes";
import { registerRegistrationRoutes } from "./routes/registration.routes";
import { registerIdentityRoutes } from "./routes/identity.routes";
import { registerServiceRecordRoutes } from "./routes/service-record.routes";
import { registerCriminalCaseRoutes } from "./routes/criminal-case.routes";
import { registerAdminRoutes } from "./routes/admin.routes";
import { registerAdminReportRoutes } from "./routes/admin-reports.routes";
import {
  evaluateRuntimeAdapterPreflight,
  runRuntimeAdapterPreflightOrThrow,
} from "./runtime-adapter-preflight";
import { isRegistryError, send400, sendDomainError, sendError } from "./errors";
import { logError } from "./logger";
import { setLogContext } from "./log-context";
import { listPendingRegistrations } from "./registrations";
import { isTestRuntime, parsePositiveIntEnv } from "./runtime-safety";
import { getRegistryStore } from "./store";
import { pool } from "./db";
import {
  getMetricsContentType,
  getMetricsSnapshot,
  recordHttpRequestMetric,
  updateDbPoolMetric,
} from "./observability/metrics";

declare module "fastify" {
  interface FastifyRequest {
    metricsStartedAtNs?: bigint;
  }
}

const DEFAULT_API_SUCCESS_RESPONSE_SCHEMA = {
  type: "object",
  additionalProperties: true,
  description: "Generic success payload. Route-specific response schema is recommended.",
};

const DEFAULT_API_ERROR_RESPONSE_SCHEMA = {
  type: "object",
  required: ["error", "message", "statusCode"],
  additionalProperties: false,
  properties: {
    error: { type: "string" },
    message: { type: "string" },
    statusCode: { type: "integer", minimum: 400, maximum: 599 },
  },
};

const DEFAULT_API_ERROR_RESPONSE_STATUS_CODES = [
  "400",
  "401",
  "403",
  "404",
  "409",
  "422",
  "429",
  "500",
] as const;

function isPlainObject(node: unknown): node is Record<string, unknown> {
  return Boolean(node) && typeof node === "object" && !Array.isArray(node);
}

function normalizeRouteMethods(method: unknown): string[] {
  if (Array.isArray(method)) {
    return method.map((entry) => String(entry).toUpperCase());
  }
  if (method == null) return [];
  return [String(method).toUpperCase()];
}

function inferApiTag(url: string): string {
  if (url.startsWith("/api/v1/auth/")) return "auth";
  if (url.startsWith("/api/v1/registrations") || url.startsWith("/api/v1/admin/registrations")) {
    return "registrations";
  }
  if (url.startsWith("/api/v1/admin/criminal-cases")) return "criminal-cases";
  if (url.startsWith("/api/v1/admin/reports/") || url === "/api/v1/admin/audit" || url === "/api/v1/admin/stats") {
    return "reports";
  }
  if (url.startsWith("/api/v1/admin/")) return "admin";
  if (
    url.startsWith("/api/v1/tax-ids/") ||
    url.startsWith("/api/v1/voter-records/") ||
    url.startsWith("/api/v1/sims/") ||
    url.startsWith("/api/v1/bank-accounts/") ||
    /^\/api\/v1\/identities\/:nationalId\/(tax-ids|voter-records|sims|bank-accounts)$/.test(url)
  ) {
    return "service-records";
  }
  if (url.startsWith("/api/v1/identities/")) return "identities";
  return "api";
}

function inferOperationId(method: string, url: string): string {
  const cleanedPath = url
    .replace(/^\/+/, "")
    .replace(/\/+$/, "")
    .split("/")
    .filter(Boolean)
    .map((segment) => {
      if (segment === "*") return "wildcard";
      if (segment.startsWith(":")) return `by_${segment.slice(1)}`;
      return segment.replace(/[^A-Za-z0-9]+/g, "_");
    })
    .join("_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
  return `${method.toLowerCase()}_${cleanedPath}` || `${method.toLowerCase()}_root`;
}

function ensureOpenApiContractDefaults(input: {
  schema: unknown;
  url: string;
  method: string;
}): Record<string, unknown> {
  const nextSchema: Record<string, unknown> = isPlainObject(input.schema) ? { ...input.schema } : {};

  if (!input.url.startsWith("/api/v1/")) {
    return nextSchema;
  }

  const currentOperationId = nextSchema.operationId;
  if (typeof currentOperationId !== "string" || currentOperationId.trim().length === 0) {
    nextSchema.operationId = inferOperationId(input.method, input.url);
  }

  const currentTags = nextSchema.tags;
  if (!Array.isArray(currentTags) || currentTags.length === 0) {
    nextSchema.tags = [inferApiTag(input.url)];
  }

  const currentSecurity = nextSchema.security;
  if (!isPublicRoutePath(input.url)) {
    if (!Array.isArray(currentSecurity) || currentSecurity.length === 0) {
      nextSchema.security = [{ bearerAuth: [] }];
    }
  }

  const responseSchemas: Record<string, unknown> = isPlainObject(nextSchema.response)
    ? { ...nextSchema.response }
    : {};
  const has2xx = Object.keys(responseSchemas).some((statusCode) => /^2\d\d$/.test(statusCode));
  if (!has2xx) {
    responseSchemas["200"] = DEFAULT_API_SUCCESS_RESPONSE_SCHEMA;
  }
  for (const statusCode of DEFAULT_API_ERROR_RESPONSE_STATUS_CODES) {
    if (!responseSchemas[statusCode]) {
      responseSchemas[statusCode] = DEFAULT_API_ERROR_RESPONSE_SCHEMA;
    }
  }
  nextSchema.response = responseSchemas;

  return nextSchema;
}

function routeLabelForMetrics(request: FastifyRequest): string {
  const routeUrl = request.routeOptions.url;
  if (routeUrl) return routeUrl;
  const rawPath = request.url.split("?")[0];
  return rawPath || "UNKNOWN_ROUTE";
}

function isStrictObjectSchema(node: unknown): boolean {
  return isPlainObject(node) && node.type === "object" && node.additionalProperties === false;
}

function containsStrictObjectSchema(node: unknown): boolean {
  if (!isPlainObject(node)) return false;
  if (isStrictObjectSchema(node)) return true;
  const unionNodes = [node.anyOf, node.oneOf, node.allOf];
  return unionNodes.some(
    (entry) => Array.isArray(entry) && entry.some((item) => containsStrictObjectSchema(item))
  );
}

function hasStrictRouteSchemaSection(
  routeSchema: unknown,
  section: "body" | "params" | "querystring"
): boolean {
  if (!isPlainObject(routeSchema)) return false;
  return containsStrictObjectSchema(routeSchema[section]);
}

/** Build and return the Fastify app with all routes (no listen). Used by server and tests. */
export async function buildApp(logger = true): Promise<FastifyInstance> {
  const testRuntime = isTestRuntime();
  const docsEnabled = process.env.ENABLE_API_DOCS === "true" || process.env.NODE_ENV !== "production";
  const app = Fastify({
    logger,
    requestTimeout: parsePositiveIntEnv(process.env.REQUEST_TIMEOUT_MS, 30000),
    requestIdHeader: "x-request-id",
    genReqId: (req) => {
      const incomingHeader = req.headers["x-request-id"];
      if (typeof incomingHeader === "string" && incomingHeader.trim().length > 0) {
        return incomingHeader.trim();
      }
      if (Array.isArray(incomingHeader) && incomingHeader[0]?.trim().length) {
        return incomingHeader[0].trim();
      }
      return randomUUID();
    },
    ajv: {
      customOptions: {
        // Keep unknown keys so strict schemas (additionalProperties: false)
        // return 400 instead of silently dropping fields.
        removeAdditional: false,
      },
    },
  });

  app.addHook("onRequest", async (request, reply) => {
    request.metricsStartedAtNs = process.hrtime.bigint();
    setLogContext({ requestId: request.id });
    reply.header("x-request-id", request.id);
    const activeSpan = trace.getActiveSpan();
    if (activeSpan) {
      activeSpan.setAttribute("request.id", request.id);
    }
  });

  app.addHook("onError", async (request, _reply, error) => {
    const activeSpan = trace.getActiveSpan();
    if (activeSpan && !isRegistryError(error)) {
      activeSpan.recordException(error);
      activeSpan.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    }
    setLogContext({ requestId: request.id });
  });

  app.addHook("onResponse", async (request, reply) => {
    setLogContext({ requestId: request.id });
    if (!request.metricsStartedAtNs) return;
    const elapsedNs = process.hrtime.bigint() - request.metricsStartedAtNs;
    const durationSeconds = Number(elapsedNs) / 1_000_000_000;
    recordHttpRequestMetric({
      method: request.method,
      route: routeLabelForMetrics(request),
      statusCode: reply.statusCode,
      durationSeconds,
    });
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: "Civic Registry API",
        description: "Identity records, linked government services and the registration approval workflow.",
        version: "1.0.0",
      },
      tags: [
        { name: "health", description: "Service health and readiness" },
        { name: "auth", description: "Credential verification and the current principal" },
        { name: "registrations", description: "Self-service registration and its review" },
        { name: "identities", description: "Identity dashboard, contact details and biometrics" },
        { name: "service-records", description: "Tax IDs, voter records, SIMs and bank accounts" },
        { name: "criminal-cases", description: "Criminal case management and identity links" },
        { name: "reports", description: "Derived counts, audit trail and registry totals" },
        { name: "admin", description: "Identity directory and account administration" },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: "http",
            scheme: "bearer",
            bearerFormat: "JWT",
          },
        },
      },
    },
    transform: ({ schema, url, route }) => {
      const methods = normalizeRouteMethods(route.method);
      const primaryMethod = methods[0] || "GET";
      const transformedSchema = ensureOpenApiContractDefaults({
        schema,
        url,
        method: primaryMethod,
      });
      return { schema: transformedSchema, url };
    },
  });

  if (docsEnabled) {
    await app.register(swaggerUi, {
      routePrefix: "/docs",
      uiConfig: {
        docExpansion: "list",
        deepLinking: false,
      },
      staticCSP: true,
      transformStaticCSP: (header) => header,
    });
  }

  app.setErrorHandler((error, _request, reply) => {
    if (isRegistryError(error)) {
      return reply.send(sendDomainError(reply, error));
    }
    if (error.validation) {
      const context = error.validationContext;
      const errorCode =
        context === "querystring"
          ? "INVALID_QUERY_PARAMS"
          : context === "params"
            ? "INVALID_PATH_PARAMS"
            : "INVALID_REQUEST_BODY";
      return reply.send(send400(reply, errorCode, error.message || "Request validation failed"));
    }
    // Never expose internal error details to clients
    logError("Unhandled request error", {
      message: error.message,
      stack: error.stack,
      statusCode: error.statusCode,
    });
    const statusCode = error.statusCode || 500;
    if (statusCode >= 500) {
      return reply.send(sendError(reply, 500, "INTERNAL_ERROR", "An unexpected error occurred"));
    }
    // For 4xx errors from Fastify itself (e.g. 413, 415), return a clean message
    return reply.send(sendError(reply, statusCode, error.code || "ERROR", error.message));
  });

  // Fail app boot early if runtime configuration is unsafe.
  const runtimeAdapterPreflight = evaluateRuntimeAdapterPreflight(process.env);
  for (const warning of runtimeAdapterPreflight.warnings) {
    app.log.warn({ code: warning.code, message: warning.message }, "runtime adapter preflight warning");
  }
  runRuntimeAdapterPreflightOrThrow(process.env);

  // Mutations carry a strict body schema; deletes and parameterised reads a
  // strict params schema.
  app.addHook("onRoute", (routeOptions) => {
    const methods = normalizeRouteMethods(routeOptions.method);
    const isDelete = methods.includes("DELETE");
    const isMutation = methods.some((method) => {
      return method !== "GET" && method !== "HEAD" && method !== "OPTIONS" && method !== "DELETE";
    });
    if (isMutation && !hasStrictRouteSchemaSection(routeOptions.schema, "body")) {
      throw new Error(
        `[MUTATION_SCHEMA_REQUIRED] ${methods.join(",")} ${routeOptions.url} must define a strict body schema (additionalProperties=false object, optionally within anyOf/oneOf/allOf)`
      );
    }

    if (!isDelete && !methods.includes("GET")) return;

    const routeHasPathParams = routeOptions.url.includes(":") || routeOptions.url.includes("*");
    if (routeHasPathParams && !hasStrictRouteSchemaSection(routeOptions.schema, "params")) {
      throw new Error(
        `[READ_PARAMS_SCHEMA_REQUIRED] ${methods.join(",")} ${routeOptions.url} must define a strict params schema (object + additionalProperties=false)`
      );
    }

    if (
      methods.includes("GET") &&
      routeOptions.url.startsWith("/api/v1/admin/") &&
      !routeHasPathParams &&
      !hasStrictRouteSchemaSection(routeOptions.schema, "querystring")
    ) {
      throw new Error(
        `[READ_QUERY_SCHEMA_REQUIRED] GET ${routeOptions.url} must define a strict querystring schema (object + additionalProperties=false)`
      );
    }
  });

  // CORS requires explicit allowed origins outside tests.
  const rawAllowedOrigins = process.env.ALLOWED_ORIGINS;
  if (!rawAllowedOrigins && !testRuntime) {
    throw new Error("FATAL: ALLOWED_ORIGINS must be set in non-test runtime");
  }
  const allowedOrigins = rawAllowedOrigins
    ? rawAllowedOrigins.split(",").map((o) => o.trim()).filter(Boolean)
    : true;
  await app.register(cors, { origin: allowedOrigins });

  // Global rate limiting: default 100 req/min per IP (override via env for tests/load)
  await app.register(rateLimit, {
    max: parsePositiveIntEnv(process.env.RATE_LIMIT_MAX, 100),
    timeWindow: process.env.RATE_LIMIT_WINDOW || "1 minute",
  });

  registerAuthMiddleware(app);

  app.get("/health", { schema: { tags: ["health"] } }, async () => {
    return { status: "ok" };
  });

  app.get("/ready", { schema: { tags: ["health"] } }, async (_request, reply) => {
    const store = getRegistryStore();
    try {
      await store.ping();
      return { status: "ok", store: store.name };
    } catch (error) {
      logError("Readiness check failed", { store: store.name, error });
      reply.code(503);
      return { status: "degraded", reason: "store_unreachable" };
    }
  });

  app.get(
    "/metrics",
    {
      schema: {
        querystring: {
          type: "object",
          additionalProperties: false,
          properties: {},
        },
      },
    },
    async (_request, reply) => {
      if (getRegistryStore().name === "postgres") {
        updateDbPoolMetric({
          totalClients: pool.totalCount,
          idleClients: pool.idleCount,
          waitingClients: pool.waitingCount,
        });
      }
      // Refreshes the pending-registration gauges as a side effect.
      await listPendingRegistrations();
      reply.header("content-type", getMetricsContentType());
      reply.header("cache-control", "no-store");
      return getMetricsSnapshot();
    }
  );

  await registerAuthRoutes(app);
  await registerRegistrationRoutes(app);
  await registerIdentityRoutes(app);
  await registerServiceRecordRoutes(app);
  await registerCriminalCaseRoutes(app);
  await registerAdminRoutes(app);
  await registerAdminReportRoutes(app);

  if (docsEnabled) {
    app.get("/api/v1/openapi.json", async (_request, reply) => {
      reply.header("cache-control", "no-store");
      return app.swagger();
    });
  }

  return app;
}
