import { LOCK_TIMEOUT_PATTERN, isProductionRuntime } from "./runtime-safety";

type PreflightLevel = "error" | "warning";

export interface RuntimeAdapterPreflightIssue {
  level: PreflightLevel;
  code: string;
  message: string;
}

export interface RuntimeAdapterPreflightResult {
  errors: RuntimeAdapterPreflightIssue[];
  warnings: RuntimeAdapterPreflightIssue[];
}

type EnvMap = NodeJS.ProcessEnv;

const REGISTRY_STORES = new Set(["postgres", "memory"]);
const MIN_JWT_SECRET_LENGTH = 32;

function normalize(value: string | undefined, fallback = ""): string {
  return (value || fallback).trim();
}

function normalizeLower(value: string | undefined, fallback = ""): string {
  return normalize(value, fallback).toLowerCase();
}

function isTruthy(value: string | undefined): boolean {
  return normalizeLower(value) === "true";
}

function isPositiveInteger(value: string | undefined): boolean {
  return /^[1-9][0-9]*$/.test(normalize(value));
}

function addIssue(
  result: RuntimeAdapterPreflightResult,
  level: PreflightLevel,
  code: string,
  message: string
): void {
  const issue: RuntimeAdapterPreflightIssue = { level, code, message };
  if (level === "error") {
    result.errors.push(issue);
    return;
  }
  result.warnings.push(issue);
}

/** Numeric settings that fall back to a default when malformed; flag them. */
const NUMERIC_SETTINGS = [
  "DB_POOL_MAX",
  "DB_SLOW_QUERY_MS",
  "LOGIN_MAX_FAILED_ATTEMPTS",
  "PHOTO_MAX_BYTES",
  "ARGON2_MEMORY_COST",
  "ARGON2_TIME_COST",
  "RATE_LIMIT_MAX",
] as const;

export function evaluateRuntimeAdapterPreflight(env: EnvMap = process.env): RuntimeAdapterPreflightResult {
  const result: RuntimeAdapterPreflightResult = { errors: [], warnings: [] };
  const production = isProductionRuntime(env);
  const store = normalizeLower(env.REGISTRY_STORE, "postgres");

  if (!REGISTRY_STORES.has(store)) {
    addIssue(
      result,
      "error",
      "UNKNOWN_REGISTRY_STORE",
      `Unsupported REGISTRY_STORE=${store}. Supported: postgres, memory`
    );
  }

  if (store === "memory") {
    if (production && !isTruthy(env.ALLOW_MEMORY_STORE_IN_PRODUCTION)) {
      addIssue(
        result,
        "error",
        "PROD_MEMORY_STORE",
        "REGISTRY_STORE=memory is not allowed in production unless ALLOW_MEMORY_STORE_IN_PRODUCTION=true"
      );
    } else if (!production) {
      addIssue(result, "warning", "MEMORY_STORE", "REGISTRY_STORE=memory keeps all registry data in process memory");
    }
  }

  if (store === "postgres" && !normalize(env.DATABASE_URL) && production) {
    addIssue(result, "error", "MISSING_DATABASE_URL", "DATABASE_URL is required for REGISTRY_STORE=postgres");
  }

  const lockTimeout = normalize(env.DB_LOCK_TIMEOUT);
  if (lockTimeout && !LOCK_TIMEOUT_PATTERN.test(lockTimeout)) {
    addIssue(
      result,
      "error",
      "INVALID_DB_LOCK_TIMEOUT",
      `DB_LOCK_TIMEOUT=${lockTimeout} must be a whole number with an optional ms, s or min unit`
    );
  }

  const jwtSecret = normalize(env.JWT_SECRET);
  if (production) {
    if (!jwtSecret) {
      addIssue(result, "error", "MISSING_JWT_SECRET", "JWT_SECRET is required in production");
    } else if (jwtSecret.length < MIN_JWT_SECRET_LENGTH) {
      addIssue(
        result,
        "error",
        "WEAK_JWT_SECRET",
        `JWT_SECRET must be at least ${MIN_JWT_SECRET_LENGTH} characters in production`
      );
    }
    if (!normalize(env.ALLOWED_ORIGINS)) {
      addIssue(result, "error", "MISSING_ALLOWED_ORIGINS", "ALLOWED_ORIGINS is required in production");
    }
    if (isTruthy(env.ENABLE_API_DOCS)) {
      addIssue(result, "warning", "PROD_API_DOCS_ENABLED", "ENABLE_API_DOCS=true exposes the OpenAPI UI in production");
    }
  }

  for (const key of NUMERIC_SETTINGS) {
    const raw = env[key];
    if (raw !== undefined && normalize(raw) !== "" && !isPositiveInteger(raw)) {
      addIssue(result, "warning", "INVALID_NUMERIC_SETTING", `${key}=${raw} is not a positive integer; the default applies`);
    }
  }

  return result;
}

export function runRuntimeAdapterPreflightOrThrow(env: EnvMap = process.env): void {
  const result = evaluateRuntimeAdapterPreflight(env);
  if (result.errors.length === 0) {
    return;
  }
  const details = result.errors.map((issue) => `${issue.code}: ${issue.message}`).join("; ");
  throw new Error(`[RUNTIME_ADAPTER_PREFLIGHT_FAILED] ${details}`);
}
