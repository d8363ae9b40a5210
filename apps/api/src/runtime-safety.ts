/**
 * Runtime safety helpers.
 */
export function isTestRuntime(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST === "true";
}

export function isProductionRuntime(env: NodeJS.ProcessEnv = process.env): boolean {
  return (env.NODE_ENV || "").trim().toLowerCase() === "production";
}

export function parsePositiveIntEnv(rawValue: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(rawValue || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** Postgres interval literal accepted for `SET LOCAL lock_timeout`. */
export const LOCK_TIMEOUT_PATTERN = /^[0-9]+(ms|s|min)?$/;
