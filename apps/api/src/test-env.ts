import { beforeAll, beforeEach } from "vitest";

/**
 * Test runtime env preflight.
 *
 * Suites run against the in-memory registry store; nothing reaches Postgres.
 * Argon2 costs are lowered so credential tests stay fast.
 */
process.env.REGISTRY_STORE = "memory";
process.env.OTEL_ENABLED = "false";

if (!process.env.ALLOWED_ORIGINS) {
  process.env.ALLOWED_ORIGINS = "http://localhost:5173";
}

if (!process.env.JWT_SECRET) {
  process.env.JWT_SECRET = "test-secret";
}

process.env.ARGON2_MEMORY_COST = "1024";
process.env.ARGON2_TIME_COST = "2";

// Imported lazily so modules a test file mocks with vi.mock are not cached by this setup file first.
let resetRegistryStoreForTests: () => void;

beforeAll(async () => {
  ({ resetRegistryStoreForTests } = await import("./store"));
});

beforeEach(() => {
  resetRegistryStoreForTests();
});
