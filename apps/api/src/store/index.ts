import { logInfo } from "../logger";
import { InMemoryRegistryStore } from "./memory-store";
import { PostgresRegistryStore } from "./postgres-store";
import type { RegistryStore } from "./types";

export type RegistryStoreKind = RegistryStore["name"];

const STORE_KINDS = new Set<string>(["postgres", "memory"]);

export function resolveRegistryStoreKind(env: NodeJS.ProcessEnv = process.env): RegistryStoreKind {
  const configured = (env.REGISTRY_STORE || "postgres").trim().toLowerCase();
  if (configured === "memory") return "memory";
  if (configured === "postgres") return "postgres";
  throw new Error(
    `Unsupported REGISTRY_STORE=${configured}. Supported: ${Array.from(STORE_KINDS).join(", ")}`
  );
}

let cachedStore: RegistryStore | null = null;

function createStore(kind: RegistryStoreKind): RegistryStore {
  if (kind === "memory") return new InMemoryRegistryStore();
  return new PostgresRegistryStore();
}

export function getRegistryStore(): RegistryStore {
  if (cachedStore) return cachedStore;
  const kind = resolveRegistryStoreKind();
  cachedStore = createStore(kind);
  logInfo("Registry store selected", { store: kind });
  return cachedStore;
}

/** Swap in a fresh in-memory store (or the given one) for the next test. */
export function resetRegistryStoreForTests(store: RegistryStore = new InMemoryRegistryStore()): RegistryStore {
  cachedStore = store;
  return store;
}

export type { RegistryStore, RegistryTx } from "./types";
