import {
  LinkedRecordKindEnum,
  MaxCombinedSchema,
  MinimumThresholdSchema,
  ageInYears,
  type AccountStatus,
  type LinkedRecordKind,
  type MaxCombinedInput,
  type MinimumThresholdInput,
} from "@civic-registry/shared";
import { parseInput } from "./errors";
import { requireIdentity, toIdentity, type Identity } from "./identities";
import { getRegistryStore } from "./store";
import type { CombinedCountRow, RegistryTx } from "./store/types";

export type ServiceCounts = Record<LinkedRecordKind, number>;

export interface LinkedCount {
  nationalId: string;
  name: string;
  count: number;
  keys: string[];
}

export interface CombinedCount {
  nationalId: string;
  name: string;
  countA: number;
  countB: number;
  total: number;
}

export interface CitizenDashboard {
  identity: Identity;
  age: number;
  accountStatus: AccountStatus | null;
  lastLogin: string | null;
  counts: ServiceCounts;
}

export interface RegistryStatistics {
  identities: number;
  activeAccounts: number;
  pendingRegistrations: number;
  taxIds: number;
  voterRecords: number;
  sims: number;
  bankAccounts: number;
  criminalCases: number;
}

async function readCounts(tx: RegistryTx, nationalId: string): Promise<ServiceCounts> {
  const counts: ServiceCounts = { taxId: 0, voter: 0, sim: 0, bank: 0, case: 0 };
  for (const kind of LinkedRecordKindEnum.options) {
    counts[kind] = await tx.countLinked(nationalId, kind);
  }
  return counts;
}

/** Zero for an identity with nothing linked, and for an unknown national ID. */
export async function countLinked(nationalId: string, kind: LinkedRecordKind): Promise<number> {
  const parsedKind = parseInput(LinkedRecordKindEnum, kind);
  return getRegistryStore().transaction((tx) => tx.countLinked(nationalId, parsedKind), { readOnly: true });
}

export async function getServiceCounts(nationalId: string): Promise<ServiceCounts> {
  return getRegistryStore().transaction((tx) => readCounts(tx, nationalId), { readOnly: true });
}

/** Count descending, then name ascending. */
export async function identitiesWithMinimum(rawInput: MinimumThresholdInput): Promise<LinkedCount[]> {
  const { kind, threshold } = parseInput(MinimumThresholdSchema, rawInput);
  const rows = await getRegistryStore().transaction((tx) => tx.identitiesWithMinimum(kind, threshold), {
    readOnly: true,
  });
  return rows.map((row) => ({ nationalId: row.national_id, name: row.name, count: row.count, keys: row.keys }));
}

function compareCombined(a: CombinedCountRow, b: CombinedCountRow): number {
  return (
    b.count_a - a.count_a ||
    b.count_b - a.count_b ||
    (a.name < b.name ? -1 : a.name > b.name ? 1 : 0) ||
    (a.national_id < b.national_id ? -1 : a.national_id > b.national_id ? 1 : 0)
  );
}

/**
 * Identities with the highest combined count over two record kinds, among
 * those holding at least one record of each. Every identity sharing the
 * maximum is returned unless `single` asks for the first after tie-breaking.
 */
export async function maxCombined(rawInput: MaxCombinedInput): Promise<CombinedCount[]> {
  const { kinds, single } = parseInput(MaxCombinedSchema, rawInput);
  const [kindA, kindB] = kinds;
  const rows = await getRegistryStore().transaction((tx) => tx.combinedCounts(kindA, kindB), { readOnly: true });
  if (rows.length === 0) return [];

  const best = Math.max(...rows.map((row) => row.count_a + row.count_b));
  const winners = rows.filter((row) => row.count_a + row.count_b === best).sort(compareCombined);
  return (single ? winners.slice(0, 1) : winners).map((row) => ({
    nationalId: row.national_id,
    name: row.name,
    countA: row.count_a,
    countB: row.count_b,
    total: row.count_a + row.count_b,
  }));
}

export async function getCitizenDashboard(nationalId: string, today?: string): Promise<CitizenDashboard> {
  return getRegistryStore().transaction(
    async (tx) => {
      const identity = await requireIdentity(tx, nationalId);
      const account = await tx.findCitizenAccountByNationalId(nationalId);
      return {
        identity: toIdentity(identity),
        age: ageInYears(identity.birth_date, today),
        accountStatus: account ? account.account_status : null,
        lastLogin: account?.last_login ? account.last_login.toISOString() : null,
        counts: await readCounts(tx, nationalId),
      };
    },
    { readOnly: true }
  );
}

export async function getRegistryStatistics(): Promise<RegistryStatistics> {
  const row = await getRegistryStore().transaction((tx) => tx.registryStatistics(), { readOnly: true });
  return {
    identities: row.identities,
    activeAccounts: row.active_accounts,
    pendingRegistrations: row.pending_registrations,
    taxIds: row.tax_ids,
    voterRecords: row.voter_records,
    sims: row.sims,
    bankAccounts: row.bank_accounts,
    criminalCases: row.criminal_cases,
  };
}
