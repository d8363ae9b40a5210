import {
  SimRegistrationSchema,
  StatusUpdateSchema,
  type SimRegistrationInput,
  type StatusUpdateInput,
} from "@civic-registry/shared";
import { canActOn, type Actor } from "./actor";
import { AUDIT_OPERATIONS, recordAudit } from "./audit";
import { NotFoundError, parseInput } from "./errors";
import { requireIdentity, requireIdentityFor } from "./identities";
import { getRegistryStore } from "./store";
import type { RegistryTx, SimRecordRow } from "./store/types";

export interface SimRecord {
  simNumber: string;
  nationalId: string;
  provider: string;
  status: string;
}

export function toSimRecord(row: SimRecordRow): SimRecord {
  return { simNumber: row.sim_number, nationalId: row.national_id, provider: row.provider, status: row.status };
}

async function requireSim(tx: RegistryTx, actor: Actor, simNumber: string): Promise<SimRecordRow> {
  const row = await tx.findSim(simNumber);
  if (!row || !canActOn(actor, row.national_id)) {
    throw new NotFoundError("SIM_NOT_FOUND", `No SIM ${simNumber}`);
  }
  return row;
}

export async function registerSim(nationalId: string, rawInput: SimRegistrationInput, actor: Actor): Promise<SimRecord> {
  const input = parseInput(SimRegistrationSchema, rawInput);
  const row = await getRegistryStore().transaction(async (tx) => {
    await requireIdentityFor(tx, actor, nationalId);
    const created = await tx.insertSim({
      sim_number: input.simNumber,
      national_id: nationalId,
      provider: input.provider,
      status: input.status,
    });
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.REGISTER_SIM,
      table: "sim_record",
      recordId: created.sim_number,
      details: `Provider ${created.provider}`,
    });
    return created;
  });
  return toSimRecord(row);
}

export async function listSims(nationalId: string): Promise<SimRecord[]> {
  const rows = await getRegistryStore().transaction(
    async (tx) => {
      await requireIdentity(tx, nationalId);
      return tx.listSims(nationalId);
    },
    { readOnly: true }
  );
  return rows.map(toSimRecord);
}

export async function updateSimStatus(
  simNumber: string,
  rawInput: StatusUpdateInput,
  actor: Actor
): Promise<SimRecord> {
  const { status } = parseInput(StatusUpdateSchema, rawInput);
  const key = simNumber.trim();
  const row = await getRegistryStore().transaction(async (tx) => {
    const current = await requireSim(tx, actor, key);
    const updated = await tx.updateSimStatus(key, status);
    if (!updated) throw new NotFoundError("SIM_NOT_FOUND", `No SIM ${key}`);
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.UPDATE_SIM,
      table: "sim_record",
      recordId: key,
      details: `Status ${current.status} -> ${updated.status}`,
    });
    return updated;
  });
  return toSimRecord(row);
}

export async function deleteSim(simNumber: string, actor: Actor): Promise<void> {
  const key = simNumber.trim();
  await getRegistryStore().transaction(async (tx) => {
    await requireSim(tx, actor, key);
    await tx.deleteSim(key);
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.DELETE_SIM,
      table: "sim_record",
      recordId: key,
    });
  });
}
