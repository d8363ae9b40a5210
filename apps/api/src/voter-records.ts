import {
  VoterRecordRegistrationSchema,
  VoterRecordUpdateSchema,
  type VoterRecordRegistrationInput,
  type VoterRecordUpdateInput,
  type VoterRegistrationType,
} from "@civic-registry/shared";
import { canActOn, type Actor } from "./actor";
import { AUDIT_OPERATIONS, recordAudit } from "./audit";
import { NotFoundError, parseInput } from "./errors";
import { requireIdentity, requireIdentityFor } from "./identities";
import { getRegistryStore } from "./store";
import type { RegistryTx, VoterRecordPatch, VoterRecordRow } from "./store/types";

export interface VoterRecord {
  code: string;
  nationalId: string;
  holderName: string;
  address: string;
  registrationType: VoterRegistrationType;
  issueDate: string | null;
  status: string;
  isPrimary: boolean;
  createdOn: string;
  lastUpdatedOn: string;
}

export function toVoterRecord(row: VoterRecordRow): VoterRecord {
  return {
    code: row.code,
    nationalId: row.national_id,
    holderName: row.holder_name,
    address: row.address,
    registrationType: row.registration_type,
    issueDate: row.issue_date,
    status: row.status,
    isPrimary: row.is_primary,
    createdOn: row.created_on.toISOString(),
    lastUpdatedOn: row.last_updated_on.toISOString(),
  };
}

async function requireVoterRecord(tx: RegistryTx, actor: Actor, code: string): Promise<VoterRecordRow> {
  const row = await tx.findVoterRecord(code);
  if (!row || !canActOn(actor, row.national_id)) {
    throw new NotFoundError("VOTER_RECORD_NOT_FOUND", `No voter record ${code}`);
  }
  return row;
}

/** The holder name is copied from the identity at registration time. */
export async function registerVoterRecord(
  nationalId: string,
  rawInput: VoterRecordRegistrationInput,
  actor: Actor
): Promise<VoterRecord> {
  const input = parseInput(VoterRecordRegistrationSchema, rawInput);
  const row = await getRegistryStore().transaction(async (tx) => {
    const identity = await requireIdentityFor(tx, actor, nationalId);
    if (input.isPrimary) {
      await tx.clearPrimaryVoterRecords(nationalId);
    }
    const created = await tx.insertVoterRecord({
      code: input.code,
      national_id: nationalId,
      holder_name: identity.name,
      address: input.address,
      registration_type: input.registrationType,
      issue_date: input.issueDate ?? null,
      status: input.status,
      is_primary: input.isPrimary,
    });
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.REGISTER_VOTER_RECORD,
      table: "voter_record",
      recordId: created.code,
      details: `${created.registration_type} registration${created.is_primary ? ", primary" : ""}`,
    });
    return created;
  });
  return toVoterRecord(row);
}

export async function listVoterRecords(nationalId: string): Promise<VoterRecord[]> {
  const rows = await getRegistryStore().transaction(
    async (tx) => {
      await requireIdentity(tx, nationalId);
      return tx.listVoterRecords(nationalId);
    },
    { readOnly: true }
  );
  return rows.map(toVoterRecord);
}

export async function updateVoterRecord(
  code: string,
  rawInput: VoterRecordUpdateInput,
  actor: Actor
): Promise<VoterRecord> {
  const input = parseInput(VoterRecordUpdateSchema, rawInput);
  const key = code.trim().toUpperCase();
  const patch: VoterRecordPatch = {};
  if (input.address !== undefined) patch.address = input.address;
  if (input.registrationType !== undefined) patch.registration_type = input.registrationType;
  if (input.status !== undefined) patch.status = input.status;
  if (input.isPrimary !== undefined) patch.is_primary = input.isPrimary;

  const row = await getRegistryStore().transaction(async (tx) => {
    const current = await requireVoterRecord(tx, actor, key);
    if (patch.is_primary) {
      await tx.clearPrimaryVoterRecords(current.national_id, key);
    }
    const updated = await tx.updateVoterRecord(key, patch);
    if (!updated) throw new NotFoundError("VOTER_RECORD_NOT_FOUND", `No voter record ${key}`);
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.UPDATE_VOTER_RECORD,
      table: "voter_record",
      recordId: key,
      details: `Updated ${Object.keys(patch).join(", ")}`,
    });
    return updated;
  });
  return toVoterRecord(row);
}

export async function deleteVoterRecord(code: string, actor: Actor): Promise<void> {
  const key = code.trim().toUpperCase();
  await getRegistryStore().transaction(async (tx) => {
    await requireVoterRecord(tx, actor, key);
    await tx.deleteVoterRecord(key);
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.DELETE_VOTER_RECORD,
      table: "voter_record",
      recordId: key,
    });
  });
}
