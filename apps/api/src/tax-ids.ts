import {
  StatusUpdateSchema,
  TaxIdRegistrationSchema,
  type StatusUpdateInput,
  type TaxIdRegistrationInput,
} from "@civic-registry/shared";
import { canActOn, type Actor } from "./actor";
import { AUDIT_OPERATIONS, recordAudit } from "./audit";
import { NotFoundError, parseInput } from "./errors";
import { requireIdentity, requireIdentityFor } from "./identities";
import { getRegistryStore } from "./store";
import type { RegistryTx, TaxIdRow } from "./store/types";

export interface TaxId {
  code: string;
  nationalId: string;
  issueDate: string;
  status: string;
}

export function toTaxId(row: TaxIdRow): TaxId {
  return { code: row.code, nationalId: row.national_id, issueDate: row.issue_date, status: row.status };
}

function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}

async function requireTaxId(tx: RegistryTx, actor: Actor, code: string): Promise<TaxIdRow> {
  const row = await tx.findTaxId(code);
  if (!row || !canActOn(actor, row.national_id)) {
    throw new NotFoundError("TAX_ID_NOT_FOUND", `No tax ID ${code}`);
  }
  return row;
}

export async function registerTaxId(
  nationalId: string,
  rawInput: TaxIdRegistrationInput,
  actor: Actor
): Promise<TaxId> {
  const input = parseInput(TaxIdRegistrationSchema, rawInput);
  const row = await getRegistryStore().transaction(async (tx) => {
    await requireIdentityFor(tx, actor, nationalId);
    const created = await tx.insertTaxId({
      code: input.code,
      national_id: nationalId,
      issue_date: input.issueDate,
      status: input.status,
    });
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.REGISTER_TAX_ID,
      table: "tax_id",
      recordId: created.code,
      details: `Issued ${created.issue_date}, status ${created.status}`,
    });
    return created;
  });
  return toTaxId(row);
}

export async function listTaxIds(nationalId: string): Promise<TaxId[]> {
  const rows = await getRegistryStore().transaction(
    async (tx) => {
      await requireIdentity(tx, nationalId);
      return tx.listTaxIds(nationalId);
    },
    { readOnly: true }
  );
  return rows.map(toTaxId);
}

export async function updateTaxIdStatus(code: string, rawInput: StatusUpdateInput, actor: Actor): Promise<TaxId> {
  const { status } = parseInput(StatusUpdateSchema, rawInput);
  const key = normalizeCode(code);
  const row = await getRegistryStore().transaction(async (tx) => {
    const current = await requireTaxId(tx, actor, key);
    const updated = await tx.updateTaxIdStatus(key, status);
    if (!updated) throw new NotFoundError("TAX_ID_NOT_FOUND", `No tax ID ${key}`);
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.UPDATE_TAX_ID,
      table: "tax_id",
      recordId: key,
      details: `Status ${current.status} -> ${updated.status}`,
    });
    return updated;
  });
  return toTaxId(row);
}

export async function deleteTaxId(code: string, actor: Actor): Promise<void> {
  const key = normalizeCode(code);
  await getRegistryStore().transaction(async (tx) => {
    await requireTaxId(tx, actor, key);
    await tx.deleteTaxId(key);
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.DELETE_TAX_ID,
      table: "tax_id",
      recordId: key,
    });
  });
}
