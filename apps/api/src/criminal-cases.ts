import { CriminalCaseRegistrationSchema, type CriminalCaseRegistrationInput } from "@civic-registry/shared";
import type { StaffActor } from "./actor";
import { AUDIT_OPERATIONS, recordAudit } from "./audit";
import { NotFoundError, parseInput } from "./errors";
import { requireIdentity } from "./identities";
import { getRegistryStore } from "./store";
import type { CaseLinkRow, CriminalCaseRow, RegistryTx } from "./store/types";

export interface CriminalCaseSummary {
  caseNumber: number;
  offence: string;
}

export interface CriminalCase extends CriminalCaseSummary {
  linkedIdentities: Array<{ nationalId: string; name: string }>;
}

function toSummary(row: CriminalCaseRow): CriminalCaseSummary {
  return { caseNumber: row.case_number, offence: row.offence };
}

function toCriminalCase(row: CriminalCaseRow, links: CaseLinkRow[]): CriminalCase {
  return {
    ...toSummary(row),
    linkedIdentities: links.map((link) => ({ nationalId: link.national_id, name: link.name })),
  };
}

async function requireCase(tx: RegistryTx, caseNumber: number): Promise<CriminalCaseRow> {
  const row = Number.isSafeInteger(caseNumber) && caseNumber > 0 ? await tx.findCriminalCase(caseNumber) : null;
  if (!row) {
    throw new NotFoundError("CASE_NOT_FOUND", `No criminal case ${caseNumber}`);
  }
  return row;
}

/** Opens a case and links the given identities in one step. */
export async function registerCriminalCase(
  rawInput: CriminalCaseRegistrationInput,
  actor: StaffActor
): Promise<CriminalCase> {
  const input = parseInput(CriminalCaseRegistrationSchema, rawInput);
  return getRegistryStore().transaction(async (tx) => {
    const created = await tx.insertCriminalCase(input.offence);
    for (const nationalId of input.nationalIds) {
      await requireIdentity(tx, nationalId);
      await tx.linkCase(created.case_number, nationalId);
    }
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.REGISTER_CRIMINAL_CASE,
      table: "criminal_case",
      recordId: created.case_number,
      details: `Offence: ${created.offence}; linked ${input.nationalIds.length} identities`,
    });
    return toCriminalCase(created, await tx.listCaseLinks(created.case_number));
  });
}

export async function getCriminalCase(caseNumber: number): Promise<CriminalCase> {
  return getRegistryStore().transaction(
    async (tx) => {
      const row = await requireCase(tx, caseNumber);
      return toCriminalCase(row, await tx.listCaseLinks(caseNumber));
    },
    { readOnly: true }
  );
}

export async function listCasesForIdentity(nationalId: string): Promise<CriminalCaseSummary[]> {
  const rows = await getRegistryStore().transaction(
    async (tx) => {
      await requireIdentity(tx, nationalId);
      return tx.listCasesForIdentity(nationalId);
    },
    { readOnly: true }
  );
  return rows.map(toSummary);
}

export async function linkIdentityToCase(caseNumber: number, nationalId: string, actor: StaffActor): Promise<CriminalCase> {
  return getRegistryStore().transaction(async (tx) => {
    const row = await requireCase(tx, caseNumber);
    await requireIdentity(tx, nationalId);
    await tx.linkCase(caseNumber, nationalId);
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.LINK_CRIMINAL_CASE,
      table: "case_linkage",
      recordId: caseNumber,
      details: `Linked national ID ${nationalId}`,
    });
    return toCriminalCase(row, await tx.listCaseLinks(caseNumber));
  });
}

export async function unlinkIdentityFromCase(
  caseNumber: number,
  nationalId: string,
  actor: StaffActor
): Promise<CriminalCase> {
  return getRegistryStore().transaction(async (tx) => {
    const row = await requireCase(tx, caseNumber);
    const removed = await tx.unlinkCase(caseNumber, nationalId);
    if (!removed) {
      throw new NotFoundError("CASE_LINK_NOT_FOUND", `National ID ${nationalId} is not linked to case ${caseNumber}`);
    }
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.UNLINK_CRIMINAL_CASE,
      table: "case_linkage",
      recordId: caseNumber,
      details: `Unlinked national ID ${nationalId}`,
    });
    return toCriminalCase(row, await tx.listCaseLinks(caseNumber));
  });
}

/** Deleting a case removes its links as well. */
export async function deleteCriminalCase(caseNumber: number, actor: StaffActor): Promise<void> {
  await getRegistryStore().transaction(async (tx) => {
    const row = await requireCase(tx, caseNumber);
    const links = await tx.listCaseLinks(caseNumber);
    await tx.deleteCriminalCase(caseNumber);
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.DELETE_CRIMINAL_CASE,
      table: "criminal_case",
      recordId: caseNumber,
      details: `Offence: ${row.offence}; removed ${links.length} links`,
    });
  });
}
