import {
  BankAccountKeySchema,
  BankAccountRegistrationSchema,
  BankAccountUpdateSchema,
  type BankAccountKeyInput,
  type BankAccountRegistrationInput,
  type BankAccountUpdateInput,
} from "@civic-registry/shared";
import { canActOn, type Actor } from "./actor";
import { AUDIT_OPERATIONS, recordAudit } from "./audit";
import { NotFoundError, parseInput } from "./errors";
import { requireIdentity, requireIdentityFor } from "./identities";
import { getRegistryStore } from "./store";
import type { BankAccountKeyRow, BankAccountPatch, BankAccountRow, RegistryTx } from "./store/types";

export interface BankAccount {
  accountNumber: string;
  bankName: string;
  accountType: string;
  branchCode: string;
  nationalId: string;
}

export function toBankAccount(row: BankAccountRow): BankAccount {
  return {
    accountNumber: row.account_number,
    bankName: row.bank_name,
    accountType: row.account_type,
    branchCode: row.branch_code,
    nationalId: row.national_id,
  };
}

/** Audit record id for the composite key. */
export function bankAccountRecordId(key: BankAccountKeyRow): string {
  return `${key.bank_name}/${key.account_number}`;
}

function parseKey(rawKey: BankAccountKeyInput): BankAccountKeyRow {
  const key = parseInput(BankAccountKeySchema, rawKey);
  return { account_number: key.accountNumber, bank_name: key.bankName };
}

async function requireBankAccount(tx: RegistryTx, actor: Actor, key: BankAccountKeyRow): Promise<BankAccountRow> {
  const row = await tx.findBankAccount(key);
  if (!row || !canActOn(actor, row.national_id)) {
    throw new NotFoundError("BANK_ACCOUNT_NOT_FOUND", `No bank account ${bankAccountRecordId(key)}`);
  }
  return row;
}

export async function registerBankAccount(
  nationalId: string,
  rawInput: BankAccountRegistrationInput,
  actor: Actor
): Promise<BankAccount> {
  const input = parseInput(BankAccountRegistrationSchema, rawInput);
  const row = await getRegistryStore().transaction(async (tx) => {
    await requireIdentityFor(tx, actor, nationalId);
    const created = await tx.insertBankAccount({
      account_number: input.accountNumber,
      bank_name: input.bankName,
      account_type: input.accountType,
      branch_code: input.branchCode,
      national_id: nationalId,
    });
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.REGISTER_BANK_ACCOUNT,
      table: "bank_account",
      recordId: bankAccountRecordId(created),
      details: `${created.account_type} account at branch ${created.branch_code}`,
    });
    return created;
  });
  return toBankAccount(row);
}

export async function listBankAccounts(nationalId: string): Promise<BankAccount[]> {
  const rows = await getRegistryStore().transaction(
    async (tx) => {
      await requireIdentity(tx, nationalId);
      return tx.listBankAccounts(nationalId);
    },
    { readOnly: true }
  );
  return rows.map(toBankAccount);
}

export async function updateBankAccount(
  rawKey: BankAccountKeyInput,
  rawInput: BankAccountUpdateInput,
  actor: Actor
): Promise<BankAccount> {
  const key = parseKey(rawKey);
  const input = parseInput(BankAccountUpdateSchema, rawInput);
  const patch: BankAccountPatch = {};
  if (input.accountType !== undefined) patch.account_type = input.accountType;
  if (input.branchCode !== undefined) patch.branch_code = input.branchCode;

  const row = await getRegistryStore().transaction(async (tx) => {
    await requireBankAccount(tx, actor, key);
    const updated = await tx.updateBankAccount(key, patch);
    if (!updated) {
      throw new NotFoundError("BANK_ACCOUNT_NOT_FOUND", `No bank account ${bankAccountRecordId(key)}`);
    }
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.UPDATE_BANK_ACCOUNT,
      table: "bank_account",
      recordId: bankAccountRecordId(key),
      details: `Updated ${Object.keys(patch).join(", ")}`,
    });
    return updated;
  });
  return toBankAccount(row);
}

export async function deleteBankAccount(rawKey: BankAccountKeyInput, actor: Actor): Promise<void> {
  const key = parseKey(rawKey);
  await getRegistryStore().transaction(async (tx) => {
    await requireBankAccount(tx, actor, key);
    await tx.deleteBankAccount(key);
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.DELETE_BANK_ACCOUNT,
      table: "bank_account",
      recordId: bankAccountRecordId(key),
    });
  });
}
