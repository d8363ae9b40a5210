import {
  ContactUpdateSchema,
  IdentityCreationSchema,
  LinkedRecordKindEnum,
  type AccountStatus,
  type ContactUpdateInput,
  type Gender,
  type IdentityCreation,
  type IdentityCreationInput,
} from "@civic-registry/shared";
import { canActOn, type Actor } from "./actor";
import { AUDIT_OPERATIONS, recordAudit } from "./audit";
import { ConflictError, NotFoundError, parseInput } from "./errors";
import { logInfo } from "./logger";
import { getRegistryStore } from "./store";
import type { BiometricRow, IdentityDirectoryRow, IdentityRow, LockOption, RegistryTx } from "./store/types";

export interface Identity {
  nationalId: string;
  name: string;
  gender: Gender;
  birthDate: string;
  mobile: string;
  email: string | null;
  createdAt: string;
}

export interface IdentityDirectoryEntry extends Identity {
  username: string | null;
  accountStatus: AccountStatus | null;
}

export function toIdentity(row: IdentityRow): Identity {
  return {
    nationalId: row.national_id,
    name: row.name,
    gender: row.gender,
    birthDate: row.birth_date,
    mobile: row.mobile,
    email: row.email,
    createdAt: row.created_at.toISOString(),
  };
}

function toDirectoryEntry(row: IdentityDirectoryRow): IdentityDirectoryEntry {
  return { ...toIdentity(row), username: row.username, accountStatus: row.account_status };
}

export async function requireIdentity(tx: RegistryTx, nationalId: string, options?: LockOption): Promise<IdentityRow> {
  const row = await tx.findIdentity(nationalId, options);
  if (!row) {
    throw new NotFoundError("IDENTITY_NOT_FOUND", `No identity with national ID ${nationalId}`);
  }
  return row;
}

/** Like `requireIdentity`, but a citizen acting on someone else's identity sees it as absent. */
export async function requireIdentityFor(
  tx: RegistryTx,
  actor: Actor,
  nationalId: string,
  options?: LockOption
): Promise<IdentityRow> {
  if (!canActOn(actor, nationalId)) {
    throw new NotFoundError("IDENTITY_NOT_FOUND", `No identity with national ID ${nationalId}`);
  }
  return requireIdentity(tx, nationalId, options);
}

/**
 * The only path that creates identities. The biometric row is written in the
 * same transaction, empty and at version 0. Callers write the audit entry.
 */
export async function createIdentityWithBiometric(
  tx: RegistryTx,
  input: IdentityCreation
): Promise<{ identity: IdentityRow; biometric: BiometricRow }> {
  const identity = await tx.insertIdentity({
    national_id: input.nationalId,
    name: input.name,
    gender: input.gender,
    birth_date: input.birthDate,
    mobile: input.mobile,
    email: input.email,
  });
  const biometric = await tx.insertBiometric(identity.national_id);
  return { identity, biometric };
}

/** Direct creation for seeding and back-office imports; registrations go through approval. */
export async function createIdentity(rawInput: IdentityCreationInput, actor: Actor): Promise<Identity> {
  const input = parseInput(IdentityCreationSchema, rawInput);
  const identity = await getRegistryStore().transaction(async (tx) => {
    const created = await createIdentityWithBiometric(tx, input);
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.CREATE_IDENTITY,
      table: "identity",
      recordId: created.identity.national_id,
      details: `Created identity for ${created.identity.name}`,
    });
    return created.identity;
  });
  return toIdentity(identity);
}

export async function getIdentity(nationalId: string): Promise<Identity> {
  const row = await getRegistryStore().transaction((tx) => requireIdentity(tx, nationalId), { readOnly: true });
  return toIdentity(row);
}

export const IDENTITY_PAGE_MAX = 200;

export async function listIdentities(filter: {
  search?: string;
  limit?: number;
  offset?: number;
}): Promise<IdentityDirectoryEntry[]> {
  const limit = Math.min(Math.max(filter.limit ?? 50, 1), IDENTITY_PAGE_MAX);
  const offset = Math.max(filter.offset ?? 0, 0);
  const rows = await getRegistryStore().transaction(
    (tx) => tx.listIdentities({ search: filter.search, limit, offset }),
    { readOnly: true }
  );
  return rows.map(toDirectoryEntry);
}

export async function updateIdentityContact(
  nationalId: string,
  rawInput: ContactUpdateInput,
  actor: Actor
): Promise<Identity> {
  const input = parseInput(ContactUpdateSchema, rawInput);
  const updated = await getRegistryStore().transaction(async (tx) => {
    const current = await requireIdentityFor(tx, actor, nationalId, { forUpdate: true });
    if (input.email !== null) {
      const holder = await tx.findIdentityByEmail(input.email);
      if (holder && holder.national_id !== nationalId) {
        throw new ConflictError("EMAIL_TAKEN", "Email is already registered to another identity");
      }
    }
    const row = await tx.updateIdentityContact(nationalId, input.mobile, input.email);
    if (!row) {
      throw new NotFoundError("IDENTITY_NOT_FOUND", `No identity with national ID ${nationalId}`);
    }
    const changed = [
      current.mobile !== row.mobile ? "mobile" : null,
      current.email !== row.email ? "email" : null,
    ].filter((field): field is string => field !== null);
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.UPDATE_PROFILE,
      table: "identity",
      recordId: nationalId,
      details: changed.length > 0 ? `Updated ${changed.join(" and ")}` : "Contact details unchanged",
    });
    return row;
  });
  return toIdentity(updated);
}

/** Removes the identity and, by cascade, every record that hangs off it. */
export async function deleteIdentity(nationalId: string, actor: Actor): Promise<void> {
  await getRegistryStore().transaction(async (tx) => {
    const identity = await requireIdentity(tx, nationalId, { forUpdate: true });
    const counts: string[] = [];
    for (const kind of LinkedRecordKindEnum.options) {
      const count = await tx.countLinked(nationalId, kind);
      if (count > 0) counts.push(`${kind}=${count}`);
    }
    await tx.deleteIdentity(nationalId);
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.DELETE_IDENTITY,
      table: "identity",
      recordId: nationalId,
      details: `Deleted identity of ${identity.name}${counts.length > 0 ? ` with ${counts.join(", ")}` : ""}`,
    });
  });
  logInfo("Identity deleted", { performedBy: actor.username, role: actor.role });
}
