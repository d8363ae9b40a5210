import crypto from "crypto";
import argon2 from "argon2";
import {
  AccountStatusUpdateSchema,
  AdminAccountCreationSchema,
  type AccountStatus,
  type AccountStatusUpdateInput,
  type AdminAccountCreationInput,
} from "@civic-registry/shared";
import { SYSTEM_ACTOR, type StaffActor } from "./actor";
import { AUDIT_OPERATIONS, recordAudit } from "./audit";
import { ConflictError, NotFoundError, parseInput } from "./errors";
import { logInfo, logWarn } from "./logger";
import { parsePositiveIntEnv } from "./runtime-safety";
import { getRegistryStore } from "./store";
import type { AdminAccountRow, CitizenAccountRow } from "./store/types";

export const DEFAULT_LOGIN_MAX_FAILED_ATTEMPTS = 5;

const LEGACY_SHA256_HEX = /^[0-9a-f]{64}$/i;

export type AuthenticatedPrincipal =
  | { userType: "CITIZEN"; citizenId: number; username: string; nationalId: string }
  | { userType: "ADMIN"; adminId: number; username: string; fullName: string };

export type CredentialCheck =
  | { ok: true; principal: AuthenticatedPrincipal }
  | { ok: false; reason: "INVALID_CREDENTIALS" | "ACCOUNT_LOCKED" | "ACCOUNT_NOT_ACTIVE" };

export interface CitizenAccount {
  citizenId: number;
  username: string;
  nationalId: string;
  accountStatus: AccountStatus;
  failedLoginAttempts: number;
  createdOn: string;
  lastLogin: string | null;
}

export interface AdminAccount {
  adminId: number;
  username: string;
  fullName: string;
  createdOn: string;
  lastLogin: string | null;
}

function toCitizenAccount(row: CitizenAccountRow): CitizenAccount {
  return {
    citizenId: row.citizen_id,
    username: row.username,
    nationalId: row.national_id,
    accountStatus: row.account_status,
    failedLoginAttempts: row.failed_login_attempts,
    createdOn: row.created_on.toISOString(),
    lastLogin: row.last_login ? row.last_login.toISOString() : null,
  };
}

function toAdminAccount(row: AdminAccountRow): AdminAccount {
  return {
    adminId: row.admin_id,
    username: row.username,
    fullName: row.full_name,
    createdOn: row.created_on.toISOString(),
    lastLogin: row.last_login ? row.last_login.toISOString() : null,
  };
}

export function loginMaxFailedAttempts(): number {
  return parsePositiveIntEnv(process.env.LOGIN_MAX_FAILED_ATTEMPTS, DEFAULT_LOGIN_MAX_FAILED_ATTEMPTS);
}

export async function hashPassword(password: string): Promise<string> {
  return argon2.hash(password, {
    type: argon2.argon2id,
    memoryCost: parsePositiveIntEnv(process.env.ARGON2_MEMORY_COST, 65536),
    timeCost: parsePositiveIntEnv(process.env.ARGON2_TIME_COST, 3),
    parallelism: 1,
  });
}

// argon2 hashes start with $argon2; older accounts carry an unsalted SHA-256 hex digest.
export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  if (hash.startsWith("$argon2")) {
    return argon2.verify(hash, password);
  }
  if (!LEGACY_SHA256_HEX.test(hash)) return false;
  const expected = Buffer.from(hash.toLowerCase(), "hex");
  const actual = crypto.createHash("sha256").update(password, "utf8").digest();
  return crypto.timingSafeEqual(expected, actual);
}

/**
 * Citizen accounts are checked first, then administrators. A wrong citizen
 * password counts towards the lockout; reaching the limit suspends the
 * account and writes an ACCOUNT_LOCKED audit entry.
 */
export async function verifyCredentials(
  username: string,
  password: string,
  ipAddress: string | null = null
): Promise<CredentialCheck> {
  const store = getRegistryStore();
  const { citizen, admin } = await store.transaction(
    async (tx) => {
      const citizenRow = await tx.findCitizenAccountByUsername(username);
      const adminRow = citizenRow ? null : await tx.findAdminAccountByUsername(username);
      return { citizen: citizenRow, admin: adminRow };
    },
    { readOnly: true }
  );

  if (citizen) {
    if (citizen.account_status !== "Active") {
      logWarn("Login refused for non-active account", { status: citizen.account_status });
      return { ok: false, reason: "ACCOUNT_NOT_ACTIVE" };
    }
    if (!(await verifyPassword(password, citizen.password_hash))) {
      const maxAttempts = loginMaxFailedAttempts();
      const locked = await store.transaction(async (tx) => {
        const updated = await tx.recordCitizenLoginFailure(citizen.citizen_id, maxAttempts);
        if (!updated || updated.account_status !== "Suspended") return false;
        await recordAudit(tx, { ...SYSTEM_ACTOR, ipAddress }, {
          operation: AUDIT_OPERATIONS.ACCOUNT_LOCKED,
          table: "citizen_account",
          recordId: updated.username,
          details: `Suspended after ${updated.failed_login_attempts} failed login attempts`,
        });
        return true;
      });
      return { ok: false, reason: locked ? "ACCOUNT_LOCKED" : "INVALID_CREDENTIALS" };
    }
    await store.transaction((tx) => tx.recordCitizenLoginSuccess(citizen.citizen_id));
    return {
      ok: true,
      principal: {
        userType: "CITIZEN",
        citizenId: citizen.citizen_id,
        username: citizen.username,
        nationalId: citizen.national_id,
      },
    };
  }

  if (admin && (await verifyPassword(password, admin.password_hash))) {
    await store.transaction((tx) => tx.recordAdminLogin(admin.admin_id));
    return {
      ok: true,
      principal: { userType: "ADMIN", adminId: admin.admin_id, username: admin.username, fullName: admin.full_name },
    };
  }
  return { ok: false, reason: "INVALID_CREDENTIALS" };
}

export async function getCitizenAccountByNationalId(nationalId: string): Promise<CitizenAccount | null> {
  const row = await getRegistryStore().transaction((tx) => tx.findCitizenAccountByNationalId(nationalId), {
    readOnly: true,
  });
  return row ? toCitizenAccount(row) : null;
}

/** Reactivating an account also clears its failed-attempt counter. */
export async function setCitizenAccountStatus(
  username: string,
  rawInput: AccountStatusUpdateInput,
  actor: StaffActor
): Promise<CitizenAccount> {
  const { status } = parseInput(AccountStatusUpdateSchema, rawInput);
  const row = await getRegistryStore().transaction(async (tx) => {
    const current = await tx.findCitizenAccountByUsername(username, { forUpdate: true });
    if (!current) throw new NotFoundError("ACCOUNT_NOT_FOUND", `No citizen account ${username}`);
    const updated = await tx.updateCitizenAccountStatus(username, status);
    if (!updated) throw new NotFoundError("ACCOUNT_NOT_FOUND", `No citizen account ${username}`);
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.UPDATE_ACCOUNT_STATUS,
      table: "citizen_account",
      recordId: username,
      details: `Status ${current.account_status} -> ${updated.account_status}`,
    });
    return updated;
  });
  return toCitizenAccount(row);
}

export async function createAdminAccount(
  rawInput: AdminAccountCreationInput,
  actor: StaffActor = SYSTEM_ACTOR
): Promise<AdminAccount> {
  const input = parseInput(AdminAccountCreationSchema, rawInput);
  const passwordHash = await hashPassword(input.password);
  const row = await getRegistryStore().transaction(async (tx) => {
    if (
      (await tx.findCitizenAccountByUsername(input.username)) ||
      (await tx.hasPendingRegistrationForUsername(input.username))
    ) {
      throw new ConflictError("USERNAME_TAKEN", `Username ${input.username} is already in use`);
    }
    const created = await tx.insertAdminAccount({
      username: input.username,
      password_hash: passwordHash,
      full_name: input.fullName,
    });
    await recordAudit(tx, actor, {
      operation: AUDIT_OPERATIONS.CREATE_ADMIN,
      table: "admin_account",
      recordId: created.admin_id,
      details: `Created administrator ${created.username}`,
    });
    return created;
  });
  logInfo("Admin account created", { adminId: row.admin_id });
  return toAdminAccount(row);
}
