import {
  RegistrationSubmissionSchema,
  RejectionSchema,
  type Gender,
  type RegistrationStatus,
  type RegistrationSubmissionInput,
  type RejectionInput,
} from "@civic-registry/shared";
import type { AdminActor, SystemActor } from "./actor";
import { AUDIT_OPERATIONS, recordAudit } from "./audit";
import { hashPassword } from "./auth";
import { ConflictError, NotFoundError, parseInput } from "./errors";
import { createIdentityWithBiometric } from "./identities";
import { logInfo } from "./logger";
import { updateRegistrationBacklogMetric } from "./observability/metrics";
import { getRegistryStore } from "./store";
import type { PendingRegistrationRow, RegistrationRow, RegistryTx } from "./store/types";

export interface Registration {
  requestId: number;
  username: string;
  nationalId: string;
  name: string;
  gender: Gender;
  birthDate: string;
  mobile: string;
  email: string | null;
  requestDate: string;
  status: RegistrationStatus;
  reviewedBy: number | null;
  reviewDate: string | null;
  rejectionReason: string | null;
}

export interface PendingRegistration {
  requestId: number;
  username: string;
  nationalId: string;
  name: string;
  email: string | null;
  requestDate: string;
  daysPending: number;
}

export interface ApprovalResult {
  requestId: number;
  nationalId: string;
  citizenId: number;
  username: string;
}

// The password hash never leaves this module.
function toRegistration(row: RegistrationRow): Registration {
  return {
    requestId: row.request_id,
    username: row.username,
    nationalId: row.national_id,
    name: row.name,
    gender: row.gender,
    birthDate: row.birth_date,
    mobile: row.mobile,
    email: row.email,
    requestDate: row.request_date.toISOString(),
    status: row.status,
    reviewedBy: row.reviewed_by,
    reviewDate: row.review_date ? row.review_date.toISOString() : null,
    rejectionReason: row.rejection_reason,
  };
}

function toPendingRegistration(row: PendingRegistrationRow): PendingRegistration {
  return {
    requestId: row.request_id,
    username: row.username,
    nationalId: row.national_id,
    name: row.name,
    email: row.email,
    requestDate: row.request_date.toISOString(),
    daysPending: row.days_pending,
  };
}

async function requirePendingRegistration(tx: RegistryTx, requestId: number): Promise<RegistrationRow> {
  const row = await tx.findRegistration(requestId, { forUpdate: true });
  if (!row) {
    throw new NotFoundError("REGISTRATION_NOT_FOUND", `No registration request ${requestId}`);
  }
  if (row.status !== "Pending") {
    throw new ConflictError(
      "REGISTRATION_ALREADY_REVIEWED",
      `Registration request ${requestId} is already ${row.status}`,
      { status: row.status }
    );
  }
  return row;
}

function assertTransitioned(affected: number, requestId: number): void {
  if (affected !== 1) {
    throw new ConflictError("REGISTRATION_ALREADY_REVIEWED", `Registration request ${requestId} is no longer pending`);
  }
}

/**
 * Queues a self-service registration. Username, national ID and email must be
 * free across accounts, identities and other pending requests.
 */
export async function submitRegistration(
  rawInput: RegistrationSubmissionInput,
  ipAddress: string | null = null
): Promise<Registration> {
  const input = parseInput(RegistrationSubmissionSchema, rawInput);
  const passwordHash = await hashPassword(input.password);
  const row = await getRegistryStore().transaction(async (tx) => {
    const conflicts = await tx.findRegistrationConflicts({
      username: input.username,
      national_id: input.nationalId,
      email: input.email,
    });
    if (conflicts.length > 0) {
      throw new ConflictError(conflicts[0], "Registration conflicts with an existing record", { conflicts });
    }
    const created = await tx.insertRegistration({
      username: input.username,
      password_hash: passwordHash,
      national_id: input.nationalId,
      name: input.name,
      gender: input.gender,
      birth_date: input.birthDate,
      mobile: input.mobile,
      email: input.email,
    });
    // Applicants have no account yet; the entry is attributed to the requested username.
    const applicant: SystemActor = { role: "System", username: created.username, ipAddress };
    await recordAudit(tx, applicant, {
      operation: AUDIT_OPERATIONS.SUBMIT_REGISTRATION,
      table: "registration_request",
      recordId: created.request_id,
      details: `Registration submitted for username ${created.username}`,
    });
    return created;
  });
  logInfo("Registration submitted", { requestId: row.request_id });
  return toRegistration(row);
}

/**
 * Creates the identity, its biometric row and an active citizen account, then
 * marks the request Approved. Any failure leaves the request Pending.
 */
export async function approveRegistration(requestId: number, reviewer: AdminActor): Promise<ApprovalResult> {
  const result = await getRegistryStore().transaction(async (tx) => {
    const request = await requirePendingRegistration(tx, requestId);
    if (await tx.findAdminAccountByUsername(request.username)) {
      throw new ConflictError("USERNAME_TAKEN", `Username ${request.username} is already in use`);
    }
    const { identity } = await createIdentityWithBiometric(tx, {
      nationalId: request.national_id,
      name: request.name,
      gender: request.gender,
      birthDate: request.birth_date,
      mobile: request.mobile,
      email: request.email,
    });
    const account = await tx.insertCitizenAccount({
      username: request.username,
      password_hash: request.password_hash,
      national_id: identity.national_id,
      account_status: "Active",
    });
    assertTransitioned(
      await tx.transitionRegistration(requestId, {
        status: "Approved",
        reviewed_by: reviewer.adminId,
        rejection_reason: null,
      }),
      requestId
    );
    await recordAudit(tx, reviewer, {
      operation: AUDIT_OPERATIONS.APPROVE_REGISTRATION,
      table: "registration_request",
      recordId: requestId,
      details: `Approved registration for national ID ${identity.national_id}`,
    });
    return {
      requestId,
      nationalId: identity.national_id,
      citizenId: account.citizen_id,
      username: account.username,
    };
  });
  logInfo("Registration approved", { requestId, reviewer: reviewer.username });
  return result;
}

export async function rejectRegistration(
  requestId: number,
  reviewer: AdminActor,
  rawInput: RejectionInput
): Promise<Registration> {
  const { reason } = parseInput(RejectionSchema, rawInput);
  const row = await getRegistryStore().transaction(async (tx) => {
    await requirePendingRegistration(tx, requestId);
    assertTransitioned(
      await tx.transitionRegistration(requestId, {
        status: "Rejected",
        reviewed_by: reviewer.adminId,
        rejection_reason: reason,
      }),
      requestId
    );
    await recordAudit(tx, reviewer, {
      operation: AUDIT_OPERATIONS.REJECT_REGISTRATION,
      table: "registration_request",
      recordId: requestId,
      details: `Rejected registration. Reason: ${reason}`,
    });
    const updated = await tx.findRegistration(requestId);
    if (!updated) throw new NotFoundError("REGISTRATION_NOT_FOUND", `No registration request ${requestId}`);
    return updated;
  });
  logInfo("Registration rejected", { requestId, reviewer: reviewer.username });
  return toRegistration(row);
}

/** Oldest first. Also refreshes the backlog gauges. */
export async function listPendingRegistrations(): Promise<PendingRegistration[]> {
  const rows = await getRegistryStore().transaction((tx) => tx.listPendingRegistrations(), { readOnly: true });
  updateRegistrationBacklogMetric({
    pending: rows.length,
    oldestPendingDays: rows.length > 0 ? rows[0].days_pending : 0,
  });
  return rows.map(toPendingRegistration);
}

export async function getRegistration(requestId: number): Promise<Registration> {
  const row = await getRegistryStore().transaction((tx) => tx.findRegistration(requestId), { readOnly: true });
  if (!row) {
    throw new NotFoundError("REGISTRATION_NOT_FOUND", `No registration request ${requestId}`);
  }
  return toRegistration(row);
}
