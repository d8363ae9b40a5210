import { MAX_AUDIT_PAGE, type ActorRole } from "@civic-registry/shared";
import type { Actor } from "./actor";
import { annotateRegistrySpan } from "./observability/tracing";
import { getRegistryStore } from "./store";
import type { AuditRow, RegistryTx } from "./store/types";

export const AUDIT_OPERATIONS = {
  SUBMIT_REGISTRATION: "SUBMIT_REGISTRATION",
  APPROVE_REGISTRATION: "APPROVE_REGISTRATION",
  REJECT_REGISTRATION: "REJECT_REGISTRATION",
  CREATE_IDENTITY: "CREATE_IDENTITY",
  UPDATE_PROFILE: "UPDATE_PROFILE",
  DELETE_IDENTITY: "DELETE_IDENTITY",
  UPLOAD_PHOTO: "UPLOAD_PHOTO",
  REGISTER_TAX_ID: "REGISTER_TAX_ID",
  UPDATE_TAX_ID: "UPDATE_TAX_ID",
  DELETE_TAX_ID: "DELETE_TAX_ID",
  REGISTER_VOTER_RECORD: "REGISTER_VOTER_RECORD",
  UPDATE_VOTER_RECORD: "UPDATE_VOTER_RECORD",
  DELETE_VOTER_RECORD: "DELETE_VOTER_RECORD",
  REGISTER_SIM: "REGISTER_SIM",
  UPDATE_SIM: "UPDATE_SIM",
  DELETE_SIM: "DELETE_SIM",
  REGISTER_BANK_ACCOUNT: "REGISTER_BANK_ACCOUNT",
  UPDATE_BANK_ACCOUNT: "UPDATE_BANK_ACCOUNT",
  DELETE_BANK_ACCOUNT: "DELETE_BANK_ACCOUNT",
  REGISTER_CRIMINAL_CASE: "REGISTER_CRIMINAL_CASE",
  LINK_CRIMINAL_CASE: "LINK_CRIMINAL_CASE",
  UNLINK_CRIMINAL_CASE: "UNLINK_CRIMINAL_CASE",
  DELETE_CRIMINAL_CASE: "DELETE_CRIMINAL_CASE",
  UPDATE_ACCOUNT_STATUS: "UPDATE_ACCOUNT_STATUS",
  ACCOUNT_LOCKED: "ACCOUNT_LOCKED",
  CREATE_ADMIN: "CREATE_ADMIN",
} as const;

export type AuditOperation = (typeof AUDIT_OPERATIONS)[keyof typeof AUDIT_OPERATIONS];

export interface AuditEntry {
  logId: number;
  operationType: string;
  tableName: string;
  recordId: string | null;
  performedBy: string;
  userType: ActorRole;
  operationDetails: string | null;
  ipAddress: string | null;
  timestamp: string;
}

export function toAuditEntry(row: AuditRow): AuditEntry {
  return {
    logId: row.log_id,
    operationType: row.operation_type,
    tableName: row.table_name,
    recordId: row.record_id,
    performedBy: row.performed_by,
    userType: row.user_type,
    operationDetails: row.operation_details,
    ipAddress: row.ip_address,
    timestamp: row.timestamp.toISOString(),
  };
}

/**
 * Append one audit entry inside the caller's transaction. A failed write
 * fails the surrounding operation.
 */
export async function recordAudit(
  tx: RegistryTx,
  actor: Actor,
  entry: {
    operation: AuditOperation;
    table: string;
    recordId: string | number | null;
    details?: string | null;
  }
): Promise<AuditRow> {
  const recordId = entry.recordId === null ? null : String(entry.recordId);
  annotateRegistrySpan({ operation: entry.operation, table: entry.table, recordId, actorRole: actor.role });
  return tx.appendAudit({
    operation_type: entry.operation,
    table_name: entry.table,
    record_id: recordId,
    performed_by: actor.username,
    user_type: actor.role,
    operation_details: entry.details ?? null,
    ip_address: actor.ipAddress ?? null,
  });
}

/** Newest first; the page size is capped at 100. */
export async function listRecentAudit(limit: number = MAX_AUDIT_PAGE): Promise<AuditEntry[]> {
  const pageSize = Math.min(Math.max(Math.trunc(limit), 1), MAX_AUDIT_PAGE);
  const rows = await getRegistryStore().transaction((tx) => tx.listRecentAudit(pageSize), { readOnly: true });
  return rows.map(toAuditEntry);
}
