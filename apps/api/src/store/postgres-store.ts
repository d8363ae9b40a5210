import type { PoolClient, QueryResultRow } from "pg";
import type { AccountStatus, LinkedRecordKind, PhotoFormat } from "@civic-registry/shared";
import { getClient, pool, runQuery } from "../db";
import { logWarn } from "../logger";
import { LOCK_TIMEOUT_PATTERN } from "../runtime-safety";
import { recordStoreTransaction } from "../observability/metrics";
import { translatePgError } from "./pg-errors";
import type {
  AdminAccountInsert,
  AdminAccountRow,
  AuditInsert,
  AuditRow,
  BankAccountKeyRow,
  BankAccountPatch,
  BankAccountRow,
  BiometricRow,
  CaseLinkRow,
  CitizenAccountInsert,
  CitizenAccountRow,
  CombinedCountRow,
  CriminalCaseRow,
  IdentityDirectoryRow,
  IdentityInsert,
  IdentityRow,
  LinkedCountRow,
  LockOption,
  PendingRegistrationRow,
  RegistrationConflictCode,
  RegistrationInsert,
  RegistrationRow,
  RegistrationTransition,
  RegistryStatisticsRow,
  RegistryStore,
  RegistryTx,
  SimRecordRow,
  TaxIdRow,
  TransactionOptions,
  VoterRecordInsert,
  VoterRecordPatch,
  VoterRecordRow,
} from "./types";

const IDENTITY_COLUMNS = "national_id, name, gender, birth_date, mobile, email, created_at";
const BIOMETRIC_COLUMNS = "national_id, photo, photo_type, has_photo, version, created_on, last_updated_on";
const TAX_ID_COLUMNS = "code, national_id, issue_date, status";
const VOTER_COLUMNS =
  "code, national_id, holder_name, address, registration_type, issue_date, status, is_primary, created_on, last_updated_on";
const SIM_COLUMNS = "sim_number::text AS sim_number, national_id, provider, status";
const BANK_COLUMNS = "account_number::text AS account_number, bank_name, account_type, branch_code, national_id";
const CITIZEN_COLUMNS =
  "citizen_id, username, password_hash, national_id, account_status, failed_login_attempts, created_on, last_login";
const ADMIN_COLUMNS = "admin_id, username, password_hash, full_name, created_on, last_login";
const REGISTRATION_COLUMNS =
  "request_id, username, password_hash, national_id, name, gender, birth_date, mobile, email, request_date, status, reviewed_by, review_date, rejection_reason";
const AUDIT_COLUMNS =
  "log_id, operation_type, table_name, record_id, performed_by, user_type, operation_details, ip_address, timestamp";

/** Per-kind source of linked rows: table and the record key as text. */
const LINKED_SOURCES: Record<LinkedRecordKind, { table: string; key: string }> = {
  taxId: { table: "tax_id", key: "code" },
  voter: { table: "voter_record", key: "code" },
  sim: { table: "sim_record", key: "sim_number::text" },
  bank: { table: "bank_account", key: "bank_name || '/' || account_number::text" },
  case: { table: "case_linkage", key: "case_number::text" },
};


function resolveLockTimeout(): string {
  const configured = (process.env.DB_LOCK_TIMEOUT || "5s").trim();
  if (LOCK_TIMEOUT_PATTERN.test(configured)) return configured;
  logWarn("Ignoring invalid DB_LOCK_TIMEOUT", { configured });
  return "5s";
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export class PostgresRegistryTx implements RegistryTx {
  constructor(private readonly client: Pick<PoolClient, "query">) {}

  private async rows<R extends QueryResultRow>(text: string, params: unknown[] = []): Promise<R[]> {
    const result = await runQuery<R>(this.client, text, params);
    return result.rows;
  }

  private async first<R extends QueryResultRow>(text: string, params: unknown[] = []): Promise<R | null> {
    const rows = await this.rows<R>(text, params);
    return rows[0] ?? null;
  }

  private async one<R extends QueryResultRow>(text: string, params: unknown[] = []): Promise<R> {
    const row = await this.first<R>(text, params);
    if (!row) throw new Error(`Statement returned no row: ${text.slice(0, 60)}`);
    return row;
  }

  private async affected(text: string, params: unknown[] = []): Promise<number> {
    const result = await runQuery(this.client, text, params);
    return result.rowCount ?? 0;
  }

  // ── Identity ────────────────────────────────────────────────────────────

  insertIdentity(row: IdentityInsert): Promise<IdentityRow> {
    return this.one<IdentityRow>(
      `INSERT INTO identity (national_id, name, gender, birth_date, mobile, email)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${IDENTITY_COLUMNS}`,
      [row.national_id, row.name, row.gender, row.birth_date, row.mobile, row.email]
    );
  }

  findIdentity(nationalId: string, options: LockOption = {}): Promise<IdentityRow | null> {
    return this.first<IdentityRow>(
      `SELECT ${IDENTITY_COLUMNS} FROM identity WHERE national_id = $1${options.forUpdate ? " FOR UPDATE" : ""}`,
      [nationalId]
    );
  }

  findIdentityByEmail(email: string): Promise<IdentityRow | null> {
    return this.first<IdentityRow>(`SELECT ${IDENTITY_COLUMNS} FROM identity WHERE email = $1`, [email]);
  }

  listIdentities(filter: { search?: string; limit: number; offset: number }): Promise<IdentityDirectoryRow[]> {
    const search = filter.search?.trim() || null;
    return this.rows<IdentityDirectoryRow>(
      `SELECT i.national_id, i.name, i.gender, i.birth_date, i.mobile, i.email, i.created_at,
              c.username, c.account_status
       FROM identity i
       LEFT JOIN citizen_account c ON c.national_id = i.national_id
       WHERE $1::text IS NULL
          OR i.national_id = $1
          OR i.name ILIKE '%' || $2 || '%'
       ORDER BY i.name COLLATE "C" ASC, i.national_id ASC
       LIMIT $3 OFFSET $4`,
      [search, search ? escapeLike(search) : null, filter.limit, filter.offset]
    );
  }

  updateIdentityContact(nationalId: string, mobile: string, email: string | null): Promise<IdentityRow | null> {
    return this.first<IdentityRow>(
      `UPDATE identity SET mobile = $2, email = $3
       WHERE national_id = $1
       RETURNING ${IDENTITY_COLUMNS}`,
      [nationalId, mobile, email]
    );
  }

  async deleteIdentity(nationalId: string): Promise<boolean> {
    return (await this.affected(`DELETE FROM identity WHERE national_id = $1`, [nationalId])) > 0;
  }

  // ── Biometric ───────────────────────────────────────────────────────────

  insertBiometric(nationalId: string): Promise<BiometricRow> {
    return this.one<BiometricRow>(
      `INSERT INTO biometric (national_id) VALUES ($1) RETURNING ${BIOMETRIC_COLUMNS}`,
      [nationalId]
    );
  }

  findBiometric(nationalId: string): Promise<BiometricRow | null> {
    return this.first<BiometricRow>(`SELECT ${BIOMETRIC_COLUMNS} FROM biometric WHERE national_id = $1`, [nationalId]);
  }

  updateBiometricPhoto(nationalId: string, photo: Buffer, photoType: PhotoFormat): Promise<BiometricRow | null> {
    return this.first<BiometricRow>(
      `UPDATE biometric
       SET photo = $2, photo_type = $3, has_photo = TRUE,
           version = version + 1, last_updated_on = NOW()
       WHERE national_id = $1
       RETURNING ${BIOMETRIC_COLUMNS}`,
      [nationalId, photo, photoType]
    );
  }

  // ── Tax ID ──────────────────────────────────────────────────────────────

  insertTaxId(row: TaxIdRow): Promise<TaxIdRow> {
    return this.one<TaxIdRow>(
      `INSERT INTO tax_id (code, national_id, issue_date, status)
       VALUES ($1, $2, $3, $4)
       RETURNING ${TAX_ID_COLUMNS}`,
      [row.code, row.national_id, row.issue_date, row.status]
    );
  }

  findTaxId(code: string): Promise<TaxIdRow | null> {
    return this.first<TaxIdRow>(`SELECT ${TAX_ID_COLUMNS} FROM tax_id WHERE code = $1`, [code]);
  }

  listTaxIds(nationalId: string): Promise<TaxIdRow[]> {
    return this.rows<TaxIdRow>(
      `SELECT ${TAX_ID_COLUMNS} FROM tax_id WHERE national_id = $1 ORDER BY issue_date ASC, code ASC`,
      [nationalId]
    );
  }

  updateTaxIdStatus(code: string, status: string): Promise<TaxIdRow | null> {
    return this.first<TaxIdRow>(
      `UPDATE tax_id SET status = $2 WHERE code = $1 RETURNING ${TAX_ID_COLUMNS}`,
      [code, status]
    );
  }

  async deleteTaxId(code: string): Promise<boolean> {
    return (await this.affected(`DELETE FROM tax_id WHERE code = $1`, [code])) > 0;
  }

  // ── Voter record ────────────────────────────────────────────────────────

  insertVoterRecord(row: VoterRecordInsert): Promise<VoterRecordRow> {
    return this.one<VoterRecordRow>(
      `INSERT INTO voter_record
         (code, national_id, holder_name, address, registration_type, issue_date, status, is_primary)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${VOTER_COLUMNS}`,
      [
        row.code,
        row.national_id,
        row.holder_name,
        row.address,
        row.registration_type,
        row.issue_date,
        row.status,
        row.is_primary,
      ]
    );
  }

  findVoterRecord(code: string): Promise<VoterRecordRow | null> {
    return this.first<VoterRecordRow>(`SELECT ${VOTER_COLUMNS} FROM voter_record WHERE code = $1`, [code]);
  }

  listVoterRecords(nationalId: string): Promise<VoterRecordRow[]> {
    return this.rows<VoterRecordRow>(
      `SELECT ${VOTER_COLUMNS} FROM voter_record
       WHERE national_id = $1
       ORDER BY is_primary DESC, created_on ASC, code ASC`,
      [nationalId]
    );
  }

  updateVoterRecord(code: string, patch: VoterRecordPatch): Promise<VoterRecordRow | null> {
    return this.first<VoterRecordRow>(
      `UPDATE voter_record
       SET address = COALESCE($2, address),
           registration_type = COALESCE($3, registration_type),
           status = COALESCE($4, status),
           is_primary = COALESCE($5, is_primary),
           last_updated_on = NOW()
       WHERE code = $1
       RETURNING ${VOTER_COLUMNS}`,
      [code, patch.address ?? null, patch.registration_type ?? null, patch.status ?? null, patch.is_primary ?? null]
    );
  }

  clearPrimaryVoterRecords(nationalId: string, keepCode?: string): Promise<number> {
    return this.affected(
      `UPDATE voter_record
       SET is_primary = FALSE, last_updated_on = NOW()
       WHERE national_id = $1 AND is_primary AND ($2::text IS NULL OR code <> $2)`,
      [nationalId, keepCode ?? null]
    );
  }

  async deleteVoterRecord(code: string): Promise<boolean> {
    return (await this.affected(`DELETE FROM voter_record WHERE code = $1`, [code])) > 0;
  }

  // ── SIM ─────────────────────────────────────────────────────────────────

  insertSim(row: SimRecordRow): Promise<SimRecordRow> {
    return this.one<SimRecordRow>(
      `INSERT INTO sim_record (sim_number, national_id, provider, status)
       VALUES ($1, $2, $3, $4)
       RETURNING ${SIM_COLUMNS}`,
      [row.sim_number, row.national_id, row.provider, row.status]
    );
  }

  findSim(simNumber: string): Promise<SimRecordRow | null> {
    return this.first<SimRecordRow>(`SELECT ${SIM_COLUMNS} FROM sim_record WHERE sim_number = $1`, [simNumber]);
  }

  listSims(nationalId: string): Promise<SimRecordRow[]> {
    return this.rows<SimRecordRow>(
      `SELECT ${SIM_COLUMNS} FROM sim_record WHERE national_id = $1 ORDER BY sim_record.sim_number ASC`,
      [nationalId]
    );
  }

  updateSimStatus(simNumber: string, status: string): Promise<SimRecordRow | null> {
    return this.first<SimRecordRow>(
      `UPDATE sim_record SET status = $2 WHERE sim_number = $1 RETURNING ${SIM_COLUMNS}`,
      [simNumber, status]
    );
  }

  async deleteSim(simNumber: string): Promise<boolean> {
    return (await this.affected(`DELETE FROM sim_record WHERE sim_number = $1`, [simNumber])) > 0;
  }

  // ── Bank account ────────────────────────────────────────────────────────

  insertBankAccount(row: BankAccountRow): Promise<BankAccountRow> {
    return this.one<BankAccountRow>(
      `INSERT INTO bank_account (account_number, bank_name, account_type, branch_code, national_id)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${BANK_COLUMNS}`,
      [row.account_number, row.bank_name, row.account_type, row.branch_code, row.national_id]
    );
  }

  findBankAccount(key: BankAccountKeyRow): Promise<BankAccountRow | null> {
    return this.first<BankAccountRow>(
      `SELECT ${BANK_COLUMNS} FROM bank_account WHERE account_number = $1 AND bank_name = $2`,
      [key.account_number, key.bank_name]
    );
  }

  listBankAccounts(nationalId: string): Promise<BankAccountRow[]> {
    return this.rows<BankAccountRow>(
      `SELECT ${BANK_COLUMNS} FROM bank_account
       WHERE national_id = $1
       ORDER BY bank_name COLLATE "C" ASC, bank_account.account_number ASC`,
      [nationalId]
    );
  }

  updateBankAccount(key: BankAccountKeyRow, patch: BankAccountPatch): Promise<BankAccountRow | null> {
    return this.first<BankAccountRow>(
      `UPDATE bank_account
       SET account_type = COALESCE($3, account_type),
           branch_code = COALESCE($4, branch_code)
       WHERE account_number = $1 AND bank_name = $2
       RETURNING ${BANK_COLUMNS}`,
      [key.account_number, key.bank_name, patch.account_type ?? null, patch.branch_code ?? null]
    );
  }

  async deleteBankAccount(key: BankAccountKeyRow): Promise<boolean> {
    const count = await this.affected(
      `DELETE FROM bank_account WHERE account_number = $1 AND bank_name = $2`,
      [key.account_number, key.bank_name]
    );
    return count > 0;
  }

  // ── Criminal case ───────────────────────────────────────────────────────

  insertCriminalCase(offence: string): Promise<CriminalCaseRow> {
    return this.one<CriminalCaseRow>(
      `INSERT INTO criminal_case (offence) VALUES ($1) RETURNING case_number, offence`,
      [offence]
    );
  }

  findCriminalCase(caseNumber: number): Promise<CriminalCaseRow | null> {
    return this.first<CriminalCaseRow>(
      `SELECT case_number, offence FROM criminal_case WHERE case_number = $1`,
      [caseNumber]
    );
  }

  async linkCase(caseNumber: number, nationalId: string): Promise<void> {
    await this.affected(
      `INSERT INTO case_linkage (case_number, national_id) VALUES ($1, $2)`,
      [caseNumber, nationalId]
    );
  }

  async unlinkCase(caseNumber: number, nationalId: string): Promise<boolean> {
    const count = await this.affected(
      `DELETE FROM case_linkage WHERE case_number = $1 AND national_id = $2`,
      [caseNumber, nationalId]
    );
    return count > 0;
  }

  listCaseLinks(caseNumber: number): Promise<CaseLinkRow[]> {
    return this.rows<CaseLinkRow>(
      `SELECT l.case_number, l.national_id, i.name
       FROM case_linkage l
       JOIN identity i ON i.national_id = l.national_id
       WHERE l.case_number = $1
       ORDER BY i.name COLLATE "C" ASC, l.national_id ASC`,
      [caseNumber]
    );
  }

  listCasesForIdentity(nationalId: string): Promise<CriminalCaseRow[]> {
    return this.rows<CriminalCaseRow>(
      `SELECT c.case_number, c.offence
       FROM criminal_case c
       JOIN case_linkage l ON l.case_number = c.case_number
       WHERE l.national_id = $1
       ORDER BY c.case_number ASC`,
      [nationalId]
    );
  }

  async deleteCriminalCase(caseNumber: number): Promise<boolean> {
    return (await this.affected(`DELETE FROM criminal_case WHERE case_number = $1`, [caseNumber])) > 0;
  }

  // ── Accounts ────────────────────────────────────────────────────────────

  insertCitizenAccount(row: CitizenAccountInsert): Promise<CitizenAccountRow> {
    return this.one<CitizenAccountRow>(
      `INSERT INTO citizen_account (username, password_hash, national_id, account_status)
       VALUES ($1, $2, $3, $4)
       RETURNING ${CITIZEN_COLUMNS}`,
      [row.username, row.password_hash, row.national_id, row.account_status]
    );
  }

  findCitizenAccountByUsername(username: string, options: LockOption = {}): Promise<CitizenAccountRow | null> {
    return this.first<CitizenAccountRow>(
      `SELECT ${CITIZEN_COLUMNS} FROM citizen_account WHERE username = $1${options.forUpdate ? " FOR UPDATE" : ""}`,
      [username]
    );
  }

  findCitizenAccountByNationalId(nationalId: string): Promise<CitizenAccountRow | null> {
    return this.first<CitizenAccountRow>(
      `SELECT ${CITIZEN_COLUMNS} FROM citizen_account WHERE national_id = $1`,
      [nationalId]
    );
  }

  recordCitizenLoginFailure(citizenId: number, maxAttempts: number): Promise<CitizenAccountRow | null> {
    return this.first<CitizenAccountRow>(
      `UPDATE citizen_account
       SET failed_login_attempts = failed_login_attempts + 1,
           account_status = CASE
             WHEN failed_login_attempts + 1 >= $2 THEN 'Suspended'
             ELSE account_status
           END
       WHERE citizen_id = $1
       RETURNING ${CITIZEN_COLUMNS}`,
      [citizenId, maxAttempts]
    );
  }

  async recordCitizenLoginSuccess(citizenId: number): Promise<void> {
    await this.affected(
      `UPDATE citizen_account SET failed_login_attempts = 0, last_login = NOW() WHERE citizen_id = $1`,
      [citizenId]
    );
  }

  updateCitizenAccountStatus(username: string, status: AccountStatus): Promise<CitizenAccountRow | null> {
    return this.first<CitizenAccountRow>(
      `UPDATE citizen_account
       SET account_status = $2,
           failed_login_attempts = CASE WHEN $2 = 'Active' THEN 0 ELSE failed_login_attempts END
       WHERE username = $1
       RETURNING ${CITIZEN_COLUMNS}`,
      [username, status]
    );
  }

  insertAdminAccount(row: AdminAccountInsert): Promise<AdminAccountRow> {
    return this.one<AdminAccountRow>(
      `INSERT INTO admin_account (username, password_hash, full_name)
       VALUES ($1, $2, $3)
       RETURNING ${ADMIN_COLUMNS}`,
      [row.username, row.password_hash, row.full_name]
    );
  }

  findAdminAccountByUsername(username: string): Promise<AdminAccountRow | null> {
    return this.first<AdminAccountRow>(`SELECT ${ADMIN_COLUMNS} FROM admin_account WHERE username = $1`, [username]);
  }

  async recordAdminLogin(adminId: number): Promise<void> {
    await this.affected(`UPDATE admin_account SET last_login = NOW() WHERE admin_id = $1`, [adminId]);
  }

  // ── Registration queue ──────────────────────────────────────────────────

  insertRegistration(row: RegistrationInsert): Promise<RegistrationRow> {
    return this.one<RegistrationRow>(
      `INSERT INTO registration_request
         (username, password_hash, national_id, name, gender, birth_date, mobile, email)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${REGISTRATION_COLUMNS}`,
      [
        row.username,
        row.password_hash,
        row.national_id,
        row.name,
        row.gender,
        row.birth_date,
        row.mobile,
        row.email,
      ]
    );
  }

  findRegistration(requestId: number, options: LockOption = {}): Promise<RegistrationRow | null> {
    return this.first<RegistrationRow>(
      `SELECT ${REGISTRATION_COLUMNS} FROM registration_request
       WHERE request_id = $1${options.forUpdate ? " FOR UPDATE" : ""}`,
      [requestId]
    );
  }

  async findRegistrationConflicts(candidate: {
    username: string;
    national_id: string;
    email: string | null;
  }): Promise<RegistrationConflictCode[]> {
    const rows = await this.rows<{ code: RegistrationConflictCode }>(
      `SELECT 'USERNAME_TAKEN' AS code
       WHERE EXISTS (SELECT 1 FROM citizen_account WHERE username = $1)
          OR EXISTS (SELECT 1 FROM admin_account WHERE username = $1)
          OR EXISTS (SELECT 1 FROM registration_request WHERE username = $1 AND status = 'Pending')
       UNION ALL
       SELECT 'NATIONAL_ID_TAKEN'
       WHERE EXISTS (SELECT 1 FROM identity WHERE national_id = $2)
          OR EXISTS (SELECT 1 FROM registration_request WHERE national_id = $2 AND status = 'Pending')
       UNION ALL
       SELECT 'EMAIL_TAKEN'
       WHERE $3::text IS NOT NULL
         AND (EXISTS (SELECT 1 FROM identity WHERE email = $3)
           OR EXISTS (SELECT 1 FROM registration_request WHERE email = $3 AND status = 'Pending'))`,
      [candidate.username, candidate.national_id, candidate.email]
    );
    return rows.map((row) => row.code);
  }

  async hasPendingRegistrationForUsername(username: string): Promise<boolean> {
    const row = await this.first<{ pending: number }>(
      `SELECT 1 AS pending FROM registration_request WHERE username = $1 AND status = 'Pending' LIMIT 1`,
      [username]
    );
    return row !== null;
  }

  transitionRegistration(requestId: number, change: RegistrationTransition): Promise<number> {
    return this.affected(
      `UPDATE registration_request
       SET status = $2, reviewed_by = $3, review_date = NOW(), rejection_reason = $4
       WHERE request_id = $1 AND status = 'Pending'`,
      [requestId, change.status, change.reviewed_by, change.rejection_reason]
    );
  }

  listPendingRegistrations(): Promise<PendingRegistrationRow[]> {
    return this.rows<PendingRegistrationRow>(
      `SELECT request_id, username, national_id, name, email, request_date, days_pending
       FROM pending_registrations_summary
       ORDER BY request_date ASC, request_id ASC`
    );
  }

  // ── Audit ───────────────────────────────────────────────────────────────

  appendAudit(entry: AuditInsert): Promise<AuditRow> {
    return this.one<AuditRow>(
      `INSERT INTO audit_log
         (operation_type, table_name, record_id, performed_by, user_type, operation_details, ip_address)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${AUDIT_COLUMNS}`,
      [
        entry.operation_type,
        entry.table_name,
        entry.record_id,
        entry.performed_by,
        entry.user_type,
        entry.operation_details,
        entry.ip_address,
      ]
    );
  }

  listRecentAudit(limit: number): Promise<AuditRow[]> {
    return this.rows<AuditRow>(`SELECT ${AUDIT_COLUMNS} FROM recent_audit_log ORDER BY timestamp DESC, log_id DESC LIMIT $1`, [limit]);
  }

  // ── Aggregates ──────────────────────────────────────────────────────────

  async countLinked(nationalId: string, kind: LinkedRecordKind): Promise<number> {
    const source = LINKED_SOURCES[kind];
    const row = await this.one<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM ${source.table} WHERE national_id = $1`,
      [nationalId]
    );
    return row.count;
  }

  identitiesWithMinimum(kind: LinkedRecordKind, threshold: number): Promise<LinkedCountRow[]> {
    const source = LINKED_SOURCES[kind];
    return this.rows<LinkedCountRow>(
      `SELECT i.national_id, i.name, COUNT(*)::int AS count,
              array_agg(l.record_key ORDER BY l.record_key COLLATE "C") AS keys
       FROM identity i
       JOIN (SELECT national_id, ${source.key} AS record_key FROM ${source.table}) l
         ON l.national_id = i.national_id
       GROUP BY i.national_id, i.name
       HAVING COUNT(*) >= $1
       ORDER BY count DESC, i.name COLLATE "C" ASC, i.national_id ASC`,
      [threshold]
    );
  }

  combinedCounts(kindA: LinkedRecordKind, kindB: LinkedRecordKind): Promise<CombinedCountRow[]> {
    const a = LINKED_SOURCES[kindA];
    const b = LINKED_SOURCES[kindB];
    return this.rows<CombinedCountRow>(
      `SELECT i.national_id, i.name, a.count AS count_a, b.count AS count_b
       FROM identity i
       JOIN (SELECT national_id, COUNT(*)::int AS count FROM ${a.table} GROUP BY national_id) a
         ON a.national_id = i.national_id
       JOIN (SELECT national_id, COUNT(*)::int AS count FROM ${b.table} GROUP BY national_id) b
         ON b.national_id = i.national_id
       ORDER BY i.national_id ASC`
    );
  }

  registryStatistics(): Promise<RegistryStatisticsRow> {
    return this.one<RegistryStatisticsRow>(
      `SELECT
         (SELECT COUNT(*)::int FROM identity) AS identities,
         (SELECT COUNT(*)::int FROM citizen_account WHERE account_status = 'Active') AS active_accounts,
         (SELECT COUNT(*)::int FROM registration_request WHERE status = 'Pending') AS pending_registrations,
         (SELECT COUNT(*)::int FROM tax_id) AS tax_ids,
         (SELECT COUNT(*)::int FROM voter_record) AS voter_records,
         (SELECT COUNT(*)::int FROM sim_record) AS sims,
         (SELECT COUNT(*)::int FROM bank_account) AS bank_accounts,
         (SELECT COUNT(*)::int FROM criminal_case) AS criminal_cases`
    );
  }
}

export class PostgresRegistryStore implements RegistryStore {
  readonly name = "postgres";
  private readonly lockTimeout = resolveLockTimeout();

  async transaction<T>(work: (tx: RegistryTx) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    const client = await getClient();
    let releaseError: Error | undefined;
    try {
      await client.query(
        options.readOnly ? "BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY" : "BEGIN"
      );
      await client.query(`SET LOCAL lock_timeout = '${this.lockTimeout}'`);
      const result = await work(new PostgresRegistryTx(client));
      await client.query("COMMIT");
      recordStoreTransaction(this.name, "commit");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        // The connection is unusable; release destroys it instead of pooling it.
        releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        logWarn("ROLLBACK failed", { error: releaseError.message });
      }
      recordStoreTransaction(this.name, "rollback");
      throw translatePgError(error);
    } finally {
      client.release(releaseError);
    }
  }

  async ping(): Promise<void> {
    await runQuery(pool, "SELECT 1");
  }

  async close(): Promise<void> {
    await pool.end();
  }
}
