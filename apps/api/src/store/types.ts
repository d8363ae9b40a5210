import type {
  AccountStatus,
  ActorRole,
  Gender,
  LinkedRecordKind,
  PhotoFormat,
  RegistrationStatus,
  VoterRegistrationType,
} from "@civic-registry/shared";

/*
 * Row shapes mirror the Postgres columns (snake_case). Calendar dates are
 * YYYY-MM-DD strings; BIGINT keys travel as decimal strings.
 */

export type IdentityRow = {
  national_id: string;
  name: string;
  gender: Gender;
  birth_date: string;
  mobile: string;
  email: string | null;
  created_at: Date;
};

export type IdentityInsert = Omit<IdentityRow, "created_at">;

export type IdentityDirectoryRow = IdentityRow & {
  username: string | null;
  account_status: AccountStatus | null;
};

export type BiometricRow = {
  national_id: string;
  photo: Buffer | null;
  photo_type: PhotoFormat | null;
  has_photo: boolean;
  version: number;
  created_on: Date;
  last_updated_on: Date;
};

export type TaxIdRow = {
  code: string;
  national_id: string;
  issue_date: string;
  status: string;
};

export type VoterRecordRow = {
  code: string;
  national_id: string;
  holder_name: string;
  address: string;
  registration_type: VoterRegistrationType;
  issue_date: string | null;
  status: string;
  is_primary: boolean;
  created_on: Date;
  last_updated_on: Date;
};

export type VoterRecordInsert = Omit<VoterRecordRow, "created_on" | "last_updated_on">;

export type VoterRecordPatch = Partial<
  Pick<VoterRecordRow, "address" | "registration_type" | "status" | "is_primary">
>;

export type SimRecordRow = {
  sim_number: string;
  national_id: string;
  provider: string;
  status: string;
};

export type BankAccountKeyRow = {
  account_number: string;
  bank_name: string;
};

export type BankAccountRow = BankAccountKeyRow & {
  account_type: string;
  branch_code: string;
  national_id: string;
};

export type BankAccountPatch = Partial<Pick<BankAccountRow, "account_type" | "branch_code">>;

export type CriminalCaseRow = {
  case_number: number;
  offence: string;
};

export type CaseLinkRow = {
  case_number: number;
  national_id: string;
  name: string;
};

export type CitizenAccountRow = {
  citizen_id: number;
  username: string;
  password_hash: string;
  national_id: string;
  account_status: AccountStatus;
  failed_login_attempts: number;
  created_on: Date;
  last_login: Date | null;
};

export type CitizenAccountInsert = Pick<
  CitizenAccountRow,
  "username" | "password_hash" | "national_id" | "account_status"
>;

export type AdminAccountRow = {
  admin_id: number;
  username: string;
  password_hash: string;
  full_name: string;
  created_on: Date;
  last_login: Date | null;
};

export type AdminAccountInsert = Pick<AdminAccountRow, "username" | "password_hash" | "full_name">;

export type RegistrationRow = {
  request_id: number;
  username: string;
  password_hash: string;
  national_id: string;
  name: string;
  gender: Gender;
  birth_date: string;
  mobile: string;
  email: string | null;
  request_date: Date;
  status: RegistrationStatus;
  reviewed_by: number | null;
  review_date: Date | null;
  rejection_reason: string | null;
};

export type RegistrationInsert = Omit<
  RegistrationRow,
  "request_id" | "request_date" | "status" | "reviewed_by" | "review_date" | "rejection_reason"
>;

export type RegistrationTransition = {
  status: Exclude<RegistrationStatus, "Pending">;
  reviewed_by: number;
  rejection_reason: string | null;
};

export type PendingRegistrationRow = {
  request_id: number;
  username: string;
  national_id: string;
  name: string;
  email: string | null;
  request_date: Date;
  days_pending: number;
};

export type RegistrationConflictCode = "USERNAME_TAKEN" | "NATIONAL_ID_TAKEN" | "EMAIL_TAKEN";

export type AuditRow = {
  log_id: number;
  operation_type: string;
  table_name: string;
  record_id: string | null;
  performed_by: string;
  user_type: ActorRole;
  operation_details: string | null;
  ip_address: string | null;
  timestamp: Date;
};

export type AuditInsert = Omit<AuditRow, "log_id" | "timestamp">;

export type LinkedCountRow = {
  national_id: string;
  name: string;
  count: number;
  keys: string[];
};

export type CombinedCountRow = {
  national_id: string;
  name: string;
  count_a: number;
  count_b: number;
};

export type RegistryStatisticsRow = {
  identities: number;
  active_accounts: number;
  pending_registrations: number;
  tax_ids: number;
  voter_records: number;
  sims: number;
  bank_accounts: number;
  criminal_cases: number;
};

export type LockOption = { forUpdate?: boolean };

/**
 * Everything the domain modules may do inside one transaction. Both adapters
 * enforce the same keys, references and cascades and raise the same
 * `RegistryError` codes, so domain code never inspects driver errors.
 */
export interface RegistryTx {
  // Identity
  insertIdentity(row: IdentityInsert): Promise<IdentityRow>;
  findIdentity(nationalId: string, options?: LockOption): Promise<IdentityRow | null>;
  findIdentityByEmail(email: string): Promise<IdentityRow | null>;
  listIdentities(filter: { search?: string; limit: number; offset: number }): Promise<IdentityDirectoryRow[]>;
  updateIdentityContact(nationalId: string, mobile: string, email: string | null): Promise<IdentityRow | null>;
  deleteIdentity(nationalId: string): Promise<boolean>;

  // Biometric
  insertBiometric(nationalId: string): Promise<BiometricRow>;
  findBiometric(nationalId: string): Promise<BiometricRow | null>;
  updateBiometricPhoto(nationalId: string, photo: Buffer, photoType: PhotoFormat): Promise<BiometricRow | null>;

  // Tax ID
  insertTaxId(row: TaxIdRow): Promise<TaxIdRow>;
  findTaxId(code: string): Promise<TaxIdRow | null>;
  listTaxIds(nationalId: string): Promise<TaxIdRow[]>;
  updateTaxIdStatus(code: string, status: string): Promise<TaxIdRow | null>;
  deleteTaxId(code: string): Promise<boolean>;

  // Voter record
  insertVoterRecord(row: VoterRecordInsert): Promise<VoterRecordRow>;
  findVoterRecord(code: string): Promise<VoterRecordRow | null>;
  listVoterRecords(nationalId: string): Promise<VoterRecordRow[]>;
  updateVoterRecord(code: string, patch: VoterRecordPatch): Promise<VoterRecordRow | null>;
  /** Clears the primary flag on the holder's records, except `keepCode`. */
  clearPrimaryVoterRecords(nationalId: string, keepCode?: string): Promise<number>;
  deleteVoterRecord(code: string): Promise<boolean>;

  // SIM
  insertSim(row: SimRecordRow): Promise<SimRecordRow>;
  findSim(simNumber: string): Promise<SimRecordRow | null>;
  listSims(nationalId: string): Promise<SimRecordRow[]>;
  updateSimStatus(simNumber: string, status: string): Promise<SimRecordRow | null>;
  deleteSim(simNumber: string): Promise<boolean>;

  // Bank account
  insertBankAccount(row: BankAccountRow): Promise<BankAccountRow>;
  findBankAccount(key: BankAccountKeyRow): Promise<BankAccountRow | null>;
  listBankAccounts(nationalId: string): Promise<BankAccountRow[]>;
  updateBankAccount(key: BankAccountKeyRow, patch: BankAccountPatch): Promise<BankAccountRow | null>;
  deleteBankAccount(key: BankAccountKeyRow): Promise<boolean>;

  // Criminal case
  insertCriminalCase(offence: string): Promise<CriminalCaseRow>;
  findCriminalCase(caseNumber: number): Promise<CriminalCaseRow | null>;
  linkCase(caseNumber: number, nationalId: string): Promise<void>;
  unlinkCase(caseNumber: number, nationalId: string): Promise<boolean>;
  listCaseLinks(caseNumber: number): Promise<CaseLinkRow[]>;
  listCasesForIdentity(nationalId: string): Promise<CriminalCaseRow[]>;
  deleteCriminalCase(caseNumber: number): Promise<boolean>;

  // Accounts
  insertCitizenAccount(row: CitizenAccountInsert): Promise<CitizenAccountRow>;
  findCitizenAccountByUsername(username: string, options?: LockOption): Promise<CitizenAccountRow | null>;
  findCitizenAccountByNationalId(nationalId: string): Promise<CitizenAccountRow | null>;
  /** Increments the failure counter and suspends at `maxAttempts`. */
  recordCitizenLoginFailure(citizenId: number, maxAttempts: number): Promise<CitizenAccountRow | null>;
  recordCitizenLoginSuccess(citizenId: number): Promise<void>;
  updateCitizenAccountStatus(username: string, status: AccountStatus): Promise<CitizenAccountRow | null>;
  insertAdminAccount(row: AdminAccountInsert): Promise<AdminAccountRow>;
  findAdminAccountByUsername(username: string): Promise<AdminAccountRow | null>;
  recordAdminLogin(adminId: number): Promise<void>;

  // Registration queue
  insertRegistration(row: RegistrationInsert): Promise<RegistrationRow>;
  findRegistration(requestId: number, options?: LockOption): Promise<RegistrationRow | null>;
  findRegistrationConflicts(candidate: {
    username: string;
    national_id: string;
    email: string | null;
  }): Promise<RegistrationConflictCode[]>;
  hasPendingRegistrationForUsername(username: string): Promise<boolean>;
  /** Conditional on the request still being Pending; returns affected rows. */
  transitionRegistration(requestId: number, change: RegistrationTransition): Promise<number>;
  listPendingRegistrations(): Promise<PendingRegistrationRow[]>;

  // Audit
  appendAudit(entry: AuditInsert): Promise<AuditRow>;
  listRecentAudit(limit: number): Promise<AuditRow[]>;

  // Aggregates
  countLinked(nationalId: string, kind: LinkedRecordKind): Promise<number>;
  identitiesWithMinimum(kind: LinkedRecordKind, threshold: number): Promise<LinkedCountRow[]>;
  /** Identities holding at least one record of each kind. */
  combinedCounts(kindA: LinkedRecordKind, kindB: LinkedRecordKind): Promise<CombinedCountRow[]>;
  registryStatistics(): Promise<RegistryStatisticsRow>;
}

export interface TransactionOptions {
  /** Snapshot read; no writes are kept. */
  readOnly?: boolean;
}

export interface RegistryStore {
  readonly name: "postgres" | "memory";
  transaction<T>(work: (tx: RegistryTx) => Promise<T>, options?: TransactionOptions): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
