import {
  ACCOUNT_NUMBER_PATTERN,
  BRANCH_CODE_PATTERN,
  ELECTORAL_CODE_PATTERN,
  MOBILE_PATTERN,
  NATIONAL_ID_PATTERN,
  SIM_NUMBER_PATTERN,
  TAX_ID_PATTERN,
  toIsoDate,
  validateBirthDate,
  validateTaxIdIssueDate,
  type AccountStatus,
  type LinkedRecordKind,
  type PhotoFormat,
} from "@civic-registry/shared";
import { ConflictError, IntegrityError, ValidationError } from "../errors";
import { recordStoreTransaction } from "../observability/metrics";
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

type CaseLink = { case_number: number; national_id: string };

type Sequences = {
  caseNumber: number;
  citizenId: number;
  adminId: number;
  requestId: number;
  logId: number;
};

type MemoryState = {
  identities: Map<string, IdentityRow>;
  biometrics: Map<string, BiometricRow>;
  taxIds: Map<string, TaxIdRow>;
  voterRecords: Map<string, VoterRecordRow>;
  sims: Map<string, SimRecordRow>;
  bankAccounts: Map<string, BankAccountRow>;
  criminalCases: Map<number, CriminalCaseRow>;
  caseLinks: Map<string, CaseLink>;
  citizenAccounts: Map<number, CitizenAccountRow>;
  adminAccounts: Map<number, AdminAccountRow>;
  registrations: Map<number, RegistrationRow>;
  auditLog: AuditRow[];
  sequences: Sequences;
};

const DAY_MS = 24 * 60 * 60 * 1000;

// Messages follow the trigger texts in the SQL migrations.
const DATE_RULE_CODES: Record<string, [string, string]> = {
  "validation.birth_date_future": ["BIRTH_DATE_FUTURE", "Birth date cannot be in the future"],
  "validation.birth_date_too_old": ["BIRTH_DATE_TOO_OLD", "Birth date cannot be more than 120 years ago"],
  "validation.issue_date_future": ["ISSUE_DATE_FUTURE", "Issue date cannot be in the future"],
  "validation.issue_date_before_floor": ["ISSUE_DATE_BEFORE_FLOOR", "Issue date cannot be before 1995-01-01"],
  "validation.date_format": ["INVALID_VALUE", "Invalid date value"],
};

function emptyState(): MemoryState {
  return {
    identities: new Map(),
    biometrics: new Map(),
    taxIds: new Map(),
    voterRecords: new Map(),
    sims: new Map(),
    bankAccounts: new Map(),
    criminalCases: new Map(),
    caseLinks: new Map(),
    citizenAccounts: new Map(),
    adminAccounts: new Map(),
    registrations: new Map(),
    auditLog: [],
    sequences: { caseNumber: 0, citizenId: 0, adminId: 0, requestId: 0, logId: 0 },
  };
}

function cloneTable<K, V extends object>(table: Map<K, V>): Map<K, V> {
  return new Map(Array.from(table, ([key, row]) => [key, { ...row }]));
}

function cloneState(state: MemoryState): MemoryState {
  return {
    identities: cloneTable(state.identities),
    biometrics: cloneTable(state.biometrics),
    taxIds: cloneTable(state.taxIds),
    voterRecords: cloneTable(state.voterRecords),
    sims: cloneTable(state.sims),
    bankAccounts: cloneTable(state.bankAccounts),
    criminalCases: cloneTable(state.criminalCases),
    caseLinks: cloneTable(state.caseLinks),
    citizenAccounts: cloneTable(state.citizenAccounts),
    adminAccounts: cloneTable(state.adminAccounts),
    registrations: cloneTable(state.registrations),
    auditLog: state.auditLog.map((row) => ({ ...row })),
    sequences: { ...state.sequences },
  };
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Orders positive decimal strings without leading zeros numerically. */
function compareDecimal(a: string, b: string): number {
  return a.length - b.length || compareText(a, b);
}

function bankKey(key: BankAccountKeyRow): string {
  return `${key.bank_name}\u0000${key.account_number}`;
}

function linkKey(caseNumber: number, nationalId: string): string {
  return `${caseNumber}:${nationalId}`;
}

function check(condition: boolean, message: string): void {
  if (!condition) throw new ValidationError("CHECK_VIOLATION", message);
}

function checkLength(value: string, max: number, column: string): void {
  if (value.length > max) {
    throw new ValidationError("VALUE_TOO_LONG", `value too long for ${column} (max ${max})`);
  }
}

function checkDateRule(error: string | null): void {
  if (!error) return;
  const [code, message] = DATE_RULE_CODES[error] ?? ["CHECK_VIOLATION", error];
  throw new ValidationError(code, message);
}

function checkPersonColumns(row: {
  national_id: string;
  name: string;
  birth_date: string;
  mobile: string;
  email: string | null;
}): void {
  check(NATIONAL_ID_PATTERN.test(row.national_id), "national_id must be 12 digits");
  check(row.name.trim().length >= 2, "name must have at least 2 characters");
  checkLength(row.name, 100, "name");
  check(MOBILE_PATTERN.test(row.mobile), "mobile must be 10 digits");
  if (row.email !== null) checkLength(row.email, 100, "email");
  checkDateRule(validateBirthDate(row.birth_date));
}

function foreignKeyViolation(table: string, column: string, value: string | number): IntegrityError {
  return new IntegrityError(
    "FOREIGN_KEY_VIOLATION",
    `insert or update on table "${table}" violates foreign key: ${column}=${value} is not present`
  );
}

export class MemoryRegistryTx implements RegistryTx {
  constructor(private readonly state: MemoryState) {}

  private now(): Date {
    return new Date();
  }

  private requireIdentity(table: string, nationalId: string): void {
    if (!this.state.identities.has(nationalId)) {
      throw foreignKeyViolation(table, "national_id", nationalId);
    }
  }

  // ── Identity ────────────────────────────────────────────────────────────

  async insertIdentity(row: IdentityInsert): Promise<IdentityRow> {
    checkPersonColumns(row);
    if (this.state.identities.has(row.national_id)) {
      throw new ConflictError("NATIONAL_ID_TAKEN", `Key (national_id)=(${row.national_id}) already exists.`);
    }
    if (row.email !== null && (await this.findIdentityByEmail(row.email))) {
      throw new ConflictError("EMAIL_TAKEN", `Key (email)=(${row.email}) already exists.`);
    }
    const stored: IdentityRow = { ...row, created_at: this.now() };
    this.state.identities.set(row.national_id, stored);
    return { ...stored };
  }

  async findIdentity(nationalId: string): Promise<IdentityRow | null> {
    const row = this.state.identities.get(nationalId);
    return row ? { ...row } : null;
  }

  async findIdentityByEmail(email: string): Promise<IdentityRow | null> {
    for (const row of this.state.identities.values()) {
      if (row.email === email) return { ...row };
    }
    return null;
  }

  async listIdentities(filter: { search?: string; limit: number; offset: number }): Promise<IdentityDirectoryRow[]> {
    const search = filter.search?.trim() || null;
    const needle = search?.toLowerCase() ?? "";
    const accounts = new Map(
      Array.from(this.state.citizenAccounts.values(), (account) => [account.national_id, account])
    );
    return Array.from(this.state.identities.values())
      .filter((row) => !search || row.national_id === search || row.name.toLowerCase().includes(needle))
      .sort((a, b) => compareText(a.name, b.name) || compareText(a.national_id, b.national_id))
      .slice(filter.offset, filter.offset + filter.limit)
      .map((row) => {
        const account = accounts.get(row.national_id);
        return {
          ...row,
          username: account?.username ?? null,
          account_status: account?.account_status ?? null,
        };
      });
  }

  async updateIdentityContact(nationalId: string, mobile: string, email: string | null): Promise<IdentityRow | null> {
    const row = this.state.identities.get(nationalId);
    if (!row) return null;
    checkPersonColumns({ ...row, mobile, email });
    if (email !== null) {
      const holder = await this.findIdentityByEmail(email);
      if (holder && holder.national_id !== nationalId) {
        throw new ConflictError("EMAIL_TAKEN", `Key (email)=(${email}) already exists.`);
      }
    }
    row.mobile = mobile;
    row.email = email;
    return { ...row };
  }

  async deleteIdentity(nationalId: string): Promise<boolean> {
    if (!this.state.identities.delete(nationalId)) return false;
    this.state.biometrics.delete(nationalId);
    const ownedBy = <K, V extends { national_id: string }>(table: Map<K, V>) => {
      for (const [key, row] of table) {
        if (row.national_id === nationalId) table.delete(key);
      }
    };
    ownedBy(this.state.taxIds);
    ownedBy(this.state.voterRecords);
    ownedBy(this.state.sims);
    ownedBy(this.state.bankAccounts);
    ownedBy(this.state.caseLinks);
    ownedBy(this.state.citizenAccounts);
    return true;
  }

  // ── Biometric ───────────────────────────────────────────────────────────

  async insertBiometric(nationalId: string): Promise<BiometricRow> {
    this.requireIdentity("biometric", nationalId);
    if (this.state.biometrics.has(nationalId)) {
      throw new ConflictError("BIOMETRIC_EXISTS", `Key (national_id)=(${nationalId}) already exists.`);
    }
    const now = this.now();
    const row: BiometricRow = {
      national_id: nationalId,
      photo: null,
      photo_type: null,
      has_photo: false,
      version: 0,
      created_on: now,
      last_updated_on: now,
    };
    this.state.biometrics.set(nationalId, row);
    return { ...row };
  }

  async findBiometric(nationalId: string): Promise<BiometricRow | null> {
    const row = this.state.biometrics.get(nationalId);
    return row ? { ...row } : null;
  }

  async updateBiometricPhoto(nationalId: string, photo: Buffer, photoType: PhotoFormat): Promise<BiometricRow | null> {
    const row = this.state.biometrics.get(nationalId);
    if (!row) return null;
    row.photo = Buffer.from(photo);
    row.photo_type = photoType;
    row.has_photo = true;
    row.version += 1;
    row.last_updated_on = this.now();
    return { ...row };
  }

  // ── Tax ID ──────────────────────────────────────────────────────────────

  async insertTaxId(row: TaxIdRow): Promise<TaxIdRow> {
    check(TAX_ID_PATTERN.test(row.code), "tax ID code must be 5 letters, 4 digits and a letter");
    checkLength(row.status, 20, "status");
    checkDateRule(validateTaxIdIssueDate(row.issue_date));
    if (this.state.taxIds.has(row.code)) {
      throw new ConflictError("TAX_ID_EXISTS", `Key (code)=(${row.code}) already exists.`);
    }
    this.requireIdentity("tax_id", row.national_id);
    this.state.taxIds.set(row.code, { ...row });
    return { ...row };
  }

  async findTaxId(code: string): Promise<TaxIdRow | null> {
    const row = this.state.taxIds.get(code);
    return row ? { ...row } : null;
  }

  async listTaxIds(nationalId: string): Promise<TaxIdRow[]> {
    return Array.from(this.state.taxIds.values())
      .filter((row) => row.national_id === nationalId)
      .sort((a, b) => compareText(a.issue_date, b.issue_date) || compareText(a.code, b.code))
      .map((row) => ({ ...row }));
  }

  async updateTaxIdStatus(code: string, status: string): Promise<TaxIdRow | null> {
    const row = this.state.taxIds.get(code);
    if (!row) return null;
    checkLength(status, 20, "status");
    row.status = status;
    return { ...row };
  }

  async deleteTaxId(code: string): Promise<boolean> {
    return this.state.taxIds.delete(code);
  }

  // ── Voter record ────────────────────────────────────────────────────────

  private assertSinglePrimary(nationalId: string, code: string): void {
    for (const row of this.state.voterRecords.values()) {
      if (row.national_id === nationalId && row.is_primary && row.code !== code) {
        throw new ConflictError("PRIMARY_VOTER_RECORD_EXISTS", `Key (national_id)=(${nationalId}) already exists.`);
      }
    }
  }

  async insertVoterRecord(row: VoterRecordInsert): Promise<VoterRecordRow> {
    check(ELECTORAL_CODE_PATTERN.test(row.code), "electoral code must be 8 letters or digits");
    checkLength(row.address, 300, "address");
    checkLength(row.status, 30, "status");
    if (this.state.voterRecords.has(row.code)) {
      throw new ConflictError("ELECTORAL_CODE_EXISTS", `Key (code)=(${row.code}) already exists.`);
    }
    this.requireIdentity("voter_record", row.national_id);
    if (row.is_primary) this.assertSinglePrimary(row.national_id, row.code);
    const now = this.now();
    const stored: VoterRecordRow = { ...row, created_on: now, last_updated_on: now };
    this.state.voterRecords.set(row.code, stored);
    return { ...stored };
  }

  async findVoterRecord(code: string): Promise<VoterRecordRow | null> {
    const row = this.state.voterRecords.get(code);
    return row ? { ...row } : null;
  }

  async listVoterRecords(nationalId: string): Promise<VoterRecordRow[]> {
    return Array.from(this.state.voterRecords.values())
      .filter((row) => row.national_id === nationalId)
      .sort(
        (a, b) =>
          Number(b.is_primary) - Number(a.is_primary) ||
          a.created_on.getTime() - b.created_on.getTime() ||
          compareText(a.code, b.code)
      )
      .map((row) => ({ ...row }));
  }

  async updateVoterRecord(code: string, patch: VoterRecordPatch): Promise<VoterRecordRow | null> {
    const row = this.state.voterRecords.get(code);
    if (!row) return null;
    if (patch.address !== undefined) checkLength(patch.address, 300, "address");
    if (patch.status !== undefined) checkLength(patch.status, 30, "status");
    if (patch.is_primary) this.assertSinglePrimary(row.national_id, code);
    Object.assign(row, {
      address: patch.address ?? row.address,
      registration_type: patch.registration_type ?? row.registration_type,
      status: patch.status ?? row.status,
      is_primary: patch.is_primary ?? row.is_primary,
      last_updated_on: this.now(),
    });
    return { ...row };
  }

  async clearPrimaryVoterRecords(nationalId: string, keepCode?: string): Promise<number> {
    let cleared = 0;
    for (const row of this.state.voterRecords.values()) {
      if (row.national_id === nationalId && row.is_primary && row.code !== keepCode) {
        row.is_primary = false;
        row.last_updated_on = this.now();
        cleared += 1;
      }
    }
    return cleared;
  }

  async deleteVoterRecord(code: string): Promise<boolean> {
    return this.state.voterRecords.delete(code);
  }

  // ── SIM ─────────────────────────────────────────────────────────────────

  async insertSim(row: SimRecordRow): Promise<SimRecordRow> {
    check(SIM_NUMBER_PATTERN.test(row.sim_number), "sim_number must be a positive integer");
    checkLength(row.provider, 50, "provider");
    checkLength(row.status, 20, "status");
    if (this.state.sims.has(row.sim_number)) {
      throw new ConflictError("SIM_EXISTS", `Key (sim_number)=(${row.sim_number}) already exists.`);
    }
    this.requireIdentity("sim_record", row.national_id);
    this.state.sims.set(row.sim_number, { ...row });
    return { ...row };
  }

  async findSim(simNumber: string): Promise<SimRecordRow | null> {
    const row = this.state.sims.get(simNumber);
    return row ? { ...row } : null;
  }

  async listSims(nationalId: string): Promise<SimRecordRow[]> {
    return Array.from(this.state.sims.values())
      .filter((row) => row.national_id === nationalId)
      .sort((a, b) => compareDecimal(a.sim_number, b.sim_number))
      .map((row) => ({ ...row }));
  }

  async updateSimStatus(simNumber: string, status: string): Promise<SimRecordRow | null> {
    const row = this.state.sims.get(simNumber);
    if (!row) return null;
    checkLength(status, 20, "status");
    row.status = status;
    return { ...row };
  }

  async deleteSim(simNumber: string): Promise<boolean> {
    return this.state.sims.delete(simNumber);
  }

  // ── Bank account ────────────────────────────────────────────────────────

  async insertBankAccount(row: BankAccountRow): Promise<BankAccountRow> {
    check(ACCOUNT_NUMBER_PATTERN.test(row.account_number), "account_number must be a positive integer");
    check(BRANCH_CODE_PATTERN.test(row.branch_code), "branch_code must be 4 letters, 0 and 6 letters or digits");
    checkLength(row.bank_name, 50, "bank_name");
    checkLength(row.account_type, 20, "account_type");
    const key = bankKey(row);
    if (this.state.bankAccounts.has(key)) {
      throw new ConflictError(
        "BANK_ACCOUNT_EXISTS",
        `Key (account_number, bank_name)=(${row.account_number}, ${row.bank_name}) already exists.`
      );
    }
    this.requireIdentity("bank_account", row.national_id);
    this.state.bankAccounts.set(key, { ...row });
    return { ...row };
  }

  async findBankAccount(key: BankAccountKeyRow): Promise<BankAccountRow | null> {
    const row = this.state.bankAccounts.get(bankKey(key));
    return row ? { ...row } : null;
  }

  async listBankAccounts(nationalId: string): Promise<BankAccountRow[]> {
    return Array.from(this.state.bankAccounts.values())
      .filter((row) => row.national_id === nationalId)
      .sort((a, b) => compareText(a.bank_name, b.bank_name) || compareDecimal(a.account_number, b.account_number))
      .map((row) => ({ ...row }));
  }

  async updateBankAccount(key: BankAccountKeyRow, patch: BankAccountPatch): Promise<BankAccountRow | null> {
    const row = this.state.bankAccounts.get(bankKey(key));
    if (!row) return null;
    if (patch.branch_code !== undefined) {
      check(BRANCH_CODE_PATTERN.test(patch.branch_code), "branch_code must be 4 letters, 0 and 6 letters or digits");
    }
    if (patch.account_type !== undefined) checkLength(patch.account_type, 20, "account_type");
    row.account_type = patch.account_type ?? row.account_type;
    row.branch_code = patch.branch_code ?? row.branch_code;
    return { ...row };
  }

  async deleteBankAccount(key: BankAccountKeyRow): Promise<boolean> {
    return this.state.bankAccounts.delete(bankKey(key));
  }

  // ── Criminal case ───────────────────────────────────────────────────────

  async insertCriminalCase(offence: string): Promise<CriminalCaseRow> {
    checkLength(offence, 100, "offence");
    this.state.sequences.caseNumber += 1;
    const row: CriminalCaseRow = { case_number: this.state.sequences.caseNumber, offence };
    this.state.criminalCases.set(row.case_number, row);
    return { ...row };
  }

  async findCriminalCase(caseNumber: number): Promise<CriminalCaseRow | null> {
    const row = this.state.criminalCases.get(caseNumber);
    return row ? { ...row } : null;
  }

  async linkCase(caseNumber: number, nationalId: string): Promise<void> {
    const key = linkKey(caseNumber, nationalId);
    if (this.state.caseLinks.has(key)) {
      throw new ConflictError(
        "CASE_LINK_EXISTS",
        `Key (case_number, national_id)=(${caseNumber}, ${nationalId}) already exists.`
      );
    }
    if (!this.state.criminalCases.has(caseNumber)) {
      throw foreignKeyViolation("case_linkage", "case_number", caseNumber);
    }
    this.requireIdentity("case_linkage", nationalId);
    this.state.caseLinks.set(key, { case_number: caseNumber, national_id: nationalId });
  }

  async unlinkCase(caseNumber: number, nationalId: string): Promise<boolean> {
    return this.state.caseLinks.delete(linkKey(caseNumber, nationalId));
  }

  async listCaseLinks(caseNumber: number): Promise<CaseLinkRow[]> {
    const links: CaseLinkRow[] = [];
    for (const link of this.state.caseLinks.values()) {
      if (link.case_number !== caseNumber) continue;
      const identity = this.state.identities.get(link.national_id);
      if (identity) links.push({ ...link, name: identity.name });
    }
    return links.sort((a, b) => compareText(a.name, b.name) || compareText(a.national_id, b.national_id));
  }

  async listCasesForIdentity(nationalId: string): Promise<CriminalCaseRow[]> {
    const cases: CriminalCaseRow[] = [];
    for (const link of this.state.caseLinks.values()) {
      if (link.national_id !== nationalId) continue;
      const row = this.state.criminalCases.get(link.case_number);
      if (row) cases.push({ ...row });
    }
    return cases.sort((a, b) => a.case_number - b.case_number);
  }

  async deleteCriminalCase(caseNumber: number): Promise<boolean> {
    if (!this.state.criminalCases.delete(caseNumber)) return false;
    for (const [key, link] of this.state.caseLinks) {
      if (link.case_number === caseNumber) this.state.caseLinks.delete(key);
    }
    return true;
  }

  // ── Accounts ────────────────────────────────────────────────────────────

  async insertCitizenAccount(row: CitizenAccountInsert): Promise<CitizenAccountRow> {
    for (const account of this.state.citizenAccounts.values()) {
      if (account.username === row.username) {
        throw new ConflictError("USERNAME_TAKEN", `Key (username)=(${row.username}) already exists.`);
      }
      if (account.national_id === row.national_id) {
        throw new ConflictError("ACCOUNT_EXISTS", `Key (national_id)=(${row.national_id}) already exists.`);
      }
    }
    this.requireIdentity("citizen_account", row.national_id);
    this.state.sequences.citizenId += 1;
    const stored: CitizenAccountRow = {
      ...row,
      citizen_id: this.state.sequences.citizenId,
      failed_login_attempts: 0,
      created_on: this.now(),
      last_login: null,
    };
    this.state.citizenAccounts.set(stored.citizen_id, stored);
    return { ...stored };
  }

  async findCitizenAccountByUsername(username: string): Promise<CitizenAccountRow | null> {
    for (const account of this.state.citizenAccounts.values()) {
      if (account.username === username) return { ...account };
    }
    return null;
  }

  async findCitizenAccountByNationalId(nationalId: string): Promise<CitizenAccountRow | null> {
    for (const account of this.state.citizenAccounts.values()) {
      if (account.national_id === nationalId) return { ...account };
    }
    return null;
  }

  async recordCitizenLoginFailure(citizenId: number, maxAttempts: number): Promise<CitizenAccountRow | null> {
    const account = this.state.citizenAccounts.get(citizenId);
    if (!account) return null;
    account.failed_login_attempts += 1;
    if (account.failed_login_attempts >= maxAttempts) account.account_status = "Suspended";
    return { ...account };
  }

  async recordCitizenLoginSuccess(citizenId: number): Promise<void> {
    const account = this.state.citizenAccounts.get(citizenId);
    if (!account) return;
    account.failed_login_attempts = 0;
    account.last_login = this.now();
  }

  async updateCitizenAccountStatus(username: string, status: AccountStatus): Promise<CitizenAccountRow | null> {
    for (const account of this.state.citizenAccounts.values()) {
      if (account.username !== username) continue;
      account.account_status = status;
      if (status === "Active") account.failed_login_attempts = 0;
      return { ...account };
    }
    return null;
  }

  async insertAdminAccount(row: AdminAccountInsert): Promise<AdminAccountRow> {
    if (await this.findAdminAccountByUsername(row.username)) {
      throw new ConflictError("USERNAME_TAKEN", `Key (username)=(${row.username}) already exists.`);
    }
    checkLength(row.full_name, 100, "full_name");
    this.state.sequences.adminId += 1;
    const stored: AdminAccountRow = {
      ...row,
      admin_id: this.state.sequences.adminId,
      created_on: this.now(),
      last_login: null,
    };
    this.state.adminAccounts.set(stored.admin_id, stored);
    return { ...stored };
  }

  async findAdminAccountByUsername(username: string): Promise<AdminAccountRow | null> {
    for (const account of this.state.adminAccounts.values()) {
      if (account.username === username) return { ...account };
    }
    return null;
  }

  async recordAdminLogin(adminId: number): Promise<void> {
    const account = this.state.adminAccounts.get(adminId);
    if (account) account.last_login = this.now();
  }

  // ── Registration queue ──────────────────────────────────────────────────

  private pendingRegistrations(): RegistrationRow[] {
    return Array.from(this.state.registrations.values()).filter((row) => row.status === "Pending");
  }

  async insertRegistration(row: RegistrationInsert): Promise<RegistrationRow> {
    checkPersonColumns(row);
    for (const pending of this.pendingRegistrations()) {
      if (pending.username === row.username) {
        throw new ConflictError("USERNAME_TAKEN", `Key (username)=(${row.username}) already exists.`);
      }
      if (pending.national_id === row.national_id) {
        throw new ConflictError("NATIONAL_ID_TAKEN", `Key (national_id)=(${row.national_id}) already exists.`);
      }
      if (row.email !== null && pending.email === row.email) {
        throw new ConflictError("EMAIL_TAKEN", `Key (email)=(${row.email}) already exists.`);
      }
    }
    this.state.sequences.requestId += 1;
    const stored: RegistrationRow = {
      ...row,
      request_id: this.state.sequences.requestId,
      request_date: this.now(),
      status: "Pending",
      reviewed_by: null,
      review_date: null,
      rejection_reason: null,
    };
    this.state.registrations.set(stored.request_id, stored);
    return { ...stored };
  }

  async findRegistration(requestId: number): Promise<RegistrationRow | null> {
    const row = this.state.registrations.get(requestId);
    return row ? { ...row } : null;
  }

  async findRegistrationConflicts(candidate: {
    username: string;
    national_id: string;
    email: string | null;
  }): Promise<RegistrationConflictCode[]> {
    const pending = this.pendingRegistrations();
    const conflicts: RegistrationConflictCode[] = [];
    const usernameTaken =
      (await this.findCitizenAccountByUsername(candidate.username)) !== null ||
      (await this.findAdminAccountByUsername(candidate.username)) !== null ||
      pending.some((row) => row.username === candidate.username);
    if (usernameTaken) conflicts.push("USERNAME_TAKEN");
    const nationalIdTaken =
      this.state.identities.has(candidate.national_id) ||
      pending.some((row) => row.national_id === candidate.national_id);
    if (nationalIdTaken) conflicts.push("NATIONAL_ID_TAKEN");
    const { email } = candidate;
    if (email !== null) {
      const emailTaken =
        (await this.findIdentityByEmail(email)) !== null || pending.some((row) => row.email === email);
      if (emailTaken) conflicts.push("EMAIL_TAKEN");
    }
    return conflicts;
  }

  async hasPendingRegistrationForUsername(username: string): Promise<boolean> {
    return this.pendingRegistrations().some((row) => row.username === username);
  }

  async transitionRegistration(requestId: number, change: RegistrationTransition): Promise<number> {
    const row = this.state.registrations.get(requestId);
    if (!row || row.status !== "Pending") return 0;
    if (!this.state.adminAccounts.has(change.reviewed_by)) {
      throw foreignKeyViolation("registration_request", "reviewed_by", change.reviewed_by);
    }
    check(change.status !== "Rejected" || change.rejection_reason !== null, "rejection requires a reason");
    if (change.rejection_reason !== null) checkLength(change.rejection_reason, 255, "rejection_reason");
    row.status = change.status;
    row.reviewed_by = change.reviewed_by;
    row.review_date = this.now();
    row.rejection_reason = change.rejection_reason;
    return 1;
  }

  async listPendingRegistrations(): Promise<PendingRegistrationRow[]> {
    const today = Date.parse(toIsoDate(this.now()));
    return this.pendingRegistrations()
      .sort((a, b) => a.request_date.getTime() - b.request_date.getTime() || a.request_id - b.request_id)
      .map((row) => ({
        request_id: row.request_id,
        username: row.username,
        national_id: row.national_id,
        name: row.name,
        email: row.email,
        request_date: row.request_date,
        days_pending: Math.round((today - Date.parse(toIsoDate(row.request_date))) / DAY_MS),
      }));
  }

  // ── Audit ───────────────────────────────────────────────────────────────

  async appendAudit(entry: AuditInsert): Promise<AuditRow> {
    checkLength(entry.operation_type, 50, "operation_type");
    checkLength(entry.performed_by, 50, "performed_by");
    this.state.sequences.logId += 1;
    const row: AuditRow = { ...entry, log_id: this.state.sequences.logId, timestamp: this.now() };
    this.state.auditLog.push(row);
    return { ...row };
  }

  async listRecentAudit(limit: number): Promise<AuditRow[]> {
    return this.state.auditLog
      .slice()
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime() || b.log_id - a.log_id)
      .slice(0, Math.min(limit, 100))
      .map((row) => ({ ...row }));
  }

  // ── Aggregates ──────────────────────────────────────────────────────────

  private linkedKeys(kind: LinkedRecordKind): Array<{ national_id: string; key: string }> {
    switch (kind) {
      case "taxId":
        return Array.from(this.state.taxIds.values(), (row) => ({ national_id: row.national_id, key: row.code }));
      case "voter":
        return Array.from(this.state.voterRecords.values(), (row) => ({ national_id: row.national_id, key: row.code }));
      case "sim":
        return Array.from(this.state.sims.values(), (row) => ({ national_id: row.national_id, key: row.sim_number }));
      case "bank":
        return Array.from(this.state.bankAccounts.values(), (row) => ({
          national_id: row.national_id,
          key: `${row.bank_name}/${row.account_number}`,
        }));
      case "case":
        return Array.from(this.state.caseLinks.values(), (row) => ({
          national_id: row.national_id,
          key: String(row.case_number),
        }));
    }
  }

  private keysByIdentity(kind: LinkedRecordKind): Map<string, string[]> {
    const grouped = new Map<string, string[]>();
    for (const { national_id, key } of this.linkedKeys(kind)) {
      const keys = grouped.get(national_id) ?? [];
      keys.push(key);
      grouped.set(national_id, keys);
    }
    return grouped;
  }

  async countLinked(nationalId: string, kind: LinkedRecordKind): Promise<number> {
    return this.linkedKeys(kind).filter((row) => row.national_id === nationalId).length;
  }

  async identitiesWithMinimum(kind: LinkedRecordKind, threshold: number): Promise<LinkedCountRow[]> {
    const rows: LinkedCountRow[] = [];
    for (const [nationalId, keys] of this.keysByIdentity(kind)) {
      const identity = this.state.identities.get(nationalId);
      if (!identity || keys.length < threshold) continue;
      rows.push({ national_id: nationalId, name: identity.name, count: keys.length, keys: keys.sort(compareText) });
    }
    return rows.sort(
      (a, b) => b.count - a.count || compareText(a.name, b.name) || compareText(a.national_id, b.national_id)
    );
  }

  async combinedCounts(kindA: LinkedRecordKind, kindB: LinkedRecordKind): Promise<CombinedCountRow[]> {
    const countsA = this.keysByIdentity(kindA);
    const countsB = this.keysByIdentity(kindB);
    const rows: CombinedCountRow[] = [];
    for (const [nationalId, keysA] of countsA) {
      const keysB = countsB.get(nationalId);
      const identity = this.state.identities.get(nationalId);
      if (!keysB || !identity) continue;
      rows.push({ national_id: nationalId, name: identity.name, count_a: keysA.length, count_b: keysB.length });
    }
    return rows.sort((a, b) => compareText(a.national_id, b.national_id));
  }

  async registryStatistics(): Promise<RegistryStatisticsRow> {
    const activeAccounts = Array.from(this.state.citizenAccounts.values()).filter(
      (account) => account.account_status === "Active"
    );
    return {
      identities: this.state.identities.size,
      active_accounts: activeAccounts.length,
      pending_registrations: this.pendingRegistrations().length,
      tax_ids: this.state.taxIds.size,
      voter_records: this.state.voterRecords.size,
      sims: this.state.sims.size,
      bank_accounts: this.state.bankAccounts.size,
      criminal_cases: this.state.criminalCases.size,
    };
  }
}

/**
 * Process-local store for tests and single-node demos. Transactions run one at
 * a time against a copy of the state, which replaces the live state only on
 * success; read-only transactions never replace it.
 */
export class InMemoryRegistryStore implements RegistryStore {
  readonly name = "memory";
  private state: MemoryState = emptyState();
  private tail: Promise<void> = Promise.resolve();

  transaction<T>(work: (tx: RegistryTx) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    const run = this.tail.then(() => this.runIsolated(work, options));
    // The queue only orders transactions; callers observe failures through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runIsolated<T>(work: (tx: RegistryTx) => Promise<T>, options: TransactionOptions): Promise<T> {
    const draft = cloneState(this.state);
    try {
      const result = await work(new MemoryRegistryTx(draft));
      if (!options.readOnly) this.state = draft;
      recordStoreTransaction(this.name, "commit");
      return result;
    } catch (error) {
      recordStoreTransaction(this.name, "rollback");
      throw error;
    }
  }

  async ping(): Promise<void> {
    return;
  }

  async close(): Promise<void> {
    this.state = emptyState();
  }
}
