/**
 * Shared field-level validators for civil registry records.
 * Each validator returns an error key string or null if valid.
 */

export const NATIONAL_ID_PATTERN = /^[0-9]{12}$/;
export const MOBILE_PATTERN = /^[0-9]{10}$/;
export const TAX_ID_PATTERN = /^[A-Z]{5}[0-9]{4}[A-Z]$/;
export const ELECTORAL_CODE_PATTERN = /^[A-Z0-9]{8}$/;
export const BRANCH_CODE_PATTERN = /^[A-Z]{4}0[A-Z0-9]{6}$/;
// BIGINT columns; 18 digits always fit.
export const SIM_NUMBER_PATTERN = /^[1-9][0-9]{0,17}$/;
export const ACCOUNT_NUMBER_PATTERN = /^[1-9][0-9]{0,17}$/;
export const USERNAME_PATTERN = /^[A-Za-z0-9._-]{3,50}$/;

export const MAX_AGE_YEARS = 120;
export const TAX_ID_ISSUE_FLOOR = "1995-01-01";

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

// ── Date helpers (calendar dates, UTC) ──────────────────────────────────

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;
  const [, year, month, day] = match;
  const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return toIsoDate(parsed) === value && Number(year) > 0;
}

/**
 * Shift a calendar date back by whole years. A day that does not exist in the
 * target month (29 Feb) is clamped to the month's last day.
 */
export function subtractYears(isoDate: string, years: number): string {
  const match = ISO_DATE_PATTERN.exec(isoDate);
  if (!match) throw new Error(`Invalid ISO date: ${isoDate}`);
  const year = Number(match[1]) - years;
  const monthIndex = Number(match[2]) - 1;
  const lastDay = new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();
  const day = Math.min(Number(match[3]), lastDay);
  return toIsoDate(new Date(Date.UTC(year, monthIndex, day)));
}

export function shiftDays(isoDate: string, days: number): string {
  const match = ISO_DATE_PATTERN.exec(isoDate);
  if (!match) throw new Error(`Invalid ISO date: ${isoDate}`);
  const base = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return toIsoDate(new Date(base + days * 24 * 60 * 60 * 1000));
}

/** Whole years between two calendar dates. */
export function ageInYears(birthDate: string, today: string = toIsoDate(new Date())): number {
  const [by, bm, bd] = birthDate.split("-").map(Number);
  const [ty, tm, td] = today.split("-").map(Number);
  let age = ty - by;
  if (tm < bm || (tm === bm && td < bd)) age -= 1;
  return age;
}

// ── Individual validators ───────────────────────────────────────────────

export function validateEmail(value: string): string | null {
  if (!value) return null; // emptiness handled by required check
  if (value.length > 100) return "validation.email";
  const atIdx = value.indexOf("@");
  if (atIdx < 1) return "validation.email";
  const dotIdx = value.indexOf(".", atIdx);
  if (dotIdx < 0 || dotIdx === value.length - 1) return "validation.email";
  return null;
}

export function validateMobile(value: string): string | null {
  if (!value) return null;
  if (!MOBILE_PATTERN.test(value)) return "validation.mobile";
  return null;
}

export function validateNationalId(value: string): string | null {
  if (!value) return null;
  if (!NATIONAL_ID_PATTERN.test(value)) return "validation.national_id";
  return null;
}

export function validateTaxId(value: string): string | null {
  if (!value) return null;
  if (!TAX_ID_PATTERN.test(value.toUpperCase())) return "validation.tax_id";
  return null;
}

export function validateElectoralCode(value: string): string | null {
  if (!value) return null;
  if (!ELECTORAL_CODE_PATTERN.test(value.toUpperCase())) return "validation.electoral_code";
  return null;
}

export function validateBranchCode(value: string): string | null {
  if (!value) return null;
  if (!BRANCH_CODE_PATTERN.test(value.toUpperCase())) return "validation.branch_code";
  return null;
}

export function validateSimNumber(value: string): string | null {
  if (!value) return null;
  if (!SIM_NUMBER_PATTERN.test(value)) return "validation.sim_number";
  return null;
}

export function validateAccountNumber(value: string): string | null {
  if (!value) return null;
  if (!ACCOUNT_NUMBER_PATTERN.test(value)) return "validation.account_number";
  return null;
}

export function validateUsername(value: string): string | null {
  if (!value) return null;
  if (!USERNAME_PATTERN.test(value)) return "validation.username";
  return null;
}

export function validateName(value: string): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (trimmed.length < 2 || trimmed.length > 100) return "validation.name_min";
  if (/\d/.test(trimmed)) return "validation.name_charset";
  return null;
}

export function validateBirthDate(
  value: string,
  today: string = toIsoDate(new Date())
): string | null {
  if (!value) return null;
  if (!isIsoDate(value)) return "validation.date_format";
  if (value > today) return "validation.birth_date_future";
  if (value < subtractYears(today, MAX_AGE_YEARS)) return "validation.birth_date_too_old";
  return null;
}

export function validateTaxIdIssueDate(
  value: string,
  today: string = toIsoDate(new Date())
): string | null {
  if (!value) return null;
  if (!isIsoDate(value)) return "validation.date_format";
  if (value > today) return "validation.issue_date_future";
  if (value < TAX_ID_ISSUE_FLOOR) return "validation.issue_date_before_floor";
  return null;
}

// ── Unified entry point ─────────────────────────────────────────────────

export type ValidationType =
  | "email"
  | "mobile"
  | "nationalId"
  | "taxId"
  | "electoralCode"
  | "branchCode"
  | "simNumber"
  | "accountNumber"
  | "username"
  | "name"
  | "birthDate"
  | "taxIdIssueDate";

const validators: Record<ValidationType, (v: string) => string | null> = {
  email: validateEmail,
  mobile: validateMobile,
  nationalId: validateNationalId,
  taxId: validateTaxId,
  electoralCode: validateElectoralCode,
  branchCode: validateBranchCode,
  simNumber: validateSimNumber,
  accountNumber: validateAccountNumber,
  username: validateUsername,
  name: validateName,
  birthDate: (v) => validateBirthDate(v),
  taxIdIssueDate: (v) => validateTaxIdIssueDate(v),
};

/**
 * Validate a field value by type.
 * Returns an error key, or null if valid.
 */
export function validateField(value: string | undefined | null, type: ValidationType): string | null {
  if (!value) return null;
  return validators[type](value);
}
