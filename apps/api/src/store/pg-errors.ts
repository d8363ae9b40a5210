import { ConflictError, IntegrityError, RegistryError, ValidationError } from "../errors";

/** Unique constraint / index name → domain conflict code. */
const CONFLICT_CODES: Record<string, string> = {
  identity_pkey: "NATIONAL_ID_TAKEN",
  identity_email_key: "EMAIL_TAKEN",
  biometric_pkey: "BIOMETRIC_EXISTS",
  tax_id_pkey: "TAX_ID_EXISTS",
  voter_record_pkey: "ELECTORAL_CODE_EXISTS",
  voter_record_primary_idx: "PRIMARY_VOTER_RECORD_EXISTS",
  sim_record_pkey: "SIM_EXISTS",
  bank_account_pkey: "BANK_ACCOUNT_EXISTS",
  case_linkage_pkey: "CASE_LINK_EXISTS",
  citizen_account_username_key: "USERNAME_TAKEN",
  citizen_account_national_id_key: "ACCOUNT_EXISTS",
  admin_account_username_key: "USERNAME_TAKEN",
  registration_pending_username_idx: "USERNAME_TAKEN",
  registration_pending_national_id_idx: "NATIONAL_ID_TAKEN",
  registration_pending_email_idx: "EMAIL_TAKEN",
};

/** Trigger-raised check violations carry the rule name as the constraint. */
const CHECK_CODES: Record<string, string> = {
  birth_date_future: "BIRTH_DATE_FUTURE",
  birth_date_too_old: "BIRTH_DATE_TOO_OLD",
  issue_date_future: "ISSUE_DATE_FUTURE",
  issue_date_before_floor: "ISSUE_DATE_BEFORE_FLOOR",
};

type PgErrorFields = {
  code: string;
  constraint?: string;
  detail?: string;
  message: string;
};

function readPgError(error: unknown): PgErrorFields | null {
  if (!(error instanceof Error)) return null;
  const code: unknown = Reflect.get(error, "code");
  if (typeof code !== "string" || !/^[0-9A-Z]{5}$/.test(code)) return null;
  const constraint: unknown = Reflect.get(error, "constraint");
  const detail: unknown = Reflect.get(error, "detail");
  return {
    code,
    constraint: typeof constraint === "string" ? constraint : undefined,
    detail: typeof detail === "string" ? detail : undefined,
    message: error.message,
  };
}

/**
 * Translate a driver error into the registry's error kinds. Errors that are
 * already domain errors, or that carry no SQLSTATE, pass through unchanged.
 */
export function translatePgError(error: unknown): unknown {
  if (error instanceof RegistryError) return error;
  const pgError = readPgError(error);
  if (!pgError) return error;
  const details = pgError.constraint ? { constraint: pgError.constraint } : undefined;

  switch (pgError.code) {
    case "23505": {
      const code = (pgError.constraint && CONFLICT_CODES[pgError.constraint]) || "DUPLICATE_KEY";
      return new ConflictError(code, pgError.detail || pgError.message, details);
    }
    case "23503":
      return new IntegrityError("FOREIGN_KEY_VIOLATION", pgError.detail || pgError.message, details);
    case "23514": {
      const code = (pgError.constraint && CHECK_CODES[pgError.constraint]) || "CHECK_VIOLATION";
      return new ValidationError(code, pgError.message, details);
    }
    case "23502":
      return new ValidationError("NOT_NULL_VIOLATION", pgError.message, details);
    case "22001":
      return new ValidationError("VALUE_TOO_LONG", pgError.message, details);
    case "22P02":
    case "22007":
    case "22008":
      return new ValidationError("INVALID_VALUE", pgError.message, details);
    case "22003":
      return new ValidationError("VALUE_OUT_OF_RANGE", pgError.message, details);
    default:
      return error;
  }
}
