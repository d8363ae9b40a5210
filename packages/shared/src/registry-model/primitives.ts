/**
 * Primitive / reusable Zod types for the civil registry model.
 * Error messages are the same keys the plain validators return.
 */
import { z } from "zod";
import {
  isIsoDate,
  toIsoDate,
  validateAccountNumber,
  validateBirthDate,
  validateBranchCode,
  validateElectoralCode,
  validateEmail,
  validateMobile,
  validateName,
  validateNationalId,
  validateSimNumber,
  validateTaxId,
  validateTaxIdIssueDate,
  validateUsername,
} from "../validation";

function checkedBy(validator: (value: string) => string | null) {
  return (value: string, ctx: z.RefinementCtx) => {
    const error = validator(value);
    if (error) ctx.addIssue({ code: z.ZodIssueCode.custom, message: error });
  };
}

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const GenderEnum = z.enum(["M", "F", "O"]);
export const AccountStatusEnum = z.enum(["Active", "Suspended", "Inactive"]);
export const RegistrationStatusEnum = z.enum(["Pending", "Approved", "Rejected"]);
export const ActorRoleEnum = z.enum(["Admin", "Citizen", "System"]);
export const VoterRegistrationTypeEnum = z.enum(["City", "Village", "Rural", "Urban", "Other"]);
export const PhotoFormatEnum = z.enum(["jpg", "png"]);
export const LinkedRecordKindEnum = z.enum(["taxId", "voter", "sim", "bank", "case"]);

export type Gender = z.infer<typeof GenderEnum>;
export type AccountStatus = z.infer<typeof AccountStatusEnum>;
export type RegistrationStatus = z.infer<typeof RegistrationStatusEnum>;
export type ActorRole = z.infer<typeof ActorRoleEnum>;
export type VoterRegistrationType = z.infer<typeof VoterRegistrationTypeEnum>;
export type PhotoFormat = z.infer<typeof PhotoFormatEnum>;
export type LinkedRecordKind = z.infer<typeof LinkedRecordKindEnum>;

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

const Required = z.string().trim().min(1, "validation.required");

export const NationalId = Required.superRefine(checkedBy(validateNationalId));
export const Mobile = Required.superRefine(checkedBy(validateMobile));
export const Username = Required.superRefine(checkedBy(validateUsername));
export const PersonName = Required.superRefine(checkedBy(validateName));
export const TaxIdCode = Required.toUpperCase().superRefine(checkedBy(validateTaxId));
export const ElectoralCode = Required.toUpperCase().superRefine(checkedBy(validateElectoralCode));
export const BranchCode = Required.toUpperCase().superRefine(checkedBy(validateBranchCode));
export const SimNumber = Required.superRefine(checkedBy(validateSimNumber));
export const AccountNumber = Required.superRefine(checkedBy(validateAccountNumber));
export const BirthDate = Required.superRefine(checkedBy((value) => validateBirthDate(value)));
export const TaxIdIssueDate = Required.superRefine(checkedBy((value) => validateTaxIdIssueDate(value)));

/** A calendar date that is not in the future. */
export const PastDate = Required.superRefine((value, ctx) => {
  if (!isIsoDate(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "validation.date_format" });
    return;
  }
  if (value > toIsoDate(new Date())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "validation.date_future" });
  }
});

/** Empty or missing email collapses to null; otherwise lower-cased and checked. */
export const OptionalEmail = z
  .union([z.string(), z.null()])
  .optional()
  .transform((value) => {
    const trimmed = value?.trim().toLowerCase();
    return trimmed ? trimmed : null;
  })
  .superRefine((value, ctx) => {
    if (value === null) return;
    const error = validateEmail(value);
    if (error) ctx.addIssue({ code: z.ZodIssueCode.custom, message: error });
  });

export const RecordStatus = (maxLength: number) =>
  z.string().trim().min(1, "validation.required").max(maxLength, "validation.status_too_long");
