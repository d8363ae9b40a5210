/**
 * Linked service records: tax ID, voter registration, SIM, bank account and
 * criminal case inputs.
 */
import { z } from "zod";
import {
  AccountNumber,
  BranchCode,
  ElectoralCode,
  NationalId,
  PastDate,
  RecordStatus,
  SimNumber,
  TaxIdCode,
  TaxIdIssueDate,
  VoterRegistrationTypeEnum,
} from "./primitives";

const NonEmpty = (maxLength: number) =>
  z.string().trim().min(1, "validation.required").max(maxLength, "validation.too_long");

function hasAnyField(value: Record<string, unknown>): boolean {
  return Object.values(value).some((entry) => entry !== undefined);
}

// ---------------------------------------------------------------------------
// Tax ID
// ---------------------------------------------------------------------------

export const TaxIdRegistrationSchema = z.object({
  code: TaxIdCode,
  issueDate: TaxIdIssueDate,
  status: RecordStatus(20).default("Active"),
});

export type TaxIdRegistrationInput = z.input<typeof TaxIdRegistrationSchema>;

// ---------------------------------------------------------------------------
// Voter record
// ---------------------------------------------------------------------------

export const VoterRecordRegistrationSchema = z.object({
  code: ElectoralCode,
  address: NonEmpty(300),
  registrationType: VoterRegistrationTypeEnum.default("Other"),
  issueDate: PastDate.optional(),
  status: RecordStatus(30).default("Active"),
  isPrimary: z.boolean().default(false),
});

export type VoterRecordRegistrationInput = z.input<typeof VoterRecordRegistrationSchema>;

export const VoterRecordUpdateSchema = z
  .object({
    address: NonEmpty(300).optional(),
    registrationType: VoterRegistrationTypeEnum.optional(),
    status: RecordStatus(30).optional(),
    isPrimary: z.boolean().optional(),
  })
  .refine(hasAnyField, { message: "validation.empty_update" });

export type VoterRecordUpdate = z.infer<typeof VoterRecordUpdateSchema>;
export type VoterRecordUpdateInput = z.input<typeof VoterRecordUpdateSchema>;

// ---------------------------------------------------------------------------
// SIM
// ---------------------------------------------------------------------------

export const SimRegistrationSchema = z.object({
  simNumber: SimNumber,
  provider: NonEmpty(50),
  status: RecordStatus(20).default("Active"),
});

export type SimRegistrationInput = z.input<typeof SimRegistrationSchema>;

// ---------------------------------------------------------------------------
// Bank account
// ---------------------------------------------------------------------------

export const BankAccountKeySchema = z.object({
  accountNumber: AccountNumber,
  bankName: NonEmpty(50),
});

export type BankAccountKey = z.infer<typeof BankAccountKeySchema>;
export type BankAccountKeyInput = z.input<typeof BankAccountKeySchema>;

export const BankAccountRegistrationSchema = BankAccountKeySchema.extend({
  accountType: NonEmpty(20),
  branchCode: BranchCode,
});

export type BankAccountRegistrationInput = z.input<typeof BankAccountRegistrationSchema>;

export const BankAccountUpdateSchema = z
  .object({
    accountType: NonEmpty(20).optional(),
    branchCode: BranchCode.optional(),
  })
  .refine(hasAnyField, { message: "validation.empty_update" });

export type BankAccountUpdate = z.infer<typeof BankAccountUpdateSchema>;
export type BankAccountUpdateInput = z.input<typeof BankAccountUpdateSchema>;

// ---------------------------------------------------------------------------
// Shared status patch
// ---------------------------------------------------------------------------

export const StatusUpdateSchema = z.object({
  status: RecordStatus(20),
});

export type StatusUpdateInput = z.input<typeof StatusUpdateSchema>;

// ---------------------------------------------------------------------------
// Criminal case
// ---------------------------------------------------------------------------

export const CriminalCaseRegistrationSchema = z.object({
  offence: NonEmpty(100),
  nationalIds: z
    .array(NationalId)
    .max(50, "validation.too_many_links")
    .default([])
    .transform((ids) => Array.from(new Set(ids))),
});

export type CriminalCaseRegistrationInput = z.input<typeof CriminalCaseRegistrationSchema>;
