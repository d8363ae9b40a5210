/**
 * Civil registry model barrel export.
 *
 * Usage:
 *   import { RegistrationSubmissionSchema, type RegistrationSubmission } from "@civic-registry/shared";
 */

// Primitives
export {
  GenderEnum,
  AccountStatusEnum,
  RegistrationStatusEnum,
  ActorRoleEnum,
  VoterRegistrationTypeEnum,
  PhotoFormatEnum,
  LinkedRecordKindEnum,
  NationalId,
  Mobile,
  Username,
  PersonName,
  TaxIdCode,
  ElectoralCode,
  BranchCode,
  SimNumber,
  AccountNumber,
  BirthDate,
  TaxIdIssueDate,
  PastDate,
  OptionalEmail,
  RecordStatus,
  type Gender,
  type AccountStatus,
  type RegistrationStatus,
  type ActorRole,
  type VoterRegistrationType,
  type PhotoFormat,
  type LinkedRecordKind,
} from "./primitives";

// Identity
export {
  IdentityCreationSchema,
  ContactUpdateSchema,
  type IdentityCreation,
  type IdentityCreationInput,
  type ContactUpdate,
  type ContactUpdateInput,
} from "./identity";

// Registration workflow
export {
  MIN_PASSWORD_LENGTH,
  RegistrationSubmissionSchema,
  RejectionSchema,
  AccountStatusUpdateSchema,
  AdminAccountCreationSchema,
  type AccountStatusUpdateInput,
  type AdminAccountCreationInput,
  type RegistrationSubmission,
  type RegistrationSubmissionInput,
  type RejectionInput,
} from "./registration";

// Service records
export {
  TaxIdRegistrationSchema,
  VoterRecordRegistrationSchema,
  VoterRecordUpdateSchema,
  SimRegistrationSchema,
  BankAccountKeySchema,
  BankAccountRegistrationSchema,
  BankAccountUpdateSchema,
  StatusUpdateSchema,
  CriminalCaseRegistrationSchema,
  type TaxIdRegistrationInput,
  type VoterRecordRegistrationInput,
  type VoterRecordUpdate,
  type VoterRecordUpdateInput,
  type SimRegistrationInput,
  type BankAccountKey,
  type BankAccountKeyInput,
  type BankAccountRegistrationInput,
  type BankAccountUpdate,
  type BankAccountUpdateInput,
  type StatusUpdateInput,
  type CriminalCaseRegistrationInput,
} from "./services";

// Reports
export {
  MinimumThresholdSchema,
  MaxCombinedSchema,
  RecentAuditSchema,
  MAX_AUDIT_PAGE,
  type MinimumThresholdInput,
  type MaxCombinedInput,
} from "./reports";
