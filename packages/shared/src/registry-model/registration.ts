/**
 * Self-service registration request and its review payloads.
 */
import { z } from "zod";
import {
  AccountStatusEnum,
  BirthDate,
  GenderEnum,
  Mobile,
  NationalId,
  OptionalEmail,
  PersonName,
  Username,
} from "./primitives";

export const MIN_PASSWORD_LENGTH = 6;

const Password = z
  .string()
  .min(MIN_PASSWORD_LENGTH, "validation.password_min")
  .max(128, "validation.password_max");

export const RegistrationSubmissionSchema = z.object({
  username: Username,
  password: Password,
  nationalId: NationalId,
  name: PersonName,
  gender: GenderEnum,
  birthDate: BirthDate,
  mobile: Mobile,
  email: OptionalEmail,
});

export type RegistrationSubmission = z.infer<typeof RegistrationSubmissionSchema>;
export type RegistrationSubmissionInput = z.input<typeof RegistrationSubmissionSchema>;

export const RejectionSchema = z.object({
  reason: z
    .string()
    .trim()
    .min(1, "validation.reason_required")
    .max(255, "validation.reason_too_long"),
});

export type RejectionInput = z.input<typeof RejectionSchema>;

export const AccountStatusUpdateSchema = z.object({
  status: AccountStatusEnum,
});

export type AccountStatusUpdateInput = z.input<typeof AccountStatusUpdateSchema>;

export const AdminAccountCreationSchema = z.object({
  username: Username,
  password: Password,
  fullName: PersonName,
});

export type AdminAccountCreationInput = z.input<typeof AdminAccountCreationSchema>;
