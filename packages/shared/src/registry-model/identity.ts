/**
 * Identity inputs: the canonical citizen record and its contact details.
 */
import { z } from "zod";
import { BirthDate, GenderEnum, Mobile, NationalId, OptionalEmail, PersonName } from "./primitives";

export const IdentityCreationSchema = z.object({
  nationalId: NationalId,
  name: PersonName,
  gender: GenderEnum,
  birthDate: BirthDate,
  mobile: Mobile,
  email: OptionalEmail,
});

export type IdentityCreation = z.infer<typeof IdentityCreationSchema>;
export type IdentityCreationInput = z.input<typeof IdentityCreationSchema>;

export const ContactUpdateSchema = z.object({
  mobile: Mobile,
  email: OptionalEmail,
});

export type ContactUpdate = z.infer<typeof ContactUpdateSchema>;
export type ContactUpdateInput = z.input<typeof ContactUpdateSchema>;
