/**
 * Shared builders for suites running on the in-memory store (see test-env.ts).
 */
import type { IdentityCreationInput, RegistrationSubmissionInput } from "@civic-registry/shared";
import { SYSTEM_ACTOR, type AdminActor, type CitizenActor } from "./actor";
import { createAdminAccount } from "./auth";
import { createIdentity, type Identity } from "./identities";

export const TEST_PASSWORD = "test-password";

export function identityInput(overrides: Partial<IdentityCreationInput> = {}): IdentityCreationInput {
  return {
    nationalId: "111122223333",
    name: "Test Person",
    gender: "F",
    birthDate: "1990-05-17",
    mobile: "9876543210",
    email: null,
    ...overrides,
  };
}

export function seedIdentity(overrides: Partial<IdentityCreationInput> = {}): Promise<Identity> {
  return createIdentity(identityInput(overrides), SYSTEM_ACTOR);
}

export async function seedAdmin(username = "reviewer"): Promise<AdminActor> {
  const account = await createAdminAccount({ username, password: TEST_PASSWORD, fullName: "Test Reviewer" });
  return { role: "Admin", adminId: account.adminId, username: account.username, ipAddress: "127.0.0.1" };
}

export function citizenActor(nationalId: string, username = "citizen"): CitizenActor {
  return { role: "Citizen", citizenId: 1, username, nationalId, ipAddress: "127.0.0.1" };
}

export function registrationInput(
  overrides: Partial<RegistrationSubmissionInput> = {}
): RegistrationSubmissionInput {
  return {
    username: "applicant",
    password: TEST_PASSWORD,
    nationalId: "444455556666",
    name: "New Applicant",
    gender: "M",
    birthDate: "1985-09-01",
    mobile: "9123456780",
    email: "applicant@example.test",
    ...overrides,
  };
}
