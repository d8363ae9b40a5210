import crypto from "crypto";
import { beforeEach, describe, expect, it } from "vitest";
import type { AdminActor } from "./actor";
import { listRecentAudit } from "./audit";
import {
  createAdminAccount,
  getCitizenAccountByNationalId,
  hashPassword,
  setCitizenAccountStatus,
  verifyCredentials,
  verifyPassword,
} from "./auth";
import { approveRegistration, rejectRegistration, submitRegistration } from "./registrations";
import { TEST_PASSWORD, registrationInput, seedAdmin } from "./test-fixtures";

describe("password hashing", () => {
  it("verifies argon2id hashes", async () => {
    const hash = await hashPassword(TEST_PASSWORD);
    expect(hash.startsWith("$argon2id$")).toBe(true);
    expect(await verifyPassword(TEST_PASSWORD, hash)).toBe(true);
    expect(await verifyPassword("wrong-password", hash)).toBe(false);
  });

  it("still accepts legacy SHA-256 digests", async () => {
    const legacy = crypto.createHash("sha256").update(TEST_PASSWORD).digest("hex");
    expect(await verifyPassword(TEST_PASSWORD, legacy)).toBe(true);
    expect(await verifyPassword(TEST_PASSWORD, legacy.toUpperCase())).toBe(true);
    expect(await verifyPassword("wrong-password", legacy)).toBe(false);
  });

  it("refuses hashes in any other format", async () => {
    expect(await verifyPassword(TEST_PASSWORD, TEST_PASSWORD)).toBe(false);
  });
});

describe("credential checks", () => {
  let reviewer: AdminActor;

  beforeEach(async () => {
    reviewer = await seedAdmin();
    await submitRegistration(registrationInput());
    await approveRegistration(1, reviewer);
  });

  it("signs administrators in", async () => {
    expect(await verifyCredentials("reviewer", TEST_PASSWORD)).toEqual({
      ok: true,
      principal: { userType: "ADMIN", adminId: reviewer.adminId, username: "reviewer", fullName: "Test Reviewer" },
    });
  });

  it("does not distinguish unknown usernames from wrong passwords", async () => {
    expect(await verifyCredentials("nobody", TEST_PASSWORD)).toEqual({ ok: false, reason: "INVALID_CREDENTIALS" });
    expect(await verifyCredentials("reviewer", "wrong-password")).toEqual({
      ok: false,
      reason: "INVALID_CREDENTIALS",
    });
  });

  it("suspends a citizen account on the fifth consecutive failure", async () => {
    for (let attempt = 1; attempt <= 4; attempt += 1) {
      expect(await verifyCredentials("applicant", "wrong-password")).toEqual({
        ok: false,
        reason: "INVALID_CREDENTIALS",
      });
    }
    expect(await verifyCredentials("applicant", "wrong-password", "10.1.1.1")).toEqual({
      ok: false,
      reason: "ACCOUNT_LOCKED",
    });

    const account = await getCitizenAccountByNationalId("444455556666");
    expect(account).toMatchObject({ accountStatus: "Suspended", failedLoginAttempts: 5 });

    const [latest] = await listRecentAudit(1);
    expect(latest).toMatchObject({
      operationType: "ACCOUNT_LOCKED",
      recordId: "applicant",
      performedBy: "system",
      userType: "System",
      operationDetails: "Suspended after 5 failed login attempts",
      ipAddress: "10.1.1.1",
    });

    expect(await verifyCredentials("applicant", TEST_PASSWORD)).toEqual({
      ok: false,
      reason: "ACCOUNT_NOT_ACTIVE",
    });
  });

  it("resets the failure counter after a successful login", async () => {
    await verifyCredentials("applicant", "wrong-password");
    await verifyCredentials("applicant", "wrong-password");
    expect((await verifyCredentials("applicant", TEST_PASSWORD)).ok).toBe(true);

    const account = await getCitizenAccountByNationalId("444455556666");
    expect(account?.failedLoginAttempts).toBe(0);
    expect(account?.lastLogin).not.toBeNull();
  });

  it("reactivating a suspended account clears its counter and is audited", async () => {
    await setCitizenAccountStatus("applicant", { status: "Suspended" }, reviewer);
    const reactivated = await setCitizenAccountStatus("applicant", { status: "Active" }, reviewer);
    expect(reactivated).toMatchObject({ accountStatus: "Active", failedLoginAttempts: 0 });

    const [latest] = await listRecentAudit(1);
    expect(latest).toMatchObject({
      operationType: "UPDATE_ACCOUNT_STATUS",
      performedBy: "reviewer",
      operationDetails: "Status Suspended -> Active",
    });
  });

  it("reports an unknown account when changing status", async () => {
    await expect(setCitizenAccountStatus("nobody", { status: "Inactive" }, reviewer)).rejects.toMatchObject({
      code: "ACCOUNT_NOT_FOUND",
    });
  });

  it("keeps administrator usernames distinct from citizen usernames", async () => {
    await expect(
      createAdminAccount({ username: "applicant", password: TEST_PASSWORD, fullName: "Clashing Name" })
    ).rejects.toMatchObject({ code: "USERNAME_TAKEN" });
    await expect(
      createAdminAccount({ username: "reviewer", password: TEST_PASSWORD, fullName: "Second Reviewer" })
    ).rejects.toMatchObject({ code: "USERNAME_TAKEN" });
  });
});

describe("administrator accounts", () => {
  let reviewer: AdminActor;

  beforeEach(async () => {
    reviewer = await seedAdmin();
    await submitRegistration(registrationInput());
  });

  it("refuses a username held by a pending registration", async () => {
    await expect(
      createAdminAccount({ username: "applicant", password: TEST_PASSWORD, fullName: "Clashing Name" })
    ).rejects.toMatchObject({ kind: "CONFLICT", code: "USERNAME_TAKEN" });

    expect(await approveRegistration(1, reviewer)).toMatchObject({ requestId: 1, username: "applicant" });
    expect(await verifyCredentials("applicant", TEST_PASSWORD)).toMatchObject({
      ok: true,
      principal: { userType: "CITIZEN", username: "applicant" },
    });
  });

  it("frees the username once the registration is rejected", async () => {
    await rejectRegistration(1, reviewer, { reason: "Incomplete documents" });

    const account = await createAdminAccount({ username: "applicant", password: TEST_PASSWORD, fullName: "New Reviewer" });
    expect(account.username).toBe("applicant");
  });
});
