import { beforeEach, describe, expect, it } from "vitest";
import { getRegistryStatistics } from "./aggregates";
import { listRecentAudit } from "./audit";
import { hashPassword } from "./auth";
import { getCitizenAccountByNationalId, verifyCredentials } from "./auth";
import { getBiometric } from "./biometrics";
import { getIdentity } from "./identities";
import {
  approveRegistration,
  getRegistration,
  listPendingRegistrations,
  rejectRegistration,
  submitRegistration,
} from "./registrations";
import type { AdminActor } from "./actor";
import { getRegistryStore } from "./store";
import { TEST_PASSWORD, registrationInput, seedAdmin, seedIdentity } from "./test-fixtures";

describe("registration workflow", () => {
  let reviewer: AdminActor;

  beforeEach(async () => {
    reviewer = await seedAdmin();
  });

  it("queues a submission as Pending without exposing the password hash", async () => {
    const registration = await submitRegistration(registrationInput(), "10.0.0.7");

    expect(registration).toMatchObject({
      requestId: 1,
      username: "applicant",
      nationalId: "444455556666",
      email: "applicant@example.test",
      status: "Pending",
      reviewedBy: null,
      reviewDate: null,
      rejectionReason: null,
    });
    expect(Object.keys(registration)).not.toContain("passwordHash");

    const [latest] = await listRecentAudit(1);
    expect(latest).toMatchObject({
      operationType: "SUBMIT_REGISTRATION",
      tableName: "registration_request",
      recordId: "1",
      performedBy: "applicant",
      userType: "System",
      operationDetails: "Registration submitted for username applicant",
      ipAddress: "10.0.0.7",
    });
  });

  it("reports every clash with an existing pending request", async () => {
    await submitRegistration(registrationInput());

    await expect(submitRegistration(registrationInput())).rejects.toMatchObject({
      kind: "CONFLICT",
      code: "USERNAME_TAKEN",
      details: { conflicts: ["USERNAME_TAKEN", "NATIONAL_ID_TAKEN", "EMAIL_TAKEN"] },
    });
  });

  it("refuses a national ID that already has an identity", async () => {
    await seedIdentity({ nationalId: "444455556666" });

    await expect(submitRegistration(registrationInput())).rejects.toMatchObject({
      code: "NATIONAL_ID_TAKEN",
      details: { conflicts: ["NATIONAL_ID_TAKEN"] },
    });
  });

  it("rejects malformed input before anything is stored", async () => {
    await expect(submitRegistration(registrationInput({ nationalId: "12345" }))).rejects.toMatchObject({
      kind: "VALIDATION",
      code: "INVALID_INPUT",
      message: "nationalId: validation.national_id",
    });
    expect(await listPendingRegistrations()).toEqual([]);
  });

  it("approval creates the identity, an empty biometric and an active account", async () => {
    await submitRegistration(registrationInput());

    const result = await approveRegistration(1, reviewer);
    expect(result).toEqual({ requestId: 1, nationalId: "444455556666", citizenId: 1, username: "applicant" });

    const identity = await getIdentity("444455556666");
    expect(identity).toMatchObject({ name: "New Applicant", gender: "M", birthDate: "1985-09-01" });

    const biometric = await getBiometric("444455556666");
    expect(biometric).toMatchObject({ hasPhoto: false, photoType: null, version: 0 });

    const account = await getCitizenAccountByNationalId("444455556666");
    expect(account).toMatchObject({ username: "applicant", accountStatus: "Active", failedLoginAttempts: 0 });

    const registration = await getRegistration(1);
    expect(registration).toMatchObject({ status: "Approved", reviewedBy: reviewer.adminId });

    const [latest] = await listRecentAudit(1);
    expect(latest).toMatchObject({
      operationType: "APPROVE_REGISTRATION",
      performedBy: "reviewer",
      userType: "Admin",
      operationDetails: "Approved registration for national ID 444455556666",
    });
  });

  it("lets the approved applicant sign in with the submitted password", async () => {
    await submitRegistration(registrationInput());
    await approveRegistration(1, reviewer);

    const check = await verifyCredentials("applicant", TEST_PASSWORD);
    expect(check).toEqual({
      ok: true,
      principal: { userType: "CITIZEN", citizenId: 1, username: "applicant", nationalId: "444455556666" },
    });
  });

  it("does not approve the same request twice", async () => {
    await submitRegistration(registrationInput());
    await approveRegistration(1, reviewer);

    const before = await getRegistryStatistics();
    const auditBefore = (await listRecentAudit(100)).length;

    await expect(approveRegistration(1, reviewer)).rejects.toMatchObject({
      kind: "CONFLICT",
      code: "REGISTRATION_ALREADY_REVIEWED",
      details: { status: "Approved" },
    });

    const after = await getRegistryStatistics();
    expect(after.identities).toBe(before.identities);
    expect(after.activeAccounts).toBe(before.activeAccounts);
    expect((await listRecentAudit(100)).length).toBe(auditBefore);
  });

  it("lets only one of two simultaneous approvals through", async () => {
    await submitRegistration(registrationInput());

    const outcomes = await Promise.allSettled([approveRegistration(1, reviewer), approveRegistration(1, reviewer)]);

    expect(outcomes.map((outcome) => outcome.status).sort()).toEqual(["fulfilled", "rejected"]);
    const refused = outcomes.find((outcome) => outcome.status === "rejected");
    expect(refused).toMatchObject({
      status: "rejected",
      reason: { kind: "CONFLICT", code: "REGISTRATION_ALREADY_REVIEWED" },
    });
    expect((await getRegistryStatistics()).identities).toBe(1);
    expect((await getRegistration(1)).status).toBe("Approved");
  });

  it("does not reject a request that was already approved", async () => {
    await submitRegistration(registrationInput());
    await approveRegistration(1, reviewer);

    await expect(rejectRegistration(1, reviewer, { reason: "Changed mind" })).rejects.toMatchObject({
      kind: "CONFLICT",
      code: "REGISTRATION_ALREADY_REVIEWED",
      details: { status: "Approved" },
    });

    const registration = await getRegistration(1);
    expect(registration.status).toBe("Approved");
    expect(registration.rejectionReason).toBeNull();
  });

  it("leaves the request Pending when the identity appeared after submission", async () => {
    await submitRegistration(registrationInput());
    await seedIdentity({ nationalId: "444455556666" });

    await expect(approveRegistration(1, reviewer)).rejects.toMatchObject({ code: "NATIONAL_ID_TAKEN" });

    expect((await getRegistration(1)).status).toBe("Pending");
    expect(await getCitizenAccountByNationalId("444455556666")).toBeNull();
  });

  it("refuses approval when the username now belongs to an administrator", async () => {
    await submitRegistration(registrationInput({ username: "late-admin" }));
    // Written straight to the store: account creation itself refuses a name held by a pending request.
    const passwordHash = await hashPassword(TEST_PASSWORD);
    await getRegistryStore().transaction((tx) =>
      tx.insertAdminAccount({ username: "late-admin", password_hash: passwordHash, full_name: "Late Admin" })
    );

    await expect(approveRegistration(1, reviewer)).rejects.toMatchObject({ code: "USERNAME_TAKEN" });
    expect((await getRegistration(1)).status).toBe("Pending");
  });

  it("rejects with a trimmed reason and closes the request", async () => {
    await submitRegistration(registrationInput());

    const rejected = await rejectRegistration(1, reviewer, { reason: "  Documents unclear " });
    expect(rejected).toMatchObject({
      status: "Rejected",
      reviewedBy: reviewer.adminId,
      rejectionReason: "Documents unclear",
    });
    expect(await listPendingRegistrations()).toEqual([]);

    await expect(approveRegistration(1, reviewer)).rejects.toMatchObject({
      code: "REGISTRATION_ALREADY_REVIEWED",
      details: { status: "Rejected" },
    });
  });

  it("requires a rejection reason", async () => {
    await submitRegistration(registrationInput());

    await expect(rejectRegistration(1, reviewer, { reason: "   " })).rejects.toMatchObject({
      code: "INVALID_INPUT",
      message: "reason: validation.reason_required",
    });
    expect((await getRegistration(1)).status).toBe("Pending");
  });

  it("lists pending requests oldest first", async () => {
    await submitRegistration(registrationInput());
    await submitRegistration(
      registrationInput({ username: "second", nationalId: "777788889999", email: "second@example.test" })
    );

    const pending = await listPendingRegistrations();
    expect(pending.map((entry) => [entry.requestId, entry.username, entry.daysPending])).toEqual([
      [1, "applicant", 0],
      [2, "second", 0],
    ]);
  });

  it("reports an unknown request as not found", async () => {
    await expect(getRegistration(42)).rejects.toMatchObject({ kind: "NOT_FOUND", code: "REGISTRATION_NOT_FOUND" });
    await expect(approveRegistration(42, reviewer)).rejects.toMatchObject({ code: "REGISTRATION_NOT_FOUND" });
  });
});
