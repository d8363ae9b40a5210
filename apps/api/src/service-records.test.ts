import { beforeEach, describe, expect, it } from "vitest";
import { SYSTEM_ACTOR } from "./actor";
import { listRecentAudit } from "./audit";
import { deleteBankAccount, listBankAccounts, registerBankAccount, updateBankAccount } from "./bank-accounts";
import { deleteSim, listSims, registerSim, updateSimStatus } from "./sims";
import { deleteTaxId, listTaxIds, registerTaxId, updateTaxIdStatus } from "./tax-ids";
import { deleteVoterRecord, listVoterRecords, registerVoterRecord, updateVoterRecord } from "./voter-records";
import { citizenActor, seedIdentity } from "./test-fixtures";

const OWNER = "111122223333";
const OTHER = "999988887777";

beforeEach(async () => {
  await seedIdentity({ nationalId: OWNER });
  await seedIdentity({ nationalId: OTHER, name: "Other Person" });
});

describe("tax IDs", () => {
  it("registers several tax IDs per identity, upper-casing the code", async () => {
    const first = await registerTaxId(OWNER, { code: "abcde1234f", issueDate: "2012-07-01" }, SYSTEM_ACTOR);
    expect(first).toEqual({ code: "ABCDE1234F", nationalId: OWNER, issueDate: "2012-07-01", status: "Active" });
    await registerTaxId(OWNER, { code: "ZYXWV9876A", issueDate: "1999-02-02", status: "Dormant" }, SYSTEM_ACTOR);

    const taxIds = await listTaxIds(OWNER);
    expect(taxIds.map((taxId) => taxId.code)).toEqual(["ZYXWV9876A", "ABCDE1234F"]);

    const [latest] = await listRecentAudit(1);
    expect(latest).toMatchObject({
      operationType: "REGISTER_TAX_ID",
      recordId: "ZYXWV9876A",
      operationDetails: "Issued 1999-02-02, status Dormant",
    });
  });

  it("enforces the issue-date floor and code uniqueness", async () => {
    await expect(
      registerTaxId(OWNER, { code: "ABCDE1234F", issueDate: "1994-12-31" }, SYSTEM_ACTOR)
    ).rejects.toMatchObject({ code: "INVALID_INPUT", message: "issueDate: validation.issue_date_before_floor" });

    await registerTaxId(OWNER, { code: "ABCDE1234F", issueDate: "1995-01-01" }, SYSTEM_ACTOR);
    await expect(
      registerTaxId(OTHER, { code: "ABCDE1234F", issueDate: "2001-01-01" }, SYSTEM_ACTOR)
    ).rejects.toMatchObject({ kind: "CONFLICT" });
  });

  it("updates status and deletes by code", async () => {
    await registerTaxId(OWNER, { code: "ABCDE1234F", issueDate: "2012-07-01" }, SYSTEM_ACTOR);

    const updated = await updateTaxIdStatus("abcde1234f", { status: "Suspended" }, SYSTEM_ACTOR);
    expect(updated.status).toBe("Suspended");
    const [latest] = await listRecentAudit(1);
    expect(latest.operationDetails).toBe("Status Active -> Suspended");

    await deleteTaxId("ABCDE1234F", SYSTEM_ACTOR);
    expect(await listTaxIds(OWNER)).toEqual([]);
    await expect(deleteTaxId("ABCDE1234F", SYSTEM_ACTOR)).rejects.toMatchObject({ code: "TAX_ID_NOT_FOUND" });
  });

  it("keeps citizens to their own tax IDs", async () => {
    await registerTaxId(OTHER, { code: "ABCDE1234F", issueDate: "2012-07-01" }, SYSTEM_ACTOR);
    const citizen = citizenActor(OWNER);

    await expect(updateTaxIdStatus("ABCDE1234F", { status: "Closed" }, citizen)).rejects.toMatchObject({
      code: "TAX_ID_NOT_FOUND",
    });
    await expect(
      registerTaxId(OTHER, { code: "PQRST6789K", issueDate: "2012-07-01" }, citizen)
    ).rejects.toMatchObject({ code: "IDENTITY_NOT_FOUND" });
  });

  it("reports an unknown identity", async () => {
    await expect(listTaxIds("123412341234")).rejects.toMatchObject({ code: "IDENTITY_NOT_FOUND" });
  });
});

describe("voter records", () => {
  it("copies the holder name and keeps a single primary record", async () => {
    const first = await registerVoterRecord(
      OWNER,
      { code: "vtr00001", address: "12 Lake Road", isPrimary: true },
      SYSTEM_ACTOR
    );
    expect(first).toMatchObject({
      code: "VTR00001",
      holderName: "Test Person",
      registrationType: "Other",
      status: "Active",
      isPrimary: true,
      issueDate: null,
    });

    await registerVoterRecord(
      OWNER,
      { code: "VTR00002", address: "4 Hill View", registrationType: "Village", isPrimary: true },
      SYSTEM_ACTOR
    );

    const records = await listVoterRecords(OWNER);
    expect(records.map((record) => [record.code, record.isPrimary])).toEqual([
      ["VTR00002", true],
      ["VTR00001", false],
    ]);

    const [latest] = await listRecentAudit(1);
    expect(latest.operationDetails).toBe("Village registration, primary");
  });

  it("moves the primary flag on update", async () => {
    await registerVoterRecord(OWNER, { code: "VTR00001", address: "12 Lake Road", isPrimary: true }, SYSTEM_ACTOR);
    await registerVoterRecord(OWNER, { code: "VTR00002", address: "4 Hill View" }, SYSTEM_ACTOR);

    const updated = await updateVoterRecord("vtr00002", { isPrimary: true }, SYSTEM_ACTOR);
    expect(updated.isPrimary).toBe(true);

    const records = await listVoterRecords(OWNER);
    expect(records.filter((record) => record.isPrimary).map((record) => record.code)).toEqual(["VTR00002"]);

    const [latest] = await listRecentAudit(1);
    expect(latest.operationDetails).toBe("Updated is_primary");
  });

  it("deletes a voter record by code", async () => {
    await registerVoterRecord(OWNER, { code: "VTR00001", address: "12 Lake Road" }, SYSTEM_ACTOR);

    await deleteVoterRecord("vtr00001", SYSTEM_ACTOR);
    expect(await listVoterRecords(OWNER)).toEqual([]);
    await expect(deleteVoterRecord("VTR00001", SYSTEM_ACTOR)).rejects.toMatchObject({
      code: "VOTER_RECORD_NOT_FOUND",
    });
  });

  it("refuses an empty update", async () => {
    await registerVoterRecord(OWNER, { code: "VTR00001", address: "12 Lake Road" }, SYSTEM_ACTOR);
    await expect(updateVoterRecord("VTR00001", {}, SYSTEM_ACTOR)).rejects.toMatchObject({
      code: "INVALID_INPUT",
      message: "validation.empty_update",
    });
  });
});

describe("SIMs", () => {
  it("lists SIMs in numeric order and rejects duplicates", async () => {
    await registerSim(OWNER, { simNumber: "10", provider: "Northline" }, SYSTEM_ACTOR);
    await registerSim(OWNER, { simNumber: "9", provider: "Coastal Mobile" }, SYSTEM_ACTOR);

    expect((await listSims(OWNER)).map((sim) => sim.simNumber)).toEqual(["9", "10"]);
    await expect(
      registerSim(OTHER, { simNumber: "10", provider: "Northline" }, SYSTEM_ACTOR)
    ).rejects.toMatchObject({ kind: "CONFLICT" });
  });

  it("updates and deletes a SIM", async () => {
    await registerSim(OWNER, { simNumber: "8991000000000001", provider: "Northline" }, SYSTEM_ACTOR);

    const updated = await updateSimStatus("8991000000000001", { status: "Blocked" }, citizenActor(OWNER));
    expect(updated).toEqual({ simNumber: "8991000000000001", nationalId: OWNER, provider: "Northline", status: "Blocked" });

    await deleteSim("8991000000000001", SYSTEM_ACTOR);
    expect(await listSims(OWNER)).toEqual([]);
    await expect(deleteSim("8991000000000001", SYSTEM_ACTOR)).rejects.toMatchObject({ code: "SIM_NOT_FOUND" });
  });
});

describe("bank accounts", () => {
  const key = { bankName: "Union Savings", accountNumber: "500100200301" };

  it("registers, updates and deletes by bank name and account number", async () => {
    const created = await registerBankAccount(
      OWNER,
      { ...key, accountType: "Savings", branchCode: "UNSB0001234" },
      SYSTEM_ACTOR
    );
    expect(created).toEqual({ ...key, accountType: "Savings", branchCode: "UNSB0001234", nationalId: OWNER });

    const updated = await updateBankAccount(key, { branchCode: "unsb0009999" }, SYSTEM_ACTOR);
    expect(updated.branchCode).toBe("UNSB0009999");

    const [latest] = await listRecentAudit(1);
    expect(latest).toMatchObject({
      operationType: "UPDATE_BANK_ACCOUNT",
      recordId: "Union Savings/500100200301",
      operationDetails: "Updated branch_code",
    });

    await deleteBankAccount(key, SYSTEM_ACTOR);
    expect(await listBankAccounts(OWNER)).toEqual([]);
  });

  it("allows the same account number at different banks", async () => {
    await registerBankAccount(OWNER, { ...key, accountType: "Savings", branchCode: "UNSB0001234" }, SYSTEM_ACTOR);
    await registerBankAccount(
      OWNER,
      { bankName: "Harbour Bank", accountNumber: key.accountNumber, accountType: "Current", branchCode: "HRBK0000456" },
      SYSTEM_ACTOR
    );

    expect((await listBankAccounts(OWNER)).map((account) => account.bankName)).toEqual([
      "Harbour Bank",
      "Union Savings",
    ]);
  });

  it("rejects a malformed branch code", async () => {
    await expect(
      registerBankAccount(OWNER, { ...key, accountType: "Savings", branchCode: "UNSB1001234" }, SYSTEM_ACTOR)
    ).rejects.toMatchObject({ code: "INVALID_INPUT", message: "branchCode: validation.branch_code" });
  });

  it("hides other people's accounts from citizens", async () => {
    await registerBankAccount(OTHER, { ...key, accountType: "Savings", branchCode: "UNSB0001234" }, SYSTEM_ACTOR);
    await expect(deleteBankAccount(key, citizenActor(OWNER))).rejects.toMatchObject({
      code: "BANK_ACCOUNT_NOT_FOUND",
    });
  });
});
