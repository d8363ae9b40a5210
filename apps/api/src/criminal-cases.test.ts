import { beforeEach, describe, expect, it } from "vitest";
import { SYSTEM_ACTOR } from "./actor";
import { listRecentAudit } from "./audit";
import {
  deleteCriminalCase,
  getCriminalCase,
  linkIdentityToCase,
  listCasesForIdentity,
  registerCriminalCase,
  unlinkIdentityFromCase,
} from "./criminal-cases";
import { seedIdentity } from "./test-fixtures";

const FIRST = "111122223333";
const SECOND = "999988887777";

describe("criminal cases", () => {
  beforeEach(async () => {
    await seedIdentity({ nationalId: FIRST, name: "Maya Iyer" });
    await seedIdentity({ nationalId: SECOND, name: "Arun Das" });
  });

  it("opens a case with its linked identities", async () => {
    const created = await registerCriminalCase(
      { offence: "Counterfeiting", nationalIds: [FIRST, SECOND, FIRST] },
      SYSTEM_ACTOR
    );
    expect(created).toEqual({
      caseNumber: 1,
      offence: "Counterfeiting",
      linkedIdentities: [
        { nationalId: SECOND, name: "Arun Das" },
        { nationalId: FIRST, name: "Maya Iyer" },
      ],
    });

    const [latest] = await listRecentAudit(1);
    expect(latest).toMatchObject({
      operationType: "REGISTER_CRIMINAL_CASE",
      recordId: "1",
      operationDetails: "Offence: Counterfeiting; linked 2 identities",
    });
  });

  it("opens nothing when a linked identity is unknown", async () => {
    await expect(
      registerCriminalCase({ offence: "Counterfeiting", nationalIds: [FIRST, "123412341234"] }, SYSTEM_ACTOR)
    ).rejects.toMatchObject({ code: "IDENTITY_NOT_FOUND" });
    await expect(getCriminalCase(1)).rejects.toMatchObject({ code: "CASE_NOT_FOUND" });
    expect(await listCasesForIdentity(FIRST)).toEqual([]);
  });

  it("links and unlinks identities", async () => {
    await registerCriminalCase({ offence: "Burglary" }, SYSTEM_ACTOR);

    const linked = await linkIdentityToCase(1, FIRST, SYSTEM_ACTOR);
    expect(linked.linkedIdentities).toEqual([{ nationalId: FIRST, name: "Maya Iyer" }]);
    expect(await listCasesForIdentity(FIRST)).toEqual([{ caseNumber: 1, offence: "Burglary" }]);

    await expect(linkIdentityToCase(1, FIRST, SYSTEM_ACTOR)).rejects.toMatchObject({ kind: "CONFLICT" });

    const unlinked = await unlinkIdentityFromCase(1, FIRST, SYSTEM_ACTOR);
    expect(unlinked.linkedIdentities).toEqual([]);

    const [latest] = await listRecentAudit(1);
    expect(latest.operationDetails).toBe(`Unlinked national ID ${FIRST}`);

    await expect(unlinkIdentityFromCase(1, FIRST, SYSTEM_ACTOR)).rejects.toMatchObject({
      code: "CASE_LINK_NOT_FOUND",
    });
  });

  it("deletes a case with its links", async () => {
    await registerCriminalCase({ offence: "Arson", nationalIds: [FIRST, SECOND] }, SYSTEM_ACTOR);

    await deleteCriminalCase(1, SYSTEM_ACTOR);

    await expect(getCriminalCase(1)).rejects.toMatchObject({ code: "CASE_NOT_FOUND" });
    expect(await listCasesForIdentity(SECOND)).toEqual([]);
    const [latest] = await listRecentAudit(1);
    expect(latest.operationDetails).toBe("Offence: Arson; removed 2 links");
  });

  it("treats malformed case numbers as unknown", async () => {
    await expect(getCriminalCase(0)).rejects.toMatchObject({ code: "CASE_NOT_FOUND" });
    await expect(getCriminalCase(1.5)).rejects.toMatchObject({ code: "CASE_NOT_FOUND" });
    await expect(deleteCriminalCase(7, SYSTEM_ACTOR)).rejects.toMatchObject({ code: "CASE_NOT_FOUND" });
  });
});
