import { describe, expect, it } from "vitest";
import { MaxCombinedSchema, MinimumThresholdSchema, RecentAuditSchema } from "./reports";
import { RegistrationSubmissionSchema } from "./registration";
import { CriminalCaseRegistrationSchema, TaxIdRegistrationSchema, VoterRecordUpdateSchema } from "./services";

function firstMessage(result: { success: boolean; error?: { issues: Array<{ message: string }> } }): string | undefined {
  return result.error?.issues[0]?.message;
}

describe("registry model schemas", () => {
  it("normalises tax ID registrations", () => {
    expect(TaxIdRegistrationSchema.parse({ code: " abcde1234f ", issueDate: "2012-07-01" })).toEqual({
      code: "ABCDE1234F",
      issueDate: "2012-07-01",
      status: "Active",
    });
  });

  it("de-duplicates criminal case links", () => {
    expect(
      CriminalCaseRegistrationSchema.parse({ offence: " Fraud ", nationalIds: ["111122223333", "111122223333"] })
    ).toEqual({ offence: "Fraud", nationalIds: ["111122223333"] });
  });

  it("collapses an empty email to null and checks passwords", () => {
    const base = {
      username: "applicant",
      password: "test-password",
      nationalId: "444455556666",
      name: "New Applicant",
      gender: "M",
      birthDate: "1985-09-01",
      mobile: "9123456780",
    };
    expect(RegistrationSubmissionSchema.parse({ ...base, email: "" }).email).toBeNull();
    expect(RegistrationSubmissionSchema.parse(base).email).toBeNull();
    expect(firstMessage(RegistrationSubmissionSchema.safeParse({ ...base, password: "short" }))).toBe(
      "validation.password_min"
    );
  });

  it("refuses an empty voter record update", () => {
    expect(firstMessage(VoterRecordUpdateSchema.safeParse({}))).toBe("validation.empty_update");
    expect(VoterRecordUpdateSchema.parse({ isPrimary: true })).toEqual({ isPrimary: true });
  });

  it("reads report parameters", () => {
    expect(MinimumThresholdSchema.parse({ kind: "sim", threshold: "3" })).toEqual({ kind: "sim", threshold: 3 });
    expect(MaxCombinedSchema.parse({ kinds: ["bank", "case"] })).toEqual({ kinds: ["bank", "case"], single: false });
    expect(RecentAuditSchema.parse({})).toEqual({ limit: 100 });
    expect(RecentAuditSchema.parse({ limit: "500" })).toEqual({ limit: 100 });
    expect(firstMessage(RecentAuditSchema.safeParse({ limit: "0" }))).toBe("validation.limit");
  });
});
