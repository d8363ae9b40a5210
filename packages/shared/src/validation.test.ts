import { describe, expect, it } from "vitest";
import {
  ageInYears,
  isIsoDate,
  shiftDays,
  subtractYears,
  validateBirthDate,
  validateBranchCode,
  validateElectoralCode,
  validateEmail,
  validateField,
  validateName,
  validateSimNumber,
  validateTaxId,
  validateTaxIdIssueDate,
} from "./validation";

describe("calendar helpers", () => {
  it("recognises real calendar dates only", () => {
    expect(isIsoDate("2024-02-29")).toBe(true);
    expect(isIsoDate("2023-02-29")).toBe(false);
    expect(isIsoDate("2024-2-9")).toBe(false);
    expect(isIsoDate("2024-13-01")).toBe(false);
  });

  it("clamps a leap day when subtracting years", () => {
    expect(subtractYears("2024-02-29", 1)).toBe("2023-02-28");
    expect(subtractYears("2024-02-29", 4)).toBe("2020-02-29");
    expect(subtractYears("2026-05-17", 120)).toBe("1906-05-17");
  });

  it("shifts across month ends", () => {
    expect(shiftDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(shiftDays("2024-03-01", -1)).toBe("2024-02-29");
  });

  it("counts whole years of age", () => {
    expect(ageInYears("1990-05-17", "2026-05-16")).toBe(35);
    expect(ageInYears("1990-05-17", "2026-05-17")).toBe(36);
  });
});

describe("field validators", () => {
  it("bounds birth dates between today and 120 years back", () => {
    expect(validateBirthDate("2026-05-17", "2026-05-17")).toBeNull();
    expect(validateBirthDate("2026-05-18", "2026-05-17")).toBe("validation.birth_date_future");
    expect(validateBirthDate("1906-05-17", "2026-05-17")).toBeNull();
    expect(validateBirthDate("1906-05-16", "2026-05-17")).toBe("validation.birth_date_too_old");
    expect(validateBirthDate("17/05/1990", "2026-05-17")).toBe("validation.date_format");
  });

  it("keeps tax ID issue dates between the floor and today", () => {
    expect(validateTaxIdIssueDate("1994-12-31", "2026-01-01")).toBe("validation.issue_date_before_floor");
    expect(validateTaxIdIssueDate("1995-01-01", "2026-01-01")).toBeNull();
    expect(validateTaxIdIssueDate("2026-01-02", "2026-01-01")).toBe("validation.issue_date_future");
  });

  it("checks email shape", () => {
    expect(validateEmail("a@b.c")).toBeNull();
    expect(validateEmail("a@b")).toBe("validation.email");
    expect(validateEmail("@b.c")).toBe("validation.email");
    expect(validateEmail("a@b.")).toBe("validation.email");
  });

  it("accepts codes in either case", () => {
    expect(validateTaxId("abcde1234f")).toBeNull();
    expect(validateTaxId("ABCDE12345")).toBe("validation.tax_id");
    expect(validateElectoralCode("vtr00001")).toBeNull();
    expect(validateElectoralCode("VTR0001")).toBe("validation.electoral_code");
    expect(validateBranchCode("unsb0001234")).toBeNull();
    expect(validateBranchCode("UNSB1001234")).toBe("validation.branch_code");
  });

  it("rejects SIM numbers with a leading zero", () => {
    expect(validateSimNumber("8991000000000001")).toBeNull();
    expect(validateSimNumber("0123")).toBe("validation.sim_number");
  });

  it("requires names of two or more characters without digits", () => {
    expect(validateName(" Asha ")).toBeNull();
    expect(validateName("A")).toBe("validation.name_min");
    expect(validateName("R2D2")).toBe("validation.name_charset");
  });

  it("dispatches by field type and skips empty values", () => {
    expect(validateField(null, "email")).toBeNull();
    expect(validateField("", "nationalId")).toBeNull();
    expect(validateField("12", "mobile")).toBe("validation.mobile");
    expect(validateField("12345678901", "nationalId")).toBe("validation.national_id");
  });
});
