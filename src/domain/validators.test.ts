import { describe, expect, it } from "vitest";

import {
  FieldChecker,
  addDays,
  appointmentEndTime,
  formatCurrency,
  formatPhone,
  isValidDate,
  isValidEmail,
  isValidPhone,
  isValidTime,
  patientAge,
  toIsoDate,
  toIsoTime,
} from "./validators.ts";

describe("field validators", () => {
  it("treats empty optional values as valid", () => {
    expect(isValidEmail("")).toBe(true);
    expect(isValidPhone(null)).toBe(true);
    expect(isValidDate(undefined)).toBe(true);
  });

  it("checks email addresses", () => {
    expect(isValidEmail("front.desk@clinic.test")).toBe(true);
    expect(isValidEmail("front.desk@clinic")).toBe(false);
    expect(isValidEmail("no-at-sign.test")).toBe(false);
  });

  it("ignores spaces, dashes and parentheses in phone numbers", () => {
    expect(isValidPhone("(555) 123-4567")).toBe(true);
    expect(isValidPhone("+44 20 7946 0000")).toBe(true);
    expect(isValidPhone("0123")).toBe(false);
    expect(isValidPhone("call me")).toBe(false);
  });

  it("only accepts real calendar days", () => {
    expect(isValidDate("2024-02-29")).toBe(true);
    expect(isValidDate("2026-02-29")).toBe(false);
    expect(isValidDate("2026-13-01")).toBe(false);
    expect(isValidDate("02/03/2026")).toBe(false);
  });

  it("accepts 24-hour times only", () => {
    expect(isValidTime("00:00")).toBe(true);
    expect(isValidTime("23:59")).toBe(true);
    expect(isValidTime("24:00")).toBe(false);
    expect(isValidTime("9:30")).toBe(false);
  });
});

describe("FieldChecker", () => {
  it("collects every failing field", () => {
    const checker = new FieldChecker()
      .required("firstName", "  ", "First name")
      .email("email", "nope")
      .date("dateOfBirth", "1990-02-30", "Date of birth")
      .check(true, "ignored", "never reported");

    expect(checker.ok).toBe(false);
    expect(checker.issues).toEqual([
      { field: "firstName", message: "First name is required" },
      { field: "email", message: "Invalid email format" },
      { field: "dateOfBirth", message: "Date of birth must be a valid date (YYYY-MM-DD)" },
    ]);
  });
});

describe("date helpers", () => {
  it("formats local dates and times", () => {
    const now = new Date(2026, 0, 5, 7, 4);
    expect(toIsoDate(now)).toBe("2026-01-05");
    expect(toIsoTime(now)).toBe("07:04");
  });

  it("adds days across month ends", () => {
    expect(addDays("2026-01-31", 1)).toBe("2026-02-01");
    expect(addDays("2026-03-01", -1)).toBe("2026-02-28");
    expect(addDays("2026-03-02", 30)).toBe("2026-04-01");
  });

  it("computes the end of an appointment", () => {
    expect(appointmentEndTime("09:30", 45)).toBe("10:15");
    expect(appointmentEndTime("23:30", 45)).toBe("00:15");
  });

  it("computes age in whole years", () => {
    expect(patientAge("1990-06-15", "2026-06-14")).toBe(35);
    expect(patientAge("1990-06-15", "2026-06-15")).toBe(36);
    expect(patientAge(null, "2026-06-15")).toBeNull();
    expect(patientAge("not-a-date", "2026-06-15")).toBeNull();
  });
});

describe("display formatters", () => {
  it("formats currency amounts", () => {
    expect(formatCurrency(1234.5)).toBe("$1,234.50");
    expect(formatCurrency(0)).toBe("$0.00");
  });

  it("formats North American phone numbers", () => {
    expect(formatPhone("5551234567")).toBe("(555) 123-4567");
    expect(formatPhone("1-555-123-4567")).toBe("+1 (555) 123-4567");
    expect(formatPhone("+44 20 7946 0000")).toBe("+44 20 7946 0000");
    expect(formatPhone(undefined)).toBe("");
  });
});
