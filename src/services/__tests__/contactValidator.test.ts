import { describe, expect, it } from "vitest";
import { validateContactRow, validateContactRows } from "../contactValidator";

const complete = {
  phone_number: "(555) 123-0001",
  patient_name: " Alice ",
  date: "2024-07-01",
  time: "10:00 AM",
  provider_name: "Dr. Lee",
  office_location: "Main",
};

describe("validateContactRow", () => {
  it("builds a frozen contact with a normalized phone number", () => {
    const result = validateContactRow(complete, 4, "+1");
    expect(result).toEqual({
      ok: true,
      contact: {
        sheet_index: 4,
        phone_number: "+15551230001",
        patient_name: "Alice",
        provider_name: "Dr. Lee",
        appointment_date: "2024-07-01",
        appointment_time: "10:00 AM",
        office_location: "Main",
      },
    });
    expect(result.ok && Object.isFrozen(result.contact)).toBe(true);
  });

  it("accepts the alternate column names", () => {
    const result = validateContactRow(
      {
        phone: 5551230002,
        name: "Bob",
        appointment_date: "2024-07-02",
        appointment_time: "9:30 AM",
        provider: "Dr. Kim",
        location: "North",
      },
      0,
      "+1"
    );
    expect(result.ok && result.contact.phone_number).toBe("+15551230002");
    expect(result.ok && result.contact.office_location).toBe("North");
  });

  it("lists every missing or blank field", () => {
    const result = validateContactRow(
      { ...complete, phone_number: "  ", provider_name: undefined, time: null },
      2,
      "+1"
    );
    expect(result).toEqual({
      ok: false,
      failure: {
        sheet_index: 2,
        reason: "Missing required field(s): phone_number, time, provider_name",
        row: { ...complete, phone_number: "  ", provider_name: undefined, time: null },
      },
    });
  });

  it("rejects a phone number that cannot be dialed", () => {
    const result = validateContactRow({ ...complete, phone_number: "555-0001" }, 1, "+1");
    expect(result.ok).toBe(false);
    expect(!result.ok && result.failure.reason).toBe("Invalid phone number: 555-0001");
  });
});

describe("validateContactRows", () => {
  it("uses the row position as sheet index and keeps failures apart", () => {
    const { contacts, failures } = validateContactRows(
      [complete, { ...complete, patient_name: "" }, { ...complete, phone_number: "5551230003" }],
      "+1"
    );
    expect(contacts.map((c) => [c.sheet_index, c.phone_number])).toEqual([
      [0, "+15551230001"],
      [2, "+15551230003"],
    ]);
    expect(failures.map((f) => [f.sheet_index, f.reason])).toEqual([
      [1, "Missing required field(s): patient_name"],
    ]);
  });
});
