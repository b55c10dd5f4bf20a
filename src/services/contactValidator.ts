// ============================================================================
// Contact Row Validator
// Turns parsed sheet rows into frozen Contacts or ValidationFailures
// ============================================================================

import { z } from "zod";
import { logger } from "../utils/logger";
import { normalizePhoneNumber } from "../utils/phone";
import { Contact, ValidationFailure } from "../types/campaign";

export type ContactRow = Record<string, unknown>;

const requiredCell = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1));

const contactRowSchema = z.object({
  phone_number: requiredCell,
  patient_name: requiredCell,
  date: requiredCell,
  time: requiredCell,
  provider_name: requiredCell,
  office_location: requiredCell,
});

type RequiredField = keyof z.infer<typeof contactRowSchema>;

// Column names seen in uploaded sheets, in lookup order
const FIELD_ALIASES: Record<RequiredField, string[]> = {
  phone_number: ["phone_number", "phone"],
  patient_name: ["patient_name", "name"],
  date: ["date", "appointment_date"],
  time: ["time", "appointment_time"],
  provider_name: ["provider_name", "provider"],
  office_location: ["office_location", "location"],
};

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

function resolveAliases(row: ContactRow): Record<RequiredField, unknown> {
  const pick = (field: RequiredField): unknown => {
    const key = FIELD_ALIASES[field].find((alias) => !isBlank(row[alias]));
    return key === undefined ? undefined : row[key];
  };

  return {
    phone_number: pick("phone_number"),
    patient_name: pick("patient_name"),
    date: pick("date"),
    time: pick("time"),
    provider_name: pick("provider_name"),
    office_location: pick("office_location"),
  };
}

export type RowValidation =
  | { ok: true; contact: Readonly<Contact> }
  | { ok: false; failure: ValidationFailure };

export function validateContactRow(
  row: ContactRow,
  sheetIndex: number,
  countryCode: string
): RowValidation {
  const parsed = contactRowSchema.safeParse(resolveAliases(row));

  if (!parsed.success) {
    const fields = [
      ...new Set(parsed.error.issues.map((issue) => String(issue.path[0]))),
    ];
    return {
      ok: false,
      failure: {
        sheet_index: sheetIndex,
        reason: `Missing required field(s): ${fields.join(", ")}`,
        row,
      },
    };
  }

  const phone = normalizePhoneNumber(parsed.data.phone_number, countryCode);
  if (!phone) {
    return {
      ok: false,
      failure: {
        sheet_index: sheetIndex,
        reason: `Invalid phone number: ${parsed.data.phone_number}`,
        row,
      },
    };
  }

  return {
    ok: true,
    contact: Object.freeze({
      sheet_index: sheetIndex,
      phone_number: phone,
      patient_name: parsed.data.patient_name,
      provider_name: parsed.data.provider_name,
      appointment_date: parsed.data.date,
      appointment_time: parsed.data.time,
      office_location: parsed.data.office_location,
    }),
  };
}

/**
 * Validate every row. `sheet_index` is the row's position in the input.
 */
export function validateContactRows(
  rows: readonly ContactRow[],
  countryCode: string
): { contacts: Readonly<Contact>[]; failures: ValidationFailure[] } {
  const contacts: Readonly<Contact>[] = [];
  const failures: ValidationFailure[] = [];

  rows.forEach((row, index) => {
    const result = validateContactRow(row, index, countryCode);
    if (result.ok) {
      contacts.push(result.contact);
    } else {
      failures.push(result.failure);
    }
  });

  if (failures.length > 0) {
    logger.warn("Contact rows rejected", {
      rejected: failures.length,
      accepted: contacts.length,
      reasons: failures.slice(0, 10).map((f) => `#${f.sheet_index}: ${f.reason}`),
    });
  }

  return { contacts, failures };
}
