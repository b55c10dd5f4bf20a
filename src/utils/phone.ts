/**
 * Normalize a phone number to E.164 using the campaign's country code.
 * Returns null when the input cannot be a dialable number.
 *
 *   normalizePhoneNumber("(555) 123-0001")        -> "+15551230001"
 *   normalizePhoneNumber("020 7946 0018", "+44")  -> "+442079460018"
 */
export function normalizePhoneNumber(raw: string, countryCode = "+1"): string | null {
  // Spreadsheet cells sometimes arrive as floats ("5551230001.0")
  const input = raw.trim().replace(/\.0+$/, "");
  if (!input) return null;

  const digits = input.replace(/\D/g, "");
  const cc = countryCode.replace(/\D/g, "") || "1";

  if (input.startsWith("+")) {
    return isE164Length(digits) ? `+${digits}` : null;
  }

  if (digits.startsWith("00")) {
    const international = digits.slice(2);
    return isE164Length(international) ? `+${international}` : null;
  }

  // North American numbering plan
  if (cc === "1") {
    if (digits.length === 10) return `+1${digits}`;
    if (digits.length === 11 && digits.startsWith("1")) return `+${digits}`;
    return null;
  }

  const national = digits.replace(/^0+/, "");
  const full =
    national.startsWith(cc) && national.length >= cc.length + 8
      ? national
      : `${cc}${national}`;

  return isE164Length(full) ? `+${full}` : null;
}

function isE164Length(digits: string): boolean {
  return digits.length >= 8 && digits.length <= 15;
}
