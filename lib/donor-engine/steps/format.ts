import { format as formatDate, isValid, parse as parseDate, parseISO } from "date-fns";
import { isBlank, toText } from "@/lib/utils";
import type {
  CanonicalField,
  CanonicalRow,
  NormalizationFailures,
  NormalizedDonorRecord,
  RawValue
} from "../types";

export const BIRTHDATE_PATTERNS = [
  "MM/dd/yyyy",
  "dd/MM/yyyy",
  "yyyy-MM-dd",
  "yyyy/MM/dd",
  "MM-dd-yyyy",
  "dd-MM-yyyy"
] as const;

const DONATION_DATE_PATTERNS = [...BIRTHDATE_PATTERNS, "MM/dd/yyyy HH:mm", "MM/dd/yyyy HH:mm:ss"];

const ISO_DATE = "yyyy-MM-dd";
const FORMATTED_PHONE = /^1\(\d{3}\) \d{3}-\d{4}$/;

// Only used to fill date parts the pattern leaves out; every pattern above sets all of them.
const REFERENCE_DATE = new Date(2000, 0, 1);

export type FormatOptions = {
  invalidEmails: ReadonlySet<string>;
};

export type FormatResult = {
  records: NormalizedDonorRecord[];
  failures: NormalizationFailures;
};

/**
 * Formats a phone number as `1(AAA) BBB-CCCC`.
 * Values that do not reduce to 10 or 11 digits come back unchanged,
 * whitespace included; only a missing or empty cell becomes `null`.
 */
export function formatPhone(value: RawValue): string | null {
  if (value === "" || (typeof value !== "string" && isBlank(value))) {
    return null;
  }
  const original = toText(value);
  let digits = original.replace(/\D/g, "");
  if (digits.length === 10) {
    digits = `1${digits}`;
  }
  if (digits.length !== 11) {
    return original;
  }
  return `1(${digits.slice(1, 4)}) ${digits.slice(4, 7)}-${digits.slice(7)}`;
}

export function titleCase(value: string): string {
  return value
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

/** Splits `"Last, First"` on the first comma. Without a comma the whole value is the first name. */
export function processName(value: RawValue): { first: string; last: string } {
  if (isBlank(value)) {
    return { first: "", last: "" };
  }
  const text = toText(value);
  const commaIndex = text.indexOf(",");
  if (commaIndex === -1) {
    return { first: titleCase(text), last: "" };
  }
  return {
    first: titleCase(text.slice(commaIndex + 1)),
    last: titleCase(text.slice(0, commaIndex))
  };
}

export function normalizeEmail(value: RawValue, invalidEmails: ReadonlySet<string>): string | null {
  if (isBlank(value)) {
    return null;
  }
  const lower = toText(value).trim().toLowerCase();
  return invalidEmails.has(lower) ? null : lower;
}

export function parseDateValue(value: RawValue, patterns: readonly string[] = BIRTHDATE_PATTERNS): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  for (const pattern of patterns) {
    const parsed = parseDate(trimmed, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return null;
}

export function normalizeBirthdate(value: RawValue): string | null {
  if (isBlank(value)) {
    return null;
  }
  const parsed = parseDateValue(value);
  return parsed ? formatDate(parsed, ISO_DATE) : toText(value);
}

export function parseDonationDate(value: RawValue): Date | null {
  const parsed = parseDateValue(value, DONATION_DATE_PATTERNS);
  if (parsed || typeof value !== "string") {
    return parsed;
  }
  const iso = parseISO(value.trim());
  return isValid(iso) ? iso : null;
}

export function composeAddress(line1: RawValue, line2: RawValue): string {
  const first = isBlank(line1) ? "" : toText(line1);
  const second = isBlank(line2) ? "" : toText(line2);
  return `${first} ${second}`.trim();
}

function cleanText(value: RawValue): string {
  return isBlank(value) ? "" : toText(value).trim();
}

function optionalText(value: RawValue): string | null {
  return isBlank(value) ? null : toText(value).trim();
}

export function formatRows(rows: CanonicalRow[], options: FormatOptions): FormatResult {
  const failures: NormalizationFailures = {
    name: 0,
    phone: 0,
    birthdate: 0,
    last_donation_date: 0
  };

  const records = rows.map((row) => {
    const has = (field: CanonicalField) => field in row;

    // A combined name column wins over pre-split columns when both are mapped.
    const name =
      has("donor_first") && !has("donor_name")
        ? { first: titleCase(cleanText(row.donor_first)), last: titleCase(cleanText(row.donor_last)) }
        : processName(row.donor_name);
    if (!name.first && !name.last) {
      failures.name += 1;
    }

    const record: NormalizedDonorRecord = {
      donor_number: cleanText(row.donor_number),
      donor_first: name.first,
      donor_last: name.last,
      facility: cleanText(row.facility)
    };

    if (has("donor_email")) {
      record.donor_email = normalizeEmail(row.donor_email, options.invalidEmails);
    }
    if (has("donor_phone")) {
      const phone = formatPhone(row.donor_phone);
      if (phone !== null && !FORMATTED_PHONE.test(phone)) {
        failures.phone += 1;
      }
      record.donor_phone = phone;
    }
    if (has("donor_account")) {
      record.donor_account = optionalText(row.donor_account);
    }
    if (has("address_line1") || has("address_line2")) {
      record.donor_address = composeAddress(row.address_line1, row.address_line2);
    }
    if (has("city")) {
      record.city = optionalText(row.city);
    }
    if (has("zip_code")) {
      record.zip_code = optionalText(row.zip_code);
    }
    if (has("donor_status")) {
      record.donor_status = optionalText(row.donor_status);
    }
    if (has("birthdate")) {
      if (!isBlank(row.birthdate) && !parseDateValue(row.birthdate)) {
        failures.birthdate += 1;
      }
      record.birthdate = normalizeBirthdate(row.birthdate);
    }
    if (has("last_donation_date")) {
      const donated = parseDonationDate(row.last_donation_date);
      if (!donated && !isBlank(row.last_donation_date)) {
        failures.last_donation_date += 1;
      }
      record.last_donation_date = donated;
    }

    return record;
  });

  return { records, failures };
}
