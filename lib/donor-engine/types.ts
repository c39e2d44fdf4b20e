export type RawValue = string | number | boolean | Date | null | undefined;

/** One row of an uploaded batch, keyed by the source column name. */
export type RawRow = Record<string, RawValue>;

export const CANONICAL_FIELDS = [
  "donor_number",
  "donor_name",
  "donor_first",
  "donor_last",
  "donor_email",
  "donor_account",
  "donor_phone",
  "facility",
  "address_line1",
  "address_line2",
  "city",
  "zip_code",
  "donor_status",
  "last_donation_date",
  "birthdate"
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

/** Canonical field -> source column. Unmapped fields are omitted. */
export type FieldMapping = Partial<Record<CanonicalField, string>>;

/** A batch row after column mapping; only mapped fields are present. */
export type CanonicalRow = Partial<Record<CanonicalField, RawValue>>;

/**
 * Canonical per-visit record.
 *
 * Optional fields follow one rule throughout the engine: a property that is
 * missing means the batch never carried that column, while `null` means the
 * column was mapped but the cell was blank or rejected.
 */
export type NormalizedDonorRecord = {
  donor_number: string;
  donor_first: string;
  donor_last: string;
  facility: string;
  donor_email?: string | null;
  donor_phone?: string | null;
  donor_account?: string | null;
  donor_address?: string | null;
  city?: string | null;
  zip_code?: string | null;
  donor_status?: string | null;
  birthdate?: string | null;
  last_donation_date?: Date | null;
};

export const REGISTRY_COLUMNS = [
  "donor_number",
  "donor_first",
  "donor_last",
  "donor_email",
  "donor_account",
  "donor_phone",
  "donor_address",
  "zip_code",
  "donor_status",
  "center"
] as const;

export type RegistryColumn = (typeof REGISTRY_COLUMNS)[number];

export const BIRTHDATE_COLUMN = "birthdate";

export type MasterRecord = Record<RegistryColumn, string> & {
  birthdate?: string;
};

export type RegistrySnapshot = {
  records: MasterRecord[];
  /** Registry variant with a trailing birthdate column. */
  tracksBirthdate: boolean;
};

export type TabularData = {
  headers: string[];
  rows: string[][];
};

export const COMPARED_FIELDS = ["email", "phone", "address", "center", "birthdate"] as const;

export type ComparedField = (typeof COMPARED_FIELDS)[number];

export type NormalizationFailures = {
  name: number;
  phone: number;
  birthdate: number;
  last_donation_date: number;
};
