import type { ComparedField, FieldMapping, NormalizedDonorRecord, TabularData } from "../types";
import type { ReconciliationOutcome } from "./reconcile";

export const CONTACT_FIELDS: readonly ComparedField[] = ["phone", "email", "birthdate"];

export const LEAD_COLUMNS = [
  "donor_number",
  "donor_first",
  "donor_last",
  "donor_email",
  "donor_account",
  "donor_phone",
  "donor_address",
  "city",
  "zip_code",
  "donor_status",
  "facility",
  "birthdate"
] as const;

export type LeadColumn = (typeof LEAD_COLUMNS)[number];

const ALWAYS_PRESENT = new Set<LeadColumn>(["donor_number", "donor_first", "donor_last", "facility"]);

/**
 * New donors always become leads. Updated donors only when a contact channel
 * changed; address or center changes alone do not call for outreach.
 */
export function selectLeads(outcome: ReconciliationOutcome): NormalizedDonorRecord[] {
  const contactChanged = outcome.updated.filter((entry) =>
    entry.changedFields.some((field) => CONTACT_FIELDS.includes(field))
  );
  return [...outcome.new.map((entry) => entry.record), ...contactChanged.map((entry) => entry.record)];
}

/** Lead columns for the fields a batch mapping carries. */
export function leadColumnsFor(mapping: FieldMapping): LeadColumn[] {
  const carried: Record<LeadColumn, boolean> = {
    donor_number: true,
    donor_first: true,
    donor_last: true,
    facility: true,
    donor_email: mapping.donor_email !== undefined,
    donor_account: mapping.donor_account !== undefined,
    donor_phone: mapping.donor_phone !== undefined,
    donor_address: mapping.address_line1 !== undefined || mapping.address_line2 !== undefined,
    city: mapping.city !== undefined,
    zip_code: mapping.zip_code !== undefined,
    donor_status: mapping.donor_status !== undefined,
    birthdate: mapping.birthdate !== undefined
  };
  return LEAD_COLUMNS.filter((column) => ALWAYS_PRESENT.has(column) || carried[column]);
}

export function leadsToTable(leads: NormalizedDonorRecord[], columns: readonly LeadColumn[] = LEAD_COLUMNS): TabularData {
  return {
    headers: [...columns],
    rows: leads.map((lead) => columns.map((column) => lead[column] ?? ""))
  };
}
