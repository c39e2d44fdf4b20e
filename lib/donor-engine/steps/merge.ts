import type { MasterRecord, NormalizedDonorRecord, RegistrySnapshot } from "../types";
import { masterKey, type ReconciliationOutcome } from "./reconcile";

function pick(value: string | null | undefined, fallback: string | undefined): string {
  if (value === undefined) {
    return fallback ?? "";
  }
  return value ?? "";
}

/**
 * Registry row for a batch record. Fields the batch never carried keep the
 * value from `previous` when one is given.
 */
export function toMasterRecord(
  record: NormalizedDonorRecord,
  tracksBirthdate: boolean,
  previous?: MasterRecord
): MasterRecord {
  const master: MasterRecord = {
    donor_number: record.donor_number,
    donor_first: record.donor_first,
    donor_last: record.donor_last,
    donor_email: pick(record.donor_email, previous?.donor_email),
    donor_account: pick(record.donor_account, previous?.donor_account),
    donor_phone: pick(record.donor_phone, previous?.donor_phone),
    donor_address: pick(record.donor_address, previous?.donor_address),
    zip_code: pick(record.zip_code, previous?.zip_code),
    donor_status: pick(record.donor_status, previous?.donor_status),
    center: record.facility
  };
  if (tracksBirthdate) {
    master.birthdate = pick(record.birthdate, previous?.birthdate);
  }
  return master;
}

/**
 * Next registry state: untouched rows in their existing order, then the
 * updated rows, then the new ones. An update replaces every row carrying
 * the exact key of the row it matched; rows whose key differs only in case
 * are left alone.
 */
export function mergeRegistry(registry: RegistrySnapshot, outcome: ReconciliationOutcome): RegistrySnapshot {
  const replaced = new Set(outcome.updated.map((entry) => masterKey(entry.master)));
  const kept = registry.records.filter((master) => !replaced.has(masterKey(master)));

  const updated = outcome.updated.map((entry) =>
    toMasterRecord(entry.record, registry.tracksBirthdate, entry.master)
  );
  const added = outcome.new.map((entry) => toMasterRecord(entry.record, registry.tracksBirthdate));

  return {
    records: [...kept, ...updated, ...added],
    tracksBirthdate: registry.tracksBirthdate
  };
}
