import {
  COMPARED_FIELDS,
  type ComparedField,
  type MasterRecord,
  type NormalizedDonorRecord,
  type RegistrySnapshot
} from "../types";

export type ReconciledRecord = {
  key: string;
  record: NormalizedDonorRecord;
};

export type ReconciledMatch = ReconciledRecord & {
  master: MasterRecord;
  /** Every compared field whose standardized values differ. */
  changedFields: ComparedField[];
};

export type ReconciliationOutcome = {
  new: ReconciledRecord[];
  /** Authoritative change set; drives the merge, audit and leads. */
  updated: ReconciledMatch[];
  /** Informational change set computed over `looseFields`. */
  updatedLoose: ReconciledMatch[];
  unchanged: ReconciledMatch[];
  excluded: {
    count: number;
    records: NormalizedDonorRecord[];
  };
};

export type ReconcileOptions = {
  strictFields?: readonly ComparedField[];
  looseFields?: readonly ComparedField[];
};

export function identityKey(donorNumber: string, site: string): string {
  return `${donorNumber.trim()}_${site.trim()}`;
}

/** Join form of an identity key; facility capitalization never splits a donor. */
export function matchKey(key: string): string {
  return key.toLowerCase();
}

export function isKeyable(record: NormalizedDonorRecord): boolean {
  return record.donor_number.trim().length > 0 && record.facility.trim().length > 0;
}

export function recordKey(record: NormalizedDonorRecord): string {
  return identityKey(record.donor_number, record.facility);
}

export function masterKey(master: MasterRecord): string {
  return identityKey(master.donor_number, master.center);
}

/** Comparison form of a value: lower-cased, trimmed, reduced to `[a-z0-9@.]`. */
export function standardize(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  return String(value)
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9@.]/g, "");
}

function comparedValues(
  field: ComparedField,
  record: NormalizedDonorRecord,
  master: MasterRecord,
  tracksBirthdate: boolean
): [unknown, unknown] | null {
  switch (field) {
    case "email":
      return record.donor_email === undefined ? null : [record.donor_email, master.donor_email];
    case "phone":
      return record.donor_phone === undefined ? null : [record.donor_phone, master.donor_phone];
    case "address":
      return record.donor_address === undefined ? null : [record.donor_address, master.donor_address];
    case "center":
      return [record.facility, master.center];
    case "birthdate":
      if (!tracksBirthdate || record.birthdate === undefined) {
        return null;
      }
      return [record.birthdate, master.birthdate];
    default:
      return null;
  }
}

export function changedFields(
  record: NormalizedDonorRecord,
  master: MasterRecord,
  tracksBirthdate: boolean
): ComparedField[] {
  return COMPARED_FIELDS.filter((field) => {
    const values = comparedValues(field, record, master, tracksBirthdate);
    return values !== null && standardize(values[0]) !== standardize(values[1]);
  });
}

export function reconcile(
  records: NormalizedDonorRecord[],
  registry: RegistrySnapshot,
  options: ReconcileOptions = {}
): ReconciliationOutcome {
  const strictFields = new Set<ComparedField>(options.strictFields ?? COMPARED_FIELDS);
  const looseFields = new Set<ComparedField>(options.looseFields ?? strictFields);

  // An exact key match wins; the case-folded key is only a fallback.
  const exact = new Map<string, MasterRecord>();
  const folded = new Map<string, MasterRecord>();
  for (const master of registry.records) {
    const key = masterKey(master);
    if (!exact.has(key)) {
      exact.set(key, master);
    }
    if (!folded.has(matchKey(key))) {
      folded.set(matchKey(key), master);
    }
  }

  const outcome: ReconciliationOutcome = {
    new: [],
    updated: [],
    updatedLoose: [],
    unchanged: [],
    excluded: { count: 0, records: [] }
  };

  for (const record of records) {
    if (!isKeyable(record)) {
      outcome.excluded.count += 1;
      outcome.excluded.records.push(record);
      continue;
    }

    const key = recordKey(record);
    const master = exact.get(key) ?? folded.get(matchKey(key));
    if (!master) {
      outcome.new.push({ key, record });
      continue;
    }

    const match: ReconciledMatch = {
      key,
      record,
      master,
      changedFields: changedFields(record, master, registry.tracksBirthdate)
    };
    const isStrict = match.changedFields.some((field) => strictFields.has(field));
    if (isStrict) {
      outcome.updated.push(match);
    } else {
      outcome.unchanged.push(match);
    }
    if (match.changedFields.some((field) => looseFields.has(field))) {
      outcome.updatedLoose.push(match);
    }
  }

  return outcome;
}

/** Donor numbers are not unique across centers, so a lookup may return several entries. */
export function findByDonorNumber<T extends ReconciledRecord>(entries: T[], donorNumber: string): T[] {
  const wanted = donorNumber.trim();
  return entries.filter((entry) => entry.record.donor_number === wanted);
}
