import { toText } from "@/lib/utils";
import {
  BIRTHDATE_COLUMN,
  REGISTRY_COLUMNS,
  type MasterRecord,
  type RegistrySnapshot,
  type TabularData
} from "./types";

/**
 * Reads a registry table positionally. A header row wider than the canonical
 * layout marks the variant whose trailing column is the birthdate.
 */
export function registryFromTable(table: TabularData): RegistrySnapshot {
  const tracksBirthdate = table.headers.length > REGISTRY_COLUMNS.length;
  const records: MasterRecord[] = [];

  for (const row of table.rows) {
    if (row.every((value) => toText(value).trim().length === 0)) {
      continue;
    }
    const cell = (index: number) => toText(row[index]);
    const record: MasterRecord = {
      donor_number: cell(0),
      donor_first: cell(1),
      donor_last: cell(2),
      donor_email: cell(3),
      donor_account: cell(4),
      donor_phone: cell(5),
      donor_address: cell(6),
      zip_code: cell(7),
      donor_status: cell(8),
      center: cell(9)
    };
    if (tracksBirthdate) {
      record.birthdate = cell(REGISTRY_COLUMNS.length);
    }
    records.push(record);
  }

  return { records, tracksBirthdate };
}

export function registryHeaders(tracksBirthdate: boolean): string[] {
  return tracksBirthdate ? [...REGISTRY_COLUMNS, BIRTHDATE_COLUMN] : [...REGISTRY_COLUMNS];
}

export function registryToTable(snapshot: RegistrySnapshot): TabularData {
  return {
    headers: registryHeaders(snapshot.tracksBirthdate),
    rows: snapshot.records.map((record) => {
      const row = REGISTRY_COLUMNS.map((column) => record[column]);
      return snapshot.tracksBirthdate ? [...row, record.birthdate ?? ""] : row;
    })
  };
}

export function emptyRegistry(tracksBirthdate = false): RegistrySnapshot {
  return { records: [], tracksBirthdate };
}
