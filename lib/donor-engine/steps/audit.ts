import { REGISTRY_COLUMNS, type MasterRecord } from "../types";
import type { ReconciliationOutcome } from "./reconcile";
import { toMasterRecord } from "./merge";

// Manual-review flags filled in downstream.
export const AUDIT_MARKER_COLUMNS = ["K", "L", "M", "N"] as const;
export const AUDIT_MARKER_VALUE = "x";

export const AUDIT_COLUMNS = [...REGISTRY_COLUMNS, ...AUDIT_MARKER_COLUMNS, "birthdate"] as const;

function auditRow(master: MasterRecord, birthdate: string): string[] {
  return [
    ...REGISTRY_COLUMNS.map((column) => master[column]),
    ...AUDIT_MARKER_COLUMNS.map(() => AUDIT_MARKER_VALUE),
    birthdate
  ];
}

/** Fixed-width rows for new then updated records. Birthdate is blank when the batch has none. */
export function buildAuditRows(outcome: ReconciliationOutcome): string[][] {
  const entries = [...outcome.new, ...outcome.updated];
  return entries.map(({ record }) => auditRow(toMasterRecord(record, false), record.birthdate ?? ""));
}
