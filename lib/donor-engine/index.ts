import { PersistenceError } from "@/lib/errors";
import { newBatchId } from "@/lib/ids";
import { createLogger, type Logger } from "@/lib/logging";
import type { RegistryStore } from "@/lib/registryStore";
import { defaultEngineConfig, type EngineConfig } from "./config";
import { registryToTable } from "./registry";
import { buildAuditRows } from "./steps/audit";
import { dedupeRecords } from "./steps/dedupe";
import { formatRows } from "./steps/format";
import { leadColumnsFor, leadsToTable, selectLeads } from "./steps/leads";
import { mapColumns, type SchemaMapper } from "./steps/map_columns";
import { mergeRegistry } from "./steps/merge";
import { reconcile, type ReconciliationOutcome } from "./steps/reconcile";
import type {
  ComparedField,
  FieldMapping,
  NormalizationFailures,
  NormalizedDonorRecord,
  RawRow,
  RegistrySnapshot,
  TabularData
} from "./types";

export type BatchOptions = {
  mapper: SchemaMapper;
  /** Column names of the upload; defaults to every key seen in `rows`. */
  columns?: string[];
  config?: EngineConfig;
  strictFields?: readonly ComparedField[];
  looseFields?: readonly ComparedField[];
  logger?: Logger;
};

export type ExecuteOptions = BatchOptions & {
  store: RegistryStore;
};

export type BatchStats = {
  totalRows: number;
  uniqueDonors: number;
  duplicatesDropped: number;
  excluded: number;
  newDonors: number;
  updatedRecords: number;
  unchanged: number;
  leads: number;
};

export type BatchResult = {
  mapping: FieldMapping;
  outcome: ReconciliationOutcome;
  /** Complete next-state registry. */
  registry: RegistrySnapshot;
  registryTable: TabularData;
  auditRows: string[][];
  leads: NormalizedDonorRecord[];
  leadsTable: TabularData;
  failures: NormalizationFailures;
  stats: BatchStats;
};

function collectColumns(rows: RawRow[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }
  return Array.from(columns);
}

/**
 * Runs the whole engine against a registry snapshot without touching any
 * store. Schema errors are thrown before a single row is normalized.
 */
export function previewBatch(rows: RawRow[], registry: RegistrySnapshot, options: BatchOptions): BatchResult {
  const logger = options.logger ?? createLogger({ component: "donor-engine", mode: "preview" });
  const config = options.config ?? defaultEngineConfig();

  const mapping = options.mapper.resolve(options.columns ?? collectColumns(rows));
  logger.debug("schema resolved", { mode: options.mapper.mode, fields: Object.keys(mapping) });

  const { records: formatted, failures } = formatRows(mapColumns(rows, mapping), {
    invalidEmails: config.invalidEmails
  });
  logger.debug("rows normalized", { rows: formatted.length, failures });

  const byDonationDate = mapping.last_donation_date !== undefined;
  if (!byDonationDate) {
    logger.warn("no donation date mapped; keeping first row per donor", { rows: formatted.length });
  }
  const { records, dropped } = dedupeRecords(formatted, { byDonationDate });

  const outcome = reconcile(records, registry, {
    strictFields: options.strictFields,
    looseFields: options.looseFields
  });
  if (outcome.excluded.count > 0) {
    logger.warn("records without donor number or facility excluded", { excluded: outcome.excluded.count });
  }

  const next = mergeRegistry(registry, outcome);
  const leads = selectLeads(outcome);

  const stats: BatchStats = {
    totalRows: rows.length,
    uniqueDonors: new Set(records.map((record) => record.donor_number).filter((value) => value.length > 0)).size,
    duplicatesDropped: dropped,
    excluded: outcome.excluded.count,
    newDonors: outcome.new.length,
    updatedRecords: outcome.updated.length,
    unchanged: outcome.unchanged.length,
    leads: leads.length
  };
  logger.info("batch reconciled", { ...stats });

  return {
    mapping,
    outcome,
    registry: next,
    registryTable: registryToTable(next),
    auditRows: buildAuditRows(outcome),
    leads,
    leadsTable: leadsToTable(leads, leadColumnsFor(mapping)),
    failures,
    stats
  };
}

/**
 * Loads the registry, runs the engine, writes the full replacement registry
 * and appends the audit rows. Assumes a single writer per registry.
 */
export async function executeBatch(rows: RawRow[], options: ExecuteOptions): Promise<BatchResult> {
  const batchId = newBatchId();
  const logger = (options.logger ?? createLogger({ component: "donor-engine" })).child({
    batchId,
    mode: "execute"
  });

  let registry: RegistrySnapshot;
  try {
    registry = await options.store.load();
  } catch (error) {
    logger.error("registry load failed", { error });
    throw new PersistenceError<BatchResult>("load", "Failed to load the donor registry", { cause: error });
  }
  logger.info("registry loaded", { records: registry.records.length, tracksBirthdate: registry.tracksBirthdate });

  const result = previewBatch(rows, registry, { ...options, logger });

  try {
    await options.store.replace(result.registryTable);
  } catch (error) {
    logger.error("registry replace failed", { error });
    throw new PersistenceError("replace", "Failed to persist the donor registry", { cause: error, result });
  }

  if (result.auditRows.length > 0) {
    try {
      await options.store.appendAudit(result.auditRows);
    } catch (error) {
      logger.error("audit append failed", { error, rows: result.auditRows.length });
      throw new PersistenceError("append", "Failed to append audit rows", { cause: error, result });
    }
  }

  logger.info("batch persisted", { registryRows: result.registry.records.length, auditRows: result.auditRows.length });
  return result;
}

export * from "./types";
export { createEngineConfig, defaultEngineConfig, type EngineConfig } from "./config";
export { emptyRegistry, registryFromTable, registryToTable } from "./registry";
export { buildAuditRows, AUDIT_COLUMNS } from "./steps/audit";
export { dedupeRecords } from "./steps/dedupe";
export { formatPhone, formatRows, normalizeBirthdate, normalizeEmail, processName } from "./steps/format";
export { leadsToTable, selectLeads, LEAD_COLUMNS } from "./steps/leads";
export {
  createAssistedMapper,
  createFixedSchemaMapper,
  previewBirthdateColumn,
  suggestMapping,
  type SchemaMapper
} from "./steps/map_columns";
export { mergeRegistry } from "./steps/merge";
export { findByDonorNumber, reconcile, standardize, type ReconciliationOutcome } from "./steps/reconcile";
