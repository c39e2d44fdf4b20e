import { toCsv, parseTableFile } from "@/lib/csv";
import { createRegistryStore } from "@/lib/db";
import {
  createAssistedMapper,
  createFixedSchemaMapper,
  defaultEngineConfig,
  executeBatch,
  previewBirthdateColumn,
  suggestMapping,
  type BatchResult,
  type EngineConfig,
  type FieldMapping
} from "@/lib/donor-engine";
import { createLogger } from "@/lib/logging";
import type { RegistryStore } from "@/lib/registryStore";

export type DonorUpload = {
  buffer: Buffer;
  fileName: string;
};

export type SyncOptions = {
  /** Operator-confirmed mapping; without one the fixed export layout is required. */
  mapping?: FieldMapping;
  store?: RegistryStore;
  config?: EngineConfig;
};

export type SyncResult = {
  result: BatchResult;
  leadsCsv: string;
  leadsFileName: string;
};

export const LEADS_FILE_NAME = "donor-leads-for-upload.csv";

/** Column suggestions and a birthdate sample for the mapping screen. */
export function prepareMapping(upload: DonorUpload, config: EngineConfig = defaultEngineConfig()) {
  const table = parseTableFile(upload.buffer, upload.fileName);
  const suggestion = suggestMapping(table.headers, config.synonyms);
  const birthdateColumn = suggestion.mapping.birthdate;
  return {
    headers: table.headers,
    ...suggestion,
    birthdatePreview: birthdateColumn ? previewBirthdateColumn(table.rows, birthdateColumn) : []
  };
}

export async function syncDonorUpload(upload: DonorUpload, options: SyncOptions = {}): Promise<SyncResult> {
  const logger = createLogger({ component: "donor-sync" });
  const config = options.config ?? defaultEngineConfig();
  const table = parseTableFile(upload.buffer, upload.fileName);
  logger.info("upload parsed", { fileName: upload.fileName, rows: table.rows.length, columns: table.headers.length });

  const mapper = options.mapping
    ? createAssistedMapper(options.mapping)
    : createFixedSchemaMapper(config.fixedSchema);

  const result = await executeBatch(table.rows, {
    mapper,
    columns: table.headers,
    config,
    store: options.store ?? createRegistryStore(),
    logger
  });

  return {
    result,
    leadsCsv: toCsv(result.leadsTable),
    leadsFileName: LEADS_FILE_NAME
  };
}
