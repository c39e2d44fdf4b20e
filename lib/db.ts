import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { env } from "@/lib/env";
import { createLogger } from "@/lib/logging";
import { registryFromTable } from "@/lib/donor-engine/registry";
import { AUDIT_COLUMNS } from "@/lib/donor-engine/steps/audit";
import type { MasterRecord, RegistrySnapshot, TabularData } from "@/lib/donor-engine/types";
import { createMemoryRegistryStore, type RegistryStore } from "@/lib/registryStore";
import { chunkArray } from "@/lib/utils";

const PAGE_SIZE = 1000;
const AUDIT_CHUNK_SIZE = 500;

const text = z
  .union([z.string(), z.number()])
  .nullable()
  .optional()
  .transform((value) => (value === null || value === undefined ? "" : String(value)));

const registryRowSchema = z.object({
  donor_number: text,
  donor_first: text,
  donor_last: text,
  donor_email: text,
  donor_account: text,
  donor_phone: text,
  donor_address: text,
  zip_code: text,
  donor_status: text,
  center: text,
  birthdate: text
});

let serviceClient: SupabaseClient | null = null;
let stubStore: RegistryStore | null = null;

export function getServiceSupabase(): SupabaseClient {
  if (serviceClient) {
    return serviceClient;
  }

  const { supabase } = env();
  if (!supabase.url || !supabase.serviceRoleKey) {
    throw new Error("Supabase service role credentials are not configured.");
  }

  serviceClient = createClient(supabase.url, supabase.serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false
    },
    global: {
      headers: {
        "X-Client-Info": "donor-registry-sync/0.1.0"
      }
    }
  });

  return serviceClient;
}

export type SupabaseRegistryOptions = {
  table: string;
  auditTable: string;
  tracksBirthdate: boolean;
};

/**
 * Registry kept in Postgres. Rows carry a `position` so the table reads back
 * in the order it was written; replacement runs inside one database function.
 */
export function createSupabaseRegistryStore(
  client: SupabaseClient,
  options: SupabaseRegistryOptions
): RegistryStore {
  const logger = createLogger({ component: "registry-store" });

  return {
    async load(): Promise<RegistrySnapshot> {
      const records: MasterRecord[] = [];
      for (let from = 0; ; from += PAGE_SIZE) {
        const { data, error } = await client
          .from(options.table)
          .select("*")
          .order("position", { ascending: true })
          .range(from, from + PAGE_SIZE - 1);
        if (error) {
          throw new Error(`Failed to read ${options.table}: ${error.message}`);
        }
        const page = z.array(registryRowSchema).parse(data ?? []);
        for (const row of page) {
          const { birthdate, ...rest } = row;
          records.push(options.tracksBirthdate ? { ...rest, birthdate } : rest);
        }
        if (page.length < PAGE_SIZE) {
          break;
        }
      }
      logger.debug("registry page load complete", { table: options.table, records: records.length });
      return { records, tracksBirthdate: options.tracksBirthdate };
    },

    async replace(table: TabularData): Promise<void> {
      const snapshot = registryFromTable(table);
      const payload = snapshot.records.map((record, position) => ({
        ...record,
        birthdate: record.birthdate ?? null,
        position
      }));
      const { error } = await client.rpc("replace_donor_registry", {
        target_table: options.table,
        payload
      });
      if (error) {
        throw new Error(`Failed to replace ${options.table}: ${error.message}`);
      }
      logger.info("registry replaced", { table: options.table, records: payload.length });
    },

    async appendAudit(rows: string[][]): Promise<void> {
      const columns = AUDIT_COLUMNS.map((column) => column.toLowerCase());
      const records = rows.map((row) => Object.fromEntries(columns.map((column, index) => [column, row[index] ?? ""])));
      for (const chunk of chunkArray(records, AUDIT_CHUNK_SIZE)) {
        const { error } = await client.from(options.auditTable).insert(chunk);
        if (error) {
          throw new Error(`Failed to append to ${options.auditTable}: ${error.message}`);
        }
      }
      logger.info("audit rows appended", { table: options.auditTable, rows: rows.length });
    }
  };
}

/**
 * Store for the configured environment. Without Supabase credentials the
 * in-process store is used in tests or when `ENABLE_SUPABASE_STUB` is set.
 */
export function createRegistryStore(): RegistryStore {
  const config = env();
  if (config.supabase.url && config.supabase.serviceRoleKey) {
    return createSupabaseRegistryStore(getServiceSupabase(), config.registry);
  }
  if (config.nodeEnv === "test" || config.supabase.enableStub) {
    stubStore ??= createMemoryRegistryStore();
    return stubStore;
  }
  throw new Error("Supabase service role credentials are not configured.");
}
