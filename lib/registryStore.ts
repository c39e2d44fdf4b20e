import { emptyRegistry, registryFromTable, registryToTable } from "@/lib/donor-engine/registry";
import type { RegistrySnapshot, TabularData } from "@/lib/donor-engine/types";

/**
 * Persistence boundary of the engine. `replace` receives the complete
 * next-state registry and must swap it in atomically; `appendAudit` never
 * rewrites earlier rows.
 */
export interface RegistryStore {
  load(): Promise<RegistrySnapshot>;
  replace(table: TabularData): Promise<void>;
  appendAudit(rows: string[][]): Promise<void>;
}

export type MemoryRegistryStore = RegistryStore & {
  registryTable(): TabularData;
  auditLog(): string[][];
};

export function createMemoryRegistryStore(initial: TabularData | RegistrySnapshot = emptyRegistry()): MemoryRegistryStore {
  let table: TabularData = "headers" in initial ? cloneTable(initial) : registryToTable(initial);
  const audit: string[][] = [];

  return {
    async load() {
      return registryFromTable(cloneTable(table));
    },
    async replace(next) {
      table = cloneTable(next);
    },
    async appendAudit(rows) {
      audit.push(...rows.map((row) => [...row]));
    },
    registryTable() {
      return cloneTable(table);
    },
    auditLog() {
      return audit.map((row) => [...row]);
    }
  };
}

function cloneTable(table: TabularData): TabularData {
  return { headers: [...table.headers], rows: table.rows.map((row) => [...row]) };
}
