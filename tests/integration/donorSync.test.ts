import { describe, expect, it } from "vitest";
import {
  createAssistedMapper,
  createFixedSchemaMapper,
  defaultEngineConfig,
  emptyRegistry,
  executeBatch,
  previewBatch,
  type RawRow
} from "@/lib/donor-engine";
import { prepareMapping, syncDonorUpload } from "@/lib/donorSync";
import { PersistenceError, SchemaError } from "@/lib/errors";
import { createMemoryRegistryStore, type RegistryStore } from "@/lib/registryStore";

const { fixedSchema } = defaultEngineConfig();

function exportRow(values: Record<string, string>): RawRow {
  return Object.fromEntries(fixedSchema.requiredColumns.map((column) => [column, values[column] ?? ""]));
}

function visit(facility: string, phone: string, donated: string): RawRow {
  return exportRow({
    Facility: facility,
    "Donor #": "100",
    "Donor Name": "Smith, john",
    "Donor Phone": phone,
    "Last \tDonation Date": donated
  });
}

const batch = [visit("A", "555-123-4567", "01/01/2024"), visit("A", "555-999-9999", "03/01/2024"), visit("B", "", "02/01/2024")];

async function capture(run: Promise<unknown>): Promise<unknown> {
  try {
    await run;
  } catch (error) {
    return error;
  }
  throw new Error("expected the batch to fail");
}

describe("previewBatch", () => {
  it("runs the export layout end to end", () => {
    const result = previewBatch(batch, emptyRegistry(), { mapper: createFixedSchemaMapper(fixedSchema) });

    expect(result.outcome.new.map((entry) => entry.key)).toEqual(["100_A", "100_B"]);
    expect(result.registryTable.rows[0]).toEqual(["100", "John", "Smith", "", "", "1(555) 999-9999", "", "", "", "A"]);
    expect(result.stats).toEqual({
      totalRows: 3,
      uniqueDonors: 1,
      duplicatesDropped: 1,
      excluded: 0,
      newDonors: 2,
      updatedRecords: 0,
      unchanged: 0,
      leads: 2
    });
  });

  it("rejects an upload missing export columns before reading rows", () => {
    const rows = [{ "Donor #": "100", Facility: "A" }];
    expect(() => previewBatch(rows, emptyRegistry(), { mapper: createFixedSchemaMapper(fixedSchema) })).toThrow(
      SchemaError
    );
  });
});

describe("executeBatch", () => {
  it("reaches a fixed point when the same batch is applied twice", async () => {
    const store = createMemoryRegistryStore();
    const mapper = createFixedSchemaMapper(fixedSchema);

    await executeBatch(batch, { mapper, store });
    const afterFirst = store.registryTable();
    const second = await executeBatch(batch, { mapper, store });

    expect(second.stats.newDonors).toBe(0);
    expect(second.stats.updatedRecords).toBe(0);
    expect(second.stats.unchanged).toBe(2);
    expect(second.leads).toEqual([]);
    expect(store.registryTable()).toEqual(afterFirst);
    expect(store.auditLog()).toHaveLength(2);
  });

  it("updates a changed phone and raises a lead", async () => {
    const store = createMemoryRegistryStore();
    const mapper = createFixedSchemaMapper(fixedSchema);
    await executeBatch(batch, { mapper, store });

    const result = await executeBatch([visit("A", "555-000-1111", "04/01/2024")], { mapper, store });

    expect(result.outcome.updated.map((entry) => entry.key)).toEqual(["100_A"]);
    expect(result.leads.map((lead) => lead.donor_phone)).toEqual(["1(555) 000-1111"]);
    expect(store.registryTable().rows.map((row) => [row[5], row[9]])).toEqual([
      ["", "B"],
      ["1(555) 000-1111", "A"]
    ]);
    expect(store.auditLog()).toHaveLength(3);
  });

  it("wraps a failed registry load", async () => {
    const store: RegistryStore = {
      ...createMemoryRegistryStore(),
      load: async () => {
        throw new Error("connection reset");
      }
    };
    const error = await capture(executeBatch(batch, { mapper: createFixedSchemaMapper(fixedSchema), store }));

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toMatchObject({ stage: "load", result: undefined });
  });

  it("returns the computed result when the registry write fails", async () => {
    const store: RegistryStore = {
      ...createMemoryRegistryStore(),
      replace: async () => {
        throw new Error("disk full");
      }
    };
    const error = await capture(executeBatch(batch, { mapper: createFixedSchemaMapper(fixedSchema), store }));

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toMatchObject({ stage: "replace", result: { stats: { newDonors: 2 } } });
  });

  it("reports a failed audit append after the registry was replaced", async () => {
    const memory = createMemoryRegistryStore();
    const store: RegistryStore = {
      load: () => memory.load(),
      replace: (table) => memory.replace(table),
      appendAudit: async () => {
        throw new Error("quota exceeded");
      }
    };
    const error = await capture(executeBatch(batch, { mapper: createFixedSchemaMapper(fixedSchema), store }));

    expect(error).toMatchObject({ stage: "append" });
    expect(memory.registryTable().rows).toHaveLength(2);
  });

  it("matches a facility spelled with different capitalization", async () => {
    const store = createMemoryRegistryStore();
    const mapper = createAssistedMapper({ donor_number: "ID", donor_name: "Name", facility: "Site" });

    await executeBatch([{ ID: "100", Name: "Smith, john", Site: "Center A" }], { mapper, store });
    const result = await executeBatch([{ ID: "100", Name: "Smith, john", Site: "CENTER A" }], { mapper, store });

    expect(result.outcome.new).toEqual([]);
    expect(result.leads).toEqual([]);
    expect(store.registryTable().rows).toHaveLength(1);
  });
});

describe("syncDonorUpload", () => {
  const csv = Buffer.from('Donor #,Name,Site,DOB\n100,"Smith, john",A,03/15/1990\n');

  it("suggests a mapping and previews birthdates", () => {
    const prepared = prepareMapping({ buffer: csv, fileName: "batch.csv" });
    expect(prepared.mapping).toEqual({ donor_number: "Donor #", donor_name: "Name", facility: "Site", birthdate: "DOB" });
    expect(prepared.birthdatePreview).toEqual([{ raw: "03/15/1990", birthdate: "1990-03-15" }]);
  });

  it("applies a confirmed mapping and renders the leads file", async () => {
    const store = createMemoryRegistryStore();
    const { mapping } = prepareMapping({ buffer: csv, fileName: "batch.csv" });

    const synced = await syncDonorUpload({ buffer: csv, fileName: "batch.csv" }, { mapping, store });

    expect(synced.leadsFileName).toBe("donor-leads-for-upload.csv");
    expect(synced.leadsCsv).toBe("donor_number,donor_first,donor_last,facility,birthdate\r\n100,John,Smith,A,1990-03-15");
    expect(store.auditLog()).toEqual([
      ["100", "John", "Smith", "", "", "", "", "", "", "A", "x", "x", "x", "x", "1990-03-15"]
    ]);
  });

  it("leaves the registry untouched when the export layout is incomplete", async () => {
    const store = createMemoryRegistryStore();
    const error = await capture(syncDonorUpload({ buffer: csv, fileName: "batch.csv" }, { store }));

    expect(error).toBeInstanceOf(SchemaError);
    expect(store.registryTable().rows).toEqual([]);
  });
});
