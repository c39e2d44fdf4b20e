import { describe, expect, it } from "vitest";
import { registryToTable } from "@/lib/donor-engine/registry";
import { mergeRegistry, toMasterRecord } from "@/lib/donor-engine/steps/merge";
import { reconcile } from "@/lib/donor-engine/steps/reconcile";
import type { RegistrySnapshot } from "@/lib/donor-engine/types";
import { donor, master } from "../helpers";

describe("toMasterRecord", () => {
  it("writes blank cells for rejected values", () => {
    const record = toMasterRecord(donor({ donor_email: null, donor_phone: "1(555) 123-4567" }), false);
    expect(record.donor_email).toBe("");
    expect(record.donor_phone).toBe("1(555) 123-4567");
    expect(record.center).toBe("A");
    expect("birthdate" in record).toBe(false);
  });

  it("keeps registry values for fields the batch did not carry", () => {
    const previous = master({ donor_account: "ACC-1", birthdate: "1980-01-01" });
    const record = toMasterRecord(donor({ donor_email: "new@example.com" }), true, previous);
    expect(record.donor_account).toBe("ACC-1");
    expect(record.donor_email).toBe("new@example.com");
    expect(record.birthdate).toBe("1980-01-01");
  });
});

describe("mergeRegistry", () => {
  it("adds new donors to an empty registry", () => {
    const registry: RegistrySnapshot = { records: [], tracksBirthdate: false };
    const merged = mergeRegistry(registry, reconcile([donor()], registry));
    expect(merged.records).toHaveLength(1);
    expect(merged.records[0].donor_number).toBe("100");
    expect(merged.records[0].center).toBe("A");
  });

  it("keeps untouched rows first, then updated, then new", () => {
    const registry: RegistrySnapshot = {
      records: [
        master({ donor_number: "100", donor_phone: "1(555) 000-0001" }),
        master({ donor_number: "200", donor_phone: "1(555) 000-0002" })
      ],
      tracksBirthdate: false
    };
    const batch = [
      donor({ donor_number: "100", donor_phone: "1(555) 999-9999" }),
      donor({ donor_number: "300", facility: "B" })
    ];

    const merged = mergeRegistry(registry, reconcile(batch, registry));

    expect(merged.records.map((record) => `${record.donor_number}_${record.center}`)).toEqual([
      "200_A",
      "100_A",
      "300_B"
    ]);
    expect(merged.records[1].donor_phone).toBe("1(555) 999-9999");
  });

  it("never touches the same donor number at another facility", () => {
    const registry: RegistrySnapshot = {
      records: [
        master({ center: "A", donor_phone: "1(555) 000-0001" }),
        master({ center: "B", donor_phone: "1(555) 000-0002" })
      ],
      tracksBirthdate: false
    };
    const merged = mergeRegistry(registry, reconcile([donor({ facility: "A", donor_phone: "1(555) 999-9999" })], registry));
    const siteB = merged.records.find((record) => record.center === "B");
    expect(siteB?.donor_phone).toBe("1(555) 000-0002");
    expect(merged.records).toHaveLength(2);
  });

  it("replaces only the row that shares the exact key", () => {
    const registry: RegistrySnapshot = {
      records: [master({ center: "a", donor_phone: "x" }), master({ center: "A", donor_phone: "y" })],
      tracksBirthdate: false
    };
    const outcome = reconcile([donor({ facility: "A", donor_phone: "1(555) 999-9999" })], registry);
    const merged = mergeRegistry(registry, outcome);

    expect(outcome.updated[0].master.donor_phone).toBe("y");
    expect(merged.records.map((record) => `${record.center}:${record.donor_phone}`)).toEqual([
      "a:x",
      "A:1(555) 999-9999"
    ]);
  });

  it("collapses repeated rows of the updated key into the update", () => {
    const registry: RegistrySnapshot = {
      records: [master({ donor_phone: "x" }), master({ donor_phone: "y" }), master({ donor_number: "200" })],
      tracksBirthdate: false
    };
    const merged = mergeRegistry(registry, reconcile([donor({ donor_phone: "1(555) 999-9999" })], registry));
    expect(merged.records.map((record) => `${record.donor_number}:${record.donor_phone}`)).toEqual([
      "200:",
      "100:1(555) 999-9999"
    ]);
  });

  it("preserves the birthdate column for tracking registries", () => {
    const registry: RegistrySnapshot = { records: [master({ birthdate: "1980-01-01" })], tracksBirthdate: true };
    const merged = mergeRegistry(registry, reconcile([donor({ facility: "B", birthdate: "1990-03-15" })], registry));
    expect(registryToTable(merged).rows).toEqual([
      ["100", "John", "Smith", "", "", "", "", "", "", "A", "1980-01-01"],
      ["100", "John", "Smith", "", "", "", "", "", "", "B", "1990-03-15"]
    ]);
  });
});
