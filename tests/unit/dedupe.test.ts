import { describe, expect, it } from "vitest";
import { dedupeRecords } from "@/lib/donor-engine/steps/dedupe";
import { donor } from "../helpers";

describe("dedupeRecords", () => {
  it("keeps the most recent visit per donor and facility", () => {
    const older = donor({ donor_phone: "1(555) 000-0001", last_donation_date: new Date(2024, 0, 1) });
    const newer = donor({ donor_phone: "1(555) 000-0002", last_donation_date: new Date(2024, 2, 1) });

    const result = dedupeRecords([older, newer], { byDonationDate: true });

    expect(result.records).toEqual([newer]);
    expect(result.dropped).toBe(1);
  });

  it("sorts visits without a donation date last", () => {
    const undated = donor({ donor_phone: "a", last_donation_date: null });
    const dated = donor({ donor_phone: "b", last_donation_date: new Date(2023, 5, 1) });

    const result = dedupeRecords([undated, dated], { byDonationDate: true });

    expect(result.records.map((record) => record.donor_phone)).toEqual(["b"]);
  });

  it("keeps the first row when no donation date is mapped", () => {
    const first = donor({ donor_phone: "a" });
    const second = donor({ donor_phone: "b" });

    expect(dedupeRecords([first, second], { byDonationDate: false }).records).toEqual([first]);
  });

  it("keeps the same donor number at different facilities", () => {
    const records = [donor({ facility: "A" }), donor({ facility: "B" })];
    const result = dedupeRecords(records, { byDonationDate: false });
    expect(result.records).toHaveLength(2);
    expect(result.dropped).toBe(0);
  });

  it("treats facility capitalization as the same site", () => {
    const result = dedupeRecords([donor({ facility: "Center A" }), donor({ facility: "CENTER A" })], {
      byDonationDate: false
    });
    expect(result.records).toHaveLength(1);
  });

  it("passes records without a key through", () => {
    const records = [donor({ donor_number: "" }), donor({ donor_number: "" })];
    const result = dedupeRecords(records, { byDonationDate: false });
    expect(result.records).toHaveLength(2);
    expect(result.dropped).toBe(0);
  });
});
