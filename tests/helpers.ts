import type { MasterRecord, NormalizedDonorRecord } from "@/lib/donor-engine/types";

export function donor(overrides: Partial<NormalizedDonorRecord> = {}): NormalizedDonorRecord {
  return {
    donor_number: "100",
    donor_first: "John",
    donor_last: "Smith",
    facility: "A",
    ...overrides
  };
}

export function master(overrides: Partial<MasterRecord> = {}): MasterRecord {
  return {
    donor_number: "100",
    donor_first: "John",
    donor_last: "Smith",
    donor_email: "",
    donor_account: "",
    donor_phone: "",
    donor_address: "",
    zip_code: "",
    donor_status: "",
    center: "A",
    ...overrides
  };
}
