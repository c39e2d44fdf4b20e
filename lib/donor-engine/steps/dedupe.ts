import type { NormalizedDonorRecord } from "../types";
import { isKeyable, matchKey, recordKey } from "./reconcile";

type DedupeConfig = {
  /** Set when the batch maps a last-donation-date column. */
  byDonationDate: boolean;
};

type DedupeResult = {
  records: NormalizedDonorRecord[];
  dropped: number;
};

function donationTime(record: NormalizedDonorRecord): number {
  return record.last_donation_date?.getTime() ?? Number.NEGATIVE_INFINITY;
}

function mostRecentFirst(a: NormalizedDonorRecord, b: NormalizedDonorRecord): number {
  const left = donationTime(a);
  const right = donationTime(b);
  if (left === right) return 0;
  return right > left ? 1 : -1;
}

/**
 * Keeps one record per (donor_number, facility). With donation dates the
 * most recent visit wins; without them the first row seen wins.
 * Records that cannot be keyed pass through for reconciliation to report.
 */
export function dedupeRecords(records: NormalizedDonorRecord[], config: DedupeConfig): DedupeResult {
  const ordered = config.byDonationDate ? [...records].sort(mostRecentFirst) : records;
  const seen = new Set<string>();
  const kept: NormalizedDonorRecord[] = [];
  let dropped = 0;

  for (const record of ordered) {
    if (!isKeyable(record)) {
      kept.push(record);
      continue;
    }
    const key = matchKey(recordKey(record));
    if (seen.has(key)) {
      dropped += 1;
      continue;
    }
    seen.add(key);
    kept.push(record);
  }

  return { records: kept, dropped };
}
